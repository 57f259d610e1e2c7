/**
 * Child Aggregator
 *
 * Groups resolved person rows under their parent key as an ordered list of
 * documents with a fixed field projection. Group order is input order; the
 * caller supplies rows in storage order (`ingest_seq`).
 */

import { parseJsonObject, type JsonObject } from "../../db/json.js";
import { AggregationError } from "../../errors.js";
import { syncLogger } from "../../logger.js";
import { readScalarFields } from "../../odk/parser.js";
import {
  PERSON_SCALAR_FIELDS,
  type PersonScalarFields,
} from "../../types/odk.js";

/** Every key a nested person document can carry, in output order */
export const PERSON_DETAIL_FIELDS = [
  "uuid",
  "person_type",
  ...PERSON_SCALAR_FIELDS,
  "occupancy",
] as const;

export type PersonDetailDocument = {
  uuid: string;
  person_type: JsonObject;
} & PersonScalarFields & {
    occupancy: JsonObject;
  };

export interface AggregationInput {
  childKey: string;
  parentKey: string;
  personType: unknown;
  occupancy: unknown;
  fields: PersonScalarFields;
}

export interface AggregationResult {
  /** Parent key -> documents in input order; childless parents are absent */
  groups: Map<string, PersonDetailDocument[]>;
  warnings: AggregationError[];
}

function decodeNested(
  value: unknown,
  childKey: string,
  field: "person_type" | "occupancy",
  warnings: AggregationError[]
): JsonObject {
  const result = parseJsonObject(value);
  if (result.status === "object") return result.value;
  if (result.status === "absent") return {};

  const warning = new AggregationError(
    `Malformed ${field} on child ${childKey}, substituting {}`,
    childKey,
    field
  );
  syncLogger.warn(
    { childKey, field, raw: result.raw },
    "Malformed nested document in child record"
  );
  warnings.push(warning);
  return {};
}

export function toPersonDocument(
  child: AggregationInput,
  warnings: AggregationError[]
): PersonDetailDocument {
  const key = child.childKey;
  const personType = decodeNested(
    child.personType,
    key,
    "person_type",
    warnings
  );
  const occupancy = decodeNested(child.occupancy, key, "occupancy", warnings);

  return {
    uuid: child.childKey,
    person_type: personType,
    ...readScalarFields(child.fields),
    occupancy,
  };
}

export function aggregateChildren(
  children: AggregationInput[]
): AggregationResult {
  const groups = new Map<string, PersonDetailDocument[]>();
  const warnings: AggregationError[] = [];

  for (const child of children) {
    const document = toPersonDocument(child, warnings);
    const group = groups.get(child.parentKey);
    if (group === undefined) {
      groups.set(child.parentKey, [document]);
    } else {
      group.push(document);
    }
  }

  return { groups, warnings };
}
