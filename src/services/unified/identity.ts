/**
 * Identity Resolver
 *
 * ODK repeat rows carry no clean foreign key. Depending on the upstream data
 * shape the parent is found through the explicit `__Submissions-id`
 * reference, or by splitting the child's own composite key on a separator
 * (`<parent>_<n>`). The strategy is configuration, not code.
 *
 * ODK fills `__Submissions-id` with the parent's instance id (`uuid:...`)
 * while parents are keyed by their form UUID, so references are looked up in
 * a parent index that maps both spellings to the parent key.
 */

import { IdentityError } from "../../errors.js";

import type { LinkStrategy } from "../../config.js";

export interface ChildIdentityInput {
  key: string | null;
  parentRef: string | null;
  /** Position within the parent's group, used to rebuild a missing key */
  index: number | null;
}

export interface IdentityOptions {
  strategy: LinkStrategy;
  separator: string;
}

export type ChildIdentity =
  | { status: "resolved"; childKey: string; parentKey: string }
  | { status: "rejected"; error: IdentityError };

/** Known parent keys and instance ids, each mapped to the parent key */
export type ParentIndex = ReadonlyMap<string, string>;

export const DEFAULT_IDENTITY_OPTIONS: IdentityOptions = {
  strategy: "hybrid",
  separator: "_",
};

/**
 * Candidate parent key: everything before the first separator, or the whole
 * key when it has none.
 */
export function resolveParentKey(childKey: string, separator: string): string {
  const at = childKey.indexOf(separator);
  return at === -1 ? childKey : childKey.slice(0, at);
}

/**
 * `parentRef + separator + index`, or null without both parts
 */
export function reconstructChildKey(
  parentRef: string | null,
  index: number | null,
  separator: string
): string | null {
  if (parentRef === null || parentRef === "" || index === null) return null;
  return `${parentRef}${separator}${String(index)}`;
}

export function buildParentIndex(
  parents: Iterable<{ uuid: string; instance_id: string | null }>
): ParentIndex {
  const index = new Map<string, string>();
  for (const parent of parents) {
    if (parent.instance_id !== null && parent.instance_id !== "") {
      index.set(parent.instance_id, parent.uuid);
    }
  }
  // Parent keys win over an instance id that happens to spell the same
  for (const parent of parents) {
    index.set(parent.uuid, parent.uuid);
  }
  return index;
}

function linkParent(
  childKey: string,
  parentRef: string | null,
  options: IdentityOptions,
  parents: ParentIndex
): string | null {
  const prefix = resolveParentKey(childKey, options.separator);

  switch (options.strategy) {
    case "reference":
      if (parentRef === null || parentRef === "") return null;
      return parents.get(parentRef) ?? parentRef;
    case "prefix":
      return parents.get(prefix) ?? prefix;
    case "hybrid": {
      if (parentRef === null || parentRef === "") {
        return parents.get(prefix) ?? prefix;
      }
      // An unknown reference falls back to the key prefix before orphaning
      return parents.get(parentRef) ?? parents.get(prefix) ?? parentRef;
    }
  }
}

/**
 * Resolve a child row's own key and its parent key. A parent key that
 * matches no known parent is still resolved; the join drops it later.
 */
export function resolveChildIdentity(
  input: ChildIdentityInput,
  options: IdentityOptions = DEFAULT_IDENTITY_OPTIONS,
  parents: ParentIndex = new Map()
): ChildIdentity {
  const key =
    input.key !== null && input.key !== ""
      ? input.key
      : reconstructChildKey(input.parentRef, input.index, options.separator);

  if (key === null) {
    return {
      status: "rejected",
      error: new IdentityError("Child record has no derivable identity", {
        parentRef: input.parentRef,
        index: input.index,
      }),
    };
  }

  const parentKey = linkParent(key, input.parentRef, options, parents);
  if (parentKey === null || parentKey === "") {
    return {
      status: "rejected",
      error: new IdentityError(
        `Child record ${key} has no parent reference for strategy "${options.strategy}"`,
        { key, parentRef: input.parentRef }
      ),
    };
  }

  return { status: "resolved", childKey: key, parentKey };
}
