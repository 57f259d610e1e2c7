/**
 * Schema-on-read helpers for JSON document columns
 */

export type JsonObject = Record<string, unknown>;

export type JsonObjectResult =
  | { status: "object"; value: JsonObject }
  | { status: "absent" }
  | { status: "malformed"; raw: unknown };

export function isJsonObject(value: unknown): value is JsonObject {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

/**
 * Serialize a value for a JSON column; null and undefined stay SQL NULL
 */
export function toJsonText(value: unknown): string | null {
  return value === undefined || value === null ? null : JSON.stringify(value);
}

/**
 * Decode a JSON document that may arrive parsed (PostgreSQL JSONB), as JSON
 * text (SQLite, OData string fields), or as JSON text of JSON text.
 */
export function parseJsonObject(value: unknown): JsonObjectResult {
  if (value === null || value === undefined || value === "") {
    return { status: "absent" };
  }

  let current: unknown = value;
  for (let depth = 0; depth < 2 && typeof current === "string"; depth++) {
    try {
      current = JSON.parse(current);
    } catch {
      return { status: "malformed", raw: value };
    }
  }

  if (isJsonObject(current)) return { status: "object", value: current };
  if (current === null) return { status: "absent" };
  return { status: "malformed", raw: value };
}

export function readJsonObject(value: unknown): JsonObject | null {
  const result = parseJsonObject(value);
  return result.status === "object" ? result.value : null;
}

export function readJsonArray(value: unknown): unknown[] {
  let current: unknown = value;
  if (typeof current === "string") {
    try {
      current = JSON.parse(current);
    } catch {
      return [];
    }
  }
  return Array.isArray(current) ? current : [];
}

/**
 * Read a scalar field as trimmed text; blanks and non-scalars become null
 */
export function readText(value: unknown): string | null {
  if (typeof value === "string") {
    const trimmed = value.trim();
    return trimmed === "" ? null : trimmed;
  }
  if (typeof value === "number" && Number.isFinite(value)) return String(value);
  if (typeof value === "boolean") return String(value);
  return null;
}
