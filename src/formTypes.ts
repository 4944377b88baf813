export type FieldValue = string | number | boolean | null;

/** Request-shaped data: string keys to leaves or further mappings. */
export type NestedFields = {
  [key: string]: FieldValue | NestedFields;
};

/** Delimiter-joined field names to leaf values. */
export type FlatFields = Record<string, FieldValue>;

export type FieldLookup =
  | { present: true; value: FieldValue }
  | { present: false };

export type ValidationParams = Readonly<Record<string, unknown>>;

export type ValidationError = {
  code: string;
  params: ValidationParams;
};

/**
 * Turns an error code into text. Omitting a translator where one is
 * accepted yields the raw codes.
 */
export type Translator = (code: string, params: ValidationParams) => string;

export type FormStatus = "not-started" | "in-progress" | "complete";

export type FormOverallValidity = "unknown" | "valid" | "invalid";

export function isFieldValue(value: unknown): value is FieldValue {
  return (
    value === null ||
    typeof value === "string" ||
    typeof value === "number" ||
    typeof value === "boolean"
  );
}

export function isFieldMapping(value: unknown): value is Record<string, unknown> {
  if (typeof value !== "object" || value === null) return false;
  if (Array.isArray(value)) return true;
  const proto: unknown = Object.getPrototypeOf(value);
  return proto === Object.prototype || proto === null;
}
