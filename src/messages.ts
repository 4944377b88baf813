import type { Translator, ValidationParams } from "./formTypes.js";

export const DEFAULT_MESSAGES: Readonly<Record<string, string>> = {
  is_empty: "Value is required and can't be empty",
  too_short: "Value must be at least {min} characters long",
  too_long: "Value must be at most {max} characters long",
  not_match: "Value does not match the pattern {pattern}",
  not_numeric: "Value must be a number",
  not_between: "Value must be between {min} and {max}",
  not_in_array: "Value is not one of the allowed values",
  invalid_format: "Value is not a valid {format}",
  schema_mismatch: "Value does not match the schema: {detail}",
};

/**
 * Build a translator from message templates. `{name}` placeholders are
 * filled from the error params; codes without a template come back as is.
 */
export function createTranslator(templates: Readonly<Record<string, string>>): Translator {
  return (code: string, params: ValidationParams): string => {
    const template = Object.hasOwn(templates, code) ? templates[code] : undefined;
    if (template === undefined) return code;
    return template.replace(/\{(\w+)\}/g, (placeholder: string, key: string) =>
      Object.hasOwn(params, key) ? String(params[key]) : placeholder,
    );
  };
}

export const defaultTranslator = createTranslator(DEFAULT_MESSAGES);
