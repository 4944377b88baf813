import AjvModule from "ajv";
import type { ErrorObject, SchemaObject, ValidateFunction } from "ajv";
import addFormatsModule from "ajv-formats";
import { z } from "zod";
import { InvalidValidatorArgumentsError } from "./errors.js";
import { isFieldMapping, isFieldValue } from "./formTypes.js";
import type { FieldValue } from "./formTypes.js";
import { Validator } from "./validator.js";
import {
  BUILTIN_VALIDATOR_NAMESPACE,
  ValidatorRegistry,
  parseValidatorArgs,
  qualifyName,
} from "./validatorRegistry.js";

const Ajv = AjvModule.default;
const addFormats = addFormatsModule.default;
const ajv = new Ajv({ allErrors: true, strict: false });
addFormats(ajv);

function asText(value: FieldValue): string {
  return value === null ? "" : String(value);
}

export class NotEmpty extends Validator {
  protected validate(value: FieldValue): void {
    if (value === null || asText(value).trim() === "") this.error("is_empty");
  }
}

export class StringLength extends Validator {
  constructor(
    private readonly min: number,
    private readonly max?: number,
  ) {
    super();
  }

  protected validate(value: FieldValue): void {
    // code points, so a surrogate pair counts once
    const length = [...asText(value)].length;
    if (length < this.min) {
      this.error("too_short", { min: this.min, length });
    } else if (this.max !== undefined && length > this.max) {
      this.error("too_long", { max: this.max, length });
    }
  }
}

export class Regex extends Validator {
  constructor(private readonly pattern: RegExp) {
    super();
  }

  protected validate(value: FieldValue): void {
    this.pattern.lastIndex = 0;
    if (!this.pattern.test(asText(value))) {
      this.error("not_match", { pattern: this.pattern.source });
    }
  }
}

export class Between extends Validator {
  constructor(
    private readonly min: number,
    private readonly max: number,
    private readonly inclusive = true,
  ) {
    super();
  }

  protected validate(value: FieldValue): void {
    const n = typeof value === "number" ? value : typeof value === "string" && value.trim() !== "" ? Number(value) : NaN;
    if (!Number.isFinite(n)) {
      this.error("not_numeric");
      return;
    }
    const inRange = this.inclusive ? n >= this.min && n <= this.max : n > this.min && n < this.max;
    if (!inRange) this.error("not_between", { min: this.min, max: this.max });
  }
}

export class InArray extends Validator {
  constructor(
    private readonly haystack: readonly FieldValue[],
    private readonly strict = true,
  ) {
    super();
  }

  protected validate(value: FieldValue): void {
    const found = this.strict
      ? this.haystack.includes(value)
      : this.haystack.some((candidate) => asText(candidate) === asText(value));
    if (!found) this.error("not_in_array");
  }
}

/** String formats from ajv-formats: email, date, time, date-time, uri, uuid, ... */
export class Format extends Validator {
  private readonly check: ValidateFunction;

  constructor(private readonly format: string) {
    super();
    this.check = ajv.compile({ type: "string", format });
  }

  protected validate(value: FieldValue): void {
    if (!this.check(value)) this.error("invalid_format", { format: this.format });
  }
}

/** Validates the raw value against a JSON Schema. */
export class Schema extends Validator {
  private readonly check: ValidateFunction;

  constructor(schema: SchemaObject) {
    super();
    this.check = ajv.compile(schema);
  }

  protected validate(value: FieldValue): void {
    if (this.check(value)) return;
    const errors: ErrorObject[] = this.check.errors ?? [];
    this.error("schema_mismatch", {
      detail: errors.map((e) => `${e.instancePath || "value"} ${e.message ?? "is invalid"}`).join("; "),
    });
  }
}

const fieldValueSchema = z.custom<FieldValue>(isFieldValue, { message: "Expected a scalar value" });

const regexArgsSchema = z
  .tuple([z.string()])
  .rest(z.string())
  .refine((args) => args.length <= 2, { message: "Expected a pattern and optional flags" })
  .transform(([pattern, ...rest]) => ({ pattern, flags: rest.at(0) }))
  .refine(({ pattern, flags }) => isValidPattern(pattern, flags), { message: "Invalid regular expression" });

const inArrayArgsSchema = z
  .tuple([z.array(fieldValueSchema)])
  .rest(z.boolean())
  .refine((args) => args.length <= 2, { message: "Expected a list of values and an optional strict flag" })
  .transform(([haystack, ...rest]) => ({ haystack, strict: rest.at(0) }));

function isValidPattern(pattern: string, flags: string | undefined): boolean {
  try {
    new RegExp(pattern, flags);
    return true;
  } catch {
    return false;
  }
}

const builtins: Record<string, (args: readonly unknown[]) => Validator> = {
  NotEmpty: (args) => {
    parseValidatorArgs("NotEmpty", z.tuple([]), args);
    return new NotEmpty();
  },
  StringLength: (args) => {
    const [opts] = parseValidatorArgs(
      "StringLength",
      z.tuple([
        z
          .object({ min: z.number().int().min(0).default(0), max: z.number().int().min(0).optional() })
          .refine((o) => o.max === undefined || o.max >= o.min, { message: "max must not be below min" }),
      ]),
      args,
    );
    return new StringLength(opts.min, opts.max);
  },
  Regex: (args) => {
    const { pattern, flags } = parseValidatorArgs("Regex", regexArgsSchema, args);
    return new Regex(new RegExp(pattern, flags));
  },
  Between: (args) => {
    const [opts] = parseValidatorArgs(
      "Between",
      z.tuple([z.object({ min: z.number(), max: z.number(), inclusive: z.boolean().default(true) })]),
      args,
    );
    return new Between(opts.min, opts.max, opts.inclusive);
  },
  InArray: (args) => {
    const { haystack, strict } = parseValidatorArgs("InArray", inArrayArgsSchema, args);
    return new InArray(haystack, strict);
  },
  Format: (args) => {
    const [format] = parseValidatorArgs(
      "Format",
      z.tuple([z.string().refine((name) => ajv.formats[name] !== undefined, { message: "Unknown format" })]),
      args,
    );
    return new Format(format);
  },
  Schema: (args) => {
    const [schema] = parseValidatorArgs(
      "Schema",
      z.tuple([z.custom<SchemaObject>((v) => isFieldMapping(v) && !Array.isArray(v), { message: "Expected a schema object" })]),
      args,
    );
    try {
      return new Schema(schema);
    } catch (err) {
      throw new InvalidValidatorArgumentsError("Schema", err instanceof Error ? err.message : String(err));
    }
  },
};

export function registerBuiltinValidators(registry: ValidatorRegistry): ValidatorRegistry {
  for (const [name, factory] of Object.entries(builtins)) {
    registry.register(qualifyName(BUILTIN_VALIDATOR_NAMESPACE, name), factory);
  }
  return registry;
}

export function createValidatorRegistry(): ValidatorRegistry {
  return registerBuiltinValidators(new ValidatorRegistry());
}

export const defaultValidatorRegistry = createValidatorRegistry();
