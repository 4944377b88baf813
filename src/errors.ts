import type { ZodIssue } from "zod";

export type FormErrorCode =
  | "VALIDATOR_NOT_FOUND"
  | "INVALID_VALIDATOR_ARGUMENTS"
  | "CONVERTER_NOT_FOUND"
  | "INVALID_CONFIG"
  | "FORM_NOT_FOUND"
  | "SESSION_NOT_FOUND";

export class FormError extends Error {
  readonly code: FormErrorCode;

  constructor(code: FormErrorCode, message: string) {
    super(message);
    this.name = new.target.name;
    this.code = code;
  }
}

export class ValidatorNotFoundError extends FormError {
  readonly qualifiedName: string;
  readonly triedNames: readonly string[];

  constructor(qualifiedName: string, triedNames: readonly string[]) {
    super("VALIDATOR_NOT_FOUND", `Could not find validator '${qualifiedName}'.`);
    this.qualifiedName = qualifiedName;
    this.triedNames = triedNames;
  }
}

export class InvalidValidatorArgumentsError extends FormError {
  constructor(validatorName: string, detail: string) {
    super("INVALID_VALIDATOR_ARGUMENTS", `Invalid arguments for validator '${validatorName}': ${detail}`);
  }
}

export class ConverterNotFoundError extends FormError {
  constructor(name: string) {
    super("CONVERTER_NOT_FOUND", `Converter not found: ${name}`);
  }
}

export class FormConfigError extends FormError {
  readonly issues: readonly ZodIssue[];

  constructor(issues: readonly ZodIssue[]) {
    super("INVALID_CONFIG", `Invalid form configuration: ${formatIssues(issues)}`);
    this.issues = issues;
  }
}

export class FormNotFoundError extends FormError {
  constructor(formId: string) {
    super("FORM_NOT_FOUND", `Form not found: ${formId}`);
  }
}

export class SessionNotFoundError extends FormError {
  constructor(sessionId: string) {
    super("SESSION_NOT_FOUND", `Session not found: ${sessionId}`);
  }
}

export function formatIssues(issues: readonly ZodIssue[]): string {
  return issues.map((i) => `${i.path.join(".") || "(root)"}: ${i.message}`).join("; ");
}
