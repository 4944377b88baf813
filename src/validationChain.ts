import type { FieldValue, Translator, ValidationError, ValidationParams } from "./formTypes.js";
import type { Validator } from "./validator.js";

/**
 * Ordered validators for one field, plus the errors of the last run.
 *
 * Custom errors are kept apart from the run errors: they survive repeated
 * isValid() calls and make the chain invalid until it is discarded.
 */
export class ValidationChain {
  private readonly validators: Validator[] = [];
  private runErrors: ValidationError[] = [];
  private readonly customErrors: ValidationError[] = [];

  get length(): number {
    return this.validators.length;
  }

  appendValidator(validator: Validator): this {
    this.validators.push(validator);
    return this;
  }

  addCustomError(code: string, params: ValidationParams = {}): this {
    this.customErrors.push({ code, params });
    return this;
  }

  isValid(value: FieldValue): boolean {
    const errors: ValidationError[] = [];
    for (const validator of this.validators) {
      if (!validator.isValid(value)) errors.push(...validator.getErrors());
    }
    this.runErrors = errors;
    return this.getErrorDetails().length === 0;
  }

  getErrorDetails(): ValidationError[] {
    return [...this.runErrors, ...this.customErrors];
  }

  getErrors(): string[] {
    return this.getErrorDetails().map((e) => e.code);
  }

  getMessages(translator?: Translator): string[] {
    return this.getErrorDetails().map((e) => (translator ? translator(e.code, e.params) : e.code));
  }
}
