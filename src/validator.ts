import type { FieldValue, ValidationError, ValidationParams } from "./formTypes.js";

/**
 * Base for field validators. Each isValid() call starts from a clean error
 * list; subclasses report failures through error().
 */
export abstract class Validator {
  private errors: ValidationError[] = [];

  isValid(value: FieldValue): boolean {
    this.errors = [];
    this.validate(value);
    return this.errors.length === 0;
  }

  getErrors(): readonly ValidationError[] {
    return this.errors;
  }

  protected abstract validate(value: FieldValue): void;

  protected error(code: string, params: ValidationParams = {}): void {
    this.errors.push({ code, params });
  }
}
