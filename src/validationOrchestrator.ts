import type { FieldStore } from "./fieldStore.js";
import type { Translator, ValidationParams } from "./formTypes.js";
import { ValidationChain } from "./validationChain.js";
import { DEFAULT_VALIDATOR_NAMESPACES, normalizeNamespace } from "./validatorRegistry.js";
import type { ValidatorRegistry } from "./validatorRegistry.js";

/** The slice of the wrapper engine that error fallback needs. */
export interface WrappedFieldSource {
  wrappedFieldsOf(wrapperFieldName: string): string[];
}

export type ValidationOrchestratorOptions = {
  registry: ValidatorRegistry;
  wrappers: WrappedFieldSource;
  namespaces?: readonly string[];
};

/**
 * Validator chains per field name. Fields without a chain are valid.
 * Results only change when validate() runs again.
 */
export class ValidationOrchestrator {
  private readonly chains = new Map<string, ValidationChain>();
  private readonly namespaces: string[];
  private readonly registry: ValidatorRegistry;
  private readonly wrappers: WrappedFieldSource;

  constructor(options: ValidationOrchestratorOptions) {
    this.registry = options.registry;
    this.wrappers = options.wrappers;
    this.namespaces = (options.namespaces ?? DEFAULT_VALIDATOR_NAMESPACES).map(normalizeNamespace);
  }

  get validationNamespaces(): readonly string[] {
    return this.namespaces;
  }

  get fieldNames(): string[] {
    return [...this.chains.keys()];
  }

  appendValidationNamespace(namespace: string): this {
    this.namespaces.push(normalizeNamespace(namespace));
    return this;
  }

  /** Throws ValidatorNotFoundError before touching any chain. */
  appendValidator(fieldName: string, qualifiedName: string, constructorArgs: readonly unknown[] = []): this {
    const validator = this.registry.resolve(qualifiedName, this.namespaces, constructorArgs);
    this.chainFor(fieldName).appendValidator(validator);
    return this;
  }

  addCustomError(fieldName: string, errorCode: string, params: ValidationParams = {}): this {
    this.chainFor(fieldName).addCustomError(errorCode, params);
    return this;
  }

  validate(store: FieldStore): boolean {
    let valid = true;
    for (const [fieldName, chain] of this.chains) {
      if (!chain.isValid(store.get(fieldName))) valid = false;
    }
    return valid;
  }

  isValid(fieldName: string): boolean {
    const chain = this.chains.get(fieldName);
    if (!chain) return true;
    return chain.getErrors().length === 0;
  }

  getErrorMessages(fieldName: string, translator?: Translator): string[];
  getErrorMessages(fieldName: null, translator?: Translator): Record<string, string[]>;
  getErrorMessages(fieldName: string | null, translator?: Translator): string[] | Record<string, string[]> {
    if (fieldName !== null) {
      return this.chains.get(fieldName)?.getMessages(translator) ?? [];
    }
    return Object.fromEntries([...this.chains].map(([name, chain]) => [name, chain.getMessages(translator)] as const));
  }

  /**
   * Error codes of one field, or of every field with a chain. With
   * `wrappedFallback`, a field without errors of its own reports the errors
   * of the fields it wraps; those lookups run without fallback, so the
   * borrowing goes one level deep only.
   */
  getErrors(fieldName: string, wrappedFallback?: boolean): string[];
  getErrors(fieldName?: null, wrappedFallback?: boolean): Record<string, string[]>;
  getErrors(fieldName: string | null = null, wrappedFallback = true): string[] | Record<string, string[]> {
    if (fieldName !== null) return this.fieldErrors(fieldName, wrappedFallback);

    return Object.fromEntries([...this.chains.keys()].map((name) => [name, this.fieldErrors(name, wrappedFallback)] as const));
  }

  private fieldErrors(fieldName: string, wrappedFallback: boolean): string[] {
    const own = this.chains.get(fieldName)?.getErrors() ?? [];
    if (!wrappedFallback || own.length > 0) return own;

    const borrowed: string[] = [];
    for (const wrapped of this.wrappers.wrappedFieldsOf(fieldName)) {
      borrowed.push(...this.fieldErrors(wrapped, false));
    }
    return borrowed;
  }

  private chainFor(fieldName: string): ValidationChain {
    let chain = this.chains.get(fieldName);
    if (!chain) {
      chain = new ValidationChain();
      this.chains.set(fieldName, chain);
    }
    return chain;
  }
}
