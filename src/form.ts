import { FieldStore } from "./fieldStore.js";
import { parseFormConfig } from "./formConfig.js";
import type { FormConfig, FormConfigInput } from "./formConfig.js";
import type { FieldLookup, FieldValue, FlatFields, NestedFields, Translator, ValidationParams } from "./formTypes.js";
import { ValidationOrchestrator } from "./validationOrchestrator.js";
import { WrapperEngine } from "./wrapperEngine.js";
import type { WrapperConverter } from "./wrapperEngine.js";

/**
 * Binds submitted data to fields, keeps wrapper fields and wrapped fields in
 * step, and validates the result.
 *
 * Subclasses set themselves up in init(), which runs after the configuration
 * is read and before the initial fields are imported:
 *
 * @example
 * class EventForm extends Form {
 *   protected init(): void {
 *     this.addWrapper(["date", "time"], ["datetime"], join, split)
 *       .appendValidator("datetime", "Format", ["date-time"]);
 *   }
 * }
 */
export class Form {
  protected readonly config: FormConfig;
  protected readonly store: FieldStore;
  protected readonly wrappers: WrapperEngine;
  protected readonly validation: ValidationOrchestrator;

  constructor(fields: unknown = {}, config: FormConfigInput = {}) {
    this.config = parseFormConfig(config);
    this.wrappers = new WrapperEngine();
    this.store = new FieldStore({ delimiter: this.config.delimiter, reconciler: this.wrappers });
    this.validation = new ValidationOrchestrator({
      registry: this.config.validatorRegistry,
      wrappers: this.wrappers,
      namespaces: this.config.validatorNamespaces,
    });
    this.store.onDataChanged(() => this.onDataChanged());
    this.init();
    this.fromNested(fields);
  }

  protected init(): void {}

  /** Called whenever one or more values were added or changed. */
  protected onDataChanged(): void {}

  getConfig(key: string): unknown {
    return Object.hasOwn(this.config, key) ? this.config[key] : undefined;
  }

  get delimiter(): string {
    return this.store.delimiter;
  }

  addWrapper(
    wrapperFieldNames: readonly string[],
    wrappedFieldNames: readonly string[],
    toConverter: WrapperConverter,
    fromConverter: WrapperConverter,
    toArgs: readonly unknown[] = [],
    fromArgs: readonly unknown[] = [],
  ): this {
    this.wrappers.register(wrapperFieldNames, wrappedFieldNames, toConverter, fromConverter, toArgs, fromArgs);
    return this;
  }

  appendValidationNamespace(namespace: string): this {
    this.validation.appendValidationNamespace(namespace);
    return this;
  }

  appendValidator(fieldName: string, validatorName: string, constructorArgs: readonly unknown[] = []): this {
    this.validation.appendValidator(fieldName, validatorName, constructorArgs);
    return this;
  }

  /** For failures found outside the declared chains, e.g. a taken username. */
  addError(fieldName: string, errorCode: string, params: ValidationParams = {}): this {
    this.validation.addCustomError(fieldName, errorCode, params);
    return this;
  }

  get(name: string): FieldValue {
    return this.store.get(name);
  }

  lookup(name: string): FieldLookup {
    return this.store.lookup(name);
  }

  has(name: string): boolean {
    return this.store.has(name);
  }

  set(name: string, value: FieldValue): this {
    this.store.set(name, value);
    return this;
  }

  unset(name: string): this {
    this.store.unset(name);
    return this;
  }

  fromNested(fields: unknown): this {
    this.store.importNested(fields);
    return this;
  }

  toNested(): NestedFields {
    return this.store.exportNested();
  }

  toFlat(): Readonly<FlatFields> {
    return this.store.exportFlat();
  }

  getValue(name: string): FieldValue | NestedFields {
    return this.store.getValueResolved(name);
  }

  /** Run every chain against the current values. */
  validate(): boolean {
    return this.validation.validate(this.store);
  }

  /** Reflects the last validate() run. */
  isValid(fieldName: string): boolean {
    return this.validation.isValid(fieldName);
  }

  getErrors(fieldName: string, wrappedFallback?: boolean): string[];
  getErrors(fieldName?: null, wrappedFallback?: boolean): Record<string, string[]>;
  getErrors(fieldName: string | null = null, wrappedFallback = true): string[] | Record<string, string[]> {
    return fieldName === null
      ? this.validation.getErrors(null, wrappedFallback)
      : this.validation.getErrors(fieldName, wrappedFallback);
  }

  getErrorMessages(fieldName: string, translator?: Translator): string[];
  getErrorMessages(fieldName: null, translator?: Translator): Record<string, string[]>;
  getErrorMessages(fieldName: string | null, translator?: Translator): string[] | Record<string, string[]> {
    return fieldName === null
      ? this.validation.getErrorMessages(null, translator)
      : this.validation.getErrorMessages(fieldName, translator);
  }

  get validatedFieldNames(): string[] {
    return this.validation.fieldNames;
  }
}
