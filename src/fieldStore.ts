import { flattenFields, getByPath, unflattenFields } from "./fieldPaths.js";
import { isFieldMapping } from "./formTypes.js";
import type { FieldLookup, FieldValue, FlatFields, NestedFields } from "./formTypes.js";

export const DEFAULT_DELIMITER = ":";

/** Runs after every bulk import, before observers hear about the change. */
export interface Reconciler {
  reconcile(store: FieldStore): void;
}

export type DataChangedListener = (store: FieldStore) => void;

export type FieldStoreOptions = {
  delimiter?: string;
  reconciler?: Reconciler;
};

/**
 * Flat storage of field values. Nested data goes in through importNested()
 * and comes back out through exportNested(); the flat map is the record.
 */
export class FieldStore {
  readonly delimiter: string;
  private readonly fields = new Map<string, FieldValue>();
  private readonly listeners = new Set<DataChangedListener>();
  private readonly reconciler: Reconciler | undefined;

  constructor(options: FieldStoreOptions = {}) {
    this.delimiter = options.delimiter ?? DEFAULT_DELIMITER;
    this.reconciler = options.reconciler;
  }

  get size(): number {
    return this.fields.size;
  }

  has(name: string): boolean {
    return this.fields.has(name);
  }

  lookup(name: string): FieldLookup {
    if (!this.fields.has(name)) return { present: false };
    return { present: true, value: this.fields.get(name) ?? null };
  }

  /** The stored value, or "" when the field is absent. */
  get(name: string): FieldValue {
    const found = this.lookup(name);
    return found.present ? found.value : "";
  }

  set(name: string, value: FieldValue): this {
    this.fields.set(name, value);
    this.emitDataChanged();
    return this;
  }

  unset(name: string): this {
    this.fields.delete(name);
    return this;
  }

  /**
   * Merge nested data into the store. Anything that is not a mapping at the
   * top level is ignored.
   */
  importNested(input: unknown): this {
    if (!isFieldMapping(input)) return this;

    for (const [name, value] of flattenFields(input, this.delimiter)) {
      this.fields.set(name, value);
    }
    this.reconciler?.reconcile(this);
    this.emitDataChanged();
    return this;
  }

  exportNested(): NestedFields {
    return unflattenFields(this.fields, this.delimiter);
  }

  exportFlat(): Readonly<FlatFields> {
    return Object.freeze(Object.fromEntries(this.fields));
  }

  /**
   * A stored name reads like `get`. Otherwise the path is read against the
   * nested projection: a branch yields the whole subtree, a miss yields "".
   */
  getValueResolved(name: string): FieldValue | NestedFields {
    const found = this.lookup(name);
    if (found.present) return found.value;
    return getByPath(this.exportNested(), name, this.delimiter) ?? "";
  }

  onDataChanged(listener: DataChangedListener): () => void {
    this.listeners.add(listener);
    return () => {
      this.listeners.delete(listener);
    };
  }

  private emitDataChanged(): void {
    for (const listener of this.listeners) listener(this);
  }
}
