import type { FieldStore, Reconciler } from "./fieldStore.js";

/**
 * Writes the target fields from the source fields. For the to-direction the
 * sources are the wrapper fields; for the from-direction, the wrapped ones.
 */
export type WrapperConverter = (
  store: FieldStore,
  sourceFieldNames: readonly string[],
  targetFieldNames: readonly string[],
  ...args: unknown[]
) => void;

export type WrapperMapping = {
  readonly wrapperFieldNames: readonly string[];
  readonly wrappedFieldNames: readonly string[];
  readonly toConverter: WrapperConverter;
  readonly fromConverter: WrapperConverter;
  readonly toArgs: readonly unknown[];
  readonly fromArgs: readonly unknown[];
};

export type WrapperDirection = "to" | "from" | "none";

export class WrapperEngine implements Reconciler {
  private readonly registered: WrapperMapping[] = [];

  get mappings(): readonly WrapperMapping[] {
    return this.registered;
  }

  /**
   * Overlapping or empty name sets are accepted as given; what reconcile()
   * makes of them is up to the converters.
   */
  register(
    wrapperFieldNames: readonly string[],
    wrappedFieldNames: readonly string[],
    toConverter: WrapperConverter,
    fromConverter: WrapperConverter,
    toArgs: readonly unknown[] = [],
    fromArgs: readonly unknown[] = [],
  ): this {
    this.registered.push(
      Object.freeze({
        wrapperFieldNames: Object.freeze([...wrapperFieldNames]),
        wrappedFieldNames: Object.freeze([...wrappedFieldNames]),
        toConverter,
        fromConverter,
        toArgs: Object.freeze([...toArgs]),
        fromArgs: Object.freeze([...fromArgs]),
      }),
    );
    return this;
  }

  /**
   * Run at most one converter per mapping, in registration order. Fields
   * written by one converter are seen by the mappings after it. There is no
   * guard against converters that keep feeding each other, and a throwing
   * converter leaves earlier writes in place.
   */
  reconcile(store: FieldStore): void {
    for (const mapping of this.registered) {
      const direction = decideDirection(store, mapping);
      if (direction === "to") {
        mapping.toConverter(store, mapping.wrapperFieldNames, mapping.wrappedFieldNames, ...mapping.toArgs);
      } else if (direction === "from") {
        mapping.fromConverter(store, mapping.wrappedFieldNames, mapping.wrapperFieldNames, ...mapping.fromArgs);
      }
    }
  }

  /** Every field wrapped by a mapping that lists `wrapperFieldName` as a wrapper. */
  wrappedFieldsOf(wrapperFieldName: string): string[] {
    const wrapped = new Set<string>();
    for (const mapping of this.registered) {
      if (!mapping.wrapperFieldNames.includes(wrapperFieldName)) continue;
      for (const name of mapping.wrappedFieldNames) wrapped.add(name);
    }
    return [...wrapped];
  }
}

export function decideDirection(store: FieldStore, mapping: WrapperMapping): WrapperDirection {
  const missingWrapper = mapping.wrapperFieldNames.some((name) => !store.has(name));
  const missingWrapped = mapping.wrappedFieldNames.some((name) => !store.has(name));

  if (missingWrapper === missingWrapped) return "none";
  return missingWrapped ? "to" : "from";
}
