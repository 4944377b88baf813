import { z } from "zod";
import { ConverterNotFoundError } from "./errors.js";
import type { WrapperConverter } from "./wrapperEngine.js";

const separatorArgs = z.array(z.string().min(1)).max(1);

function separatorOf(args: readonly unknown[]): string {
  const [separator = " "] = separatorArgs.parse(args);
  return separator;
}

/** Joins every source value into the single target, e.g. date + time → datetime. */
export const join: WrapperConverter = (store, sources, targets, ...args) => {
  const separator = separatorOf(args);
  const [target] = targets;
  if (target === undefined) return;
  const text = sources.map((name) => String(store.get(name) ?? "")).join(separator);
  store.set(target, text);
};

/**
 * Splits the single source across the targets. The last target takes the
 * remainder; targets without a part get "".
 */
export const split: WrapperConverter = (store, sources, targets, ...args) => {
  const separator = separatorOf(args);
  const [source] = sources;
  if (source === undefined || targets.length === 0) return;
  const parts = String(store.get(source) ?? "").split(separator);
  targets.forEach((target, i) => {
    const isLast = i === targets.length - 1;
    store.set(target, isLast ? parts.slice(i).join(separator) : (parts[i] ?? ""));
  });
};

/** source[i] → target[i]; a rename when both sides hold one field. */
export const copy: WrapperConverter = (store, sources, targets) => {
  const count = Math.min(sources.length, targets.length);
  for (let i = 0; i < count; i++) {
    store.set(targets[i], store.get(sources[i]));
  }
};

export class ConverterRegistry {
  private readonly converters = new Map<string, WrapperConverter>();

  register(name: string, converter: WrapperConverter): this {
    this.converters.set(name, converter);
    return this;
  }

  get(name: string): WrapperConverter {
    const converter = this.converters.get(name);
    if (!converter) throw new ConverterNotFoundError(name);
    return converter;
  }

  names(): string[] {
    return [...this.converters.keys()];
  }
}

export function createConverterRegistry(): ConverterRegistry {
  return new ConverterRegistry().register("join", join).register("split", split).register("copy", copy);
}

export const defaultConverterRegistry = createConverterRegistry();
