import { z } from "zod";
import { InvalidValidatorArgumentsError, ValidatorNotFoundError, formatIssues } from "./errors.js";
import type { Validator } from "./validator.js";

export const BUILTIN_VALIDATOR_NAMESPACE = "builtin.validators";

export const DEFAULT_VALIDATOR_NAMESPACES: readonly string[] = ["", BUILTIN_VALIDATOR_NAMESPACE];

export type ValidatorFactory = (args: readonly unknown[]) => Validator;

/** Qualified validator names to factories. */
export class ValidatorRegistry {
  private readonly factories = new Map<string, ValidatorFactory>();

  register(qualifiedName: string, factory: ValidatorFactory): this {
    this.factories.set(qualifiedName, factory);
    return this;
  }

  has(qualifiedName: string): boolean {
    return this.factories.has(qualifiedName);
  }

  /**
   * Instantiate the first of `namespace.name` that is registered, trying the
   * namespaces in order. The empty namespace means the bare name.
   */
  resolve(name: string, namespaces: readonly string[], args: readonly unknown[] = []): Validator {
    const tried: string[] = [];
    for (const namespace of namespaces) {
      const qualifiedName = qualifyName(namespace, name);
      tried.push(qualifiedName);
      const factory = this.factories.get(qualifiedName);
      if (factory) return factory(args);
    }
    throw new ValidatorNotFoundError(name, tried);
  }
}

export function qualifyName(namespace: string, name: string): string {
  return namespace ? `${namespace}.${name}` : name;
}

export function normalizeNamespace(namespace: string): string {
  return namespace.replace(/^\.+|\.+$/g, "");
}

/** Check validator constructor arguments against a schema. */
export function parseValidatorArgs<Out>(
  validatorName: string,
  schema: z.ZodType<Out, z.ZodTypeDef, unknown>,
  args: readonly unknown[],
): Out {
  const result = schema.safeParse(args);
  if (!result.success) {
    throw new InvalidValidatorArgumentsError(validatorName, formatIssues(result.error.issues));
  }
  return result.data;
}
