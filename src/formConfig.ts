import { z } from "zod";
import { FormConfigError } from "./errors.js";
import { DEFAULT_DELIMITER } from "./fieldStore.js";
import { DEFAULT_VALIDATOR_NAMESPACES, ValidatorRegistry, normalizeNamespace } from "./validatorRegistry.js";
import { defaultValidatorRegistry } from "./validators.js";

export const formConfigSchema = z
  .object({
    delimiter: z.string().min(1).default(DEFAULT_DELIMITER),
    validatorNamespaces: z.array(z.string().transform(normalizeNamespace)).default([...DEFAULT_VALIDATOR_NAMESPACES]),
    validatorRegistry: z.instanceof(ValidatorRegistry).default(defaultValidatorRegistry),
  })
  .passthrough();

export type FormConfigInput = z.input<typeof formConfigSchema>;
export type FormConfig = Readonly<z.output<typeof formConfigSchema>>;

export function parseFormConfig(input: unknown = {}): FormConfig {
  const result = formConfigSchema.safeParse(input);
  if (!result.success) throw new FormConfigError(result.error.issues);
  return Object.freeze(result.data);
}
