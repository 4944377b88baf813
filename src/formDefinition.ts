import * as fs from "fs";
import * as path from "path";
import { z } from "zod";
import { defaultConverterRegistry } from "./converters.js";
import type { ConverterRegistry } from "./converters.js";
import { formatIssues } from "./errors.js";
import { Form } from "./form.js";
import type { ValidatorRegistry } from "./validatorRegistry.js";
import { defaultValidatorRegistry } from "./validators.js";

const converterRefSchema = z.object({
  converter: z.string().min(1),
  args: z.array(z.unknown()).default([]),
});

const validatorRefSchema = z.object({
  name: z.string().min(1),
  args: z.array(z.unknown()).default([]),
});

export const formDefinitionSchema = z.object({
  id: z.string().min(1),
  name: z.string().min(1),
  description: z.string().optional(),
  config: z
    .object({
      delimiter: z.string().min(1).optional(),
      validatorNamespaces: z.array(z.string()).optional(),
    })
    .strict()
    .default({}),
  fields: z
    .record(
      z.object({
        label: z.string().optional(),
        validators: z.array(validatorRefSchema).default([]),
      }),
    )
    .default({}),
  wrappers: z
    .array(
      z.object({
        wrapperFields: z.array(z.string().min(1)).min(1),
        wrappedFields: z.array(z.string().min(1)).min(1),
        to: converterRefSchema,
        from: converterRefSchema,
      }),
    )
    .default([]),
});

export type FormDefinitionInput = z.input<typeof formDefinitionSchema>;
export type FormDefinition = z.output<typeof formDefinitionSchema>;

export function parseFormDefinition(input: unknown): FormDefinition {
  return formDefinitionSchema.parse(input);
}

export type BuildFormOptions = {
  validatorRegistry?: ValidatorRegistry;
  converterRegistry?: ConverterRegistry;
};

/**
 * Turn a definition into a Form. Wrappers and validators are in place
 * before `fields` is imported, so the first import already reconciles.
 */
export function buildForm(definition: FormDefinition, fields: unknown = {}, options: BuildFormOptions = {}): Form {
  const converters = options.converterRegistry ?? defaultConverterRegistry;
  const form = new Form(
    {},
    {
      ...definition.config,
      validatorRegistry: options.validatorRegistry ?? defaultValidatorRegistry,
    },
  );

  for (const wrapper of definition.wrappers) {
    form.addWrapper(
      wrapper.wrapperFields,
      wrapper.wrappedFields,
      converters.get(wrapper.to.converter),
      converters.get(wrapper.from.converter),
      wrapper.to.args,
      wrapper.from.args,
    );
  }

  for (const [fieldName, field] of Object.entries(definition.fields)) {
    for (const validator of field.validators) {
      form.appendValidator(fieldName, validator.name, validator.args);
    }
  }

  return form.fromNested(fields);
}

export type LoadedForms = {
  loaded: FormDefinition[];
  failed: { file: string; error: string }[];
};

/** Parse every *.json file in `dir`. Broken files are reported and skipped. */
export function loadFormsFromDir(dir: string): LoadedForms {
  const result: LoadedForms = { loaded: [], failed: [] };
  const files = fs.readdirSync(dir).filter((file) => file.endsWith(".json")).sort();
  for (const file of files) {
    try {
      const content = fs.readFileSync(path.join(dir, file), "utf-8");
      const parsed = formDefinitionSchema.safeParse(JSON.parse(content));
      if (parsed.success) {
        result.loaded.push(parsed.data);
      } else {
        result.failed.push({ file, error: formatIssues(parsed.error.issues) });
      }
    } catch (err) {
      result.failed.push({ file, error: err instanceof Error ? err.message : String(err) });
    }
  }
  return result;
}
