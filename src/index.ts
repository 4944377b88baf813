export { FieldStore, DEFAULT_DELIMITER } from "./fieldStore.js";
export type { DataChangedListener, FieldStoreOptions, Reconciler } from "./fieldStore.js";
export { flattenFields, getByPath, unflattenFields } from "./fieldPaths.js";
export { WrapperEngine, decideDirection } from "./wrapperEngine.js";
export type { WrapperConverter, WrapperDirection, WrapperMapping } from "./wrapperEngine.js";
export { ValidationOrchestrator } from "./validationOrchestrator.js";
export type { ValidationOrchestratorOptions, WrappedFieldSource } from "./validationOrchestrator.js";
export { ValidationChain } from "./validationChain.js";
export { Validator } from "./validator.js";
export {
  BUILTIN_VALIDATOR_NAMESPACE,
  DEFAULT_VALIDATOR_NAMESPACES,
  ValidatorRegistry,
  parseValidatorArgs,
  qualifyName,
} from "./validatorRegistry.js";
export type { ValidatorFactory } from "./validatorRegistry.js";
export {
  Between,
  Format,
  InArray,
  NotEmpty,
  Regex,
  Schema,
  StringLength,
  createValidatorRegistry,
  defaultValidatorRegistry,
  registerBuiltinValidators,
} from "./validators.js";
export { ConverterRegistry, copy, createConverterRegistry, defaultConverterRegistry, join, split } from "./converters.js";
export { DEFAULT_MESSAGES, createTranslator, defaultTranslator } from "./messages.js";
export { Form } from "./form.js";
export { formConfigSchema, parseFormConfig } from "./formConfig.js";
export type { FormConfig, FormConfigInput } from "./formConfig.js";
export { buildForm, formDefinitionSchema, loadFormsFromDir, parseFormDefinition } from "./formDefinition.js";
export type { BuildFormOptions, FormDefinition, FormDefinitionInput, LoadedForms } from "./formDefinition.js";
export {
  InMemoryFormStore,
  addFieldError,
  describeFields,
  runValidation,
  setFieldValue,
  submitFormData,
} from "./formEngine.js";
export type { FormFieldState, FormSession } from "./formEngine.js";
export { createDefaultStore, createFormToolset, createServer, registerFormsFromDir, run } from "./mcpServer.js";
export type { FormToolset, RegisteredTool } from "./mcpServer.js";
export * from "./errors.js";
export type * from "./formTypes.js";
export { isFieldMapping, isFieldValue } from "./formTypes.js";
