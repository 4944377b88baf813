import { v4 as uuidv4 } from "uuid";
import { FormNotFoundError, SessionNotFoundError } from "./errors.js";
import type { Form } from "./form.js";
import { buildForm } from "./formDefinition.js";
import type { BuildFormOptions, FormDefinition } from "./formDefinition.js";
import type { FieldValue, FormOverallValidity, FormStatus, NestedFields } from "./formTypes.js";
import { defaultTranslator } from "./messages.js";

export type FormSession = {
  sessionId: string;
  userId?: string;
  formId: string;
  definitionSnapshot: FormDefinition;
  form: Form;
  status: FormStatus;
  overallValidity: FormOverallValidity;
};

export type FormFieldState = {
  name: string;
  label?: string;
  value: FieldValue | NestedFields;
  present: boolean;
  /** As of the last validation run */
  valid: boolean;
  errors: string[];
  messages: string[];
};

export class InMemoryFormStore {
  private forms = new Map<string, FormDefinition>();
  private sessions = new Map<string, FormSession>();

  constructor(private readonly buildOptions: BuildFormOptions = {}) {}

  registerForm(def: FormDefinition): void {
    this.forms.set(def.id, def);
  }

  listForms(): FormDefinition[] {
    return [...this.forms.values()];
  }

  getForm(id: string): FormDefinition | undefined {
    return this.forms.get(id);
  }

  createSession(formId: string, userId?: string, data: unknown = {}): FormSession {
    const definition = this.forms.get(formId);
    if (!definition) throw new FormNotFoundError(formId);

    const form = buildForm(definition, data, this.buildOptions);
    const session: FormSession = {
      sessionId: uuidv4(),
      userId,
      formId,
      definitionSnapshot: definition,
      form,
      status: Object.keys(form.toFlat()).length > 0 ? "in-progress" : "not-started",
      overallValidity: "unknown",
    };

    this.sessions.set(session.sessionId, session);
    return session;
  }

  getSession(sessionId: string): FormSession | undefined {
    return this.sessions.get(sessionId);
  }

  requireSession(sessionId: string): FormSession {
    const session = this.sessions.get(sessionId);
    if (!session) throw new SessionNotFoundError(sessionId);
    return session;
  }

  listSessions(filter?: { userId?: string }): FormSession[] {
    const all = [...this.sessions.values()];
    if (!filter?.userId) return all;
    return all.filter((s) => s.userId === filter.userId);
  }
}

function markChanged(session: FormSession): void {
  session.status = "in-progress";
  session.overallValidity = "unknown";
}

export function submitFormData(session: FormSession, data: unknown): void {
  session.form.fromNested(data);
  markChanged(session);
}

export function setFieldValue(session: FormSession, name: string, value: FieldValue): void {
  session.form.set(name, value);
  markChanged(session);
}

export function runValidation(session: FormSession): boolean {
  const valid = session.form.validate();
  session.overallValidity = valid ? "valid" : "invalid";
  session.status = valid ? "complete" : "in-progress";
  return valid;
}

export function addFieldError(session: FormSession, fieldName: string, errorCode: string): void {
  session.form.addError(fieldName, errorCode);
  session.overallValidity = "invalid";
  if (session.status === "complete") session.status = "in-progress";
}

/**
 * Declared fields first, in definition order, then any other stored field.
 */
export function describeFields(session: FormSession): FormFieldState[] {
  const { form } = session;
  const declared = session.definitionSnapshot.fields;
  const names = new Set([...Object.keys(declared), ...form.validatedFieldNames, ...Object.keys(form.toFlat())]);

  return [...names].map((name) => {
    const label = Object.hasOwn(declared, name) ? declared[name].label : undefined;
    return {
      name,
      ...(label !== undefined ? { label } : {}),
      value: form.getValue(name),
      present: form.has(name),
      valid: form.isValid(name),
      errors: form.getErrors(name),
      messages: form.getErrorMessages(name, defaultTranslator),
    };
  });
}
