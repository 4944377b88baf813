import { Server } from "@modelcontextprotocol/sdk/server/index.js";
import { StdioServerTransport } from "@modelcontextprotocol/sdk/server/stdio.js";
import { CallToolRequestSchema, ListToolsRequestSchema } from "@modelcontextprotocol/sdk/types.js";
import type { CallToolResult } from "@modelcontextprotocol/sdk/types.js";
import { z } from "zod";
import * as fs from "fs";
import * as path from "path";
import { fileURLToPath } from "url";
import { loadFormsFromDir } from "./formDefinition.js";
import {
  InMemoryFormStore,
  addFieldError,
  describeFields,
  runValidation,
  setFieldValue,
  submitFormData,
} from "./formEngine.js";
import type { FormSession } from "./formEngine.js";
import { defaultTranslator } from "./messages.js";

const __filename = fileURLToPath(import.meta.url);
const __dirname = path.dirname(__filename);

export function registerFormsFromDir(store: InMemoryFormStore, dir: string): number {
  const { loaded, failed } = loadFormsFromDir(dir);
  for (const def of loaded) {
    store.registerForm(def);
    console.error(`Registered form: ${def.id}`);
  }
  for (const { file, error } of failed) {
    console.error(`Failed to load form ${file}: ${error}`);
  }
  return loaded.length;
}

/**
 * Forms live in src/forms under the project root; a build run from dist/
 * may also carry a forms directory next to it.
 */
export function createDefaultStore(): InMemoryFormStore {
  const store = new InMemoryFormStore();
  const projectRoot = path.resolve(__dirname, "..");
  const formsDir = path.join(projectRoot, "src", "forms");

  if (fs.existsSync(formsDir)) {
    registerFormsFromDir(store, formsDir);
    return store;
  }

  console.warn(`Forms directory not found at ${formsDir}`);
  const localForms = path.join(__dirname, "forms");
  if (fs.existsSync(localForms)) {
    console.warn(`Found local forms dir at ${localForms}`);
    registerFormsFromDir(store, localForms);
  }
  return store;
}

type SessionSummary = {
  sessionId: string;
  formId: string;
  userId?: string;
  status: string;
  overallValidity: string;
};

function summarizeSession(session: FormSession): SessionSummary {
  return {
    sessionId: session.sessionId,
    formId: session.formId,
    ...(session.userId !== undefined ? { userId: session.userId } : {}),
    status: session.status,
    overallValidity: session.overallValidity,
  };
}

type ToolInputSchema = {
  type: "object";
  properties: Record<string, object>;
  required?: string[];
};

export type RegisteredTool = {
  name: string;
  description: string;
  inputSchema: ToolInputSchema;
};

export type FormToolset = {
  tools: RegisteredTool[];
  call(name: string, args: Record<string, unknown>): Promise<CallToolResult>;
};

const fieldValueSchema = z.union([z.string(), z.number(), z.boolean(), z.null()]);

const sessionIdStub: ToolInputSchema = {
  type: "object",
  properties: { sessionId: { type: "string" } },
  required: ["sessionId"],
};

export function createFormToolset(store: InMemoryFormStore): FormToolset {
  const registeredTools: RegisteredTool[] = [];
  const toolHandlers = new Map<string, (args: Record<string, unknown>) => Promise<unknown>>();

  function registerTool<In>(
    name: string,
    description: string,
    inputSchema: z.ZodType<In, z.ZodTypeDef, unknown>,
    handler: (input: In) => unknown,
    jsonSchemaStub: ToolInputSchema,
  ): void {
    registeredTools.push({ name, description, inputSchema: jsonSchemaStub });
    toolHandlers.set(name, async (args) => handler(inputSchema.parse(args)));
  }

  registerTool(
    "list_forms",
    "List all available form definitions.",
    z.object({}),
    () => ({
      forms: store.listForms().map((f) => ({
        id: f.id,
        name: f.name,
        description: f.description,
        fields: Object.keys(f.fields),
      })),
    }),
    { type: "object", properties: {} },
  );

  registerTool(
    "start_form_session",
    "Start a new form session for a given form id, optionally associated with a user and seeded with nested data.",
    z.object({
      formId: z.string(),
      userId: z.string().optional(),
      data: z.record(z.unknown()).optional(),
    }),
    ({ formId, userId, data }) => {
      const session = store.createSession(formId, userId, data ?? {});
      return { session: summarizeSession(session), data: session.form.toFlat() };
    },
    {
      type: "object",
      properties: {
        formId: { type: "string" },
        userId: { type: "string" },
        data: { type: "object" },
      },
      required: ["formId"],
    },
  );

  registerTool(
    "list_user_forms",
    "List all form sessions associated with a specific user.",
    z.object({ userId: z.string() }),
    ({ userId }) => ({ sessions: store.listSessions({ userId }).map(summarizeSession) }),
    {
      type: "object",
      properties: { userId: { type: "string" } },
      required: ["userId"],
    },
  );

  registerTool(
    "get_form_state",
    "Get the full state of a form session: nested data, flat fields and per-field validity.",
    z.object({ sessionId: z.string() }),
    ({ sessionId }) => {
      const session = store.requireSession(sessionId);
      return {
        session: summarizeSession(session),
        data: session.form.toNested(),
        flat: session.form.toFlat(),
        fields: describeFields(session),
      };
    },
    sessionIdStub,
  );

  registerTool(
    "submit_form_data",
    "Merge nested data into a session. Wrapper fields are reconciled right after the merge.",
    z.object({ sessionId: z.string(), data: z.record(z.unknown()) }),
    ({ sessionId, data }) => {
      const session = store.requireSession(sessionId);
      submitFormData(session, data);
      return { session: summarizeSession(session), data: session.form.toFlat() };
    },
    {
      type: "object",
      properties: {
        sessionId: { type: "string" },
        data: { type: "object" },
      },
      required: ["sessionId", "data"],
    },
  );

  registerTool(
    "set_field_value",
    "Set a single field by its flat, delimiter-joined name.",
    z.object({ sessionId: z.string(), name: z.string(), value: fieldValueSchema }),
    ({ sessionId, name, value }) => {
      const session = store.requireSession(sessionId);
      setFieldValue(session, name, value);
      return { session: summarizeSession(session), value: session.form.get(name) };
    },
    {
      type: "object",
      properties: {
        sessionId: { type: "string" },
        name: { type: "string" },
        value: {},
      },
      required: ["sessionId", "name", "value"],
    },
  );

  registerTool(
    "validate_form",
    "Run every validator chain of the session and report errors per field.",
    z.object({ sessionId: z.string() }),
    ({ sessionId }) => {
      const session = store.requireSession(sessionId);
      const valid = runValidation(session);
      return {
        valid,
        session: summarizeSession(session),
        errors: session.form.getErrors(),
        messages: session.form.getErrorMessages(null, defaultTranslator),
      };
    },
    sessionIdStub,
  );

  registerTool(
    "add_field_error",
    "Attach an error code to a field without running validators.",
    z.object({ sessionId: z.string(), fieldName: z.string(), error: z.string().min(1) }),
    ({ sessionId, fieldName, error }) => {
      const session = store.requireSession(sessionId);
      addFieldError(session, fieldName, error);
      return { session: summarizeSession(session), errors: session.form.getErrors(fieldName, false) };
    },
    {
      type: "object",
      properties: {
        sessionId: { type: "string" },
        fieldName: { type: "string" },
        error: { type: "string" },
      },
      required: ["sessionId", "fieldName", "error"],
    },
  );

  registerTool(
    "get_field_errors",
    "Get error codes for one field or all fields. Fields without own errors fall back to the errors of the fields they wrap unless wrappedFallback is false.",
    z.object({
      sessionId: z.string(),
      fieldName: z.string().optional(),
      wrappedFallback: z.boolean().default(true),
    }),
    ({ sessionId, fieldName, wrappedFallback }) => {
      const { form } = store.requireSession(sessionId);
      return {
        errors: fieldName === undefined ? form.getErrors(null, wrappedFallback) : form.getErrors(fieldName, wrappedFallback),
      };
    },
    {
      type: "object",
      properties: {
        sessionId: { type: "string" },
        fieldName: { type: "string" },
        wrappedFallback: { type: "boolean" },
      },
      required: ["sessionId"],
    },
  );

  return {
    tools: registeredTools,
    async call(name, args) {
      const handler = toolHandlers.get(name);
      if (!handler) {
        throw new Error(`Tool not found: ${name}`);
      }
      try {
        const result = await handler(args);
        return {
          content: [{ type: "text", text: JSON.stringify(result, null, 2) }],
        };
      } catch (err) {
        return {
          content: [{ type: "text", text: `Error: ${err instanceof Error ? err.message : String(err)}` }],
          isError: true,
        };
      }
    },
  };
}

export function createServer(store: InMemoryFormStore = createDefaultStore()): Server {
  const server = new Server(
    {
      name: "form-binder",
      version: "0.1.0",
    },
    {
      capabilities: {
        tools: {},
      },
    },
  );

  const toolset = createFormToolset(store);

  server.setRequestHandler(ListToolsRequestSchema, async () => ({ tools: toolset.tools }));

  server.setRequestHandler(CallToolRequestSchema, async (request) => {
    const { name, arguments: args } = request.params;
    return toolset.call(name, args ?? {});
  });

  return server;
}

export async function run(): Promise<void> {
  const server = createServer();
  const transport = new StdioServerTransport();
  await server.connect(transport);
  console.error("form-binder MCP server running on stdio");
}
