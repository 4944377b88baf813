import { Server } from "@modelcontextprotocol/sdk/server/index.js";
import { beforeEach, describe, expect, it } from "vitest";
import { z } from "zod";
import { parseFormDefinition } from "./formDefinition.js";
import { InMemoryFormStore } from "./formEngine.js";
import { createDefaultStore, createFormToolset, createServer } from "./mcpServer.js";
import type { FormToolset } from "./mcpServer.js";

const booking = parseFormDefinition({
  id: "booking",
  name: "Booking",
  description: "Date and time wrap one timestamp.",
  fields: {
    startsAt: { validators: [{ name: "Regex", args: ["^\\d{4}-\\d{2}-\\d{2} \\d{2}:\\d{2}$"] }] },
  },
  wrappers: [
    {
      wrapperFields: ["date", "time"],
      wrappedFields: ["startsAt"],
      to: { converter: "join" },
      from: { converter: "split" },
    },
  ],
});

async function callText(toolset: FormToolset, name: string, args: Record<string, unknown>): Promise<string> {
  const result = await toolset.call(name, args);
  const [first] = result.content;
  if (first?.type !== "text") throw new Error("expected text content");
  return first.text;
}

async function callJson(toolset: FormToolset, name: string, args: Record<string, unknown> = {}): Promise<unknown> {
  const result = await toolset.call(name, args);
  expect(result.isError).toBeUndefined();
  return JSON.parse(await callText(toolset, name, args));
}

const startedSchema = z.object({ session: z.object({ sessionId: z.string() }) });

describe("form toolset", () => {
  let toolset: FormToolset;

  beforeEach(() => {
    const store = new InMemoryFormStore();
    store.registerForm(booking);
    toolset = createFormToolset(store);
  });

  it("registers every tool with an object input schema", () => {
    expect(toolset.tools.map((t) => t.name)).toEqual([
      "list_forms",
      "start_form_session",
      "list_user_forms",
      "get_form_state",
      "submit_form_data",
      "set_field_value",
      "validate_form",
      "add_field_error",
      "get_field_errors",
    ]);
    expect(toolset.tools.every((t) => t.inputSchema.type === "object")).toBe(true);
  });

  it("lists forms", async () => {
    expect(await callJson(toolset, "list_forms")).toEqual({
      forms: [{ id: "booking", name: "Booking", description: "Date and time wrap one timestamp.", fields: ["startsAt"] }],
    });
  });

  it("runs a session from submission to errors", async () => {
    const started = startedSchema.parse(
      await callJson(toolset, "start_form_session", { formId: "booking", userId: "user-1" }),
    );
    const { sessionId } = started.session;

    expect(await callJson(toolset, "submit_form_data", { sessionId, data: { date: "2024-01-01", time: "ten" } })).toEqual({
      session: { sessionId, formId: "booking", userId: "user-1", status: "in-progress", overallValidity: "unknown" },
      data: { date: "2024-01-01", time: "ten", startsAt: "2024-01-01 ten" },
    });

    expect(await callJson(toolset, "validate_form", { sessionId })).toEqual({
      valid: false,
      session: { sessionId, formId: "booking", userId: "user-1", status: "in-progress", overallValidity: "invalid" },
      errors: { startsAt: ["not_match"] },
      messages: { startsAt: ["Value does not match the pattern ^\\d{4}-\\d{2}-\\d{2} \\d{2}:\\d{2}$"] },
    });

    expect(await callJson(toolset, "get_field_errors", { sessionId, fieldName: "time" })).toEqual({
      errors: ["not_match"],
    });
    expect(
      await callJson(toolset, "get_field_errors", { sessionId, fieldName: "time", wrappedFallback: false }),
    ).toEqual({ errors: [] });
  });

  it("sets single fields and adds custom errors", async () => {
    const { session } = startedSchema.parse(await callJson(toolset, "start_form_session", { formId: "booking" }));

    expect(
      await callJson(toolset, "set_field_value", { sessionId: session.sessionId, name: "startsAt", value: "2024-01-01 10:00" }),
    ).toEqual({
      session: { sessionId: session.sessionId, formId: "booking", status: "in-progress", overallValidity: "unknown" },
      value: "2024-01-01 10:00",
    });

    expect(
      await callJson(toolset, "add_field_error", { sessionId: session.sessionId, fieldName: "startsAt", error: "slot_taken" }),
    ).toMatchObject({ errors: ["slot_taken"] });
  });

  it("returns the nested state", async () => {
    const { session } = startedSchema.parse(
      await callJson(toolset, "start_form_session", { formId: "booking", data: { startsAt: "2024-01-01 10:00" } }),
    );
    const state = await callJson(toolset, "get_form_state", { sessionId: session.sessionId });
    expect(state).toMatchObject({
      data: { startsAt: "2024-01-01 10:00", date: "2024-01-01", time: "10:00" },
      flat: { startsAt: "2024-01-01 10:00", date: "2024-01-01", time: "10:00" },
    });
  });

  it("lists a user's sessions", async () => {
    await callJson(toolset, "start_form_session", { formId: "booking", userId: "user-9" });
    const listed = z.object({ sessions: z.array(z.unknown()) }).parse(
      await callJson(toolset, "list_user_forms", { userId: "user-9" }),
    );
    expect(listed.sessions).toHaveLength(1);
  });

  it("reports failures as error results", async () => {
    const missing = await toolset.call("get_form_state", { sessionId: "nope" });
    expect(missing.isError).toBe(true);
    expect(await callText(toolset, "get_form_state", { sessionId: "nope" })).toBe("Error: Session not found: nope");

    const badArgs = await toolset.call("start_form_session", {});
    expect(badArgs.isError).toBe(true);
  });

  it("throws for unknown tools", async () => {
    await expect(toolset.call("nope", {})).rejects.toThrow("Tool not found: nope");
  });
});

describe("createServer", () => {
  it("builds an MCP server over a store", () => {
    expect(createServer(new InMemoryFormStore())).toBeInstanceOf(Server);
  });

  it("loads the bundled forms by default", () => {
    expect(
      createDefaultStore()
        .listForms()
        .map((f) => f.id),
    ).toEqual(["contact", "event-booking"]);
  });
});
