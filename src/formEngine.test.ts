import { beforeEach, describe, expect, it } from "vitest";
import { FormNotFoundError, SessionNotFoundError } from "./errors.js";
import { parseFormDefinition } from "./formDefinition.js";
import {
  InMemoryFormStore,
  addFieldError,
  describeFields,
  runValidation,
  setFieldValue,
  submitFormData,
} from "./formEngine.js";

const signup = parseFormDefinition({
  id: "signup",
  name: "Sign up",
  fields: {
    username: { label: "Username", validators: [{ name: "NotEmpty" }] },
    first: { label: "First name" },
  },
  wrappers: [
    {
      wrapperFields: ["first", "last"],
      wrappedFields: ["fullName"],
      to: { converter: "join" },
      from: { converter: "split" },
    },
  ],
});

describe("InMemoryFormStore", () => {
  let store: InMemoryFormStore;

  beforeEach(() => {
    store = new InMemoryFormStore();
    store.registerForm(signup);
  });

  it("lists and looks up forms", () => {
    expect(store.listForms().map((f) => f.id)).toEqual(["signup"]);
    expect(store.getForm("signup")).toBe(signup);
    expect(store.getForm("nope")).toBeUndefined();
  });

  it("starts empty sessions as not-started", () => {
    const session = store.createSession("signup");
    expect(session.status).toBe("not-started");
    expect(session.overallValidity).toBe("unknown");
    expect(session.sessionId).toMatch(/^[0-9a-f]{8}-[0-9a-f]{4}-4[0-9a-f]{3}-[89ab][0-9a-f]{3}-[0-9a-f]{12}$/);
    expect(store.getSession(session.sessionId)).toBe(session);
  });

  it("seeds sessions with data", () => {
    const session = store.createSession("signup", "user-1", { fullName: "Ann Smith" });
    expect(session.status).toBe("in-progress");
    expect(session.form.get("first")).toBe("Ann");
    expect(session.form.get("last")).toBe("Smith");
  });

  it("throws for unknown forms and sessions", () => {
    expect(() => store.createSession("nope")).toThrow(FormNotFoundError);
    expect(() => store.requireSession("nope")).toThrow(SessionNotFoundError);
    expect(store.getSession("nope")).toBeUndefined();
  });

  it("filters sessions by user", () => {
    const a = store.createSession("signup", "user-1");
    store.createSession("signup", "user-2");
    const c = store.createSession("signup", "user-1");

    expect(store.listSessions({ userId: "user-1" })).toEqual([a, c]);
    expect(store.listSessions()).toHaveLength(3);
  });
});

describe("session lifecycle", () => {
  let store: InMemoryFormStore;

  beforeEach(() => {
    store = new InMemoryFormStore();
    store.registerForm(signup);
  });

  it("moves through in-progress to complete", () => {
    const session = store.createSession("signup");

    submitFormData(session, { first: "Ann", last: "Smith" });
    expect(session.status).toBe("in-progress");
    expect(session.form.get("fullName")).toBe("Ann Smith");

    expect(runValidation(session)).toBe(false);
    expect(session.overallValidity).toBe("invalid");

    setFieldValue(session, "username", "ann");
    expect(session.overallValidity).toBe("unknown");

    expect(runValidation(session)).toBe(true);
    expect(session.status).toBe("complete");
    expect(session.overallValidity).toBe("valid");
  });

  it("reopens a complete session when an error is added", () => {
    const session = store.createSession("signup", undefined, { username: "ann" });
    runValidation(session);

    addFieldError(session, "username", "taken");
    expect(session.status).toBe("in-progress");
    expect(session.overallValidity).toBe("invalid");
    expect(runValidation(session)).toBe(false);
  });
});

describe("describeFields", () => {
  it("lists declared fields first with labels, values and errors", () => {
    const store = new InMemoryFormStore();
    store.registerForm(signup);
    const session = store.createSession("signup", undefined, { fullName: "Ann Smith" });
    runValidation(session);

    expect(describeFields(session)).toEqual([
      {
        name: "username",
        label: "Username",
        value: "",
        present: false,
        valid: false,
        errors: ["is_empty"],
        messages: ["Value is required and can't be empty"],
      },
      { name: "first", label: "First name", value: "Ann", present: true, valid: true, errors: [], messages: [] },
      { name: "fullName", value: "Ann Smith", present: true, valid: true, errors: [], messages: [] },
      { name: "last", value: "Smith", present: true, valid: true, errors: [], messages: [] },
    ]);
  });
});
