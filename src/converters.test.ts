import { describe, expect, it } from "vitest";
import { ZodError } from "zod";
import { copy, createConverterRegistry, defaultConverterRegistry, join, split } from "./converters.js";
import { ConverterNotFoundError } from "./errors.js";
import { FieldStore } from "./fieldStore.js";

describe("join", () => {
  it("joins source values with a space by default", () => {
    const store = new FieldStore().importNested({ date: "2024-01-01", time: "10:00" });
    join(store, ["date", "time"], ["datetime"]);
    expect(store.get("datetime")).toBe("2024-01-01 10:00");
  });

  it("uses the given separator and renders null and absent values as empty", () => {
    const store = new FieldStore().set("a", null).set("b", 7);
    join(store, ["a", "b", "c"], ["out"], "-");
    expect(store.get("out")).toBe("-7-");
  });

  it("rejects an empty separator", () => {
    const store = new FieldStore();
    expect(() => join(store, ["a"], ["b"], "")).toThrow(ZodError);
  });
});

describe("split", () => {
  it("splits the source across the targets", () => {
    const store = new FieldStore().set("startsAt", "2024-05-01T09:30");
    split(store, ["startsAt"], ["date", "time"], "T");
    expect(store.exportFlat()).toEqual({ startsAt: "2024-05-01T09:30", date: "2024-05-01", time: "09:30" });
  });

  it("gives the remainder to the last target", () => {
    const store = new FieldStore().set("full", "Ann Marie Smith");
    split(store, ["full"], ["first", "rest"]);
    expect(store.get("first")).toBe("Ann");
    expect(store.get("rest")).toBe("Marie Smith");
  });

  it("fills targets without a part with empty strings", () => {
    const store = new FieldStore().set("v", "a");
    split(store, ["v"], ["x", "y", "z"]);
    expect([store.get("x"), store.get("y"), store.get("z")]).toEqual(["a", "", ""]);
  });
});

describe("copy", () => {
  it("copies position by position", () => {
    const store = new FieldStore().importNested({ a: 1, b: "two" });
    copy(store, ["a", "b"], ["x", "y", "z"]);
    expect(store.exportFlat()).toEqual({ a: 1, b: "two", x: 1, y: "two" });
  });
});

describe("ConverterRegistry", () => {
  it("ships join, split and copy", () => {
    expect(defaultConverterRegistry.names()).toEqual(["join", "split", "copy"]);
    expect(defaultConverterRegistry.get("split")).toBe(split);
  });

  it("throws for unknown converters", () => {
    expect(() => createConverterRegistry().get("reverse")).toThrow(ConverterNotFoundError);
  });

  it("accepts custom converters", () => {
    const upper = (store: FieldStore, sources: readonly string[], targets: readonly string[]): void => {
      store.set(targets[0], String(store.get(sources[0])).toUpperCase());
    };
    const registry = createConverterRegistry().register("upper", upper);
    expect(registry.get("upper")).toBe(upper);
  });
});
