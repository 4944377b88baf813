/**
 * Conversions between request-shaped nested data and delimiter-joined flat
 * field names.
 */

import { isFieldMapping, isFieldValue } from "./formTypes.js";
import type { FieldValue, NestedFields } from "./formTypes.js";

/**
 * Flatten nested data depth-first, left to right.
 *
 * Arrays count as mappings keyed by index. Leaves that are not JSON scalars
 * are dropped, and so is a mapping that contains itself along the path. When two paths flatten to the same name the later one wins.
 *
 * @example
 * flattenFields({ address: { city: "Ghent" }, tags: ["a"] }, ":")
 * // Map { "address:city" => "Ghent", "tags:0" => "a" }
 */
export function flattenFields(
  input: Record<string, unknown>,
  delimiter: string,
): Map<string, FieldValue> {
  const flat = new Map<string, FieldValue>();
  const ancestors = new WeakSet<object>();

  const walk = (node: Record<string, unknown>, path: readonly string[]): void => {
    ancestors.add(node);
    for (const [key, value] of Object.entries(node)) {
      const childPath = [...path, key];
      if (isFieldMapping(value)) {
        if (!ancestors.has(value)) walk(value, childPath);
      } else if (isFieldValue(value)) {
        flat.set(childPath.join(delimiter), value);
      }
    }
    ancestors.delete(node);
  };

  walk(input, []);
  return flat;
}

/**
 * Rebuild nested data from flat names. A scalar standing where a deeper
 * name needs a mapping is replaced by that mapping.
 *
 * @example
 * unflattenFields([["address:city", "Ghent"]], ":")
 * // { address: { city: "Ghent" } }
 */
export function unflattenFields(
  fields: Iterable<readonly [string, FieldValue]>,
  delimiter: string,
): NestedFields {
  const root: NestedFields = {};
  for (const [name, value] of fields) {
    const segments = name.split(delimiter);
    const leaf = segments.pop() ?? name;
    let current = root;
    for (const segment of segments) {
      const existing = Object.hasOwn(current, segment) ? current[segment] : undefined;
      if (typeof existing === "object" && existing !== null) {
        current = existing;
      } else {
        const child: NestedFields = {};
        defineEntry(current, segment, child);
        current = child;
      }
    }
    defineEntry(current, leaf, value);
  }
  return root;
}

/**
 * Follow a delimiter-joined path through nested data. Returns undefined as
 * soon as a segment is missing.
 */
export function getByPath(
  nested: NestedFields,
  path: string,
  delimiter: string,
): FieldValue | NestedFields | undefined {
  let current: FieldValue | NestedFields = nested;
  for (const segment of path.split(delimiter)) {
    if (typeof current !== "object" || current === null || !Object.hasOwn(current, segment)) {
      return undefined;
    }
    current = current[segment];
  }
  return current;
}

// Keys such as "__proto__" must become own properties, not prototype writes.
function defineEntry(target: NestedFields, key: string, value: FieldValue | NestedFields): void {
  Object.defineProperty(target, key, {
    value,
    enumerable: true,
    writable: true,
    configurable: true,
  });
}
