export type JsonPrimitive = string | number | boolean | null;
export type JsonValue = JsonPrimitive | JsonValue[] | { [key: string]: JsonValue };
export type JsonObject = { [key: string]: JsonValue };
export type JsonContainer = JsonValue[] | JsonObject;

export interface JsonEntry<T extends JsonValue = JsonValue> {
  value: T;
  key: string | number;
  container: JsonContainer;
}

export type JsonSelector = (value: JsonValue, key: string | number, container: JsonContainer) => boolean;
export type JsonGuard<T extends JsonValue> = (
  value: JsonValue,
  key: string | number,
  container: JsonContainer
) => value is T;

export function isJsonObject(value: unknown): value is JsonObject {
  return value !== null && typeof value === 'object' && !Array.isArray(value);
}

/**
 * Depth-first, pre-order walk over every array element and object value.
 * `select` decides what is emitted, never what is visited.
 *
 * Keys and child values are read before an entry is yielded, so the caller
 * may overwrite `container[key]` while iterating: the walk continues into
 * the value that was there when it was reached.
 */
export function traverseJson<T extends JsonValue>(root: JsonValue, select: JsonGuard<T>): Generator<JsonEntry<T>>;
export function traverseJson(root: JsonValue, select: JsonSelector): Generator<JsonEntry>;
export function* traverseJson(root: JsonValue, select: JsonSelector): Generator<JsonEntry> {
  if (Array.isArray(root)) {
    const items = root.slice();
    for (let i = 0; i < items.length; i++) {
      const value = items[i];
      if (select(value, i, root)) yield { value, key: i, container: root };
      yield* traverseJson(value, select);
    }
  } else if (isJsonObject(root)) {
    for (const key of Object.keys(root)) {
      const value = root[key];
      if (select(value, key, root)) yield { value, key, container: root };
      yield* traverseJson(value, select);
    }
  }
}

export function collectValues<T extends JsonValue>(root: JsonValue, select: JsonGuard<T>): T[];
export function collectValues(root: JsonValue, select: JsonSelector): JsonValue[];
export function collectValues(root: JsonValue, select: JsonSelector): JsonValue[] {
  return Array.from(traverseJson(root, select), (entry) => entry.value);
}

/**
 * Replaces the value an entry points at.
 */
export function replaceEntry(entry: JsonEntry, next: JsonValue): void {
  if (Array.isArray(entry.container)) {
    entry.container[Number(entry.key)] = next;
  } else {
    entry.container[String(entry.key)] = next;
  }
}
