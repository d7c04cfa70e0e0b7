/**
 * Strict JSON-serializable value type.
 * State data is limited to these values so every version can be checkpointed
 * and replayed byte-for-byte (no functions, classes, Maps, Sets, etc.).
 */
export type JsonValue =
  | string
  | number
  | boolean
  | null
  | JsonValue[]
  | { [key: string]: JsonValue };

export type JsonObject = { [key: string]: JsonValue };

export function cloneJson<T extends JsonValue>(value: T): T {
  return structuredClone(value);
}
