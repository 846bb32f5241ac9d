/**
 * Field readers for hand-validated JSON definitions. Each reader throws a
 * DefinitionError naming the JSON path of the offending value.
 */

export class DefinitionError extends Error {
  readonly path: string;

  constructor(path: string, message: string) {
    super(`${path}: ${message}`);
    this.name = "DefinitionError";
    this.path = path;
  }
}

export type JsonRecord = Record<string, unknown>;

export function isRecord(value: unknown): value is JsonRecord {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

export function expectRecord(value: unknown, path: string): JsonRecord {
  if (!isRecord(value)) throw new DefinitionError(path, "expected an object");
  return value;
}

export function readNumber(obj: JsonRecord, key: string, path: string): number {
  const value = obj[key];
  if (typeof value !== "number" || !Number.isFinite(value)) {
    throw new DefinitionError(`${path}.${key}`, "expected a number");
  }
  return value;
}

export function readInteger(obj: JsonRecord, key: string, path: string): number {
  const value = readNumber(obj, key, path);
  if (!Number.isInteger(value)) throw new DefinitionError(`${path}.${key}`, "expected an integer");
  return value;
}

export function readString(obj: JsonRecord, key: string, path: string): string {
  const value = obj[key];
  if (typeof value !== "string") throw new DefinitionError(`${path}.${key}`, "expected a string");
  return value;
}

export function optString(obj: JsonRecord, key: string, path: string): string | undefined {
  if (obj[key] === undefined) return undefined;
  return readString(obj, key, path);
}

export function optBoolean(obj: JsonRecord, key: string, path: string, fallback: boolean): boolean {
  const value = obj[key];
  if (value === undefined) return fallback;
  if (typeof value !== "boolean") throw new DefinitionError(`${path}.${key}`, "expected a boolean");
  return value;
}

/** Array field; a missing field reads as empty. */
export function readArray(obj: JsonRecord, key: string, path: string): unknown[] {
  const value = obj[key];
  if (value === undefined) return [];
  if (!Array.isArray(value)) throw new DefinitionError(`${path}.${key}`, "expected an array");
  return value;
}

/** Optional array of integers; absent stays absent. */
export function optIntegerArray(obj: JsonRecord, key: string, path: string): number[] | undefined {
  if (obj[key] === undefined) return undefined;
  return readArray(obj, key, path).map((v, i) => {
    if (typeof v !== "number" || !Number.isInteger(v)) {
      throw new DefinitionError(`${path}.${key}[${i}]`, "expected an integer");
    }
    return v;
  });
}
