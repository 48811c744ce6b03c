import { ValidationError, errorMessage } from "../errors";

function isPlainObject(v: object): boolean {
  const proto = Object.getPrototypeOf(v);
  return proto === null || Object.getPrototypeOf(proto) === null;
}

/** Why `v` would not come back unchanged from JSON, or null when it would. */
function unsupported(v: unknown): string | null {
  switch (typeof v) {
    case "string":
    case "boolean":
      return null;
    case "number":
      if (!Number.isFinite(v)) return `${v} is not representable`;
      return Object.is(v, -0) ? "-0 is not representable" : null;
    case "object":
      if (v === null || Array.isArray(v)) return null;
      if (!isPlainObject(v)) return `${Object.prototype.toString.call(v)} is not a plain object`;
      return "toJSON" in v ? "objects with toJSON are not supported" : null;
    default:
      return `${typeof v} is not supported`;
  }
}

/**
 * Serializes a value to JSON, rejecting anything that would not come back
 * identical from `JSON.parse`: functions, symbols, BigInt, `undefined`,
 * non-finite numbers, `-0`, class instances (Date, Map, Set, ...) and cycles.
 */
export function toJsonText(value: unknown): string {
  // `this` is the holder; reading from it sees the value before toJSON runs
  function replacer(this: unknown, key: string, v: unknown): unknown {
    const holder: unknown = this;
    const raw: unknown = typeof holder === "object" && holder !== null ? Reflect.get(holder, key) : v;
    const problem = unsupported(raw);
    if (problem) {
      const where = key === "" ? "" : ` at "${key}"`;
      throw new ValidationError(`Value must be JSON-serializable (${problem}${where})`);
    }
    return v;
  }

  try {
    return JSON.stringify(value, replacer);
  } catch (e) {
    if (e instanceof ValidationError) throw e;
    // JSON.stringify throws TypeError for cycles
    throw new ValidationError(`Value must be JSON-serializable (${errorMessage(e)})`);
  }
}

export function safeParseJson<T>(text: string): T {
  try {
    return JSON.parse(text);
  } catch {
    throw new ValidationError("Invalid JSON input");
  }
}

export function isRecord(v: unknown): v is Record<string, unknown> {
  return !!v && typeof v === "object" && !Array.isArray(v);
}
