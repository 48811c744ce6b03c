import "../setup";
import { isRecord, safeParseJson, toJsonText } from "../../src/utils/json";
import { ValidationError } from "../../src/errors";

describe("toJsonText", () => {
  it("serializes plain JSON values", () => {
    expect(toJsonText({ a: 1, b: [true, null, "x"] })).toBe('{"a":1,"b":[true,null,"x"]}');
    expect(toJsonText("hi")).toBe('"hi"');
    expect(toJsonText(null)).toBe("null");
  });

  it("allows the same object to appear twice", () => {
    const shared = { x: 1 };
    expect(toJsonText({ a: shared, b: shared })).toBe('{"a":{"x":1},"b":{"x":1}}');
  });

  it("rejects values JSON cannot carry", () => {
    const circular: Record<string, unknown> = {};
    circular.self = circular;

    expect(() => toJsonText(undefined)).toThrow(ValidationError);
    expect(() => toJsonText(() => 1)).toThrow(ValidationError);
    expect(() => toJsonText({ f: () => 1 })).toThrow(ValidationError);
    expect(() => toJsonText(Symbol("s"))).toThrow(ValidationError);
    expect(() => toJsonText(BigInt(1))).toThrow(ValidationError);
    expect(() => toJsonText(circular)).toThrow(ValidationError);
  });

  it.each<[string, unknown]>([
    ["NaN", { n: NaN }],
    ["Infinity", [Infinity]],
    ["negative zero", { z: -0 }],
    ["a Date", { d: new Date(0) }],
    ["a Map", { m: new Map([["a", 1]]) }],
    ["a Set", new Set([1])],
    ["undefined inside an array", [1, undefined]],
    ["undefined inside an object", { a: undefined }],
    ["an object with toJSON", { toJSON: () => "x" }],
    ["a class instance", { c: new (class Point { x = 1; })() }]
  ])("rejects %s, which would not come back unchanged", (_label, value) => {
    expect(() => toJsonText(value)).toThrow(ValidationError);
  });

  it("names the offending property", () => {
    expect(() => toJsonText({ ok: 1, when: new Date(0) })).toThrow(
      'Value must be JSON-serializable ([object Date] is not a plain object at "when")'
    );
  });

  it("accepts objects without a prototype and positive zero", () => {
    const bare: Record<string, unknown> = Object.create(null);
    bare.a = 0;
    expect(toJsonText(bare)).toBe('{"a":0}');
  });
});

describe("safeParseJson", () => {
  it("parses valid JSON", () => {
    expect(safeParseJson<{ a: number }>('{"a":1}')).toEqual({ a: 1 });
  });

  it("wraps parse failures", () => {
    expect(() => safeParseJson("nope")).toThrow(ValidationError);
  });
});

describe("isRecord", () => {
  it("accepts only non-array objects", () => {
    expect(isRecord({})).toBe(true);
    expect(isRecord([])).toBe(false);
    expect(isRecord(null)).toBe(false);
    expect(isRecord("x")).toBe(false);
  });
});
