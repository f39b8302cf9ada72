import { describe, expect, it } from "vitest";
import { isRawValueMap, matchesScalar, readKey, runtimeTypeName } from "../values.js";

describe("runtimeTypeName", () => {
  it("classifies numbers by range", () => {
    expect(runtimeTypeName(42)).toBe("int");
    expect(runtimeTypeName(-2147483648)).toBe("int");
    expect(runtimeTypeName(2147483648)).toBe("double");
    expect(runtimeTypeName(0.5)).toBe("double");
    expect(runtimeTypeName(Number.NaN)).toBe("NaN");
    expect(runtimeTypeName(-Infinity)).toBe("-Infinity");
    expect(runtimeTypeName(7n)).toBe("long");
  });

  it("names documents, collections and instances", () => {
    expect(runtimeTypeName(null)).toBe("null");
    expect(runtimeTypeName({ a: 1 })).toBe("document");
    expect(runtimeTypeName(new Map())).toBe("document");
    expect(runtimeTypeName([1])).toBe("array");
    expect(runtimeTypeName(new Date(0))).toBe("date");
    expect(runtimeTypeName(new Uint8Array(1))).toBe("binary");
    expect(runtimeTypeName(new (class Money {})())).toBe("Money");
    expect(runtimeTypeName(Object.create(Object.create(null)))).toBe("object");
  });
});

describe("matchesScalar", () => {
  it("matches exact runtime types only", () => {
    expect(matchesScalar("int", 3)).toBe(true);
    expect(matchesScalar("int", 3n)).toBe(false);
    expect(matchesScalar("long", 3)).toBe(false);
    expect(matchesScalar("double", 3)).toBe(true);
    expect(matchesScalar("double", Number.NaN)).toBe(false);
    expect(matchesScalar("double", Infinity)).toBe(false);
    expect(matchesScalar("string", 3)).toBe(false);
    expect(matchesScalar("binary", Buffer.from("x"))).toBe(true);
  });
});

describe("documents", () => {
  it("accepts plain objects and maps only", () => {
    expect(isRawValueMap({})).toBe(true);
    expect(isRawValueMap(Object.create(null))).toBe(true);
    expect(isRawValueMap(new Map())).toBe(true);
    expect(isRawValueMap([])).toBe(false);
    expect(isRawValueMap(new Date())).toBe(false);
  });

  it("reads own keys only", () => {
    expect(readKey({ a: 1 }, "a")).toBe(1);
    expect(readKey({}, "constructor")).toBeUndefined();
    expect(readKey(new Map([["a", 2]]), "a")).toBe(2);
  });
});
