import { describe, expect, it } from "vitest";
import {
  EnumDecodeError,
  FieldBuildError,
  MissingFieldError,
  NestedTypeError,
  TypeCastError,
  UnsupportedTypeError,
  VariantDecodeError,
} from "@fieldmap/core";
import { defineRecord, t } from "@fieldmap/schema";
import { materialize } from "../materialize.js";
import { Address, Crew, Drawing, Person, Priority, Task, Team } from "./models.js";

const home = { zip: 10001, c: "NY" };

function person(overrides: Record<string, unknown> = {}): Record<string, unknown> {
  return { name: "Ann", status: "Active", home, tags: [], ...overrides };
}

function failure(run: () => unknown): FieldBuildError {
  try {
    run();
  } catch (e) {
    if (e instanceof FieldBuildError) return e;
    throw e;
  }
  throw new Error("expected a FieldBuildError");
}

describe("materialize", () => {
  it("reads fields under their external names", () => {
    expect(materialize(Address, { zip: 10001, c: "NY" })).toEqual({ zipCode: 10001, city: "NY" });
  });

  it("accepts Map documents", () => {
    const data = new Map<string, unknown>([
      ["zip", 94105],
      ["c", "SF"],
    ]);
    expect(materialize(Address, data)).toEqual({ zipCode: 94105, city: "SF" });
  });

  it("ignores keys the record does not declare", () => {
    expect(materialize(Address, { _id: "abc", zip: 1, c: "X" })).toEqual({ zipCode: 1, city: "X" });
  });

  it("builds nested records", () => {
    const value = materialize(Person, person({ work: { zip: 2, c: "Work" } }));
    expect(value.home).toEqual({ zipCode: 10001, city: "NY" });
    expect(value.work).toEqual({ zipCode: 2, city: "Work" });
  });

  it("uses construct for instances", () => {
    class Point {
      constructor(
        readonly x: number,
        readonly y: number
      ) {}
    }
    const PointType = defineRecord("Point", { x: t.double(), y: t.double() }, {
      construct: ({ x, y }) => new Point(x, y),
    });
    const point = materialize(PointType, { x: 1.5, y: -2 });
    expect(point).toBeInstanceOf(Point);
    expect(point).toEqual(new Point(1.5, -2));
  });
});

describe("absent fields", () => {
  it("fails on a missing required field", () => {
    const error = failure(() => materialize(Address, { c: "NY" }));
    expect(error).toBeInstanceOf(MissingFieldError);
    expect(error.fieldName).toBe("zipCode");
    expect(error.key).toBe("zip");
    expect(error.reason).toBe("missing");
    expect(error.message).toBe("Missing field 'zipCode' (key 'zip')");
  });

  it("binds undefined for missing optional fields", () => {
    const value = materialize(Person, person());
    expect(value.age).toBeUndefined();
    expect(value.work).toBeUndefined();
  });

  it("uses declared defaults", () => {
    expect(materialize(Person, person()).country).toBe("US");
    expect(materialize(Person, person({ country: "FR" })).country).toBe("FR");
  });

  it("treats undefined values as absent", () => {
    expect(materialize(Person, person({ country: undefined })).country).toBe("US");
  });

  it("names the full path of nested missing fields", () => {
    const error = failure(() => materialize(Person, person({ home: { zip: 1 } })));
    expect(error.fieldName).toBe("home.city");
    expect(error.key).toBe("c");
  });

  it("stops at the first failing field", () => {
    const error = failure(() => materialize(Person, { status: "Nope", home: "x" }));
    expect(error).toBeInstanceOf(MissingFieldError);
    expect(error.fieldName).toBe("name");
  });
});

describe("null values", () => {
  it("binds undefined for a null optional record", () => {
    const value = materialize(Person, person({ work: null }));
    expect(value.work).toBeUndefined();
    expect(value.name).toBe("Ann");
  });

  it("binds null directly for record and enum fields", () => {
    const value = materialize(Person, person({ home: null, status: null }));
    expect(value.home).toBeNull();
    expect(value.status).toBeNull();
  });

  it("rejects null for a required scalar", () => {
    const error = failure(() => materialize(Person, person({ name: null })));
    expect(error).toBeInstanceOf(TypeCastError);
    expect(error.message).toBe("Error casting field 'name'. Expected: string, Actual: null");
  });
});

describe("enums", () => {
  it("decodes case names", () => {
    expect(materialize(Person, person({ status: "Suspended" })).status).toBe("Suspended");
  });

  it("decodes zero-based ordinals", () => {
    expect(materialize(Person, person({ status: 2 })).status).toBe("Closed");
  });

  it("rejects unknown names and ordinals out of range", () => {
    const error = failure(() => materialize(Person, person({ status: "Gone" })));
    expect(error).toBeInstanceOf(EnumDecodeError);
    expect(error.message).toBe(
      "Cannot decode enum Status for field 'status' from \"Gone\": expected one of Active, Suspended, Closed or an ordinal in 0..2"
    );
    expect(() => materialize(Person, person({ status: 3 }))).toThrow(EnumDecodeError);
    expect(() => materialize(Person, person({ status: 1.5 }))).toThrow(EnumDecodeError);
    expect(() => materialize(Person, person({ status: "active" }))).toThrow(EnumDecodeError);
  });

  it("decodes native enums by name, ordinal or value", () => {
    const task = (priority: unknown) =>
      materialize(Task, { title: "t", priority, estimate: 1n, ratio: 1, labels: {}, history: [] }).priority;
    expect(task("High")).toBe(Priority.High);
    expect(task(0)).toBe(Priority.Low);
    expect(task(20)).toBe(Priority.Normal);
  });
});

describe("scalars", () => {
  const task = (overrides: Record<string, unknown>) =>
    materialize(Task, { title: "t", priority: 0, estimate: 5n, ratio: 0.5, labels: {}, history: [], ...overrides });

  it("reports expected and actual types", () => {
    const error = failure(() => materialize(Address, { zip: "10001", c: "NY" }));
    expect(error).toBeInstanceOf(TypeCastError);
    if (error instanceof TypeCastError) {
      expect(error.expectedType).toBe("int");
      expect(error.actualType).toBe("string");
    }
    expect(error.message).toBe("Error casting field 'zipCode'. Expected: int, Actual: string");
  });

  it("does not widen int to long", () => {
    expect(() => task({ estimate: 5 })).toThrow("Error casting field 'estimate'. Expected: long, Actual: int");
  });

  it("does not narrow long or fractional numbers to int", () => {
    expect(() => materialize(Address, { zip: 5n, c: "X" })).toThrow("Expected: int, Actual: long");
    expect(() => materialize(Address, { zip: 2.5, c: "X" })).toThrow("Expected: int, Actual: double");
    expect(() => materialize(Address, { zip: 2 ** 31, c: "X" })).toThrow("Expected: int, Actual: double");
  });

  it("accepts any finite number for double", () => {
    expect(task({ ratio: 3 }).ratio).toBe(3);
    expect(() => task({ ratio: Number.NaN })).toThrow("Error casting field 'ratio'. Expected: double, Actual: NaN");
    expect(() => task({ ratio: Infinity })).toThrow("Expected: double, Actual: Infinity");
  });

  it("checks dates, binary data and booleans", () => {
    const due = new Date(0);
    const attachment = new Uint8Array([1, 2]);
    const value = task({ due, attachment, done: true });
    expect(value.due).toBe(due);
    expect(value.attachment).toBe(attachment);
    expect(value.done).toBe(true);
    expect(() => task({ due: "1970-01-01" })).toThrow("Expected: date, Actual: string");
  });
});

describe("nested records", () => {
  it("requires a document", () => {
    const error = failure(() => materialize(Person, person({ home: "NY" })));
    expect(error).toBeInstanceOf(NestedTypeError);
    expect(error.message).toBe("Field 'home' must be a document for record Address, got string");
    expect(() => materialize(Person, person({ home: Object.create(Object.create(null)) }))).toThrow(
      "Field 'home' must be a document for record Address, got object"
    );
  });

  it("rejects arrays and class instances as documents", () => {
    expect(() => materialize(Person, person({ home: [] }))).toThrow(NestedTypeError);
    expect(() => materialize(Person, person({ home: new Date() }))).toThrow(
      "Field 'home' must be a document for record Address, got date"
    );
  });

  it("names nested fields with dotted paths", () => {
    const error = failure(() => materialize(Person, person({ work: { zip: "x", c: "Y" } })));
    expect(error.fieldName).toBe("work.zipCode");
  });
});

describe("collections", () => {
  it("copies arrays of scalars after checking elements", () => {
    const tags = ["a", "b"];
    const value = materialize(Person, person({ tags }));
    expect(value.tags).toEqual(["a", "b"]);
    expect(value.tags).not.toBe(tags);
  });

  it("names the failing element", () => {
    const error = failure(() => materialize(Person, person({ tags: ["a", 1] })));
    expect(error.fieldName).toBe("tags[1]");
    expect(error.message).toBe("Error casting field 'tags[1]'. Expected: string, Actual: int");
  });

  it("requires an array", () => {
    expect(() => materialize(Person, person({ tags: "a" }))).toThrow(
      "Error casting field 'tags'. Expected: string[], Actual: string"
    );
  });

  it("decodes enum elements and optional nulls", () => {
    const value = materialize(Task, {
      title: "t",
      priority: 0,
      estimate: 1n,
      ratio: 1,
      labels: new Map([["env", "prod"]]),
      history: ["Active", null, 2],
    });
    expect(value.history).toEqual(["Active", undefined, "Closed"]);
    expect(value.labels).toEqual({ env: "prod" });
  });

  it("checks map values", () => {
    expect(() =>
      materialize(Task, { title: "t", priority: 0, estimate: 1n, ratio: 1, labels: { a: 1 }, history: [] })
    ).toThrow("Error casting field 'labels.a'. Expected: string, Actual: int");
  });

  it("rejects collections of records", () => {
    const error = failure(() => materialize(Team, { name: "core", members: [] }));
    expect(error).toBeInstanceOf(UnsupportedTypeError);
    expect(error.message).toBe(
      "Field 'members' has unsupported type Address[]: collections of records are not supported"
    );
  });

  it("rejects collections of records whatever the data holds", () => {
    expect(() => materialize(Team, { name: "core", members: null })).toThrow(
      "Field 'members' has unsupported type Address[]: collections of records are not supported"
    );
    const error = failure(() => materialize(Crew, { name: "crew" }));
    expect(error).toBeInstanceOf(UnsupportedTypeError);
    expect(error.message).toBe(
      "Field 'members' has unsupported type Address[] | undefined: collections of records are not supported"
    );
  });

  it("keeps a __proto__ map key as an own entry", () => {
    const labels: unknown = JSON.parse('{"__proto__":"x","a":"b"}');
    const value = materialize(Task, { title: "t", priority: 0, estimate: 1n, ratio: 1, labels, history: [] });
    expect(Object.keys(value.labels)).toEqual(["__proto__", "a"]);
    expect(Object.getOwnPropertyDescriptor(value.labels, "__proto__")?.value).toBe("x");
    expect(Object.getPrototypeOf(value.labels)).toBe(Object.prototype);
  });
});

describe("unions", () => {
  it("decodes the variant named by the discriminator", () => {
    expect(materialize(Drawing, { title: "d", shape: { kind: "square", s: 4 } }).shape).toEqual({
      kind: "square",
      side: 4,
    });
  });

  it("rejects unknown variants", () => {
    const error = failure(() => materialize(Drawing, { title: "d", shape: { kind: "hex" } }));
    expect(error).toBeInstanceOf(VariantDecodeError);
    expect(error.message).toBe(
      "Cannot pick a variant for field 'shape': 'kind' is \"hex\", expected one of circle, square"
    );
  });

  it("binds null directly", () => {
    expect(materialize(Drawing, { title: "d", shape: null }).shape).toBeNull();
  });
});
