import { describe, it, expect } from "vitest";
import {
  defineRecord,
  encode,
  enumOf,
  extractPaths,
  materialize,
  MissingFieldError,
  resolvePath,
  t,
  TypeCastError,
  type InferRecord,
} from "../index.js";

const Status = enumOf("Status", ["Active", "Suspended", "Closed"]);

const Address = defineRecord("Address", {
  zipCode: t.int().rename("zip"),
  city: t.string().rename("c"),
});

const Place = defineRecord("Place", {
  street: t.string(),
  zipCode: t.string().rename("z"),
});

const Contact = defineRecord("Contact", {
  name: t.string(),
  email: t.optional(t.string()).rename("e"),
  address: t.record(Place),
  office: t.optional(t.record(Place)),
});

const Account = defineRecord("Account", { status: t.enum(Status) });

function isDocument(value: unknown): value is Readonly<Record<string, unknown>> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function withPath(
  doc: Readonly<Record<string, unknown>>,
  [head, ...rest]: readonly string[],
  value: unknown
): Record<string, unknown> {
  if (head === undefined) return { ...doc };
  if (rest.length === 0) return { ...doc, [head]: value };
  const child = doc[head];
  return { ...doc, [head]: withPath(isDocument(child) ? child : {}, rest, value) };
}

/** A document holding each leaf's own path as its value. */
function sampleDocument(paths: readonly string[]): Record<string, unknown> {
  return paths.reduce<Record<string, unknown>>((doc, path) => {
    const key = path.replace(/\.value$/, "");
    return withPath(doc, key.split("."), key);
  }, {});
}

describe("extracted paths address the document materialize reads", () => {
  it("round-trips a document built from every leaf path", () => {
    const paths = extractPaths(Contact, { optionalValueSuffix: true }).map(([source]) => source);
    expect(paths).toEqual(["name", "e.value", "address.street", "address.z", "office.street", "office.z"]);

    expect(materialize(Contact, sampleDocument(paths))).toEqual({
      name: "name",
      email: "e",
      address: { street: "address.street", zipCode: "address.z" },
      office: { street: "office.street", zipCode: "office.z" },
    });
  });

  it("drops the .value suffix when disabled", () => {
    expect(extractPaths(Contact, { optionalValueSuffix: false }).map(([source]) => source)).toEqual([
      "name",
      "e",
      "address.street",
      "address.z",
      "office.street",
      "office.z",
    ]);
  });

  it("is deterministic", () => {
    expect(extractPaths(Contact)).toEqual(extractPaths(Contact));
    expect(resolvePath(Contact, "office?.zipCode")).toBe(resolvePath(Contact, ["office", "zipCode"]));
  });
});

describe("resolvePath", () => {
  it("passes through optional records without a segment", () => {
    expect(resolvePath(Contact, (c) => c.office?.zipCode)).toBe("office.z");
    expect(resolvePath(Contact, "address.zipCode")).toBe("address.z");
  });
});

describe("materialize", () => {
  it("reads renamed keys", () => {
    expect(materialize(Address, { zip: 10001, c: "NY" })).toEqual({ zipCode: 10001, city: "NY" });
  });

  it("names the missing field and its key", () => {
    expect(() => materialize(Address, { c: "NY" })).toThrow(MissingFieldError);
    expect(() => materialize(Address, { c: "NY" })).toThrow("Missing field 'zipCode' (key 'zip')");
  });

  it("decodes an enum from its ordinal", () => {
    expect(materialize(Account, { status: 2 }).status).toBe("Closed");
  });

  it("rejects a value of the wrong type", () => {
    expect(() => materialize(Address, { zip: "10001", c: "NY" })).toThrow(TypeCastError);
    expect(() => materialize(Address, { zip: "10001", c: "NY" })).toThrow(
      "Error casting field 'zipCode'. Expected: int, Actual: string"
    );
  });

  it("binds null for an optional record as absent", () => {
    const contact = materialize(Contact, { name: "n", address: { street: "s", z: "1" }, office: null });
    expect(contact.office).toBeUndefined();
    expect(contact.email).toBeUndefined();
  });
});

describe("encode", () => {
  it("writes back the document it was materialized from", () => {
    const doc = { zip: 10001, c: "NY" };
    expect(encode(Address, materialize(Address, doc))).toEqual(doc);
  });

  it("materializes what it encodes", () => {
    const contact: InferRecord<typeof Contact> = {
      name: "n",
      email: "n@example.com",
      address: { street: "s", zipCode: "1" },
      office: undefined,
    };
    expect(materialize(Contact, encode(Contact, contact))).toEqual(contact);
  });
});
