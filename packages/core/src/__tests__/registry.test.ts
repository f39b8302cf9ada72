/**
 * Tests for the generic registry
 */

import { describe, expect, it } from "vitest";
import { createGenericRegistry } from "../registry.js";

describe("GenericRegistry", () => {
  describe("basic operations", () => {
    it("should set and get values", () => {
      const registry = createGenericRegistry<string, number>({ name: "Test" });

      registry.set("a", 1);
      registry.set("b", 2);

      expect(registry.get("a")).toBe(1);
      expect(registry.get("b")).toBe(2);
      expect(registry.get("missing")).toBeUndefined();
      expect(registry.size).toBe(2);
    });

    it("should iterate in insertion order", () => {
      const registry = createGenericRegistry<string, number>();
      registry.set("b", 2);
      registry.set("a", 1);

      expect([...registry]).toEqual([
        ["b", 2],
        ["a", 1],
      ]);
      expect([...registry.keys()]).toEqual(["b", "a"]);
      expect([...registry.values()]).toEqual([2, 1]);
    });

    it("should support clear()", () => {
      const registry = createGenericRegistry<string, number>();
      registry.set("a", 1);
      registry.clear();
      expect(registry.size).toBe(0);
      expect(registry.has("a")).toBe(false);
    });
  });

  describe("duplicates", () => {
    it("should throw on a duplicate key", () => {
      const registry = createGenericRegistry<string, number>({ name: "Declarations" });
      registry.set("User", 1);
      expect(() => registry.set("User", 2)).toThrow(
        "Declarations: entry for key 'User' already exists"
      );
      expect(registry.get("User")).toBe(1);
    });

    it("should name itself Registry by default", () => {
      const registry = createGenericRegistry<string, number>();
      registry.set("a", 1);
      expect(() => registry.set("a", 1)).toThrow("Registry: entry for key 'a' already exists");
    });
  });

  describe("getOrCompute", () => {
    it("should compute once per key", () => {
      const registry = createGenericRegistry<string, number>();
      let calls = 0;
      const compute = (key: string): number => {
        calls++;
        return key.length;
      };

      expect(registry.getOrCompute("abc", compute)).toBe(3);
      expect(registry.getOrCompute("abc", compute)).toBe(3);
      expect(calls).toBe(1);
    });

    it("should keep a value stored during compute", () => {
      const registry = createGenericRegistry<string, { id: number }>();
      const first = { id: 1 };
      const result = registry.getOrCompute("k", () => {
        registry.set("k", first);
        return { id: 2 };
      });
      expect(result).toBe(first);
      expect(registry.get("k")).toBe(first);
    });

    it("should not store anything when compute throws", () => {
      const registry = createGenericRegistry<string, number>();
      expect(() =>
        registry.getOrCompute("k", () => {
          throw new Error("boom");
        })
      ).toThrow("boom");
      expect(registry.has("k")).toBe(false);
    });
  });
});
