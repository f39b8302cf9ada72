/**
 * Tests for the unified configuration system
 */

import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";
import { config, defineConfig, type FieldmapConfig } from "../config.js";

describe("config.get and config.set", () => {
  beforeEach(() => {
    config.reset();
  });

  afterEach(() => {
    config.reset();
  });

  it("should return default values", () => {
    expect(config.get("debug")).toBe(false);
    expect(config.get("paths.optionalValueSuffix")).toBe(true);
    expect(config.get("codec.noneHandling")).toBe("encode");
    expect(config.get("codec.enumEncoding")).toBe("name");
  });

  it("should set nested values without dropping siblings", () => {
    config.set({ codec: { noneHandling: "ignore" } });
    expect(config.get("codec.noneHandling")).toBe("ignore");
    expect(config.get("codec.enumEncoding")).toBe("name");
  });

  it("should keep custom keys", () => {
    config.set({ custom: { answer: 42 } });
    expect(config.get("custom.answer")).toBe(42);
    expect(config.get("custom")).toEqual({ answer: 42 });
  });

  it("should forget programmatic values on reset", () => {
    config.set({ debug: true });
    config.reset();
    expect(config.get("debug")).toBe(false);
  });
});

describe("environment variables", () => {
  beforeEach(() => {
    config.reset();
  });

  afterEach(() => {
    vi.unstubAllEnvs();
    config.reset();
  });

  it("should map nested variables to camelCase paths", () => {
    vi.stubEnv("FIELDMAP_CODEC__NONE_HANDLING", "ignore");
    vi.stubEnv("FIELDMAP_PATHS__OPTIONAL_VALUE_SUFFIX", "0");
    expect(config.get("codec.noneHandling")).toBe("ignore");
    expect(config.get("paths.optionalValueSuffix")).toBe(false);
  });

  it("should parse boolean flags", () => {
    vi.stubEnv("FIELDMAP_DEBUG", "true");
    expect(config.settings().debug).toBe(true);
  });
});

describe("config.settings", () => {
  beforeEach(() => {
    config.reset();
  });

  afterEach(() => {
    vi.unstubAllEnvs();
    config.reset();
  });

  it("should resolve every known option", () => {
    expect(config.settings()).toEqual({
      debug: false,
      paths: { optionalValueSuffix: true },
      codec: { noneHandling: "encode", enumEncoding: "name" },
    });
  });

  it("should fall back to defaults for invalid values", () => {
    vi.stubEnv("FIELDMAP_DEBUG", "yes");
    vi.stubEnv("FIELDMAP_CODEC__ENUM_ENCODING", "hex");
    const settings = config.settings();
    expect(settings.debug).toBe(false);
    expect(settings.codec.enumEncoding).toBe("name");
  });

  it("should take valid overrides", () => {
    config.set({ codec: { enumEncoding: "ordinal" } });
    expect(config.settings().codec.enumEncoding).toBe("ordinal");
  });
});

describe("defineConfig", () => {
  it("should return its argument", () => {
    const cfg: FieldmapConfig = { paths: { optionalValueSuffix: false } };
    expect(defineConfig(cfg)).toBe(cfg);
  });
});
