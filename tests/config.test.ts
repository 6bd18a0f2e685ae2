import { describe, it, expect } from "vitest";
import { COAR_RESOURCE_TYPE_NAMESPACE, DEFAULT_CONFIG, getConfig, loadConfig } from "../src/config.js";
import { ConfigValidationError } from "../src/errors.js";

describe("loadConfig", () => {
  it("uses defaults for an empty environment", () => {
    expect(loadConfig({})).toEqual({
      resourceTypeNamespace: COAR_RESOURCE_TYPE_NAMESPACE,
      dataStatus: "pending",
      collectionStatus: "private",
      logLevel: "info",
      logPretty: false,
    });
    expect(DEFAULT_CONFIG).toEqual(loadConfig({}));
  });

  it("reads METADATA_ variables", () => {
    const config = loadConfig({
      METADATA_DEFAULT_STATUS: "published",
      METADATA_COLLECTION_STATUS: "public",
      METADATA_LOG_LEVEL: "debug",
      METADATA_LOG_PRETTY: "yes",
      METADATA_RESOURCE_TYPE_NAMESPACE: "http://example.org/types/",
    });
    expect(config).toEqual({
      resourceTypeNamespace: "http://example.org/types/",
      dataStatus: "published",
      collectionStatus: "public",
      logLevel: "debug",
      logPretty: true,
    });
  });

  it("treats blank values as unset", () => {
    expect(loadConfig({ METADATA_DEFAULT_STATUS: "   " }).dataStatus).toBe("pending");
  });

  it("lists every invalid variable", () => {
    try {
      loadConfig({ METADATA_LOG_LEVEL: "loud", METADATA_RESOURCE_TYPE_NAMESPACE: "not a url" });
      expect.unreachable();
    } catch (err) {
      expect(err).toBeInstanceOf(ConfigValidationError);
      if (err instanceof ConfigValidationError) {
        expect(err.code).toBe("CONFIG_ERROR");
        expect(err.section).toBe("environment");
        expect(err.problems).toHaveLength(2);
        expect(err.problems[0].startsWith("resourceTypeNamespace: ")).toBe(true);
        expect(err.problems[1].startsWith("logLevel: ")).toBe(true);
        expect(err.message.startsWith("Configuration validation failed for environment:\n  - ")).toBe(true);
      }
    }
  });
});

describe("getConfig", () => {
  it("reads the environment once", () => {
    expect(getConfig()).toBe(getConfig());
  });
});
