import { FactoryConfigurationError } from "@plugforge/errors";
import { describe, expect, it } from "vitest";
import { PluginFactoryOptionsSchema, resolveFactoryOptions } from "../config.js";
import { silentLogger } from "../logger.js";

describe("resolveFactoryOptions", () => {
  it("should fill defaults", () => {
    const resolved = resolveFactoryOptions();

    expect(resolved.paths).toEqual([]);
    expect(resolved.packageName).toBe("default");
    expect(resolved.pluginIdAttribute).toBe("name");
    expect(resolved.versionIdAttribute).toBeUndefined();
    expect(resolved.envVar).toBeUndefined();
    expect(resolved.mechanism).toBe("guess");
    expect(resolved.env).toBe(process.env);
  });

  it("should wrap a single path in a list", () => {
    expect(resolveFactoryOptions({ paths: "/opt/tools" }).paths).toEqual(["/opt/tools"]);
  });

  it("should keep explicit values", () => {
    const env = { TOOLS: "/opt/tools" };
    const resolved = resolveFactoryOptions({
      paths: ["/a", "/b"],
      packageName: "acme",
      pluginIdAttribute: "id",
      versionIdAttribute: "version",
      envVar: "TOOLS",
      mechanism: "load-source",
      logger: silentLogger,
      env,
    });

    expect(resolved).toEqual({
      paths: ["/a", "/b"],
      packageName: "acme",
      pluginIdAttribute: "id",
      versionIdAttribute: "version",
      envVar: "TOOLS",
      mechanism: "load-source",
      logger: silentLogger,
      env,
    });
  });

  it("should throw FactoryConfigurationError listing the failing fields", () => {
    expect(() => resolveFactoryOptions({ pluginIdAttribute: "", packageName: "" })).toThrow(
      FactoryConfigurationError,
    );

    try {
      resolveFactoryOptions({ pluginIdAttribute: "" });
      expect.unreachable("expected resolveFactoryOptions to throw");
    } catch (error) {
      expect(error).toBeInstanceOf(FactoryConfigurationError);
      if (error instanceof FactoryConfigurationError) {
        expect(error.validationErrors).toEqual([
          "pluginIdAttribute: String must contain at least 1 character(s)",
        ]);
        expect(error.code).toBe("FACTORY_CONFIGURATION_INVALID");
      }
    }
  });
});

describe("PluginFactoryOptionsSchema", () => {
  it("should reject unknown mechanisms", () => {
    expect(PluginFactoryOptionsSchema.safeParse({ mechanism: "eval" }).success).toBe(false);
  });

  it("should reject non-string paths", () => {
    expect(PluginFactoryOptionsSchema.safeParse({ paths: [1, 2] }).success).toBe(false);
  });
});
