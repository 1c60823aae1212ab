import { PluginScanError } from "@plugforge/errors";
import { describe, expect, it } from "vitest";
import { isPluginClass, scanModule } from "../interface-scanner.js";

abstract class Tool {
  abstract use(): string;
}

class Hammer extends Tool {
  use(): string {
    return "bang";
  }
}

class Mallet extends Hammer {}

class Kit extends Hammer {
  static Spare = Mallet;
}

class Unrelated {}

describe("isPluginClass", () => {
  it("should accept direct and indirect subclasses", () => {
    expect(isPluginClass(Hammer, Tool)).toBe(true);
    expect(isPluginClass(Mallet, Tool)).toBe(true);
  });

  it("should reject the interface itself", () => {
    expect(isPluginClass(Tool, Tool)).toBe(false);
  });

  it("should reject unrelated classes, instances and plain values", () => {
    expect(isPluginClass(Unrelated, Tool)).toBe(false);
    expect(isPluginClass(new Hammer(), Tool)).toBe(false);
    expect(isPluginClass(() => Hammer, Tool)).toBe(false);
    expect(isPluginClass("Hammer", Tool)).toBe(false);
    expect(isPluginClass(undefined, Tool)).toBe(false);
  });
});

describe("scanModule", () => {
  it("should collect every exported subclass in export order", () => {
    const result = scanModule(
      { Tool, Hammer, Unrelated, helper: () => 1, VERSION: "1.0", Mallet },
      Tool,
      "/plugins/tools.js",
    );

    expect(result).toEqual({ ok: true, plugins: [Hammer, Mallet] });
  });

  it("should collect a class exported as the whole module", () => {
    expect(scanModule(Hammer, Tool, "/plugins/hammer.js")).toEqual({
      ok: true,
      plugins: [Hammer],
    });
  });

  it("should collect the module class before the classes on its statics", () => {
    expect(scanModule(Kit, Tool, "/plugins/kit.js")).toEqual({ ok: true, plugins: [Kit, Mallet] });
  });

  it("should return nothing for modules without exports", () => {
    expect(scanModule({}, Tool, "/plugins/empty.js")).toEqual({ ok: true, plugins: [] });
    expect(scanModule(null, Tool, "/plugins/null.js")).toEqual({ ok: true, plugins: [] });
    expect(scanModule(7, Tool, "/plugins/number.js")).toEqual({ ok: true, plugins: [] });
  });

  it("should read static attributes when the export is a function", () => {
    const namespace = Object.assign(() => undefined, { Hammer });
    expect(scanModule(namespace, Tool, "/plugins/fn.js")).toEqual({
      ok: true,
      plugins: [Hammer],
    });
  });

  it("should discard partial results when reading an export throws", () => {
    const exports = { Hammer };
    Object.defineProperty(exports, "exploding", {
      enumerable: true,
      get() {
        throw new Error("getter exploded");
      },
    });

    const result = scanModule(exports, Tool, "/plugins/exploding.js");

    expect(result.ok).toBe(false);
    if (!result.ok) {
      expect(result.error).toBeInstanceOf(PluginScanError);
      expect(result.error.message).toBe('Plugin scan failed "/plugins/exploding.js": getter exploded');
      expect(result.error.filePath).toBe("/plugins/exploding.js");
    }
  });
});
