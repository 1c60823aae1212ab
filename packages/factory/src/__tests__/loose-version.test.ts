import { describe, expect, it } from "vitest";
import { LooseVersion } from "../loose-version.js";

describe("LooseVersion", () => {
  describe("components", () => {
    it("should split dotted numbers", () => {
      expect(new LooseVersion("1.10.3").components).toEqual([1n, 10n, 3n]);
    });

    it("should keep lowercase words as text", () => {
      expect(new LooseVersion("2.0b1").components).toEqual([2n, 0n, "b", 1n]);
    });

    it("should keep other separators as text components", () => {
      expect(new LooseVersion("1.2-rc3").components).toEqual([1n, 2n, "-", "rc", 3n]);
    });

    it("should accept numbers", () => {
      const version = new LooseVersion(3);
      expect(version.raw).toBe("3");
      expect(version.components).toEqual([3n]);
    });

    it("should parse the empty string to no components", () => {
      expect(new LooseVersion("").components).toEqual([]);
    });
  });

  describe("compare", () => {
    it("should compare numeric components numerically", () => {
      expect(new LooseVersion("1.10").compare("1.2")).toBe(1);
      expect(new LooseVersion("1.2").compare("1.10")).toBe(-1);
    });

    it("should order 1.2 < 1.10 < 2.0", () => {
      expect(["2.0", "1.10", "1.2"].sort(LooseVersion.compare)).toEqual(["1.2", "1.10", "2.0"]);
    });

    it("should place a strict prefix first", () => {
      expect(new LooseVersion("1.2").compare("1.2.0")).toBe(-1);
      expect(new LooseVersion("1.2.0").compare("1.2")).toBe(1);
    });

    it("should compare text lexically", () => {
      expect(new LooseVersion("1.0a").compare("1.0b")).toBe(-1);
    });

    it("should place numbers before text at the same position", () => {
      expect(new LooseVersion("1.0.1").compare("1.0.a")).toBe(-1);
      expect(new LooseVersion("1.0.a").compare("1.0.1")).toBe(1);
    });

    it("should treat leading zeros as the same number", () => {
      expect(new LooseVersion("1.01").compare("1.1")).toBe(0);
    });

    it("should compare digit runs beyond the safe integer range exactly", () => {
      expect(new LooseVersion("20240101120000123").equals("20240101120000124")).toBe(false);
      expect(new LooseVersion("20240101120000123").compare("20240101120000124")).toBe(-1);
      expect(new LooseVersion("1.99999999999999999999").compare("1.100000000000000000000")).toBe(-1);
    });

    it("should accept LooseVersion instances", () => {
      expect(new LooseVersion("3").compare(new LooseVersion("3"))).toBe(0);
    });

    it("should place the empty version lowest", () => {
      expect(new LooseVersion("").compare("0")).toBe(-1);
    });
  });

  describe("equals / toString", () => {
    it("should compare equal across representations", () => {
      expect(new LooseVersion("2.0").equals("2.0")).toBe(true);
      expect(new LooseVersion(2).equals("2")).toBe(true);
      expect(new LooseVersion("2.0").equals("2")).toBe(false);
    });

    it("should render the raw string", () => {
      expect(String(new LooseVersion("1.2-rc3"))).toBe("1.2-rc3");
    });
  });
});
