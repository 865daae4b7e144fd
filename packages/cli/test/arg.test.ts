/**
 * Unit tests for option value parsing
 */

import { describe, it, expect } from "vitest";
import { parseNonNegativeInt, parseJson } from "../src/lib/arg.js";
import { InvalidArgumentError } from "commander";

describe("arg parsing", () => {
  describe("parseNonNegativeInt", () => {
    it("should parse valid non-negative integers", () => {
      expect(parseNonNegativeInt("0", "width")).toBe(0);
      expect(parseNonNegativeInt("80", "width")).toBe(80);
      expect(parseNonNegativeInt(" 120 ", "width")).toBe(120);
    });

    it("should reject negative numbers", () => {
      expect(() => parseNonNegativeInt("-1", "width")).toThrow(InvalidArgumentError);
      expect(() => parseNonNegativeInt("-1", "width")).toThrow("width must be a non-negative integer");
    });

    it("should reject non-numeric input", () => {
      expect(() => parseNonNegativeInt("wide", "width")).toThrow("width must be a non-negative integer");
      expect(() => parseNonNegativeInt("8.5", "width")).toThrow(InvalidArgumentError);
    });

    it("should cap the value at 1000", () => {
      expect(parseNonNegativeInt("1000", "width")).toBe(1000);
      expect(() => parseNonNegativeInt("1001", "width")).toThrow("width must be <= 1000");
    });
  });

  describe("parseJson", () => {
    it("should parse valid JSON", () => {
      expect(parseJson('{"name":"app"}', "test")).toEqual({ name: "app" });
      expect(parseJson("[1,2]", "test")).toEqual([1, 2]);
    });

    it("should handle BOM", () => {
      expect(parseJson("\uFEFF" + '{"a":1}', "test")).toEqual({ a: 1 });
    });

    it("should name the source in the error", () => {
      expect(() => parseJson("{", "file app.json")).toThrow(InvalidArgumentError);
      expect(() => parseJson("{", "file app.json")).toThrow("Invalid JSON in file app.json");
    });
  });
});
