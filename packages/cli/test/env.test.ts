/**
 * Unit tests for environment resolution
 */

import { describe, it, expect, beforeEach, afterEach } from "vitest";
import * as path from "node:path";
import { homedir } from "node:os";
import { isVerbose, resolveHelpWidth, resolveSpecPath } from "../src/lib/env.js";

const KEYS = ["ARGSPEC_SPEC", "ARGSPEC_HELP_WIDTH", "ARGSPEC_CLI_DEBUG"] as const;

describe("environment resolution", () => {
  const original = new Map<string, string | undefined>();

  beforeEach(() => {
    for (const key of KEYS) {
      original.set(key, process.env[key]);
      delete process.env[key];
    }
  });

  afterEach(() => {
    for (const key of KEYS) {
      const value = original.get(key);
      if (value !== undefined) {
        process.env[key] = value;
      } else {
        delete process.env[key];
      }
    }
  });

  describe("resolveSpecPath", () => {
    it("should use the CLI option when provided", () => {
      process.env.ARGSPEC_SPEC = "/env/app.json";
      expect(resolveSpecPath("/cli/app.json")).toBe(path.resolve("/cli/app.json"));
    });

    it("should fall back to ARGSPEC_SPEC", () => {
      process.env.ARGSPEC_SPEC = "/env/app.json";
      expect(resolveSpecPath()).toBe(path.resolve("/env/app.json"));
    });

    it("should resolve relative paths to absolute", () => {
      expect(resolveSpecPath("specs/app.json")).toBe(path.resolve("specs/app.json"));
    });

    it("should expand a leading tilde", () => {
      expect(resolveSpecPath("~/app.json")).toBe(path.join(homedir(), "app.json"));
    });

    it("should fail when no declaration file is configured", () => {
      expect(() => resolveSpecPath()).toThrow(
        "No declaration file given. Use --spec <file> or set ARGSPEC_SPEC"
      );
    });
  });

  describe("resolveHelpWidth", () => {
    it("should prefer the CLI option", () => {
      process.env.ARGSPEC_HELP_WIDTH = "60";
      expect(resolveHelpWidth(40)).toBe(40);
    });

    it("should read ARGSPEC_HELP_WIDTH", () => {
      process.env.ARGSPEC_HELP_WIDTH = "60";
      expect(resolveHelpWidth()).toBe(60);
    });

    it("should reject a malformed ARGSPEC_HELP_WIDTH", () => {
      process.env.ARGSPEC_HELP_WIDTH = "wide";
      expect(() => resolveHelpWidth()).toThrow("ARGSPEC_HELP_WIDTH must be a non-negative integer");
    });

    it("should return undefined when unset", () => {
      expect(resolveHelpWidth()).toBeUndefined();
    });
  });

  describe("isVerbose", () => {
    it("should be enabled only by ARGSPEC_CLI_DEBUG=1", () => {
      expect(isVerbose()).toBe(false);
      process.env.ARGSPEC_CLI_DEBUG = "1";
      expect(isVerbose()).toBe(true);
      process.env.ARGSPEC_CLI_DEBUG = "true";
      expect(isVerbose()).toBe(false);
    });
  });
});
