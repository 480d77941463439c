import { describe, expect, test } from "vitest";
import {
  buildInlineConfig,
  canRunWithoutConfigFile,
  extractInlineOptions,
  hasInlineOptions,
  mergeInlineConfig,
} from "../../src/config/inline";
import { ConfigError } from "../../src/config/validator";

describe("inline config", () => {
  describe("extractInlineOptions", () => {
    test("converts parsed flags", () => {
      expect(
        extractInlineOptions({
          source: ["/data"],
          dest: "/backups",
          interval: "300",
          store: "container",
          "max-file-size": "5M",
        }),
      ).toEqual({ source: ["/data"], dest: "/backups", interval: 300, store: "container", maxFileSize: "5M" });
    });

    test("rejects a non-numeric interval", () => {
      expect(() => extractInlineOptions({ interval: "soon" })).toThrow(
        '--interval must be a positive number of seconds, got "soon"',
      );
    });

    test("rejects a zero interval", () => {
      expect(() => extractInlineOptions({ interval: "0" })).toThrow(ConfigError);
    });

    test("rejects an unknown store", () => {
      expect(() => extractInlineOptions({ store: "s3" })).toThrow(
        `--store must be 'directory' or 'container', got "s3"`,
      );
    });
  });

  describe("hasInlineOptions", () => {
    test("is false when nothing is given", () => {
      expect(hasInlineOptions({})).toBe(false);
      expect(hasInlineOptions({ source: [] })).toBe(false);
    });

    test("is true for any single option", () => {
      expect(hasInlineOptions({ dest: "/b" })).toBe(true);
      expect(hasInlineOptions({ interval: 60 })).toBe(true);
      expect(hasInlineOptions({ store: "directory" })).toBe(true);
    });
  });

  describe("canRunWithoutConfigFile", () => {
    test("requires at least one source", () => {
      expect(canRunWithoutConfigFile({ dest: "/b" })).toBe(false);
      expect(canRunWithoutConfigFile({ source: ["/data"] })).toBe(true);
    });
  });

  describe("buildInlineConfig", () => {
    test("maps flags to config fields", () => {
      expect(
        buildInlineConfig({ source: ["/data", "/logs"], dest: "/b", interval: 30, store: "container", maxFileSize: "1M" }),
      ).toEqual({
        sources: [{ path: "/data" }, { path: "/logs" }],
        destination: "/b",
        intervalSeconds: 30,
        store: "container",
        maxFileSize: "1M",
      });
    });

    test("leaves out what was not given", () => {
      expect(buildInlineConfig({})).toEqual({});
    });
  });

  describe("mergeInlineConfig", () => {
    test("inline options win and replace the source list", () => {
      const fromFile = {
        version: "1",
        sources: [{ path: "/etc" }, { path: "/home" }],
        destination: "/backups",
        retention: { shortWindowMinutes: 60, maxAgeMinutes: 600 },
      };

      expect(mergeInlineConfig(fromFile, { source: ["/srv"], interval: 120 })).toEqual({
        version: "1",
        sources: [{ path: "/srv" }],
        destination: "/backups",
        intervalSeconds: 120,
        retention: { shortWindowMinutes: 60, maxAgeMinutes: 600 },
      });
    });
  });
});
