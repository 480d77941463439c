import { describe, expect, test } from "vitest";
import { formatBytes, formatDuration, parseSize } from "../../src/utils/format";

describe("format utilities", () => {
  describe("parseSize", () => {
    test.each([
      ["100k", 102_400],
      ["10M", 10_485_760],
      ["1.5G", 1_610_612_736],
      ["2t", 2 * 1024 ** 4],
      ["512", 512],
      ["512b", 512],
      ["64KiB", 65_536],
      [" 8m ", 8_388_608],
    ])("parses %j", (value, expected) => {
      expect(parseSize(value)).toBe(expected);
    });

    test("takes numbers as bytes", () => {
      expect(parseSize(4096)).toBe(4096);
      expect(parseSize(10.9)).toBe(10);
    });

    test.each(["", "ten", "10x", "-5k", "1e3"])("rejects %j", (value) => {
      expect(parseSize(value)).toBeNull();
    });

    test("rejects negative and non-finite numbers", () => {
      expect(parseSize(-1)).toBeNull();
      expect(parseSize(Number.POSITIVE_INFINITY)).toBeNull();
    });
  });

  describe("formatBytes", () => {
    test("formats bytes", () => {
      expect(formatBytes(0)).toBe("0 B");
      expect(formatBytes(512)).toBe("512 B");
      expect(formatBytes(1536)).toBe("1.50 KB");
      expect(formatBytes(10 * 1024 * 1024)).toBe("10.00 MB");
    });
  });

  describe("formatDuration", () => {
    test("formats milliseconds", () => {
      expect(formatDuration(250)).toBe("250ms");
      expect(formatDuration(4500)).toBe("4s");
      expect(formatDuration(125_000)).toBe("2m 5s");
    });
  });
});
