import { describe, test } from "vitest";
import { LogLevel, parseLogLevel } from "../../src/shared/logger.js";

test("LogLevel の値はすべて異なる", ({ expect }) => {
  const uniqueKeyCount = Object.keys(LogLevel).length;
  const uniqueValueCount = new Set(Object.values(LogLevel)).size;

  expect(uniqueKeyCount).toBe(uniqueValueCount);
});

describe("parseLogLevel", () => {
  test("大文字と小文字を区別せず、前後の空白を無視する", ({ expect }) => {
    expect(parseLogLevel("debug")).toBe(LogLevel.DEBUG);
    expect(parseLogLevel(" Warn ")).toBe(LogLevel.WARN);
    expect(parseLogLevel("QUIET")).toBe(LogLevel.QUIET);
  });

  test("不明な名前では undefined を返す", ({ expect }) => {
    expect(parseLogLevel("verbose")).toBeUndefined();
    expect(parseLogLevel("")).toBeUndefined();
  });
});
