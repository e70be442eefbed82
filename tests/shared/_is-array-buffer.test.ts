import { runInNewContext } from "node:vm";
import { test } from "vitest";
import isArrayBuffer from "../../src/shared/_is-array-buffer.js";

test("ArrayBuffer なら true を返す", ({ expect }) => {
  expect(isArrayBuffer(new ArrayBuffer(1))).toBe(true);
});

test("別のレルムで作られた ArrayBuffer でも true を返す", ({ expect }) => {
  expect(isArrayBuffer(runInNewContext("new ArrayBuffer(1)"))).toBe(true);
});

test("ArrayBuffer のビューや、それ以外の値では false を返す", ({ expect }) => {
  expect(isArrayBuffer(new Uint8Array(1))).toBe(false);
  expect(isArrayBuffer(new DataView(new ArrayBuffer(1)))).toBe(false);
  expect(isArrayBuffer("ArrayBuffer")).toBe(false);
  expect(isArrayBuffer(null)).toBe(false);
});
