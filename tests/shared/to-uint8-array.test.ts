import { test } from "vitest";
import { UnreachableError } from "../../src/shared/errors.js";
import toUint8Array from "../../src/shared/to-uint8-array.js";

test("文字列は UTF-8 でエンコードする", ({ expect }) => {
  expect(toUint8Array("aあ")).toStrictEqual(new Uint8Array([0x61, 0xE3, 0x81, 0x82]));
});

test("Uint8Array はコピーせずにそのまま返す", ({ expect }) => {
  const bytes = new Uint8Array([1, 2, 3]);

  expect(toUint8Array(bytes)).toBe(bytes);
});

test("その他の ArrayBufferView は同じメモリーを参照するビューに変換する", ({ expect }) => {
  const buffer = new ArrayBuffer(8);
  const view = new DataView(buffer, 2, 4);
  const bytes = toUint8Array(view);
  view.setUint8(0, 0xFF);

  expect(bytes.buffer).toBe(buffer);
  expect(bytes.byteOffset).toBe(2);
  expect(bytes).toHaveLength(4);
  expect(bytes[0]).toBe(0xFF);
});

test("ArrayBuffer は全体を参照するビューに変換する", ({ expect }) => {
  const buffer = new ArrayBuffer(2);
  const bytes = toUint8Array(buffer);

  expect(bytes.buffer).toBe(buffer);
  expect(bytes).toHaveLength(2);
});

test("変換できない値ではエラーを投げる", ({ expect }) => {
  expect(() => toUint8Array(1 as never)).toThrow(UnreachableError);
});
