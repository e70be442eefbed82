import { beforeEach, test } from "vitest";
import singleton from "../../src/shared/_singleton.js";

// 各テスト前にキャッシュを初期化する。
beforeEach(() => {
  globalThis.digestWriter__singleton = new Map();
});

test("関数の結果をキャッシュする", ({ expect }) => {
  let count = 0;
  const fn = () => {
    count++;
    return { value: "結果" };
  };

  const result1 = singleton("sync1", fn);
  const result2 = singleton("sync1", fn);

  expect(result1).toStrictEqual({ value: "結果" });
  expect(result2).toBe(result1);
  expect(count).toBe(1); // 1 度しか実行されていない
});

test("undefined もキャッシュする", ({ expect }) => {
  let count = 0;
  const fn = () => {
    count++;
    return undefined;
  };

  singleton("undefined1", fn);
  singleton("undefined1", fn);

  expect(count).toBe(1);
});

test("関数がエラーを投げた場合はキャッシュしない", ({ expect }) => {
  let count = 0;
  const fn = () => {
    count++;
    throw new Error("失敗");
  };

  expect(() => singleton("throw1", fn)).toThrow("失敗");
  expect(() => singleton("throw1", fn)).toThrow("失敗");
  expect(count).toBe(2);
});
