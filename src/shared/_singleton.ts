declare global {
  /**
   * 一度だけ生成される値をキャッシュするためのグローバル変数です。
   */
  var digestWriter__singleton: Map<string, unknown> | undefined;
}

/**
 * `key` に紐づく値を一度だけ生成してキャッシュします。同じ `key` で複数回呼び出された場合、`fn` は再度実行されず、
 * キャッシュされた値が返されます。Valibot のスキーマや共有の `TextEncoder` など、作り直す必要のない値に使います。
 *
 * @template T 生成される値の型です。
 * @param key キャッシュを一意に識別するための識別子です。
 * @param fn 値を生成する関数です。
 * @returns キャッシュされた値です。
 */
export default function singleton<T>(key: string, fn: () => T): T {
  const cache = globalThis.digestWriter__singleton ||= new Map<string, unknown>();
  if (cache.has(key)) {
    return cache.get(key) as T;
  }

  const value = fn();
  cache.set(key, value);

  return value;
}
