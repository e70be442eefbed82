/**
 * 文字列を JSON の文字列リテラルとして二重引用符で囲います。エラーメッセージに操作名などを埋め込む際に使います。
 *
 * @template S 文字列の型です。
 * @param s 文字列です。
 * @returns 二重引用符で囲まれ、必要に応じてエスケープされた文字列です。
 */
export default function quoteString<S extends string>(s: S): `"${S}"` {
  return JSON.stringify(s) as `"${S}"`;
}
