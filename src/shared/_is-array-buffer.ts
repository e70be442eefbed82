/**
 * 引数に与えられた値が `ArrayBuffer` オブジェクトかどうかを判定します。
 * 別のレルム (vm コンテキストなど) で作られた `ArrayBuffer` は `instanceof` で判定できないので、タグ名でも判定します。
 *
 * @param value 検証する値です。
 * @returns `value` が `ArrayBuffer` オブジェクトであれば `true`、そうでなければ `false` です。
 */
export default function isArrayBuffer(value: unknown): value is ArrayBuffer {
  return value instanceof ArrayBuffer
    || Object.prototype.toString.call(value) === "[object ArrayBuffer]";
}
