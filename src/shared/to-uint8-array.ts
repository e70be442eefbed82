import isArrayBuffer from "./_is-array-buffer.js";
import utf8 from "./_utf8.js";
import unreachable from "./unreachable.js";

/**
 * `Uint8Array` に変換可能な値の型です。
 */
export type Uint8ArraySource = string | ArrayBuffer | ArrayBufferView;

/**
 * 与えられた値を `Uint8Array` に変換します。`Uint8Array` はコピーせずにそのまま返し、
 * それ以外の `ArrayBufferView` は同じメモリーを参照するビューに変換します。
 *
 * @param source `Uint8Array` に変換する値です。
 * @returns 変換された `Uint8Array` です。
 */
export default function toUint8Array(source: Uint8ArraySource): Uint8Array {
  switch (true) {
    case typeof source === "string":
      return utf8.encode(source);

    case source instanceof Uint8Array:
      return source;

    case ArrayBuffer.isView(source):
      return new Uint8Array(source.buffer, source.byteOffset, source.byteLength);

    case isArrayBuffer(source):
      return new Uint8Array(source);

    default:
      return unreachable(source);
  }
}
