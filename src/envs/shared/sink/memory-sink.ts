import utf8 from "../../../shared/_utf8.js";
import singleton from "../../../shared/_singleton.js";
import type { ISyncSink } from "../../../shared/sink.js";
import * as v from "../../../shared/valibot.js";

/**
 * `MemorySink` を構築する際のオプションです。
 */
export type MemorySinkOptions = Readonly<{
  /**
   * 一度の書き込みで受け付ける最大のバイト数です。これより長いデータは短い書き込みになります。
   *
   * 指定しない場合は、常にすべてを受け付けます。
   */
  maxWriteSize?: number | undefined;
}>;

/**
 * `MemorySink` を構築する際のオプションの Valibot スキーマです。
 */
export function MemorySinkOptionsSchema() {
  return singleton("memory_sink__options", () => (
    v.optional(
      v.object({
        maxWriteSize: v.optional(v.pipe(v.number(), v.safeInteger(), v.minValue(1))),
      }),
      {},
    )
  ));
}

/**
 * 書き込まれたバイト列をメモリー上に保持する同期的なシンクです。テストや、小さなデータのハッシュ値の計算に使います。
 */
export default class MemorySink implements ISyncSink {
  /**
   * 書き込まれたチャンクデータです。それぞれ書き込み時にコピーされています。
   */
  readonly #chunks: Uint8Array[];

  /**
   * 書き込まれたバイト数の合計です。
   */
  #size: number;

  /**
   * `flush()` が呼び出された回数です。
   */
  #flushCount: number;

  /**
   * 一度の書き込みで受け付ける最大のバイト数です。制限がない場合は `Infinity` です。
   */
  public readonly maxWriteSize: number;

  /**
   * `MemorySink` の新しいインスタンスを構築します。
   *
   * @param options `MemorySink` を構築する際のオプションです。
   */
  public constructor(options?: MemorySinkOptions | undefined) {
    const { maxWriteSize } = v.parse(MemorySinkOptionsSchema(), options);
    this.#chunks = [];
    this.#size = 0;
    this.#flushCount = 0;
    this.maxWriteSize = maxWriteSize ?? Infinity;
  }

  /**
   * 書き込まれたバイト数の合計です。
   */
  public get size(): number {
    return this.#size;
  }

  /**
   * `flush()` が呼び出された回数です。
   */
  public get flushCount(): number {
    return this.#flushCount;
  }

  /**
   * バイト列の先頭から、最大で `maxWriteSize` バイトを受け付けます。
   *
   * @param data 書き込むバイト列です。
   * @returns 受け付けたバイト数です。
   */
  public write(data: Uint8Array): number {
    const n = Math.min(data.length, this.maxWriteSize);
    this.#chunks.push(data.slice(0, n));
    this.#size += n;

    return n;
  }

  public flush(): void {
    this.#flushCount += 1;
  }

  /**
   * 書き込まれたバイト列をすべて連結して返します。
   *
   * @returns 書き込まれたバイト列のコピーです。
   */
  public bytes(): Uint8Array {
    const out = new Uint8Array(this.#size);
    let offset = 0;
    for (const chunk of this.#chunks) {
      out.set(chunk, offset);
      offset += chunk.length;
    }

    return out;
  }

  /**
   * 書き込まれたバイト列を UTF-8 の文字列としてデコードします。
   *
   * @returns デコードされた文字列です。
   */
  public text(): string {
    return utf8.decode(this.bytes());
  }
}
