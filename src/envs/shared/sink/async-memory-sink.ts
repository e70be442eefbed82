import { SinkClosedError } from "../../../shared/errors.js";
import type { IAsyncSink } from "../../../shared/sink.js";
import MemorySink, { type MemorySinkOptions } from "./memory-sink.js";

/**
 * `AsyncMemorySink` を構築する際のオプションです。
 */
export type AsyncMemorySinkOptions = MemorySinkOptions;

/**
 * 書き込まれたバイト列をメモリー上に保持する非同期なシンクです。
 * 閉じたあとの書き込みと同期は `SinkClosedError` で拒否されます。
 */
export default class AsyncMemorySink implements IAsyncSink {
  /**
   * バイト列を保持する同期的なシンクです。
   */
  readonly #buffer: MemorySink;

  /**
   * `true` ならシンクは閉じています。
   */
  #closed: boolean;

  /**
   * `AsyncMemorySink` の新しいインスタンスを構築します。
   *
   * @param options `AsyncMemorySink` を構築する際のオプションです。
   */
  public constructor(options?: AsyncMemorySinkOptions | undefined) {
    this.#buffer = new MemorySink(options);
    this.#closed = false;
  }

  /**
   * `true` ならシンクは閉じています。
   */
  public get closed(): boolean {
    return this.#closed;
  }

  /**
   * 書き込まれたバイト数の合計です。
   */
  public get size(): number {
    return this.#buffer.size;
  }

  /**
   * `flush()` が呼び出された回数です。
   */
  public get flushCount(): number {
    return this.#buffer.flushCount;
  }

  public async write(data: Uint8Array): Promise<number> {
    if (this.#closed) {
      throw new SinkClosedError();
    }

    return this.#buffer.write(data);
  }

  public async flush(): Promise<void> {
    if (this.#closed) {
      throw new SinkClosedError();
    }

    this.#buffer.flush();
  }

  public async close(): Promise<void> {
    if (this.#closed) {
      throw new SinkClosedError();
    }

    this.#closed = true;
  }

  /**
   * 書き込まれたバイト列をすべて連結して返します。
   *
   * @returns 書き込まれたバイト列のコピーです。
   */
  public bytes(): Uint8Array {
    return this.#buffer.bytes();
  }

  /**
   * 書き込まれたバイト列を UTF-8 の文字列としてデコードします。
   *
   * @returns デコードされた文字列です。
   */
  public text(): string {
    return this.#buffer.text();
  }
}
