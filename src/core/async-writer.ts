import { asyncmux } from "asyncmux";
import VoidLogger from "../envs/shared/logger/void-logger.js";
import {
  SinkContractError,
  WriterBusyError,
  WriterUnwrappedError,
  WriteZeroError,
} from "../shared/errors.js";
import { type ILogger, LogLevel } from "../shared/logger.js";
import {
  type CreateWriterOptions,
  type WriterOptions,
  WriterOptionsSchema,
} from "../shared/schemas.js";
import type { IAsyncSink } from "../shared/sink.js";
import toUint8Array, { type Uint8ArraySource } from "../shared/to-uint8-array.js";
import type { Awaitable } from "../shared/type-utils.js";
import * as v from "../shared/valibot.js";
import createHash from "./_create-hash.js";
import type { Digest, IHash } from "./_hash.js";

/**
 * 非同期なシンクを包み、書き込まれたバイト列のハッシュ値をその場で計算するライターです。
 *
 * ハッシュはシンクの書き込みが解決したときに一度だけ、受け付けられたバイト列で更新されます。
 * 解決を待っている間や、シンクが拒否した場合、ハッシュは更新されません。
 * 書き込み、同期、終了は呼び出された順に一つずつ実行されます。
 *
 * @template TSink 包まれているシンクの型です。
 * @template TDigest ダイジェストの型です。
 */
export default class AsyncWriter<TSink extends IAsyncSink = IAsyncSink, TDigest = Digest>
  implements AsyncDisposable
{
  /**
   * 新しいハッシュを作成し、シンクを包むライターを構築します。
   *
   * @param inner 包むシンクです。
   * @param options ライターを構築する際のオプションです。
   * @returns 新しいライターです。
   */
  public static async create<TSink extends IAsyncSink>(
    inner: TSink,
    options?: CreateWriterOptions | undefined,
  ): Promise<AsyncWriter<TSink>> {
    const { hash, logger } = await createHash(options);

    return new AsyncWriter(inner, hash, { logger });
  }

  /**
   * 呼び出し元が用意したハッシュで、シンクを包むライターを構築します。
   *
   * @param inner 包むシンクです。
   * @param hash 途中まで計算されたハッシュなど、ライターが所有するハッシュです。
   * @param options ライターを構築する際のオプションです。
   * @returns 新しいライターです。
   */
  public static withHash<TSink extends IAsyncSink, TDigest>(
    inner: TSink,
    hash: IHash<TDigest>,
    options?: WriterOptions | undefined,
  ): AsyncWriter<TSink, TDigest> {
    return new AsyncWriter(inner, hash, options);
  }

  #inner: TSink | null;

  #hash: IHash<TDigest> | null;

  readonly #logger: ILogger;

  #bytesWritten: number;

  /**
   * `close()` が解決すると `true` になります。
   */
  #closed: boolean;

  /**
   * シンクの操作を待っている数です。
   */
  #inFlight: number;

  /**
   * `AsyncWriter` クラスの新しいインスタンスを初期化します。
   *
   * @param inner 包むシンクです。
   * @param hash ライターが所有するハッシュです。
   * @param options ライターを構築する際のオプションです。
   */
  public constructor(inner: TSink, hash: IHash<TDigest>, options?: WriterOptions | undefined) {
    const { logger } = v.parse(WriterOptionsSchema(), options);
    this.#inner = inner;
    this.#hash = hash;
    this.#logger = logger ?? new VoidLogger();
    this.#bytesWritten = 0;
    this.#closed = false;
    this.#inFlight = 0;
  }

  /**
   * `true` なら `unwrap()` されていて、このライターはもう使えません。
   */
  public get unwrapped(): boolean {
    return this.#inner === null;
  }

  /**
   * シンクが受け付け、ハッシュに渡されたバイト数の合計です。
   */
  public get bytesWritten(): number {
    return this.#bytesWritten;
  }

  /**
   * `true` なら `close()` が完了しています。
   */
  public get closed(): boolean {
    return this.#closed;
  }

  /**
   * シンクにバイト列を書き込み、書き込みが解決したら、シンクが受け付けた分だけハッシュを更新します。
   *
   * @param chunk `Uint8Array` に変換できるチャンクデータです。
   * @returns シンクが受け付けたバイト数です。
   */
  @asyncmux
  public async write(chunk: Uint8ArraySource): Promise<number> {
    return await this.#write(toUint8Array(chunk));
  }

  /**
   * シンクがすべてを受け付けるまで書き込みを繰り返します。
   * 途中で別の書き込みが割り込むことはありません。
   *
   * @param chunk `Uint8Array` に変換できるチャンクデータです。
   * @returns 書き込まれたバイト数です。常にチャンクデータの長さと等しくなります。
   */
  @asyncmux
  public async writeAll(chunk: Uint8ArraySource): Promise<number> {
    const data = toUint8Array(chunk);
    let offset = 0;
    while (offset < data.length) {
      const n = await this.#write(data.subarray(offset));
      if (n === 0) {
        throw new WriteZeroError(offset, data.length - offset);
      }

      offset += n;
    }

    return offset;
  }

  /**
   * シンクのバッファーを送り出します。ハッシュには触れません。
   */
  @asyncmux
  public async flush(): Promise<void> {
    const inner = this.#getInner("flush");
    await this.#track(() => inner.flush());
  }

  /**
   * シンクを終了します。ハッシュには触れないので、終了したあとも `digest()` を呼び出せます。
   */
  @asyncmux
  public async close(): Promise<void> {
    const inner = this.#getInner("close");
    await this.#track(() => inner.close());
    this.#closed = true;
  }

  /**
   * これまでにシンクが受け付けたバイト列のダイジェストを返します。
   * 解決していない書き込みは含まれません。
   *
   * @returns ダイジェストです。
   */
  public digest(): TDigest {
    return this.#getHash("digest").digest();
  }

  /**
   * ライターを破棄して、包まれていたシンクを返します。ハッシュは破棄されます。
   * シンクの書き込み、同期、終了のいずれかを待っている間は呼び出せません。
   *
   * @returns 包まれていたシンクです。
   */
  public unwrap(): TSink {
    const inner = this.#getInner("unwrap");
    if (this.#inFlight > 0) {
      throw new WriterBusyError("unwrap");
    }

    this.#inner = null;
    this.#hash = null;

    return inner;
  }

  public async [Symbol.asyncDispose](): Promise<void> {
    if (!this.unwrapped && !this.#closed) {
      await this.close();
    }
  }

  async #write(data: Uint8Array): Promise<number> {
    const inner = this.#getInner("write");
    const hash = this.#getHash("write");

    let n: number;
    try {
      n = await this.#track(() => inner.write(data));
    } catch (ex) {
      this.#logger.log({
        level: LogLevel.DEBUG,
        message: `AsyncWriter.write: Sink failed to write ${data.length} bytes; `
          + "hash is left unchanged",
      });

      throw ex;
    }

    if (!Number.isSafeInteger(n) || n < 0 || n > data.length) {
      throw new SinkContractError(data.length, n);
    }

    if (n < data.length) {
      this.#logger.log({
        level: LogLevel.DEBUG,
        message: `AsyncWriter.write: Sink accepted ${n} of ${data.length} bytes`,
      });
    }

    hash.update(data.subarray(0, n));
    this.#bytesWritten += n;

    return n;
  }

  async #track<T>(op: () => Awaitable<T>): Promise<T> {
    this.#inFlight += 1;
    try {
      return await op();
    } finally {
      this.#inFlight -= 1;
    }
  }

  #getInner(operation: string): TSink {
    if (this.#inner === null) {
      throw new WriterUnwrappedError(operation);
    }

    return this.#inner;
  }

  #getHash(operation: string): IHash<TDigest> {
    if (this.#hash === null) {
      throw new WriterUnwrappedError(operation);
    }

    return this.#hash;
  }
}
