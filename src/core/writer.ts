import VoidLogger from "../envs/shared/logger/void-logger.js";
import { SinkContractError, WriterUnwrappedError, WriteZeroError } from "../shared/errors.js";
import { type ILogger, LogLevel } from "../shared/logger.js";
import {
  type CreateWriterOptions,
  type WriterOptions,
  WriterOptionsSchema,
} from "../shared/schemas.js";
import type { ISyncSink } from "../shared/sink.js";
import toUint8Array, { type Uint8ArraySource } from "../shared/to-uint8-array.js";
import * as v from "../shared/valibot.js";
import createHash from "./_create-hash.js";
import type { Digest, IHash } from "./_hash.js";

/**
 * 同期的なシンクを包み、書き込まれたバイト列のハッシュ値をその場で計算するライターです。
 *
 * シンクが受け付けたバイト列だけが、受け付けた順にハッシュに渡されます。
 * シンクがエラーを投げた場合、ハッシュは更新されません。
 *
 * @template TSink 包まれているシンクの型です。
 * @template TDigest ダイジェストの型です。
 */
export default class Writer<TSink extends ISyncSink = ISyncSink, TDigest = Digest> {
  /**
   * 新しいハッシュを作成し、シンクを包むライターを構築します。
   *
   * @param inner 包むシンクです。
   * @param options ライターを構築する際のオプションです。
   * @returns 新しいライターです。
   */
  public static async create<TSink extends ISyncSink>(
    inner: TSink,
    options?: CreateWriterOptions | undefined,
  ): Promise<Writer<TSink>> {
    const { hash, logger } = await createHash(options);

    return new Writer(inner, hash, { logger });
  }

  /**
   * 呼び出し元が用意したハッシュで、シンクを包むライターを構築します。
   *
   * @param inner 包むシンクです。
   * @param hash 途中まで計算されたハッシュなど、ライターが所有するハッシュです。
   * @param options ライターを構築する際のオプションです。
   * @returns 新しいライターです。
   */
  public static withHash<TSink extends ISyncSink, TDigest>(
    inner: TSink,
    hash: IHash<TDigest>,
    options?: WriterOptions | undefined,
  ): Writer<TSink, TDigest> {
    return new Writer(inner, hash, options);
  }

  /**
   * 包まれているシンクです。`unwrap()` されると `null` になります。
   */
  #inner: TSink | null;

  /**
   * ハッシュ値を計算するためのストリームです。`unwrap()` されると `null` になります。
   */
  #hash: IHash<TDigest> | null;

  /**
   * ログを記録する関数群です。
   */
  readonly #logger: ILogger;

  /**
   * シンクが受け付けたバイト数の合計です。
   */
  #bytesWritten: number;

  /**
   * `Writer` クラスの新しいインスタンスを初期化します。
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
   * シンクにバイト列を書き込み、シンクが受け付けた分だけハッシュを更新します。
   *
   * 長さ 0 のバイト列もシンクに渡されます。
   *
   * @param chunk `Uint8Array` に変換できるチャンクデータです。
   * @returns シンクが受け付けたバイト数です。
   */
  public write(chunk: Uint8ArraySource): number {
    const inner = this.#getInner("write");
    const hash = this.#getHash("write");
    const data = toUint8Array(chunk);

    let n: number;
    try {
      n = inner.write(data);
    } catch (ex) {
      this.#logger.log({
        level: LogLevel.DEBUG,
        message: `Writer.write: Sink failed to write ${data.length} bytes; hash is left unchanged`,
      });

      throw ex;
    }

    if (!Number.isSafeInteger(n) || n < 0 || n > data.length) {
      throw new SinkContractError(data.length, n);
    }

    if (n < data.length) {
      this.#logger.log({
        level: LogLevel.DEBUG,
        message: `Writer.write: Sink accepted ${n} of ${data.length} bytes`,
      });
    }

    hash.update(data.subarray(0, n));
    this.#bytesWritten += n;

    return n;
  }

  /**
   * シンクがすべてを受け付けるまで `write()` を繰り返します。
   *
   * @param chunk `Uint8Array` に変換できるチャンクデータです。
   * @returns 書き込まれたバイト数です。常にチャンクデータの長さと等しくなります。
   */
  public writeAll(chunk: Uint8ArraySource): number {
    const data = toUint8Array(chunk);
    let offset = 0;
    while (offset < data.length) {
      const n = this.write(data.subarray(offset));
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
  public flush(): void {
    this.#getInner("flush").flush();
  }

  /**
   * これまでにシンクが受け付けたバイト列のダイジェストを返します。ライターとシンクの状態は変わりません。
   *
   * @returns ダイジェストです。
   */
  public digest(): TDigest {
    return this.#getHash("digest").digest();
  }

  /**
   * ライターを破棄して、包まれていたシンクを返します。ハッシュは破棄されます。
   *
   * @returns 包まれていたシンクです。
   */
  public unwrap(): TSink {
    const inner = this.#getInner("unwrap");
    this.#inner = null;
    this.#hash = null;

    return inner;
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
