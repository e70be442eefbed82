import type * as fsp from "node:fs/promises";
import { SinkClosedError } from "../../../shared/errors.js";
import type { IAsyncSink } from "../../../shared/sink.js";

/**
 * `FileHandleSink` を構築する際のオプションです。
 */
export type FileHandleSinkOptions = Readonly<{
  /**
   * `true` の場合、`flush()` でファイルのデータをストレージに同期します (`fdatasync`)。
   *
   * @default false
   */
  sync?: boolean | undefined;
}>;

/**
 * `fs/promises` の `FileHandle` に書き込む非同期なシンクです。`close()` でファイルハンドルも閉じます。
 */
export default class FileHandleSink implements IAsyncSink {
  /**
   * 書き込み先のファイルハンドルです。
   */
  readonly #fileHandle: fsp.FileHandle;

  /**
   * `true` ならシンクは閉じています。
   */
  #closed: boolean;

  /**
   * `flush()` でストレージに同期するかどうかです。
   */
  public readonly sync: boolean;

  /**
   * `FileHandleSink` の新しいインスタンスを構築します。
   *
   * @param fileHandle 書き込み先のファイルハンドルです。
   * @param options `FileHandleSink` を構築する際のオプションです。
   */
  public constructor(
    fileHandle: fsp.FileHandle,
    options: FileHandleSinkOptions | undefined = {},
  ) {
    this.#fileHandle = fileHandle;
    this.#closed = false;
    this.sync = options.sync ?? false;
  }

  /**
   * `true` ならシンクは閉じています。
   */
  public get closed(): boolean {
    return this.#closed;
  }

  public async write(data: Uint8Array): Promise<number> {
    if (this.#closed) {
      throw new SinkClosedError();
    }

    const { bytesWritten } = await this.#fileHandle.write(data);

    return bytesWritten;
  }

  public async flush(): Promise<void> {
    if (this.#closed) {
      throw new SinkClosedError();
    }

    if (this.sync) {
      await this.#fileHandle.datasync();
    }
  }

  public async close(): Promise<void> {
    if (this.#closed) {
      throw new SinkClosedError();
    }

    this.#closed = true;
    await this.#fileHandle.close();
  }
}
