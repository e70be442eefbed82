import * as fs from "node:fs";
import type { ISyncSink } from "../../../shared/sink.js";

/**
 * `FileDescriptorSink` を構築する際のオプションです。
 */
export type FileDescriptorSinkOptions = Readonly<{
  /**
   * `true` の場合、`flush()` でファイルのデータをストレージに同期します (`fdatasync`)。
   *
   * @default false
   */
  sync?: boolean | undefined;
}>;

/**
 * ファイルディスクリプターに同期的に書き込むシンクです。
 *
 * `fs.writeSync` が報告したバイト数をそのまま返すので、パイプなどへの短い書き込みもライターに伝わります。
 */
export default class FileDescriptorSink implements ISyncSink {
  /**
   * 書き込み先のファイルディスクリプターです。
   */
  public readonly fd: number;

  /**
   * `flush()` でストレージに同期するかどうかです。
   */
  public readonly sync: boolean;

  /**
   * `FileDescriptorSink` の新しいインスタンスを構築します。
   *
   * @param fd 書き込み先のファイルディスクリプターです。
   * @param options `FileDescriptorSink` を構築する際のオプションです。
   */
  public constructor(fd: number, options: FileDescriptorSinkOptions | undefined = {}) {
    this.fd = fd;
    this.sync = options.sync ?? false;
  }

  public write(data: Uint8Array): number {
    return fs.writeSync(this.fd, data);
  }

  public flush(): void {
    if (this.sync) {
      fs.fdatasyncSync(this.fd);
    }
  }
}
