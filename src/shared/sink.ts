import type { Awaitable } from "./type-utils.js";

/**
 * 同期的にバイト列を受け付けるシンクのインターフェースです。
 *
 * 書き込みや同期に失敗した場合、シンクはその原因となったエラーをそのまま投げます。
 */
export interface ISyncSink {
  /**
   * バイト列を書き込みます。
   *
   * シンクはデータの先頭から一部だけを受け付けることができます (短い書き込み)。
   *
   * @param data 書き込むバイト列です。
   * @returns `data` の先頭から受け付けたバイト数です。`0` 以上 `data.length` 以下の整数です。
   */
  write(data: Uint8Array): number;

  /**
   * バッファーに溜まっているバイト列を書き込み先に送り出します。
   */
  flush(): void;
}

/**
 * 非同期にバイト列を受け付けるシンクのインターフェースです。
 *
 * 書き込みや同期、終了に失敗した場合、シンクはその原因となったエラーで拒否します。
 */
export interface IAsyncSink {
  /**
   * バイト列を書き込みます。書き込み先の準備ができるまで、解決を待たせることができます。
   *
   * @param data 書き込むバイト列です。
   * @returns `data` の先頭から受け付けたバイト数です。`0` 以上 `data.length` 以下の整数です。
   */
  write(data: Uint8Array): Awaitable<number>;

  /**
   * バッファーに溜まっているバイト列を書き込み先に送り出します。
   */
  flush(): Awaitable<void>;

  /**
   * バッファーに溜まっているバイト列を送り出し、シンクを終了します。
   */
  close(): Awaitable<void>;
}
