import type { IAsyncSink } from "../../../shared/sink.js";

/**
 * `WritableStream` から取得したライターのうち、このシンクが使用する部分のインターフェースです。
 * ブラウザと Node.js の両方の `WritableStreamDefaultWriter` が満たします。
 */
export interface IWebWritableStreamWriter {
  /**
   * ストリームの内部キューに空きができると解決します。
   */
  readonly ready: PromiseLike<unknown>;

  /**
   * チャンクデータを書き込みます。下流がチャンクデータを処理し終えると解決します。
   */
  write(chunk: Uint8Array): PromiseLike<unknown>;

  /**
   * ストリームを閉じます。
   */
  close(): PromiseLike<unknown>;
}

/**
 * `WritableStream` のうち、このシンクが使用する部分のインターフェースです。
 */
export interface IWebWritableStream {
  /**
   * ストリームをロックして、ライターを取得します。
   */
  getWriter(): IWebWritableStreamWriter;
}

/**
 * WHATWG Streams の `WritableStream` を包む非同期なシンクです。
 *
 * 書き込みはストリームの背圧 (`writer.ready`) が解消されるまで待ち、チャンクデータをすべて受け付けます。
 */
export default class WebWritableSink implements IAsyncSink {
  readonly #writer: IWebWritableStreamWriter;

  /**
   * `WebWritableSink` の新しいインスタンスを構築します。ストリームはこのシンクによってロックされます。
   *
   * @param stream 書き込み先のストリームです。
   */
  public constructor(stream: IWebWritableStream) {
    this.#writer = stream.getWriter();
  }

  public async write(data: Uint8Array): Promise<number> {
    await this.#writer.ready;
    await this.#writer.write(data);

    return data.length;
  }

  public async flush(): Promise<void> {
    await this.#writer.ready;
  }

  public async close(): Promise<void> {
    await this.#writer.close();
  }
}
