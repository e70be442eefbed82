import { once } from "node:events";
import type { Writable } from "node:stream";
import { finished } from "node:stream/promises";
import type { IAsyncSink } from "../../../shared/sink.js";

/**
 * Node.js の `stream.Writable` に書き込む非同期なシンクです。
 *
 * 書き込みはチャンクデータが処理される (書き込みのコールバックが呼ばれる) まで待ち、チャンクデータをすべて受け付けます。
 * ストリームが背圧を通知している間は、`"drain"` イベントを待ってから書き込みます。
 */
export default class NodeWritableSink implements IAsyncSink {
  /**
   * 書き込み先のストリームです。
   */
  readonly #stream: Writable;

  /**
   * ストリームで発生したエラーです。
   */
  #error: { value: unknown } | null;

  /**
   * `NodeWritableSink` の新しいインスタンスを構築します。
   *
   * @param stream 書き込み先のストリームです。
   */
  public constructor(stream: Writable) {
    this.#stream = stream;
    this.#error = null;
    // リスナーがないと "error" イベントがプロセスを停止させるので、記録しておき、次の操作で投げます。
    this.#stream.on("error", error => {
      this.#error ||= { value: error };
    });
  }

  public async write(data: Uint8Array): Promise<number> {
    this.#throwIfErrored();
    if (this.#stream.writableNeedDrain) {
      await once(this.#stream, "drain");
    }

    await new Promise<void>((resolve, reject) => {
      this.#stream.write(data, error => {
        if (error) {
          reject(error);
        } else {
          resolve();
        }
      });
    });

    return data.length;
  }

  public async flush(): Promise<void> {
    this.#throwIfErrored();
    if (this.#stream.writableNeedDrain) {
      await once(this.#stream, "drain");
    }
  }

  public async close(): Promise<void> {
    this.#throwIfErrored();
    this.#stream.end();
    await finished(this.#stream);
  }

  #throwIfErrored(): void {
    // 破棄されたストリームは "error" イベントより先に `errored` を持ちます。
    const { errored } = this.#stream;
    if (errored) {
      throw errored;
    }

    if (this.#error) {
      throw this.#error.value;
    }
  }
}
