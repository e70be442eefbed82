import * as fsp from "node:fs/promises";
import createHash from "../../../core/_create-hash.js";
import AsyncWriter from "../../../core/async-writer.js";
import { type CreateWriterOptions, type OpenMode, OpenModeSchema } from "../../../shared/schemas.js";
import * as v from "../../../shared/valibot.js";
import FileHandleSink from "../sink/file-handle-sink.js";
import getLogger from "./_get-logger.js";

/**
 * `openFileWriter` のオプションです。
 */
export type OpenFileWriterOptions = CreateWriterOptions & Readonly<{
  /**
   * ファイルを開く際のモードです。
   *
   * 追加書き込みモードでは、既存の内容はハッシュに含まれません。既存の内容から計算を続けるには `state` を渡します。
   *
   * @default "w"
   */
  flag?: OpenMode | undefined;

  /**
   * `true` の場合、`flush()` でファイルのデータをストレージに同期します。
   *
   * @default false
   */
  sync?: boolean | undefined;
}>;

/**
 * ファイルを開き、書き込んだデータのハッシュ値を計算する `AsyncWriter` を作成します。
 * ロガーが指定されない場合は、環境変数に従って `ConsoleLogger` を使います。
 *
 * @param filePath 書き込み先のファイルパスです。
 * @param options `openFileWriter` のオプションです。
 * @returns ファイルを包む `AsyncWriter` です。書き込みが終わったら `close()` してください。
 */
export default async function openFileWriter(
  filePath: string,
  options: OpenFileWriterOptions | undefined = {},
): Promise<AsyncWriter<FileHandleSink>> {
  const {
    flag,
    sync,
    ...createOptions
  } = options;
  // 既存のファイルを切り詰める前に、すべてのオプションを検証してハッシュを作成します。
  const mode = v.parse(OpenModeSchema(), flag ?? "w");
  const { hash, logger } = await createHash({
    ...createOptions,
    logger: getLogger(createOptions.logger),
  });
  const fileHandle = await fsp.open(filePath, mode);

  return AsyncWriter.withHash(new FileHandleSink(fileHandle, { sync }), hash, { logger });
}
