import type { ILogger } from "../shared/logger.js";
import { type CreateWriterOptions, CreateWriterOptionsSchema } from "../shared/schemas.js";
import * as v from "../shared/valibot.js";
import type { IHash } from "./_hash.js";
import getHashAlgorithm from "./hash-algorithms.js";

/**
 * ライターが所有するハッシュと、ライターに渡すオプションです。
 */
type CreateHashResult = Readonly<{
  /**
   * 新しく作成されたハッシュ値を計算するためのストリームです。
   */
  hash: IHash;

  /**
   * ログを記録する関数群です。
   */
  logger: ILogger | undefined;
}>;

/**
 * ライターを構築するためのオプションを検証し、ハッシュ値を計算するためのストリームを作成します。
 *
 * @param options ライターを構築する際のオプションです。
 * @returns ライターが所有するハッシュと、ライターに渡すオプションです。
 */
export default async function createHash(
  options: CreateWriterOptions | undefined,
): Promise<CreateHashResult> {
  const {
    state,
    logger,
    algorithm,
  } = v.parse(CreateWriterOptionsSchema(), options);
  const hash = await getHashAlgorithm(algorithm).create(state);

  return {
    hash,
    logger,
  };
}
