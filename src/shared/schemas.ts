import singleton from "./_singleton.js";
import type { ILogger } from "./logger.js";
import * as v from "./valibot.js";

/**
 * JavaScript で安全に扱える符号なし整数の Valibot スキーマです。
 */
export function UintSchema() {
  return singleton("schemas__uint", () => (
    v.pipe(
      v.number(),
      v.safeInteger(),
      v.minValue(0),
      v.brand("Uint"),
    )
  ));
}

/**
 * JavaScript で安全に扱える符号なし整数です。
 */
export type UintLike = v.InferInput<ReturnType<typeof UintSchema>>;

/**
 * JavaScript で安全に扱える符号なし整数です。
 */
export type Uint = v.InferOutput<ReturnType<typeof UintSchema>>;

/**
 * 符号なし 8 ビット整数の Valibot スキーマです。
 */
export function Uint8Schema() {
  return singleton("schemas__uint8", () => (
    v.pipe(
      UintSchema(),
      v.maxValue(255 as Uint),
      v.brand("Uint8"),
    )
  ));
}

/**
 * 符号なし 8 ビット整数です。
 */
export type Uint8Like = v.InferInput<ReturnType<typeof Uint8Schema>>;

/**
 * 符号なし 8 ビット整数です。
 */
export type Uint8 = v.InferOutput<ReturnType<typeof Uint8Schema>>;

/**
 * 小文字の 16 進数だけで構成される、偶数桁の文字列です。
 */
const HEX_REGEX = /^(?:[0-9a-f]{2})+$/;

/**
 * チェックサム (ハッシュ値の 16 進数文字列) の Valibot スキーマです。
 */
export function ChecksumSchema() {
  return singleton("schemas__checksum", () => (
    v.pipe(
      v.string(),
      v.regex(HEX_REGEX),
      v.brand("Checksum"),
    )
  ));
}

/**
 * チェックサム (ハッシュ値の 16 進数文字列) です。
 */
export type ChecksumLike = v.InferInput<ReturnType<typeof ChecksumSchema>>;

/**
 * チェックサム (ハッシュ値の 16 進数文字列) です。
 */
export type Checksum = v.InferOutput<ReturnType<typeof ChecksumSchema>>;

/**
 * ハッシュ関数の内部状態の Valibot スキーマです。
 */
export function HashStateSchema() {
  return singleton("schemas__hash_state", () => (
    v.pipe(
      v.array(Uint8Schema()),
      v.readonly(),
      v.brand("HashState"),
    )
  ));
}

/**
 * ハッシュ関数の内部状態です。`Digest.state` をそのまま渡せるように、読み取り専用の配列も受け付けます。
 */
export type HashStateLike = readonly number[];

/**
 * ハッシュ関数の内部状態です。
 */
export type HashState = v.InferOutput<ReturnType<typeof HashStateSchema>>;

/**
 * 利用可能なハッシュアルゴリズムの名前です。
 */
export const HASH_ALGORITHM_NAMES = [
  "md5",
  "sha1",
  "sha256",
  "sha512",
  "sha3-256",
  "blake3",
  "crc32",
  "xxhash64",
] as const;

/**
 * 既定のハッシュアルゴリズムの名前です。
 */
export const DEFAULT_HASH_ALGORITHM_NAME = "sha256";

/**
 * ハッシュアルゴリズムの名前の Valibot スキーマです。
 */
export function HashAlgorithmNameSchema() {
  return singleton("schemas__hash_algorithm_name", () => (
    v.picklist(HASH_ALGORITHM_NAMES)
  ));
}

/**
 * ハッシュアルゴリズムの名前です。
 */
export type HashAlgorithmName = v.InferOutput<ReturnType<typeof HashAlgorithmNameSchema>>;

/**
 * ファイルを開く際のモードの Valibot スキーマです。
 *
 * - **`"w"`**: 書き込みモードで開きます。ファイルが存在しない場合は新規作成され、もし存在する場合は切り詰めます。
 * - **`"wx"`**: 書き込みモードで開きます。ファイルが存在する場合はエラーになります。
 * - **`"a"`**: 追加書き込みモードで開きます。ファイルが存在しない場合は新規作成されます。
 * - **`"ax"`**: 追加書き込みモードで開きます。ファイルが存在する場合はエラーになります。
 */
export function OpenModeSchema() {
  return singleton("schemas__open_mode", () => (
    v.picklist(["w", "wx", "a", "ax"])
  ));
}

/**
 * ファイルを開く際のモードです。
 */
export type OpenMode = v.InferOutput<ReturnType<typeof OpenModeSchema>>;

/**
 * `ILogger` インターフェースを実装した値の Valibot スキーマです。
 */
export function LoggerSchema() {
  return singleton("schemas__logger", () => (
    v.custom<ILogger>(input => (
      typeof input === "object"
      && input !== null
      && "log" in input
      && typeof input.log === "function"
    ))
  ));
}

/**
 * ハッシュ値を新しく作成してライターを構築する際のオプションの Valibot スキーマです。
 */
export function CreateWriterOptionsSchema() {
  return singleton("schemas__create_writer_options", () => (
    v.optional(
      v.object({
        algorithm: v.optional(HashAlgorithmNameSchema(), DEFAULT_HASH_ALGORITHM_NAME),
        state: v.optional(HashStateSchema()),
        logger: v.optional(LoggerSchema()),
      }),
      {},
    )
  ));
}

/**
 * ハッシュ値を新しく作成してライターを構築する際のオプションです。
 */
export type CreateWriterOptions = Readonly<{
  /**
   * ハッシュアルゴリズムの名前です。
   *
   * @default "sha256"
   */
  algorithm?: HashAlgorithmName | undefined;

  /**
   * 計算を再開するハッシュ関数の内部状態です。`Digest.state` を渡します。
   */
  state?: HashStateLike | undefined;

  /**
   * ログを記録する関数群です。
   */
  logger?: ILogger | undefined;
}>;

/**
 * 既存のハッシュ値を渡してライターを構築する際のオプションの Valibot スキーマです。
 */
export function WriterOptionsSchema() {
  return singleton("schemas__writer_options", () => (
    v.optional(
      v.object({
        logger: v.optional(LoggerSchema()),
      }),
      {},
    )
  ));
}

/**
 * 既存のハッシュ値を渡してライターを構築する際のオプションです。
 */
export type WriterOptions = Readonly<{
  /**
   * ログを記録する関数群です。
   */
  logger?: ILogger | undefined;
}>;
