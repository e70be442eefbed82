import { type ErrorMeta, I18nErrorBase, initErrorMessage, setErrorMessage } from "i18n-error-base";
import { type BaseIssue } from "valibot";
import quoteString from "./quote-string.js";

/***************************************************************************************************
 *
 * ユーティリティー
 *
 **************************************************************************************************/

/**
 * あらゆる値を文字列に整形します。
 *
 * @param value 文字列に整形する値です。
 * @returns 文字列に整形された値です。
 */
export function formatErrorValue(value: unknown): string {
  if (typeof value === "string") {
    return value;
  }

  try {
    return JSON.stringify(value);
  } catch {
    return String(value);
  }
}

/***************************************************************************************************
 *
 * エラークラス
 *
 **************************************************************************************************/

/**
 * digest-writer エラーの基底クラスです。
 *
 * @template TMeta エラーに紐づくメタデータです。
 */
export class ErrorBase<TMeta extends ErrorMeta | undefined = undefined>
  extends I18nErrorBase<TMeta>
{}

/**************************************************************************************************/

/**
 * 到達不能なコードに到達した場合に投げられるエラーです。
 */
export class UnreachableError extends ErrorBase<{
  /**
   * 到達しないはずの値です。
   */
  value?: unknown;
}> {
  static {
    this.prototype.name = "DigestWriterUnreachableError";
  }

  /**
   * `DigestWriterUnreachableError` クラスの新しいインスタンスを初期化します。
   *
   * @param args 到達しないはずの値があれば指定します。
   * @param options エラーのオプションです。
   */
  public constructor(args: [never?], options?: ErrorOptions | undefined) {
    super(options, args.length > 0 ? { value: args[0] } : {});
    initErrorMessage(this, ({ meta }) => (
      "value" in meta
        ? "Encountered impossible value: " + formatErrorValue(meta.value)
        : "Unreachable code reached"
    ));
  }
}

/*#__PURE__*/ setErrorMessage(
  UnreachableError,
  ({ meta }) => (
    "value" in meta
      ? "不可能な値に遭遇しました: " + formatErrorValue(meta.value)
      : "到達できないコードに到達しました"
  ),
  "ja",
);

/**************************************************************************************************/

/**
 * 検証エラーの問題点です。
 */
export type Issue = BaseIssue<unknown>;

/**
 * 検証エラーの基底クラスです。
 *
 * @template TMeta エラーに紐づくメタデータです。
 */
export class ValidationErrorBase<TMeta extends ErrorMeta> extends ErrorBase<TMeta> {
  /**
   * @internal
   */
  public constructor(options: ErrorOptions | undefined, meta: TMeta) {
    super(options, meta);
  }
}

/**************************************************************************************************/

/**
 * 入力値の検証に失敗した場合に投げられるエラーです。
 */
export class InvalidInputError extends ValidationErrorBase<{
  /**
   * 検証エラーの問題点です。
   */
  issues: [Issue, ...Issue[]];

  /**
   * 検証した入力値です。
   */
  input: unknown;
}> {
  static {
    this.prototype.name = "DigestWriterInvalidInputError";
  }

  /**
   * `DigestWriterInvalidInputError` クラスの新しいインスタンスを初期化します。
   *
   * @param issues 検証エラーの問題点です。
   * @param input 検証した入力値です。
   * @param options エラーのオプションです。
   */
  public constructor(
    issues: [Issue, ...Issue[]],
    input: unknown,
    options?: ErrorOptions | undefined,
  ) {
    super(options, { issues, input });
    this.message = issues.map(issue => issue.message).join(": ");
  }
}

/**************************************************************************************************/

/**
 * 予期しない値に遭遇した場合に投げられるエラーです。
 */
export class UnexpectedValidationError extends ValidationErrorBase<{
  /**
   * 検証エラーの問題点です。
   */
  issues: [Issue, ...Issue[]];

  /**
   * 予期しない値です。
   */
  value: unknown;
}> {
  static {
    this.prototype.name = "DigestWriterUnexpectedValidationError";
  }

  /**
   * `DigestWriterUnexpectedValidationError` クラスの新しいインスタンスを初期化します。
   *
   * @param issues 検証エラーの問題点です。
   * @param value 予期しない値です。
   * @param options エラーのオプションです。
   */
  public constructor(
    issues: [Issue, ...Issue[]],
    value: unknown,
    options?: ErrorOptions | undefined,
  ) {
    super(options, { issues, value });
    this.message = issues.map(issue => issue.message).join(": ");
  }
}

/**************************************************************************************************/

/**
 * ライターの操作に関連するエラーの基底クラスです。
 *
 * @template TMeta エラーに紐づくメタデータです。
 */
export class WriterErrorBase<TMeta extends ErrorMeta | undefined = undefined>
  extends ErrorBase<TMeta>
{
  /**
   * @internal
   */
  public constructor(options: ErrorOptions | undefined, meta: TMeta) {
    super(options, meta);
  }
}

/**************************************************************************************************/

/**
 * `unwrap()` したあとのライターを操作しようとした場合に投げられるエラーです。
 */
export class WriterUnwrappedError extends WriterErrorBase<{
  /**
   * 呼び出された操作の名前です。
   */
  operation: string;
}> {
  static {
    this.prototype.name = "DigestWriterUnwrappedError";
  }

  /**
   * `DigestWriterUnwrappedError` クラスの新しいインスタンスを初期化します。
   *
   * @param operation 呼び出された操作の名前です。
   * @param options エラーのオプションです。
   */
  public constructor(operation: string, options?: ErrorOptions | undefined) {
    super(options, { operation });
    initErrorMessage(
      this,
      ({ meta }) => `Cannot call ${quoteString(meta.operation)} on an unwrapped writer`,
    );
  }
}

/*#__PURE__*/ setErrorMessage(
  WriterUnwrappedError,
  ({ meta }) => `unwrap されたライターで ${quoteString(meta.operation)} は呼び出せません`,
  "ja",
);

/**************************************************************************************************/

/**
 * シンクの操作を待っている間に、ライターの所有権を手放す操作を呼び出した場合に投げられるエラーです。
 */
export class WriterBusyError extends WriterErrorBase<{
  /**
   * 呼び出された操作の名前です。
   */
  operation: string;
}> {
  static {
    this.prototype.name = "DigestWriterBusyError";
  }

  /**
   * `DigestWriterBusyError` クラスの新しいインスタンスを初期化します。
   *
   * @param operation 呼び出された操作の名前です。
   * @param options エラーのオプションです。
   */
  public constructor(operation: string, options?: ErrorOptions | undefined) {
    super(options, { operation });
    initErrorMessage(
      this,
      ({ meta }) => `Cannot call ${quoteString(meta.operation)} while a sink operation is pending`,
    );
  }
}

/*#__PURE__*/ setErrorMessage(
  WriterBusyError,
  ({ meta }) => `シンクの操作を待っている間は ${quoteString(meta.operation)} を呼び出せません`,
  "ja",
);

/**************************************************************************************************/

/**
 * シンクが報告した書き込みバイト数が `0` 以上、渡したデータの長さ以下の整数ではない場合に投げられるエラーです。
 */
export class SinkContractError extends WriterErrorBase<{
  /**
   * シンクに渡したデータのバイト数です。
   */
  requested: number;

  /**
   * シンクが報告した値です。
   */
  reported: unknown;
}> {
  static {
    this.prototype.name = "DigestWriterSinkContractError";
  }

  /**
   * `DigestWriterSinkContractError` クラスの新しいインスタンスを初期化します。
   *
   * @param requested シンクに渡したデータのバイト数です。
   * @param reported シンクが報告した値です。
   * @param options エラーのオプションです。
   */
  public constructor(requested: number, reported: unknown, options?: ErrorOptions | undefined) {
    super(options, { requested, reported });
    initErrorMessage(
      this,
      ({ meta }) =>
        `Sink reported ${formatErrorValue(meta.reported)} bytes written `
        + `for a ${meta.requested} byte chunk`,
    );
  }
}

/*#__PURE__*/ setErrorMessage(
  SinkContractError,
  ({ meta }) =>
    `シンクが ${meta.requested} バイトのチャンクに対して `
    + `${formatErrorValue(meta.reported)} バイトの書き込みを報告しました`,
  "ja",
);

/**************************************************************************************************/

/**
 * `writeAll()` の途中でシンクが 1 バイトも受け付けなくなった場合に投げられるエラーです。
 */
export class WriteZeroError extends WriterErrorBase<{
  /**
   * このエラーが投げられるまでに書き込まれたバイト数です。
   */
  bytesWritten: number;

  /**
   * 書き込まれなかった残りのバイト数です。
   */
  bytesRemaining: number;
}> {
  static {
    this.prototype.name = "DigestWriterWriteZeroError";
  }

  /**
   * `DigestWriterWriteZeroError` クラスの新しいインスタンスを初期化します。
   *
   * @param bytesWritten このエラーが投げられるまでに書き込まれたバイト数です。
   * @param bytesRemaining 書き込まれなかった残りのバイト数です。
   * @param options エラーのオプションです。
   */
  public constructor(
    bytesWritten: number,
    bytesRemaining: number,
    options?: ErrorOptions | undefined,
  ) {
    super(options, { bytesWritten, bytesRemaining });
    initErrorMessage(
      this,
      ({ meta }) =>
        `Failed to write whole buffer: ${meta.bytesRemaining} bytes remaining `
        + `after ${meta.bytesWritten} bytes written`,
    );
  }
}

/*#__PURE__*/ setErrorMessage(
  WriteZeroError,
  ({ meta }) =>
    `バッファー全体を書き込めませんでした: ${meta.bytesWritten} バイト書き込んだあと、`
    + `${meta.bytesRemaining} バイト残っています`,
  "ja",
);

/**************************************************************************************************/

/**
 * シンクに関連するエラーの基底クラスです。
 */
export class SinkErrorBase extends ErrorBase {
  /**
   * @internal
   */
  public constructor(options: ErrorOptions | undefined) {
    super(options, undefined);
  }
}

/**************************************************************************************************/

/**
 * 閉じられたシンクを操作しようとした場合に投げられるエラーです。
 */
export class SinkClosedError extends SinkErrorBase {
  static {
    this.prototype.name = "DigestWriterSinkClosedError";
  }

  /**
   * `DigestWriterSinkClosedError` クラスの新しいインスタンスを初期化します。
   *
   * @param options エラーのオプションです。
   */
  public constructor(options?: ErrorOptions | undefined) {
    super(options);
    initErrorMessage(this, () => "Sink is closed");
  }
}

/*#__PURE__*/ setErrorMessage(SinkClosedError, () => "シンクは閉じられています", "ja");
