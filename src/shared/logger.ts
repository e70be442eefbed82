/**
 * ログレベルの型定義です。
 */
export type LogLevel = (typeof LogLevel)[keyof typeof LogLevel];

/**
 * ログレベルを定義する定数です。
 */
export const LogLevel = {
  DEBUG: 1,
  INFO: 2,
  WARN: 3,
  ERROR: 4,
  QUIET: 5,
} as const;

/**
 * ログレベルの名前です。
 */
export type LogLevelName = keyof typeof LogLevel;

/**
 * ログの内容を定義する型です。
 */
export type LogEntry =
  | {
    /**
     * ログレベルです。
     */
    level: typeof LogLevel.DEBUG | typeof LogLevel.INFO;
    /**
     * メッセージです。
     */
    message: string;
  }
  | {
    /**
     * ログレベルです。
     */
    level: typeof LogLevel.WARN | typeof LogLevel.ERROR;
    /**
     * メッセージです。
     */
    message: string;
    /**
     * 警告やエラーの原因です。
     */
    reason?: unknown;
  };

/**
 * digest-writer で使用されるロガーのインターフェースです。
 * ライターの内部の動き (短い書き込みやシンクのエラーなど) を通知する際に使用されます。
 */
export interface ILogger {
  /**
   * 指定されたログレベルとメッセージでログを記録します。
   *
   * @param entry ログの内容です。
   */
  log(entry: LogEntry): void;
}

/**
 * ログレベルの名前を `LogLevel` に変換します。大文字と小文字は区別しません。
 *
 * @param name ログレベルの名前です。
 * @returns 対応するログレベルです。名前が不明な場合は `undefined` を返します。
 */
export function parseLogLevel(name: string): LogLevel | undefined {
  const key = name.trim().toUpperCase();
  switch (key) {
    case "DEBUG":
    case "INFO":
    case "WARN":
    case "ERROR":
    case "QUIET":
      return LogLevel[key];

    default:
      return undefined;
  }
}
