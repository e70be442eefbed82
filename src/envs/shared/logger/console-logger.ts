import { type ILogger, type LogEntry, LogLevel } from "../../../shared/logger.js";

/**
 * `ConsoleLogger` を構築する際のオプションです。
 */
export type ConsoleLoggerOptions = Readonly<{
  /**
   * 記録するログレベルのしきい値です。
   *
   * @default LogLevel.ERROR
   */
  level?: LogLevel | undefined;

  /**
   * 各メッセージの先頭に付ける文字列です。
   *
   * @default "[digest-writer]"
   */
  prefix?: string | undefined;
}>;

/**
 * ログを標準出力や標準エラーに記録するロガーです。`ILogger` インターフェースを実装しています。
 */
export default class ConsoleLogger implements ILogger {
  /**
   * このロガーが記録するログレベルのしきい値です。指定されたレベル以上のログのみが記録されます。
   */
  public readonly level: LogLevel;

  /**
   * 各メッセージの先頭に付ける文字列です。
   */
  public readonly prefix: string;

  /**
   * `ConsoleLogger` の新しいインスタンスを構築します。
   *
   * @param options `ConsoleLogger` を構築する際のオプションです。
   */
  public constructor(options: ConsoleLoggerOptions | undefined = {}) {
    this.level = options.level ?? LogLevel.ERROR;
    this.prefix = options.prefix ?? "[digest-writer]";
  }

  /**
   * ログを記録します。`entry.level` がこのロガーの `level` 以上の場合にのみ、メッセージを `console` に出力します。
   *
   * @param entry ログの内容です。
   */
  public log(entry: LogEntry): void {
    if (entry.level < this.level) {
      return;
    }

    const message = this.prefix ? `${this.prefix} ${entry.message}` : entry.message;
    switch (entry.level) {
      case LogLevel.ERROR:
        if ("reason" in entry) {
          console.error(message, entry.reason);
        } else {
          console.error(message);
        }
        break;

      case LogLevel.WARN:
        if ("reason" in entry) {
          console.warn(message, entry.reason);
        } else {
          console.warn(message);
        }
        break;

      case LogLevel.INFO:
        console.info(message);
        break;

      case LogLevel.DEBUG:
        console.debug(message);
        break;

      default:
        entry satisfies never;
    }
  }
}
