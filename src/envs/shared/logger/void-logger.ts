import type { ILogger, LogEntry } from "../../../shared/logger.js";

/**
 * すべてのログを破棄するロガーです。ロガーが指定されなかったライターの既定値として使われます。
 */
export default class VoidLogger implements ILogger {
  public log(_entry: LogEntry): void {}
}
