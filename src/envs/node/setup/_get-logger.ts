import { type ILogger, LogLevel, parseLogLevel } from "../../../shared/logger.js";
import ConsoleLogger from "../../shared/logger/console-logger.js";

/**
 * CI などでデバッグモードが有効になっているかどうかを判定します。
 */
function isDebugMode(): boolean {
  return ["DEBUG", "RUNNER_DEBUG", "ACTIONS_RUNNER_DEBUG", "ACTIONS_STEP_DEBUG"]
    .some(k => ["1", "true"].includes(process.env[k]?.toLowerCase() ?? ""));
}

/**
 * 環境変数からログレベルを決定します。
 * `DIGEST_WRITER_LOG_LEVEL` が最優先で、次にデバッグモードかどうかを見ます。
 */
function getLogLevel(): LogLevel {
  const name = process.env["DIGEST_WRITER_LOG_LEVEL"];
  const level = name === undefined ? undefined : parseLogLevel(name);
  if (level !== undefined) {
    return level;
  }

  return isDebugMode() ? LogLevel.DEBUG : LogLevel.WARN;
}

export default function getLogger(logger: ILogger | undefined): ILogger {
  if (logger !== undefined) {
    return logger;
  }

  return new ConsoleLogger({ level: getLogLevel() });
}
