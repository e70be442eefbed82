import { afterEach, describe, test, vi } from "vitest";
import ConsoleLogger from "../../../../src/envs/shared/logger/console-logger.js";
import { LogLevel } from "../../../../src/shared/logger.js";

afterEach(() => {
  vi.restoreAllMocks();
});

describe("log", () => {
  test("しきい値未満のログは出力しない", ({ expect }) => {
    const debug = vi.spyOn(console, "debug").mockImplementation(() => {});
    const warn = vi.spyOn(console, "warn").mockImplementation(() => {});
    const logger = new ConsoleLogger({ level: LogLevel.ERROR });
    logger.log({ level: LogLevel.DEBUG, message: "a" });
    logger.log({ level: LogLevel.WARN, message: "b" });

    expect(debug).not.toHaveBeenCalled();
    expect(warn).not.toHaveBeenCalled();
  });

  test("ログレベルに応じた console のメソッドに、接頭辞を付けて出力する", ({ expect }) => {
    const debug = vi.spyOn(console, "debug").mockImplementation(() => {});
    const info = vi.spyOn(console, "info").mockImplementation(() => {});
    const logger = new ConsoleLogger({ level: LogLevel.DEBUG });
    logger.log({ level: LogLevel.DEBUG, message: "short write" });
    logger.log({ level: LogLevel.INFO, message: "opened" });

    expect(debug).toHaveBeenCalledExactlyOnceWith("[digest-writer] short write");
    expect(info).toHaveBeenCalledExactlyOnceWith("[digest-writer] opened");
  });

  test("原因があれば 2 番目の引数として渡す", ({ expect }) => {
    const error = vi.spyOn(console, "error").mockImplementation(() => {});
    const warn = vi.spyOn(console, "warn").mockImplementation(() => {});
    const reason = new Error("EIO");
    const logger = new ConsoleLogger();
    logger.log({ level: LogLevel.ERROR, message: "failed", reason });
    logger.log({ level: LogLevel.WARN, message: "ignored" });

    expect(error).toHaveBeenCalledExactlyOnceWith("[digest-writer] failed", reason);
    expect(warn).not.toHaveBeenCalled();
  });

  test("接頭辞が空文字列なら、メッセージだけを出力する", ({ expect }) => {
    const warn = vi.spyOn(console, "warn").mockImplementation(() => {});
    const logger = new ConsoleLogger({ level: LogLevel.WARN, prefix: "" });
    logger.log({ level: LogLevel.WARN, message: "slow sink" });

    expect(warn).toHaveBeenCalledExactlyOnceWith("slow sink");
  });

  test("QUIET ではエラーも出力しない", ({ expect }) => {
    const error = vi.spyOn(console, "error").mockImplementation(() => {});
    const logger = new ConsoleLogger({ level: LogLevel.QUIET });
    logger.log({ level: LogLevel.ERROR, message: "failed" });

    expect(error).not.toHaveBeenCalled();
  });
});
