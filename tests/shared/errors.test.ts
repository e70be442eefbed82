import { setGlobalConfig } from "valibot";
import { beforeEach, describe, test } from "vitest";
import {
  formatErrorValue,
  SinkClosedError,
  SinkContractError,
  UnreachableError,
  WriterBusyError,
  WriterUnwrappedError,
  WriteZeroError,
} from "../../src/shared/errors.js";

beforeEach(() => {
  setGlobalConfig({ lang: "en" });
});

describe("formatErrorValue", () => {
  test("文字列はそのまま返す", ({ expect }) => {
    expect(formatErrorValue("abc")).toBe("abc");
  });

  test("それ以外の値は JSON に整形する", ({ expect }) => {
    expect(formatErrorValue(1.5)).toBe("1.5");
    expect(formatErrorValue({ a: [1] })).toBe(`{"a":[1]}`);
  });

  test("JSON に整形できない値は String で整形する", ({ expect }) => {
    expect(formatErrorValue(1n)).toBe("1");
  });
});

describe("UnreachableError", () => {
  test("globalThis.Error を継承している", ({ expect }) => {
    expect(new UnreachableError([])).toBeInstanceOf(globalThis.Error);
  });

  test("値の有無でメッセージが変わる", ({ expect }) => {
    expect(new UnreachableError([]).message).toBe("Unreachable code reached");
    expect(new UnreachableError(["x" as never]).message)
      .toBe("Encountered impossible value: x");
  });
});

describe("WriterUnwrappedError", () => {
  test("名前が設定されている", ({ expect }) => {
    expect(new WriterUnwrappedError("write").name).toBe("DigestWriterUnwrappedError");
  });

  test("言語別にメッセージが変わる", ({ expect }) => {
    expect(new WriterUnwrappedError("write").message)
      .toBe(`Cannot call "write" on an unwrapped writer`);

    setGlobalConfig({ lang: "ja" });

    expect(new WriterUnwrappedError("write").message)
      .toBe(`unwrap されたライターで "write" は呼び出せません`);
  });
});

describe("WriterBusyError", () => {
  test("言語別にメッセージが変わる", ({ expect }) => {
    expect(new WriterBusyError("unwrap").message)
      .toBe(`Cannot call "unwrap" while a sink operation is pending`);

    setGlobalConfig({ lang: "ja" });

    expect(new WriterBusyError("unwrap").message)
      .toBe(`シンクの操作を待っている間は "unwrap" を呼び出せません`);
  });
});

describe("SinkContractError", () => {
  test("言語別にメッセージが変わる", ({ expect }) => {
    expect(new SinkContractError(12, 13).message)
      .toBe("Sink reported 13 bytes written for a 12 byte chunk");

    setGlobalConfig({ lang: "ja" });

    expect(new SinkContractError(12, 13).message)
      .toBe("シンクが 12 バイトのチャンクに対して 13 バイトの書き込みを報告しました");
  });
});

describe("WriteZeroError", () => {
  test("書き込めたバイト数と残りのバイト数をメッセージに含む", ({ expect }) => {
    const error = new WriteZeroError(4, 8);

    expect(error.name).toBe("DigestWriterWriteZeroError");
    expect(error.message).toBe("Failed to write whole buffer: 8 bytes remaining after 4 bytes written");
  });
});

describe("SinkClosedError", () => {
  test("言語別にメッセージが変わる", ({ expect }) => {
    expect(new SinkClosedError().message).toBe("Sink is closed");

    setGlobalConfig({ lang: "ja" });

    expect(new SinkClosedError().message).toBe("シンクは閉じられています");
  });
});
