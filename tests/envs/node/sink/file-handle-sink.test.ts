import * as fs from "node:fs";
import * as fsp from "node:fs/promises";
import * as os from "node:os";
import * as path from "node:path";
import { afterEach, beforeEach, test } from "vitest";
import FileHandleSink from "../../../../src/envs/node/sink/file-handle-sink.js";
import { SinkClosedError } from "../../../../src/shared/errors.js";

let dir: string;

beforeEach(() => {
  dir = fs.mkdtempSync(path.join(os.tmpdir(), "digest-writer-"));
});

afterEach(() => {
  fs.rmSync(dir, { recursive: true, force: true });
});

test("ファイルハンドルに書き込み、close でハンドルを閉じる", async ({ expect }) => {
  const filePath = path.join(dir, "out.txt");
  const sink = new FileHandleSink(await fsp.open(filePath, "w"), { sync: true });

  await expect(sink.write(new TextEncoder().encode("example"))).resolves.toBe(7);
  await sink.flush();
  await sink.close();

  expect(sink.closed).toBe(true);
  expect(fs.readFileSync(filePath, "utf8")).toBe("example");
});

test("閉じたあとの操作は SinkClosedError で拒否される", async ({ expect }) => {
  const sink = new FileHandleSink(await fsp.open(path.join(dir, "out.txt"), "w"));
  await sink.close();

  await expect(sink.write(new Uint8Array([1]))).rejects.toThrow(SinkClosedError);
  await expect(sink.flush()).rejects.toThrow(SinkClosedError);
  await expect(sink.close()).rejects.toThrow(SinkClosedError);
});
