import * as fs from "node:fs";
import * as os from "node:os";
import * as path from "node:path";
import { afterEach, beforeEach, test } from "vitest";
import Writer from "../../../../src/core/writer.js";
import FileDescriptorSink from "../../../../src/envs/node/sink/file-descriptor-sink.js";

let dir: string;

beforeEach(() => {
  dir = fs.mkdtempSync(path.join(os.tmpdir(), "digest-writer-"));
});

afterEach(() => {
  fs.rmSync(dir, { recursive: true, force: true });
});

test("ファイルに書き込み、書き込んだデータのダイジェストを計算する", async ({ expect }) => {
  const filePath = path.join(dir, "out.txt");
  const fd = fs.openSync(filePath, "w");
  try {
    const w = await Writer.create(new FileDescriptorSink(fd, { sync: true }), { algorithm: "crc32" });
    w.writeAll("123");
    w.writeAll("456789");
    w.flush();

    expect(w.digest().value).toBe("cbf43926");
  } finally {
    fs.closeSync(fd);
  }

  expect(fs.readFileSync(filePath, "utf8")).toBe("123456789");
});

test("書き込めないファイルディスクリプターではエラーになり、ハッシュは更新されない", async ({ expect }) => {
  const filePath = path.join(dir, "readonly.txt");
  fs.writeFileSync(filePath, "");
  const fd = fs.openSync(filePath, "r");
  try {
    const w = await Writer.create(new FileDescriptorSink(fd), { algorithm: "crc32" });
    const before = w.digest();

    expect(() => w.write("abc")).toThrow(/EBADF/);
    expect(w.digest()).toStrictEqual(before);
    expect(w.bytesWritten).toBe(0);
  } finally {
    fs.closeSync(fd);
  }
});
