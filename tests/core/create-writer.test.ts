import { describe, test } from "vitest";
import AsyncWriter from "../../src/core/async-writer.js";
import {
  createAsyncWriter,
  createAsyncWriterWithHash,
  createWriter,
  createWriterWithHash,
} from "../../src/core/create-writer.js";
import getHashAlgorithm from "../../src/core/hash-algorithms.js";
import Writer from "../../src/core/writer.js";
import AsyncMemorySink from "../../src/envs/shared/sink/async-memory-sink.js";
import MemorySink from "../../src/envs/shared/sink/memory-sink.js";

describe("createWriter", () => {
  test("指定したアルゴリズムで Writer を構築する", async ({ expect }) => {
    const w = await createWriter(new MemorySink(), { algorithm: "sha1" });
    w.write("abc");

    expect(w).toBeInstanceOf(Writer);
    expect(w.digest().algorithm).toBe("sha1");
    expect(w.digest().value).toBe("a9993e364706816aba3e25717850c26c9cd0d89d");
  });

  test("既存のハッシュで Writer を構築する", async ({ expect }) => {
    const hash = await getHashAlgorithm("sha1").create();
    hash.update(new TextEncoder().encode("a"));
    const w = createWriterWithHash(new MemorySink(), hash);
    w.write("bc");

    expect(w.digest().value).toBe("a9993e364706816aba3e25717850c26c9cd0d89d");
  });
});

describe("createAsyncWriter", () => {
  test("省略すると sha256 で AsyncWriter を構築する", async ({ expect }) => {
    const w = await createAsyncWriter(new AsyncMemorySink());
    await w.write("abc");

    expect(w).toBeInstanceOf(AsyncWriter);
    expect(w.digest().algorithm).toBe("sha256");
    expect(w.digest().value).toBe(
      "ba7816bf8f01cfea414140de5dae2223b00361a396177a9cb410ff61f20015ad",
    );
  });

  test("既存のハッシュで AsyncWriter を構築する", async ({ expect }) => {
    const hash = await getHashAlgorithm("sha256").create();
    hash.update(new TextEncoder().encode("ab"));
    const w = createAsyncWriterWithHash(new AsyncMemorySink(), hash);
    await w.write("c");

    expect(w.digest().value).toBe(
      "ba7816bf8f01cfea414140de5dae2223b00361a396177a9cb410ff61f20015ad",
    );
  });
});
