import type { CreateWriterOptions, WriterOptions } from "../shared/schemas.js";
import type { IAsyncSink, ISyncSink } from "../shared/sink.js";
import type { IHash } from "./_hash.js";
import AsyncWriter from "./async-writer.js";
import Writer from "./writer.js";

/**
 * 新しいハッシュを作成し、同期的なシンクを包む `Writer` を構築します。
 *
 * @param inner 包むシンクです。
 * @param options ライターを構築する際のオプションです。
 * @returns 新しいライターです。
 */
export function createWriter<TSink extends ISyncSink>(
  inner: TSink,
  options?: CreateWriterOptions | undefined,
): Promise<Writer<TSink>> {
  return Writer.create(inner, options);
}

/**
 * 呼び出し元が用意したハッシュで、同期的なシンクを包む `Writer` を構築します。
 *
 * @param inner 包むシンクです。
 * @param hash ライターが所有するハッシュです。
 * @param options ライターを構築する際のオプションです。
 * @returns 新しいライターです。
 */
export function createWriterWithHash<TSink extends ISyncSink, TDigest>(
  inner: TSink,
  hash: IHash<TDigest>,
  options?: WriterOptions | undefined,
): Writer<TSink, TDigest> {
  return Writer.withHash(inner, hash, options);
}

/**
 * 新しいハッシュを作成し、非同期なシンクを包む `AsyncWriter` を構築します。
 *
 * @param inner 包むシンクです。
 * @param options ライターを構築する際のオプションです。
 * @returns 新しいライターです。
 */
export function createAsyncWriter<TSink extends IAsyncSink>(
  inner: TSink,
  options?: CreateWriterOptions | undefined,
): Promise<AsyncWriter<TSink>> {
  return AsyncWriter.create(inner, options);
}

/**
 * 呼び出し元が用意したハッシュで、非同期なシンクを包む `AsyncWriter` を構築します。
 *
 * @param inner 包むシンクです。
 * @param hash ライターが所有するハッシュです。
 * @param options ライターを構築する際のオプションです。
 * @returns 新しいライターです。
 */
export function createAsyncWriterWithHash<TSink extends IAsyncSink, TDigest>(
  inner: TSink,
  hash: IHash<TDigest>,
  options?: WriterOptions | undefined,
): AsyncWriter<TSink, TDigest> {
  return AsyncWriter.withHash(inner, hash, options);
}
