import type { Checksum, HashAlgorithmName, HashState, HashStateLike } from "../shared/schemas.js";

/**
 * 計算されたハッシュ値の 16 進数文字列と、内部状態です。
 */
export type Digest = Readonly<{
  /**
   * ハッシュアルゴリズムの名前です。
   */
  algorithm: HashAlgorithmName;

  /**
   * 計算されたハッシュ値の 16 進数文字列です。
   */
  value: Checksum;

  /**
   * ハッシュ関数の内部状態です。`IHashAlgorithm.create()` に渡すと、この時点から計算を再開できます。
   */
  state: HashState;
}>;

/**
 * ハッシュ値を逐次的に計算するためのインターフェースです。
 *
 * @template TDigest `.digest()` が返す値の型です。
 */
export interface IHash<TDigest = Digest> {
  /**
   * ハッシュ値の計算に必要な内部データを更新します。
   *
   * @param data 追加するバイト列です。
   */
  update(data: Uint8Array): void;

  /**
   * これまでに `.update()` で渡されたすべてのデータのダイジェストを計算します。
   * 内部状態は変わらないので、このあとも `.update()` を続けられます。
   */
  digest(): TDigest;

  /**
   * 現在の内部状態を複製した、独立したハッシュを作成します。
   */
  clone(): Promise<IHash<TDigest>>;
}

/**
 * ハッシュアルゴリズムを表すインターフェースです。
 *
 * @template TDigest 作成されるハッシュの `.digest()` が返す値の型です。
 */
export interface IHashAlgorithm<TDigest = Digest> {
  /**
   * ハッシュアルゴリズムの名前です。
   */
  readonly name: HashAlgorithmName;

  /**
   * ハッシュ値を計算するためのストリームを作成します。
   *
   * @param state 計算を再開するハッシュ関数の内部状態です。省略すると空の状態から始めます。
   */
  create(state?: HashStateLike | undefined): Promise<IHash<TDigest>>;

  /**
   * 渡されたデータのダイジェストを一度に計算します。
   *
   * @param data ハッシュ値を計算する対象のバイト列です。
   */
  digest(data: Uint8Array): Promise<TDigest>;
}
