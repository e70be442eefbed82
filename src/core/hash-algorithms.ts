import {
  createBLAKE3,
  createCRC32,
  createMD5,
  createSHA1,
  createSHA256,
  createSHA3,
  createSHA512,
  createXXHash64,
  type IHasher,
} from "hash-wasm";
import { InvalidInputError } from "../shared/errors.js";
import {
  ChecksumSchema,
  type HashAlgorithmName,
  HashAlgorithmNameSchema,
  HashStateSchema,
} from "../shared/schemas.js";
import unreachable from "../shared/unreachable.js";
import * as v from "../shared/valibot.js";
import type { Digest, IHash, IHashAlgorithm } from "./_hash.js";

/**
 * hash-wasm のハッシュ関数を `IHash` インターフェースに適合させます。
 *
 * @param algorithm `hasher` を作成したハッシュアルゴリズムです。
 * @param hasher hash-wasm のハッシュ関数です。
 * @returns `IHash` インターフェースを実装したストリームです。
 */
function toHash(algorithm: IHashAlgorithm, hasher: IHasher): IHash {
  return {
    update(data) {
      hasher.update(data);
    },
    digest() {
      // hash-wasm の `.digest()` は内部状態を確定させてしまうので、前後で保存と復元を行います。
      const state = hasher.save(); // 必ず `.digest()` の前に実行します。
      const value = hasher.digest("hex");
      hasher.init();
      hasher.load(state);

      return {
        algorithm: algorithm.name,
        value: v.expect(ChecksumSchema(), value),
        state: v.expect(HashStateSchema(), Array.from(state)),
      };
    },
    clone() {
      return algorithm.create(Array.from(hasher.save()));
    },
  };
}

/**
 * hash-wasm のハッシュ関数を作成する関数から、ハッシュアルゴリズムを定義します。
 *
 * @param name ハッシュアルゴリズムの名前です。
 * @param createHasher hash-wasm のハッシュ関数を作成する関数です。
 * @returns ハッシュアルゴリズムです。
 */
function defineHashAlgorithm(
  name: HashAlgorithmName,
  createHasher: () => Promise<IHasher>,
): IHashAlgorithm {
  const algorithm: IHashAlgorithm = {
    name,
    async create(state) {
      const hasher = await createHasher();
      if (state !== undefined) {
        const saved = v.parse(HashStateSchema(), state);
        try {
          hasher.load(new Uint8Array(saved));
        } catch (ex) {
          // 別のアルゴリズムの内部状態など、hash-wasm が読み込めない状態です。
          throw new InvalidInputError(
            [
              {
                kind: "validation",
                type: "hash_state",
                input: state,
                expected: name,
                received: `${saved.length} bytes`,
                message: `Invalid ${name} hash state: ${saved.length} bytes`,
              },
            ],
            state,
            { cause: ex },
          );
        }
      }

      return toHash(algorithm, hasher);
    },
    async digest(data): Promise<Digest> {
      const h = await algorithm.create();
      h.update(data);

      return h.digest();
    },
  };

  return algorithm;
}

/**
 * 名前ごとのハッシュアルゴリズムです。
 */
const algorithms = new Map<HashAlgorithmName, IHashAlgorithm>();

/**
 * 名前に対応するハッシュアルゴリズムを取得します。
 *
 * @param name ハッシュアルゴリズムの名前です。
 * @returns ハッシュアルゴリズムです。
 */
export default function getHashAlgorithm(name: HashAlgorithmName): IHashAlgorithm {
  name = v.parse(HashAlgorithmNameSchema(), name);
  let algorithm = algorithms.get(name);
  if (algorithm) {
    return algorithm;
  }

  switch (name) {
    case "md5":
      algorithm = defineHashAlgorithm(name, () => createMD5());
      break;

    case "sha1":
      algorithm = defineHashAlgorithm(name, () => createSHA1());
      break;

    case "sha256":
      algorithm = defineHashAlgorithm(name, () => createSHA256());
      break;

    case "sha512":
      algorithm = defineHashAlgorithm(name, () => createSHA512());
      break;

    case "sha3-256":
      algorithm = defineHashAlgorithm(name, () => createSHA3(256));
      break;

    case "blake3":
      algorithm = defineHashAlgorithm(name, () => createBLAKE3(256));
      break;

    case "crc32":
      algorithm = defineHashAlgorithm(name, () => createCRC32());
      break;

    case "xxhash64":
      algorithm = defineHashAlgorithm(name, () => createXXHash64());
      break;

    default:
      return unreachable(name);
  }

  algorithms.set(name, algorithm);

  return algorithm;
}
