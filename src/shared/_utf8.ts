import singleton from "./_singleton.js";

/**
 * 共有の `TextEncoder` のインスタンスを取得します。
 */
function encoder(): TextEncoder {
  return singleton("utf8__encoder", () => new TextEncoder());
}

/**
 * 共有の `TextDecoder` のインスタンスを取得します。
 * 短い書き込みでマルチバイト文字が分断されることがあるので、不正なバイト列は置換文字にします。
 */
function decoder(): TextDecoder {
  return singleton("utf8__decoder", () => (
    new TextDecoder("utf-8", {
      fatal: false,
      ignoreBOM: true,
    })
  ));
}

/**
 * UTF-8 のエンコード・デコードを行うためのユーティリティーオブジェクトです。
 */
const utf8 = {
  /**
   * バッファーを UTF-8 の形式でデコードします。
   *
   * @param input エンコードされたテキストが入っているバッファーです。
   * @returns デコードされた文字列です。
   */
  decode(input: Uint8Array): string {
    return decoder().decode(input);
  },

  /**
   * 文字列を UTF-8 の形式でエンコードします。
   *
   * @param input エンコードする文字列です。
   * @returns エンコードされたバイト列です。
   */
  encode(input: string): Uint8Array {
    return encoder().encode(input);
  },
};

export default utf8;
