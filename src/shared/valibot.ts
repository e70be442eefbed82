import type { ErrorMeta } from "i18n-error-base";
import { tryCaptureStackTrace } from "try-capture-stack-trace";
import { type GenericSchema, type InferOutput, safeParse } from "valibot";
import {
  InvalidInputError,
  type Issue,
  UnexpectedValidationError,
  type ValidationErrorBase,
} from "./errors.js";

/***************************************************************************************************
 *
 * 再エクスポート
 *
 **************************************************************************************************/

export {
  array,
  brand,
  custom,
  maxValue,
  minValue,
  number,
  object,
  optional,
  picklist,
  pipe,
  readonly,
  regex,
  safeInteger,
  string,
} from "valibot";
export type { Brand, InferInput, InferOutput } from "valibot";

/***************************************************************************************************
 *
 * parse
 *
 **************************************************************************************************/

interface IParseError {
  new(issues: [Issue, ...Issue[]], input: unknown): ValidationErrorBase<ErrorMeta>;
}

/**
 * スキーマで入力値を検証し、出力値を返します。検証に失敗した場合は `Error` のインスタンスを投げます。
 *
 * @param schema Valibot のスキーマです。
 * @param input 検証する入力値です。
 * @param Error 検証に失敗した場合に投げるエラーのクラスです。
 * @returns 検証された出力値です。
 */
export function parse<const TSchema extends GenericSchema>(
  schema: TSchema,
  input: unknown,
  Error: IParseError = InvalidInputError,
): InferOutput<TSchema> {
  const result = safeParse(schema, input);
  if (result.success) {
    return result.output;
  }

  const error = new Error(result.issues, input);
  tryCaptureStackTrace(error, parse);
  throw error;
}

/**
 * 内部で生成した値がスキーマを満たすことを表明します。満たさない場合は `UnexpectedValidationError` を投げます。
 *
 * @param schema Valibot のスキーマです。
 * @param input 検証する値です。
 * @returns 検証された出力値です。
 */
export function expect<const TSchema extends GenericSchema>(
  schema: TSchema,
  input: unknown,
): InferOutput<TSchema> {
  const result = safeParse(schema, input);
  if (result.success) {
    return result.output;
  }

  const error = new UnexpectedValidationError(result.issues, input);
  tryCaptureStackTrace(error, expect);
  throw error;
}
