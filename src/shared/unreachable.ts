import { tryCaptureStackTrace } from "try-capture-stack-trace";
import { UnreachableError } from "./errors.js";

/**
 * 到達不能なコードに到達したことを表明します。`switch` 文の網羅性の検査などに使います。
 *
 * @param args 到達しないはずの値があれば指定します。
 */
export default function unreachable(...args: [never?]): never {
  const error = new UnreachableError(args);
  tryCaptureStackTrace(error, unreachable);
  throw error;
}
