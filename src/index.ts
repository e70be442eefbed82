export type * from "./core/_hash.js";

export type * from "./core/async-writer.js";
export { default as AsyncWriter } from "./core/async-writer.js";

export * from "./core/create-writer.js";

export { default as getHashAlgorithm } from "./core/hash-algorithms.js";

export type * from "./core/writer.js";
export { default as Writer } from "./core/writer.js";

export type { Issue } from "./shared/errors.js";
export {
  ErrorBase,
  formatErrorValue,
  InvalidInputError,
  SinkClosedError,
  SinkContractError,
  SinkErrorBase,
  UnexpectedValidationError,
  UnreachableError,
  ValidationErrorBase,
  WriterBusyError,
  WriterErrorBase,
  WriterUnwrappedError,
  WriteZeroError,
} from "./shared/errors.js";

export type { ILogger, LogEntry, LogLevelName } from "./shared/logger.js";
export { LogLevel, parseLogLevel } from "./shared/logger.js";

export type {
  Checksum,
  ChecksumLike,
  CreateWriterOptions,
  HashAlgorithmName,
  HashState,
  HashStateLike,
  OpenMode,
  Uint,
  Uint8,
  Uint8Like,
  UintLike,
  WriterOptions,
} from "./shared/schemas.js";
export {
  ChecksumSchema,
  CreateWriterOptionsSchema,
  DEFAULT_HASH_ALGORITHM_NAME,
  HASH_ALGORITHM_NAMES,
  HashAlgorithmNameSchema,
  HashStateSchema,
  LoggerSchema,
  OpenModeSchema,
  Uint8Schema,
  UintSchema,
  WriterOptionsSchema,
} from "./shared/schemas.js";

export type * from "./shared/sink.js";

export type { Uint8ArraySource } from "./shared/to-uint8-array.js";
