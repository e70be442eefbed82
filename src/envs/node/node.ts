export * from "../../index.js";

export type * from "../shared/logger/console-logger.js";
export { default as ConsoleLogger } from "../shared/logger/console-logger.js";

export type * from "../shared/logger/void-logger.js";
export { default as VoidLogger } from "../shared/logger/void-logger.js";

export type * from "../shared/sink/memory-sink.js";
export { default as MemorySink, MemorySinkOptionsSchema } from "../shared/sink/memory-sink.js";

export type * from "../shared/sink/async-memory-sink.js";
export { default as AsyncMemorySink } from "../shared/sink/async-memory-sink.js";

export type * from "../shared/sink/web-writable-sink.js";
export { default as WebWritableSink } from "../shared/sink/web-writable-sink.js";

export type * from "./sink/file-descriptor-sink.js";
export { default as FileDescriptorSink } from "./sink/file-descriptor-sink.js";

export type * from "./sink/file-handle-sink.js";
export { default as FileHandleSink } from "./sink/file-handle-sink.js";

export type * from "./sink/node-writable-sink.js";
export { default as NodeWritableSink } from "./sink/node-writable-sink.js";

export type * from "./setup/open-file-writer.js";
export { default as openFileWriter } from "./setup/open-file-writer.js";
