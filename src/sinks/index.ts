// src/sinks/index.ts

export { flushErrorSafely, type ResultSink, type FlushResult } from './types.js';
export { ConsoleSink, type ConsoleSinkOptions, type OutputFormat } from './console-sink.js';
