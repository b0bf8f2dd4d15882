// src/sinks/types.ts

import type { Document, ValidationError } from '../model/types.js';

/**
 * Receives the run brackets and every finding as it is produced.
 * `flushError` may throw; the engine logs the failure and carries on.
 */
export interface ResultSink {
  flushHeader(): void;
  flushFooter(): void;
  flushError(document: Document, error: ValidationError): void;
}

export type FlushResult = { ok: true } | { ok: false; error: Error };

/**
 * Calls `sink.flushError` and reports failure as a value instead of a throw.
 */
export function flushErrorSafely(
  sink: ResultSink,
  document: Document,
  error: ValidationError
): FlushResult {
  try {
    sink.flushError(document, error);
    return { ok: true };
  } catch (failure) {
    return {
      ok: false,
      error: failure instanceof Error ? failure : new Error(String(failure)),
    };
  }
}
