// src/sinks/console-sink.ts

import chalk from 'chalk';
import type { Writable } from 'stream';
import type { Document, ValidationError } from '../model/types.js';
import { SinkError } from '../utils/errors.js';
import type { ResultSink } from './types.js';

export type OutputFormat = 'plain' | 'json';

export interface ConsoleSinkOptions {
  format?: OutputFormat;
  color?: boolean;
}

/**
 * Writes findings to a stream, one per line. The plain format reads
 * `file:line: ValidationError[Rule], message at line: sentence`; the json
 * format writes one JSON object per finding between `[` and `]`.
 */
export class ConsoleSink implements ResultSink {
  private readonly format: OutputFormat;
  private readonly color: boolean;
  private written = 0;

  constructor(
    private readonly stream: Writable = process.stdout,
    options: ConsoleSinkOptions = {}
  ) {
    this.format = options.format ?? 'plain';
    this.color = options.color ?? false;
  }

  flushHeader(): void {
    this.written = 0;
    if (this.format === 'json') {
      this.write('[\n');
    }
  }

  flushFooter(): void {
    if (this.format === 'json') {
      this.write(this.written > 0 ? '\n]\n' : ']\n');
    }
  }

  flushError(document: Document, error: ValidationError): void {
    if (this.format === 'json') {
      const separator = this.written > 0 ? ',\n' : '';
      this.write(`${separator}${JSON.stringify(toJson(document, error))}`);
    } else {
      this.write(`${this.formatPlain(document, error)}\n`);
    }
    this.written++;
  }

  private formatPlain(document: Document, error: ValidationError): string {
    const location = `${document.fileName ?? '<input>'}:${error.position.lineNumber}`;
    const rule = `ValidationError[${error.validatorName}]`;
    const sentence = error.sentence !== undefined ? ` at line: ${error.sentence}` : '';

    if (!this.color) {
      return `${location}: ${rule}, ${error.message}${sentence}`;
    }
    return `${chalk.cyan(location)}: ${chalk.red(rule)}, ${error.message}${chalk.dim(sentence)}`;
  }

  private write(text: string): void {
    if (this.stream.destroyed || this.stream.writableEnded) {
      throw new SinkError('Output stream is closed');
    }
    this.stream.write(text);
  }
}

function toJson(document: Document, error: ValidationError): Record<string, unknown> {
  return {
    document: document.fileName ?? null,
    validator: error.validatorName,
    message: error.message,
    lineNumber: error.position.lineNumber,
    startPosition: error.position.startPosition ?? null,
    endPosition: error.position.endPosition ?? null,
    sentence: error.sentence ?? null,
  };
}
