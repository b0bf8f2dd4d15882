// src/__tests__/sinks/console-sink.test.ts

import { describe, it, expect } from 'vitest';
import { Writable } from 'stream';
import { ConsoleSink } from '../../sinks/console-sink.js';
import { flushErrorSafely } from '../../sinks/types.js';
import { createDocument } from '../../model/builders.js';
import type { ValidationError } from '../../model/types.js';
import { SinkError } from '../../utils/errors.js';

class MemoryStream extends Writable {
  chunks: string[] = [];

  override _write(chunk: Buffer | string, _encoding: BufferEncoding, callback: (error?: Error | null) => void): void {
    this.chunks.push(chunk.toString());
    callback();
  }

  text(): string {
    return this.chunks.join('');
  }
}

const document = createDocument([], 'guide.yml');

const sentenceError: ValidationError = {
  validatorName: 'SentenceLength',
  message: 'Too long.',
  position: { lineNumber: 4, startPosition: 2 },
  sentence: 'A long sentence.',
};

const sectionError: ValidationError = {
  validatorName: 'ParagraphNumber',
  message: 'Too many paragraphs.',
  position: { lineNumber: 9 },
};

describe('ConsoleSink', () => {
  describe('plain format', () => {
    it('should write one line per finding', () => {
      const stream = new MemoryStream();
      const sink = new ConsoleSink(stream);

      sink.flushHeader();
      sink.flushError(document, sentenceError);
      sink.flushError(createDocument([]), sectionError);
      sink.flushFooter();

      expect(stream.text()).toBe(
        'guide.yml:4: ValidationError[SentenceLength], Too long. at line: A long sentence.\n' +
          '<input>:9: ValidationError[ParagraphNumber], Too many paragraphs.\n'
      );
    });
  });

  describe('json format', () => {
    it('should write an array of findings', () => {
      const stream = new MemoryStream();
      const sink = new ConsoleSink(stream, { format: 'json' });

      sink.flushHeader();
      sink.flushError(document, sentenceError);
      sink.flushError(document, sectionError);
      sink.flushFooter();

      expect(JSON.parse(stream.text())).toEqual([
        {
          document: 'guide.yml',
          validator: 'SentenceLength',
          message: 'Too long.',
          lineNumber: 4,
          startPosition: 2,
          endPosition: null,
          sentence: 'A long sentence.',
        },
        {
          document: 'guide.yml',
          validator: 'ParagraphNumber',
          message: 'Too many paragraphs.',
          lineNumber: 9,
          startPosition: null,
          endPosition: null,
          sentence: null,
        },
      ]);
    });

    it('should write an empty array when nothing was found', () => {
      const stream = new MemoryStream();
      const sink = new ConsoleSink(stream, { format: 'json' });

      sink.flushHeader();
      sink.flushFooter();

      expect(stream.text()).toBe('[\n]\n');
    });
  });

  it('should raise SinkError once the stream has ended', () => {
    const stream = new MemoryStream();
    const sink = new ConsoleSink(stream);
    stream.end();

    expect(() => sink.flushError(document, sentenceError)).toThrow(SinkError);
    expect(() => sink.flushError(document, sentenceError)).toThrow('Output stream is closed');
  });
});

describe('flushErrorSafely', () => {
  it('should report success', () => {
    const sink = new ConsoleSink(new MemoryStream());

    expect(flushErrorSafely(sink, document, sectionError)).toEqual({ ok: true });
  });

  it('should turn a sink failure into a value', () => {
    const stream = new MemoryStream();
    stream.destroy();
    const sink = new ConsoleSink(stream);

    const result = flushErrorSafely(sink, document, sectionError);

    expect(result.ok).toBe(false);
    if (!result.ok) {
      expect(result.error).toBeInstanceOf(SinkError);
      expect(result.error.message).toBe('Output stream is closed');
    }
  });
});
