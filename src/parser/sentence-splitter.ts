// src/parser/sentence-splitter.ts

import { createSentence } from '../model/builders.js';
import type { Sentence } from '../model/types.js';
import type { SentenceBoundary } from '../symbols/sentence-boundary.js';

const ASCII_WORD_CHARACTER = /^[A-Za-z0-9]$/;

/**
 * Splits a block of text into sentences. A sentence ends at a run of terminators,
 * together with any closing quotations that follow it directly, unless a
 * Latin letter or digit comes right after. Trailing text without a
 * terminator forms a final sentence.
 */
export function splitSentences(
  text: string,
  firstLine: number,
  boundary: SentenceBoundary
): Sentence[] {
  const sentences: Sentence[] = [];
  let line = firstLine;
  let column = 0;
  let current = '';
  let startLine = firstLine;
  let startColumn = 0;
  let index = 0;

  const consume = (chunk: string): void => {
    for (const ch of chunk) {
      if (ch === '\n') {
        line++;
        column = 0;
      } else {
        column++;
      }
    }
    index += chunk.length;
  };

  const pushCurrent = (): void => {
    const content = current.trim();
    if (content.length > 0) {
      sentences.push(
        createSentence(content, startLine, {
          startPositionOffset: startColumn,
          isFirstSentence: sentences.length === 0,
        })
      );
    }
    current = '';
  };

  const matchAt = (candidates: readonly string[]): string | undefined =>
    candidates.find((candidate) => candidate.length > 0 && text.startsWith(candidate, index));

  while (index < text.length) {
    const ch = text.charAt(index);

    if (current.length === 0) {
      if (/\s/.test(ch)) {
        consume(ch);
        continue;
      }
      startLine = line;
      startColumn = column;
    }

    const period = matchAt(boundary.periods);
    if (period === undefined) {
      current += ch;
      consume(ch);
      continue;
    }

    let terminator: string | undefined = period;
    while (terminator !== undefined) {
      current += terminator;
      consume(terminator);
      terminator = matchAt(boundary.periods);
    }
    let quotation = matchAt(boundary.rightQuotations);
    while (quotation !== undefined) {
      current += quotation;
      consume(quotation);
      quotation = matchAt(boundary.rightQuotations);
    }

    // "3.14": no boundary when a Latin letter or digit follows
    if (ASCII_WORD_CHARACTER.test(text.charAt(index))) {
      continue;
    }
    pushCurrent();
  }

  pushCurrent();
  return sentences;
}
