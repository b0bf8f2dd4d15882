// src/parser/types.ts

import type { Document } from '../model/types.js';
import type { SentenceBoundary } from '../symbols/sentence-boundary.js';
import type { Tokenizer } from '../tokenizer/types.js';

export interface ParserSource {
  content: string;
  fileName?: string;
}

/**
 * Builds one document tree from one source.
 */
export interface DocumentParser {
  parse(source: ParserSource, sentenceBoundary: SentenceBoundary, tokenizer: Tokenizer): Document;
}
