// src/tokenizer/whitespace-tokenizer.ts

import type { Language } from '../symbols/default-symbols.js';
import type { Tokenizer } from './types.js';

export class WhitespaceTokenizer implements Tokenizer {
  readonly name = 'whitespace';

  tokenize(content: string): string[] {
    return content.split(/\s+/).filter((token) => token.length > 0);
  }
}

/**
 * Every supported language currently shares the whitespace tokenizer.
 */
export function createTokenizer(_lang: Language): Tokenizer {
  return new WhitespaceTokenizer();
}
