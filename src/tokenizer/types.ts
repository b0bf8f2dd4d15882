// src/tokenizer/types.ts

/**
 * Splits sentence content into surface tokens.
 */
export interface Tokenizer {
  readonly name: string;
  tokenize(content: string): string[];
}
