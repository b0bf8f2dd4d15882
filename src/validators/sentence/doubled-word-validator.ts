// src/validators/sentence/doubled-word-validator.ts

import type { Sentence, ValidationError } from '../../model/types.js';
import type { Tokenizer } from '../../tokenizer/types.js';
import { createTokenizer } from '../../tokenizer/whitespace-tokenizer.js';
import type { PreProcessor } from '../types.js';
import { Validator } from '../validator.js';

const EDGE_PUNCTUATION = /^[^\p{L}\p{N}]+|[^\p{L}\p{N}]+$/gu;

/**
 * Reports a word used more than once in the same sentence.
 *
 * Tokens come from `sentence.tokens`; the preprocessing step fills them
 * with the tokenizer of the configured language when the parser left them
 * empty.
 */
export class DoubledWordValidator extends Validator<'sentence'> implements PreProcessor<Sentence> {
  readonly target = 'sentence';
  private tokenizer: Tokenizer | undefined;
  private skipList = new Set<string>();

  protected init(): void {
    this.tokenizer = createTokenizer(this.getLanguage());
    this.skipList = new Set(this.getList('skip_list').map((word) => word.toLowerCase()));
  }

  preprocess(sentence: Sentence): void {
    if (!this.tokenizer) {
      throw new Error('Validator used before preInit');
    }
    if (sentence.tokens.length === 0) {
      sentence.tokens = this.tokenizer.tokenize(sentence.content);
    }
  }

  validate(sentence: Sentence): ValidationError[] {
    const seen = new Set<string>();
    const reported = new Set<string>();
    const errors: ValidationError[] = [];

    for (const token of sentence.tokens) {
      const word = token.replace(EDGE_PUNCTUATION, '').toLowerCase();
      if (word.length === 0 || this.skipList.has(word)) {
        continue;
      }
      if (seen.has(word) && !reported.has(word)) {
        reported.add(word);
        errors.push(this.createSentenceError(sentence, `Found repeated word "${word}".`));
      }
      seen.add(word);
    }

    return errors;
  }
}
