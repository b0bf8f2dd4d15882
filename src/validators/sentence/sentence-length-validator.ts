// src/validators/sentence/sentence-length-validator.ts

import type { Sentence, ValidationError } from '../../model/types.js';
import { Validator } from '../validator.js';

/**
 * Reports sentences longer than `max_len` characters.
 */
export class SentenceLengthValidator extends Validator<'sentence'> {
  readonly target = 'sentence';
  private maxLength = 30;

  protected init(): void {
    this.maxLength = this.getInt('max_len', 30);
  }

  validate(sentence: Sentence): ValidationError[] {
    const length = sentence.content.length;
    if (length <= this.maxLength) {
      return [];
    }
    return [
      this.createSentenceError(
        sentence,
        `The length of the sentence (${length}) exceeds the maximum of ${this.maxLength}.`
      ),
    ];
  }
}
