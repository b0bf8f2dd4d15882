// src/validators/sentence/comma-number-validator.ts

import type { Sentence, ValidationError } from '../../model/types.js';
import { Validator } from '../validator.js';

/**
 * Reports sentences with more than `max_num` commas. The comma is the
 * configured `COMMA` symbol, so full-width commas count in Japanese.
 */
export class CommaNumberValidator extends Validator<'sentence'> {
  readonly target = 'sentence';
  private maxCommas = 3;
  private comma = ',';

  protected init(): void {
    this.maxCommas = this.getInt('max_num', 3);
    this.comma = this.getSymbol('COMMA');
  }

  validate(sentence: Sentence): ValidationError[] {
    const count = sentence.content.split(this.comma).length - 1;
    if (count <= this.maxCommas) {
      return [];
    }
    return [
      this.createSentenceError(
        sentence,
        `The number of commas (${count}) exceeds the maximum of ${this.maxCommas}.`
      ),
    ];
  }
}
