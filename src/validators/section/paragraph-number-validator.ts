// src/validators/section/paragraph-number-validator.ts

import { firstLineNumber } from '../../model/builders.js';
import type { Section, ValidationError } from '../../model/types.js';
import { Validator } from '../validator.js';

export class ParagraphNumberValidator extends Validator<'section'> {
  readonly target = 'section';
  private maxParagraphs = 5;

  protected init(): void {
    this.maxParagraphs = this.getInt('max_num', 5);
  }

  validate(section: Section): ValidationError[] {
    const count = section.paragraphs.length;
    if (count <= this.maxParagraphs) {
      return [];
    }
    return [
      this.createError(
        `The number of paragraphs (${count}) in the section exceeds the maximum of ${this.maxParagraphs}.`,
        { lineNumber: firstLineNumber(section) }
      ),
    ];
  }
}
