// src/validators/core/section-count-validator.ts

import { firstLineNumber } from '../../model/builders.js';
import type { Document, ValidationError } from '../../model/types.js';
import { Validator } from '../validator.js';

export class SectionCountValidator extends Validator<'document'> {
  readonly target = 'document';
  private maxSections = 20;

  protected init(): void {
    this.maxSections = this.getInt('max_num', 20);
  }

  validate(document: Document): ValidationError[] {
    const count = document.sections.length;
    if (count <= this.maxSections) {
      return [];
    }
    const overflow = document.sections[this.maxSections];
    return [
      this.createError(
        `The number of sections (${count}) exceeds the maximum of ${this.maxSections}.`,
        { lineNumber: overflow ? firstLineNumber(overflow) : 0 }
      ),
    ];
  }
}
