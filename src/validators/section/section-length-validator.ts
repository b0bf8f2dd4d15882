// src/validators/section/section-length-validator.ts

import { firstLineNumber } from '../../model/builders.js';
import type { Section, ValidationError } from '../../model/types.js';
import { Validator } from '../validator.js';

/**
 * Counts the characters of a section body (paragraphs and lists, header
 * excluded) against `max_num`.
 */
export class SectionLengthValidator extends Validator<'section'> {
  readonly target = 'section';
  private maxCharacters = 1000;

  protected init(): void {
    this.maxCharacters = this.getInt('max_num', 1000);
  }

  validate(section: Section): ValidationError[] {
    let length = 0;
    for (const paragraph of section.paragraphs) {
      for (const sentence of paragraph.sentences) {
        length += sentence.content.length;
      }
    }
    for (const listBlock of section.listBlocks) {
      for (const listElement of listBlock.listElements) {
        for (const sentence of listElement.sentences) {
          length += sentence.content.length;
        }
      }
    }

    if (length <= this.maxCharacters) {
      return [];
    }
    return [
      this.createError(
        `The number of characters in the section (${length}) exceeds the maximum of ${this.maxCharacters}.`,
        { lineNumber: firstLineNumber(section) }
      ),
    ];
  }
}
