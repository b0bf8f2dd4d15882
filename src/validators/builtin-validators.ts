// src/validators/builtin-validators.ts

import { SectionCountValidator } from './core/section-count-validator.js';
import { ParagraphNumberValidator } from './section/paragraph-number-validator.js';
import { SectionLengthValidator } from './section/section-length-validator.js';
import { CommaNumberValidator } from './sentence/comma-number-validator.js';
import { DoubledWordValidator } from './sentence/doubled-word-validator.js';
import { SentenceLengthValidator } from './sentence/sentence-length-validator.js';
import { ValidatorRegistry } from './validator-registry.js';

export const CORE_NAMESPACE = 'core';
export const SENTENCE_NAMESPACE = 'sentence';
export const SECTION_NAMESPACE = 'section';

/**
 * Registry holding the built-in rules under the `core`, `sentence` and
 * `section` namespaces, searched in that order.
 */
export function createDefaultRegistry(): ValidatorRegistry {
  return new ValidatorRegistry()
    .addNamespace(CORE_NAMESPACE)
    .register(CORE_NAMESPACE, 'SectionCount', SectionCountValidator)
    .addNamespace(SENTENCE_NAMESPACE)
    .register(SENTENCE_NAMESPACE, 'SentenceLength', SentenceLengthValidator)
    .register(SENTENCE_NAMESPACE, 'CommaNumber', CommaNumberValidator)
    .register(SENTENCE_NAMESPACE, 'DoubledWord', DoubledWordValidator)
    .addNamespace(SECTION_NAMESPACE)
    .register(SECTION_NAMESPACE, 'ParagraphNumber', ParagraphNumberValidator)
    .register(SECTION_NAMESPACE, 'SectionLength', SectionLengthValidator);
}
