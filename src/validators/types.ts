// src/validators/types.ts

import type { Document, Section, Sentence } from '../model/types.js';
import type { Validator } from './validator.js';

/**
 * The entity a validator operates on. The engine routes each resolved
 * validator into one of three lists by reading this value.
 */
export type ValidationTarget = 'document' | 'section' | 'sentence';

export interface TargetEntities {
  document: Document;
  section: Section;
  sentence: Sentence;
}

export type DocumentValidator = Validator<'document'>;
export type SectionValidator = Validator<'section'>;
export type SentenceValidator = Validator<'sentence'>;

/**
 * Any validator the registry can hand out, discriminated by `target`.
 */
export type AnyValidator = DocumentValidator | SectionValidator | SentenceValidator;

/**
 * Optional capability of a sentence validator: run once per sentence before
 * any sentence validator sees it.
 */
export interface PreProcessor<T> {
  preprocess(entity: T): void;
}

export function isPreProcessor(
  validator: SentenceValidator
): validator is SentenceValidator & PreProcessor<Sentence> {
  return 'preprocess' in validator && typeof validator.preprocess === 'function';
}

/**
 * Class of a rule implementation. Constructed with no arguments, then
 * initialized through `preInit`.
 */
export type ValidatorClass = new () => AnyValidator;
