// src/model/index.ts

export type {
  Document,
  Section,
  Paragraph,
  ListBlock,
  ListElement,
  Sentence,
  SourcePosition,
  ValidationError,
} from './types.js';
export {
  createSentence,
  createParagraph,
  createListBlock,
  createSection,
  createDocument,
  forEachSentenceContainer,
  firstLineNumber,
} from './builders.js';
export { DocumentCollection, DocumentCollectionBuilder } from './document-collection.js';
