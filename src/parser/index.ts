// src/parser/index.ts

export type { DocumentParser, ParserSource } from './types.js';
export { splitSentences } from './sentence-splitter.js';
export { TreeDocumentParser, documentTreeSchema, type DocumentTree } from './tree-document-parser.js';
