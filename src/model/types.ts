// src/model/types.ts

/**
 * Smallest unit handed to sentence-level validators.
 *
 * `content` and the position fields are fixed by the parser. `tokens` is
 * the one field a preprocessor may fill, and only before the sentence
 * validation pass starts.
 */
export interface Sentence {
  readonly content: string;
  readonly lineNumber: number;
  readonly startPositionOffset: number;
  readonly isFirstSentence: boolean;
  tokens: string[];
}

export interface Paragraph {
  readonly sentences: Sentence[];
}

export interface ListElement {
  readonly level: number;
  readonly sentences: Sentence[];
}

export interface ListBlock {
  readonly listElements: ListElement[];
}

export interface Section {
  readonly level: number;
  readonly headerContents: Sentence[];
  readonly paragraphs: Paragraph[];
  readonly listBlocks: ListBlock[];
}

/**
 * A parsed input. Object identity keys the result map returned by the
 * engine, so two structurally equal documents stay distinct.
 */
export interface Document {
  readonly fileName?: string;
  readonly sections: Section[];
}

export interface SourcePosition {
  lineNumber: number;
  startPosition?: number;  // Offset of the first character within the line
  endPosition?: number;
}

/**
 * A finding reported by a validator. Never thrown; the engine collects it
 * under the document it was found in.
 */
export interface ValidationError {
  validatorName: string;
  message: string;
  position: SourcePosition;
  sentence?: string;  // Content of the offending sentence, when there is one
}
