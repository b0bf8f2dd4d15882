// src/model/builders.ts

import type { Document, ListBlock, ListElement, Paragraph, Section, Sentence } from './types.js';

export function createSentence(
  content: string,
  lineNumber: number,
  options: { startPositionOffset?: number; isFirstSentence?: boolean; tokens?: string[] } = {}
): Sentence {
  return {
    content,
    lineNumber,
    startPositionOffset: options.startPositionOffset ?? 0,
    isFirstSentence: options.isFirstSentence ?? false,
    tokens: options.tokens ?? [],
  };
}

export function createParagraph(sentences: Sentence[]): Paragraph {
  return { sentences };
}

export function createListBlock(elements: Array<{ level?: number; sentences: Sentence[] }>): ListBlock {
  const listElements: ListElement[] = elements.map((element) => ({
    level: element.level ?? 1,
    sentences: element.sentences,
  }));
  return { listElements };
}

export function createSection(parts: {
  level?: number;
  headerContents?: Sentence[];
  paragraphs?: Paragraph[];
  listBlocks?: ListBlock[];
}): Section {
  return {
    level: parts.level ?? 0,
    headerContents: parts.headerContents ?? [],
    paragraphs: parts.paragraphs ?? [],
    listBlocks: parts.listBlocks ?? [],
  };
}

export function createDocument(sections: Section[], fileName?: string): Document {
  return fileName === undefined ? { sections } : { fileName, sections };
}

/**
 * Visits every sentence container of a section in the order validators see
 * them: paragraphs, then the header, then each list element.
 */
export function forEachSentenceContainer(
  section: Section,
  visit: (sentences: Sentence[]) => void
): void {
  for (const paragraph of section.paragraphs) {
    visit(paragraph.sentences);
  }
  visit(section.headerContents);
  for (const listBlock of section.listBlocks) {
    for (const listElement of listBlock.listElements) {
      visit(listElement.sentences);
    }
  }
}

/**
 * Line of the first sentence in a section, header first; 0 for an empty section.
 */
export function firstLineNumber(section: Section): number {
  const candidates = [
    section.headerContents[0],
    section.paragraphs[0]?.sentences[0],
    section.listBlocks[0]?.listElements[0]?.sentences[0],
  ];
  for (const sentence of candidates) {
    if (sentence) {
      return sentence.lineNumber;
    }
  }
  return 0;
}
