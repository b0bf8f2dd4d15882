// src/parser/tree-document-parser.ts

import * as YAML from 'yaml';
import { z } from 'zod';
import type { Document, ListBlock, Paragraph, Section, Sentence } from '../model/types.js';
import type { SentenceBoundary } from '../symbols/sentence-boundary.js';
import type { Tokenizer } from '../tokenizer/types.js';
import { DocumentParseError } from '../utils/errors.js';
import { splitSentences } from './sentence-splitter.js';
import type { DocumentParser, ParserSource } from './types.js';

const lineSchema = z.number().int().positive();

const textBlockSchema = z.union([
  z.string(),
  z.object({ text: z.string(), line: lineSchema.optional() }),
]);

const listItemSchema = z.union([
  z.string(),
  z.object({ text: z.string(), line: lineSchema.optional(), level: z.number().int().positive().default(1) }),
]);

const sectionSchema = z.object({
  level: z.number().int().min(0).default(0),
  header: textBlockSchema.optional(),
  paragraphs: z.array(textBlockSchema).default([]),
  lists: z.array(z.array(listItemSchema)).default([]),
});

export const documentTreeSchema = z.object({
  fileName: z.string().optional(),
  sections: z.array(sectionSchema),
});

export type DocumentTree = z.input<typeof documentTreeSchema>;

type TextBlock = z.infer<typeof textBlockSchema>;
type SectionTree = z.infer<typeof sectionSchema>;

/**
 * Reads a document tree serialized as YAML or JSON.
 *
 * Each section holds an optional header, paragraphs and lists; every text
 * block is split into sentences with the given boundary. A block without an
 * explicit `line` starts on the line after the previous block.
 */
export class TreeDocumentParser implements DocumentParser {
  parse(source: ParserSource, sentenceBoundary: SentenceBoundary, tokenizer: Tokenizer): Document {
    const label = source.fileName ?? '<input>';

    let raw: unknown;
    try {
      raw = YAML.parse(source.content);
    } catch (error) {
      throw new DocumentParseError(label, `Invalid YAML/JSON: ${(error as Error).message}`);
    }

    const result = documentTreeSchema.safeParse(raw);
    if (!result.success) {
      const issues = result.error.issues
        .map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`)
        .join('; ');
      throw new DocumentParseError(label, `Invalid document tree: ${issues}`);
    }

    const builder = new SectionBuilder(sentenceBoundary, tokenizer);
    const sections = result.data.sections.map((section) => builder.build(section));
    const fileName = source.fileName ?? result.data.fileName;

    return fileName === undefined ? { sections } : { fileName, sections };
  }
}

class SectionBuilder {
  private nextLine = 1;

  constructor(
    private readonly boundary: SentenceBoundary,
    private readonly tokenizer: Tokenizer
  ) {}

  build(tree: SectionTree): Section {
    const headerContents = tree.header !== undefined ? this.sentencesOf(tree.header) : [];
    const paragraphs: Paragraph[] = tree.paragraphs.map((block) => ({
      sentences: this.sentencesOf(block),
    }));
    const listBlocks: ListBlock[] = tree.lists.map((items) => ({
      listElements: items.map((item) => ({
        level: typeof item === 'string' ? 1 : item.level,
        sentences: this.sentencesOf(item),
      })),
    }));

    return { level: tree.level, headerContents, paragraphs, listBlocks };
  }

  private sentencesOf(block: TextBlock): Sentence[] {
    const text = typeof block === 'string' ? block : block.text;
    const line = typeof block === 'string' || block.line === undefined ? this.nextLine : block.line;

    this.nextLine = line + text.split('\n').length;

    const sentences = splitSentences(text, line, this.boundary);
    for (const sentence of sentences) {
      sentence.tokens = this.tokenizer.tokenize(sentence.content);
    }
    return sentences;
  }
}
