// src/model/document-collection.ts

import type { Document } from './types.js';

/**
 * Ordered batch of documents validated together.
 */
export class DocumentCollection implements Iterable<Document> {
  private readonly documents: readonly Document[];

  private constructor(documents: Document[]) {
    this.documents = Object.freeze([...documents]);
  }

  static builder(): DocumentCollectionBuilder {
    return new DocumentCollectionBuilder();
  }

  static of(...documents: Document[]): DocumentCollection {
    return new DocumentCollection(documents);
  }

  get size(): number {
    return this.documents.length;
  }

  getDocument(index: number): Document | undefined {
    return this.documents[index];
  }

  [Symbol.iterator](): Iterator<Document> {
    return this.documents[Symbol.iterator]();
  }
}

export class DocumentCollectionBuilder {
  private documents: Document[] = [];

  addDocument(document: Document): this {
    this.documents.push(document);
    return this;
  }

  build(): DocumentCollection {
    return DocumentCollection.of(...this.documents);
  }
}
