import type { Document, DocumentVisitor } from './types.js';

// Упорядоченная коллекция документов (Object Structure).
// Порядок обхода совпадает с порядком добавления.
export class DocumentStructure {
  private readonly documents: Document[] = [];

  add(document: Document): void {
    this.documents.push(document);
  }

  // Передаёт посетителя каждому документу по порядку.
  process(visitor: DocumentVisitor<unknown>): void {
    for (const document of this.documents) {
      document.accept(visitor);
    }
  }

  // Снимок содержимого: изменения коллекции его не затрагивают, и наоборот.
  getAll(): readonly Document[] {
    return [...this.documents];
  }

  get size(): number {
    return this.documents.length;
  }
}
