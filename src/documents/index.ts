// Barrel-файл модуля документов.
export type { Document, DocumentTypeLabel, DocumentVisitor } from './types.js';

export { PDFDocument, TXTDocument, KNOWN_DOCUMENT_TYPES } from './types.js';
export { DisplayVisitor } from './display-visitor.js';
export { DocumentStructure } from './structure.js';
export { createDocument } from './factory.js';
