import type { DocumentKind } from '../config/schema.js';
import type { Document } from './types.js';
import { PDFDocument, TXTDocument } from './types.js';

// Создание варианта документа по виду из конфигурации.
export function createDocument(kind: DocumentKind): Document {
  switch (kind) {
  case 'PDF':
    return new PDFDocument();
  case 'TXT':
    return new TXTDocument();
  default:
    throw new Error(`Unsupported document kind: ${kind as string}`);
  }
}
