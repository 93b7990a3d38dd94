import type { DocumentTypeLabel } from '../documents/types.js';

// Интерфейс стратегии обработки документа.
// Метка не валидируется: любое значение выводится как есть.
export interface ProcessingStrategy {
  process(label: DocumentTypeLabel): void;
}
