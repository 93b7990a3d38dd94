import type { DocumentTypeLabel } from '../documents/types.js';
import type { ProcessingStrategy } from './types.js';

// Стратегия сохранения документа.
export class SaveStrategy implements ProcessingStrategy {
  process(label: DocumentTypeLabel): void {
    console.log(`[Strategy] Saving ${label} document...`);
  }
}
