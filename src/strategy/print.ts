import type { DocumentTypeLabel } from '../documents/types.js';
import type { ProcessingStrategy } from './types.js';

// Стратегия печати документа.
export class PrintStrategy implements ProcessingStrategy {
  process(label: DocumentTypeLabel): void {
    console.log(`[Strategy] Printing ${label} document...`);
  }
}
