import type { DocumentTypeLabel } from '../documents/types.js';
import type { ProcessingStrategy } from './types.js';

// Контекст стратегии: хранит не более одной активной стратегии.
export class DocumentProcessor {
  private strategy: ProcessingStrategy | null = null;

  // Заменяет текущую стратегию — последняя установленная выигрывает.
  setStrategy(strategy: ProcessingStrategy): void {
    this.strategy = strategy;
  }

  hasStrategy(): boolean {
    return this.strategy !== null;
  }

  // Без стратегии — no-op с уведомлением, не ошибка.
  executeStrategy(label: DocumentTypeLabel): void {
    if (!this.strategy) {
      console.log('No strategy selected.');
      return;
    }
    this.strategy.process(label);
  }
}
