import type { DocumentTypeLabel } from '../documents/types.js';
import { Handler } from './handler.js';

// Проверка безопасности. Пока без реальных правил — пропускает все документы.
export class SecurityChecker extends Handler {
  protected check(label: DocumentTypeLabel): boolean {
    console.log(`[Chain] Security check passed for ${label}.`);
    return true;
  }
}
