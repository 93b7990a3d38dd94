import { KNOWN_DOCUMENT_TYPES } from '../documents/types.js';
import type { DocumentTypeLabel } from '../documents/types.js';
import { Handler } from './handler.js';

// Проверка формата: метка должна входить в список поддерживаемых.
export class FormatChecker extends Handler {
  private readonly formats: ReadonlySet<DocumentTypeLabel>;

  constructor(formats: readonly DocumentTypeLabel[] = KNOWN_DOCUMENT_TYPES) {
    super();
    this.formats = new Set(formats);
  }

  protected check(label: DocumentTypeLabel): boolean {
    console.log(`[Chain] Checking format of ${label}...`);
    if (this.formats.has(label)) {
      return true;
    }
    console.log('Format not supported.');
    return false;
  }
}
