import type { AppConfig } from './schema.js';
import { DEFAULT_FORMATS } from './schema.js';

// Значения по умолчанию для конфигурации.
// Используются при deep-merge с пользовательским конфигом до валидации.
export const defaultConfig: AppConfig = {
  chain: {
    formats: [...DEFAULT_FORMATS],
  },
  demo: {
    documentType: 'PDF',
    strategy: 'print',
    documents: ['PDF', 'TXT'],
    pause: true,
  },
};
