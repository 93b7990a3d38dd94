import { z } from 'zod';
import { KNOWN_DOCUMENT_TYPES } from '../documents/types.js';

// Форматы, которые по умолчанию пропускает FormatChecker.
export const DEFAULT_FORMATS: readonly string[] = KNOWN_DOCUMENT_TYPES;

// Схема цепочки проверок.
export const ChainConfigSchema = z.object({
  formats: z.array(z.string()).default(() => [...DEFAULT_FORMATS]),
});

// Виды документов, для которых есть вариант в иерархии.
export const DocumentKindSchema = z.enum(['PDF', 'TXT']);

// Имя стратегии обработки; none — процессор без стратегии.
export const StrategyNameSchema = z.enum(['print', 'save', 'none']);

// Схема демо-сценария.
export const DemoConfigSchema = z.object({
  documentType: z.string().default('PDF'),
  strategy: StrategyNameSchema.default('print'),
  documents: z.array(DocumentKindSchema).default(() => ['PDF' as const, 'TXT' as const]),
  // Ждать Enter перед выходом.
  pause: z.boolean().default(true),
});

// Корневая схема конфигурации приложения.
export const AppConfigSchema = z.object({
  chain: ChainConfigSchema.default(() => ({
    formats: [...DEFAULT_FORMATS],
  })),
  demo: DemoConfigSchema.default(() => ({
    documentType: 'PDF',
    strategy: 'print' as const,
    documents: ['PDF' as const, 'TXT' as const],
    pause: true,
  })),
});

// Типы, выведенные из схем.
export type ChainConfig = z.infer<typeof ChainConfigSchema>;
export type DocumentKind = z.infer<typeof DocumentKindSchema>;
export type StrategyName = z.infer<typeof StrategyNameSchema>;
export type DemoConfig = z.infer<typeof DemoConfigSchema>;
export type AppConfig = z.infer<typeof AppConfigSchema>;
