import { z } from 'zod';
import { DocumentKindSchema, StrategyNameSchema } from '../config/schema.js';
import type { DemoConfig } from '../config/schema.js';

// Опции команды demo, как их передаёт commander.
export interface DemoCommandOptions {
  type?: string;
  strategy?: string;
  documents?: string[];
  pause?: boolean;
  config?: string;
}

/**
 * Накладывает опции CLI поверх demo-секции конфига.
 * Значения опций валидируются теми же схемами, что и конфиг.
 */
export function applyDemoOptions(base: DemoConfig, options: DemoCommandOptions): DemoConfig {
  return {
    documentType: options.type ?? base.documentType,
    strategy: options.strategy !== undefined
      ? StrategyNameSchema.parse(options.strategy)
      : base.strategy,
    documents: options.documents !== undefined
      ? z.array(DocumentKindSchema).parse(options.documents)
      : base.documents,
    // commander выставляет pause=true по умолчанию, поэтому учитываем только --no-pause.
    pause: options.pause === false ? false : base.pause,
  };
}
