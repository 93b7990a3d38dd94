import type { StrategyName } from '../config/schema.js';
import type { ProcessingStrategy } from './types.js';
import { PrintStrategy } from './print.js';
import { SaveStrategy } from './save.js';

// Создание стратегии по имени из конфигурации. none — стратегия не выбрана.
export function createStrategy(name: StrategyName): ProcessingStrategy | null {
  switch (name) {
  case 'print':
    return new PrintStrategy();
  case 'save':
    return new SaveStrategy();
  case 'none':
    return null;
  default:
    throw new Error(`Unsupported processing strategy: ${name as string}`);
  }
}
