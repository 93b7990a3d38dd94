import type { ChainConfig } from '../config/schema.js';
import { FormatChecker } from './format-checker.js';
import type { Handler } from './handler.js';
import { SecurityChecker } from './security-checker.js';

// Собирает цепочку FormatChecker → SecurityChecker и возвращает её голову.
export function buildValidationChain(config: ChainConfig): Handler {
  const head = new FormatChecker(config.formats);
  head.setNext(new SecurityChecker());
  return head;
}
