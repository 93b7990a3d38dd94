// Barrel-файл модуля стратегий обработки.
export type { ProcessingStrategy } from './types.js';
export { PrintStrategy } from './print.js';
export { SaveStrategy } from './save.js';
export { DocumentProcessor } from './processor.js';
export { createStrategy } from './factory.js';
