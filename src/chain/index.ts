// Barrel-файл модуля цепочки проверок.
export { Handler } from './handler.js';
export { FormatChecker } from './format-checker.js';
export { SecurityChecker } from './security-checker.js';
export { buildValidationChain } from './factory.js';
