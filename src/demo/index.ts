// Barrel-файл демо-сценария.
export type { DemoResult } from './runner.js';
export type { DemoCommandOptions } from './options.js';
export { runDemo, SEPARATOR } from './runner.js';
export { applyDemoOptions } from './options.js';
export { waitForEnter } from './pause.js';
