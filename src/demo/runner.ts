import type { AppConfig } from '../config/schema.js';
import { buildValidationChain } from '../chain/index.js';
import { createDocument, DisplayVisitor, DocumentStructure } from '../documents/index.js';
import type { Document } from '../documents/index.js';
import { createStrategy, DocumentProcessor } from '../strategy/index.js';

// Разделитель между частью chain/strategy и частью visitor.
export const SEPARATOR = '------------------------';

// Итог демо-сценария.
export interface DemoResult {
  // Прошёл ли документ цепочку проверок.
  accepted: boolean;
  // Документы, обойдённые посетителем.
  documents: readonly Document[];
}

/**
 * Демо-сценарий:
 * 1. Цепочка проверяет demo.documentType; при успехе процессор выполняет стратегию.
 * 2. Коллекция из demo.documents обходится DisplayVisitor.
 */
export function runDemo(config: Pick<AppConfig, 'chain' | 'demo'>): DemoResult {
  const { chain: chainConfig, demo } = config;

  const chain = buildValidationChain(chainConfig);
  const accepted = chain.handle(demo.documentType);

  if (accepted) {
    const processor = new DocumentProcessor();
    const strategy = createStrategy(demo.strategy);
    if (strategy) {
      processor.setStrategy(strategy);
    }
    processor.executeStrategy(demo.documentType);
  }

  console.log(SEPARATOR);

  const structure = new DocumentStructure();
  for (const kind of demo.documents) {
    structure.add(createDocument(kind));
  }
  structure.process(new DisplayVisitor());

  return { accepted, documents: structure.getAll() };
}
