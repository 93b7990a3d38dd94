// Команда docflow check — только цепочка проверок.
import { Command } from 'commander';
import { loadConfig } from '../config/index.js';
import { buildValidationChain } from '../chain/index.js';

export const checkCommand = new Command('check')
  .description('Run the validation chain for a document type')
  .argument('<type>', 'Document type label, e.g. PDF')
  .option('-c, --config <path>', 'Path to config file')
  .action(async (type: string, options: { config?: string }) => {
    try {
      const config = await loadConfig(options.config);
      const accepted = buildValidationChain(config.chain).handle(type);

      // Отклонение — обычный исход, код выхода остаётся 0.
      console.log(accepted ? `Документ ${type} принят.` : `Документ ${type} отклонён.`);
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      console.error(`Ошибка: ${message}`);
      process.exit(1);
    }
  });
