// Команда docflow demo — полный демо-сценарий.
import { Command } from 'commander';
import { loadConfig } from '../config/index.js';
import { applyDemoOptions, runDemo, waitForEnter } from '../demo/index.js';
import type { DemoCommandOptions } from '../demo/index.js';

export const demoCommand = new Command('demo')
  .description('Run the chain, strategy and visitor demo')
  .option('-t, --type <label>', 'Document type passed through the chain')
  .option('-s, --strategy <name>', 'Processing strategy: print, save or none')
  .option('-d, --documents <kinds...>', 'Documents to visit: PDF, TXT')
  .option('--no-pause', 'Exit without waiting for Enter')
  .option('-c, --config <path>', 'Path to config file')
  .action(async (options: DemoCommandOptions) => {
    try {
      const config = await loadConfig(options.config);
      const demo = applyDemoOptions(config.demo, options);

      runDemo({ chain: config.chain, demo });

      if (demo.pause) {
        console.log('');
        await waitForEnter();
      }
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      console.error(`Ошибка: ${message}`);
      process.exit(1);
    }
  });
