#!/usr/bin/env node

// Точка входа CLI демо-сценария.
import { Command } from 'commander';
import { demoCommand } from './commands/demo-cmd.js';
import { checkCommand } from './commands/check-cmd.js';

const program = new Command()
  .name('docflow')
  .description('Strategy, Chain of Responsibility and Visitor over toy documents')
  .version('0.1.0');

program.addCommand(demoCommand, { isDefault: true });
program.addCommand(checkCommand);

await program.parseAsync();
