import { describe, it, expect, beforeAll, afterAll, beforeEach, afterEach, vi } from 'vitest';
import type { MockInstance } from 'vitest';
import { writeFile, mkdir, rm } from 'node:fs/promises';
import { join } from 'node:path';
import { tmpdir } from 'node:os';
import { Command } from 'commander';
import { stringify as stringifyYaml } from 'yaml';
import { checkCommand } from '../check-cmd.js';

// Временная директория для конфига команды.
const TEST_DIR = join(tmpdir(), 'docflow-check-cmd-test');
const CONFIG_PATH = join(TEST_DIR, 'docflow.config.yaml');

const program = new Command().name('docflow').addCommand(checkCommand);

let logSpy: MockInstance<typeof console.log>;
let errorSpy: MockInstance<typeof console.error>;

beforeAll(async () => {
  await mkdir(TEST_DIR, { recursive: true });
  await writeFile(CONFIG_PATH, stringifyYaml({ chain: { formats: ['PDF', 'TXT', 'DOCX'] } }));
});

afterAll(async () => {
  await rm(TEST_DIR, { recursive: true, force: true });
});

beforeEach(() => {
  logSpy = vi.spyOn(console, 'log').mockImplementation(() => undefined);
  errorSpy = vi.spyOn(console, 'error').mockImplementation(() => undefined);
});

afterEach(() => {
  vi.restoreAllMocks();
});

function loggedLines(): unknown[] {
  return logSpy.mock.calls.map((call) => call[0]);
}

describe('docflow check', () => {
  it('печатает цепочку и вердикт для поддерживаемого типа', async () => {
    await program.parseAsync(['check', 'DOCX', '-c', CONFIG_PATH], { from: 'user' });

    expect(loggedLines()).toEqual([
      '[Chain] Checking format of DOCX...',
      '[Chain] Security check passed for DOCX.',
      'Документ DOCX принят.',
    ]);
  });

  it('отклонение не завершает процесс с ошибкой', async () => {
    const exitSpy = vi.spyOn(process, 'exit').mockImplementation((code) => {
      throw new Error(`process.exit(${String(code)})`);
    });

    await program.parseAsync(['check', 'XLS', '-c', CONFIG_PATH], { from: 'user' });

    expect(loggedLines()).toEqual([
      '[Chain] Checking format of XLS...',
      'Format not supported.',
      'Документ XLS отклонён.',
    ]);
    expect(exitSpy).not.toHaveBeenCalled();
    expect(errorSpy).not.toHaveBeenCalled();
  });

  it('при отсутствующем конфиге печатает ошибку и выходит с кодом 1', async () => {
    const exitSpy = vi.spyOn(process, 'exit').mockImplementation((code) => {
      throw new Error(`process.exit(${String(code)})`);
    });
    const missingPath = join(TEST_DIR, 'missing.yaml');

    await expect(program.parseAsync(['check', 'PDF', '-c', missingPath], { from: 'user' }))
      .rejects.toThrow('process.exit(1)');

    expect(exitSpy).toHaveBeenCalledWith(1);
    expect(errorSpy).toHaveBeenCalledWith(`Ошибка: Config file not found at path: ${missingPath}`);
    expect(logSpy).not.toHaveBeenCalled();
  });
});
