import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import type { MockInstance } from 'vitest';
import { runDemo, SEPARATOR } from '../runner.js';
import { defaultConfig } from '../../config/defaults.js';
import type { DemoConfig } from '../../config/schema.js';
import { PDFDocument, TXTDocument } from '../../documents/types.js';

let logSpy: MockInstance<typeof console.log>;

beforeEach(() => {
  logSpy = vi.spyOn(console, 'log').mockImplementation(() => undefined);
});

afterEach(() => {
  vi.restoreAllMocks();
});

function loggedLines(): unknown[] {
  return logSpy.mock.calls.map((call) => call[0]);
}

function demoWith(overrides: Partial<DemoConfig>): Parameters<typeof runDemo>[0] {
  return {
    chain: { formats: ['PDF', 'TXT', 'DOCX'] },
    demo: { ...defaultConfig.demo, ...overrides },
  };
}

describe('runDemo', () => {
  it('с конфигурацией по умолчанию выводит полный сценарий', () => {
    const result = runDemo(defaultConfig);

    expect(result.accepted).toBe(true);
    expect(loggedLines()).toEqual([
      '[Chain] Checking format of PDF...',
      '[Chain] Security check passed for PDF.',
      '[Strategy] Printing PDF document...',
      '------------------------',
      '[Visitor] Displaying PDF content.',
      '[Visitor] Displaying TXT content.',
    ]);
  });

  it('возвращает обойдённые документы в порядке добавления', () => {
    const result = runDemo(defaultConfig);

    expect(result.documents).toHaveLength(2);
    expect(result.documents[0]).toBeInstanceOf(PDFDocument);
    expect(result.documents[1]).toBeInstanceOf(TXTDocument);
  });

  it('для неподдерживаемого типа не вызывает стратегию', () => {
    const result = runDemo(demoWith({ documentType: 'XLS' }));

    expect(result.accepted).toBe(false);
    expect(loggedLines()).toEqual([
      '[Chain] Checking format of XLS...',
      'Format not supported.',
      SEPARATOR,
      '[Visitor] Displaying PDF content.',
      '[Visitor] Displaying TXT content.',
    ]);
  });

  it('использует стратегию save', () => {
    runDemo(demoWith({ documentType: 'DOCX', strategy: 'save', documents: [] }));

    expect(loggedLines()).toEqual([
      '[Chain] Checking format of DOCX...',
      '[Chain] Security check passed for DOCX.',
      '[Strategy] Saving DOCX document...',
      SEPARATOR,
    ]);
  });

  it('без стратегии сообщает "No strategy selected."', () => {
    runDemo(demoWith({ strategy: 'none', documents: ['TXT'] }));

    expect(loggedLines()).toEqual([
      '[Chain] Checking format of PDF...',
      '[Chain] Security check passed for PDF.',
      'No strategy selected.',
      SEPARATOR,
      '[Visitor] Displaying TXT content.',
    ]);
  });

  it('строит коллекцию из списка документов конфигурации', () => {
    const result = runDemo(demoWith({ documents: ['TXT', 'PDF', 'TXT'] }));

    expect(result.documents.map((document) => document.getType())).toEqual(['TXT', 'PDF', 'TXT']);
    expect(loggedLines().slice(-3)).toEqual([
      '[Visitor] Displaying TXT content.',
      '[Visitor] Displaying PDF content.',
      '[Visitor] Displaying TXT content.',
    ]);
  });
});
