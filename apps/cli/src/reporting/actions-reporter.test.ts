import type { LoggerMethods } from '@relscope/logger';

import { randomUUID } from 'node:crypto';
import { appendFileSync } from 'node:fs';
import { beforeEach, describe, expect, test, vi } from 'vitest';

import { ActionsReporter } from './actions-reporter';

vi.mock('node:fs', () => ({
  appendFileSync: vi.fn(),
}));

vi.mock('node:crypto', () => ({
  randomUUID: vi.fn(),
}));

describe('ActionsReporter', () => {
  let mockLogger: LoggerMethods;
  let write: (text: string) => void;

  const createReporter = (): ActionsReporter =>
    new ActionsReporter({
      outputPath: '/tmp/gh-output',
      summaryPath: '/tmp/gh-summary',
      logger: mockLogger,
      write,
    });

  beforeEach(() => {
    mockLogger = {
      debug: vi.fn(),
      info: vi.fn(),
      warn: vi.fn(),
      error: vi.fn(),
    };
    write = vi.fn();
  });

  describe('setOutput', () => {
    test('writes a single-line value', () => {
      createReporter().setOutput('ticket_key', 'REL-1');

      expect(appendFileSync).toHaveBeenCalledWith(
        '/tmp/gh-output',
        'ticket_key=REL-1\n',
        'utf-8',
      );
    });

    test('writes booleans and arrays as JSON', () => {
      const reporter = createReporter();

      reporter.setOutput('has_table', false);
      reporter.setOutput('upserted_row_json', ['0', 'svc-a', 'main', '', '']);

      expect(vi.mocked(appendFileSync).mock.calls).toEqual([
        ['/tmp/gh-output', 'has_table=false\n', 'utf-8'],
        [
          '/tmp/gh-output',
          'upserted_row_json=["0","svc-a","main","",""]\n',
          'utf-8',
        ],
      ]);
    });

    test('uses the delimiter syntax for multi-line values', () => {
      createReporter().setOutput('table_markdown', '| a |\n| --- |');

      expect(appendFileSync).toHaveBeenCalledWith(
        '/tmp/gh-output',
        'table_markdown<<EOF\n| a |\n| --- |\nEOF\n',
        'utf-8',
      );
    });

    test('picks another delimiter when the value contains EOF', () => {
      vi.mocked(randomUUID).mockReturnValue(
        '00000000-0000-4000-8000-000000000000',
      );

      createReporter().setOutput('error_message', 'line EOF\nnext\n');

      expect(appendFileSync).toHaveBeenCalledWith(
        '/tmp/gh-output',
        'error_message<<EOF_00000000-0000-4000-8000-000000000000\nline EOF\nnext\nEOF_00000000-0000-4000-8000-000000000000\n',
        'utf-8',
      );
    });

    test('skips outputs outside a workflow run', () => {
      const reporter = new ActionsReporter({ logger: mockLogger, write });

      reporter.setOutput('ticket_key', 'REL-1');

      expect(appendFileSync).not.toHaveBeenCalled();
      expect(mockLogger.debug).toHaveBeenCalledWith(
        '[ActionsReporter] No output file, skipping output ticket_key',
      );
    });
  });

  describe('publish', () => {
    test('appends to the summary and prints', () => {
      createReporter().publish('### Title');

      expect(appendFileSync).toHaveBeenCalledWith(
        '/tmp/gh-summary',
        '### Title\n',
        'utf-8',
      );
      expect(write).toHaveBeenCalledWith('### Title\n');
    });
  });

  describe('reportFailure', () => {
    test('writes annotation, output and summary', () => {
      createReporter().reportFailure('Broken: 100%\nsecond line');

      expect(write).toHaveBeenCalledWith(
        '::error::Broken: 100%25%0Asecond line\n',
      );
      expect(vi.mocked(appendFileSync).mock.calls).toEqual([
        [
          '/tmp/gh-output',
          'error_message<<EOF\nBroken: 100%\nsecond line\nEOF\n',
          'utf-8',
        ],
        ['/tmp/gh-summary', '**ERROR:** Broken: 100%\nsecond line\n', 'utf-8'],
      ]);
    });
  });
});
