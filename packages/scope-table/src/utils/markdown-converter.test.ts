import { describe, expect, test } from 'vitest';

import { MarkdownConverter } from './markdown-converter';

describe('MarkdownConverter', () => {
  describe('tableToMarkdown', () => {
    test('renders headers, separator and rows', () => {
      const result = MarkdownConverter.tableToMarkdown(
        ['Order', 'Component', 'Branch Name'],
        [
          ['0', 'svc-a', 'main'],
          ['1', 'svc-b', 'dev'],
        ],
      );

      expect(result).toBe(
        [
          '| Order | Component | Branch Name |',
          '| --- | --- | --- |',
          '| 0 | svc-a | main |',
          '| 1 | svc-b | dev |',
        ].join('\n'),
      );
    });

    test('keeps empty cells', () => {
      const result = MarkdownConverter.tableToMarkdown(
        ['A', 'B', 'C'],
        [['x', '', '']],
      );

      expect(result.split('\n')[2]).toBe('| x |  |  |');
    });

    test('escapes pipes and flattens newlines', () => {
      const result = MarkdownConverter.tableToMarkdown(
        ['Name'],
        [['a|b\nc']],
      );

      expect(result.split('\n')[2]).toBe('| a\\|b c |');
    });

    test('pads short rows to the header width', () => {
      const result = MarkdownConverter.tableToMarkdown(['A', 'B'], [['1']]);

      expect(result.split('\n')[2]).toBe('| 1 |  |');
    });

    test('renders only headers when there are no rows', () => {
      expect(MarkdownConverter.tableToMarkdown(['A'], [])).toBe(
        '| A |\n| --- |',
      );
    });

    test('returns empty string when there are no headers', () => {
      expect(MarkdownConverter.tableToMarkdown([], [['x']])).toBe('');
    });
  });
});
