import type { LoggerMethods } from '@relscope/logger';
import type { ScopeTable } from '@relscope/model';

import { beforeEach, describe, expect, test, vi } from 'vitest';

import { EmptyComponentKeyError, SchemaMismatchError } from '../errors';
import { TableUpsertEngine } from './table-upsert-engine';

const HEADERS = [
  'Order',
  'Component',
  'Branch Name',
  'Change Request',
  'External Dependency',
];

const createTable = (rows: string[][]): ScopeTable => ({
  headers: [...HEADERS],
  rows,
});

describe('TableUpsertEngine', () => {
  let mockLogger: LoggerMethods;

  beforeEach(() => {
    mockLogger = {
      debug: vi.fn(),
      info: vi.fn(),
      warn: vi.fn(),
      error: vi.fn(),
    };
  });

  describe('with reject policy (default)', () => {
    let engine: TableUpsertEngine;

    beforeEach(() => {
      engine = new TableUpsertEngine(mockLogger);
    });

    test('appends a new component after the highest order', () => {
      const table = createTable([['0', 'svc-a', 'main', '', '']]);

      const outcome = engine.upsert(table, {
        component: 'svc-b',
        branchName: 'dev',
      });

      expect(outcome).toEqual({
        status: 'added',
        headers: HEADERS,
        rows: [
          ['0', 'svc-a', 'main', '', ''],
          ['1', 'svc-b', 'dev', '', ''],
        ],
        row: ['1', 'svc-b', 'dev', '', ''],
      });
      expect(mockLogger.info).toHaveBeenCalledWith(
        '[TableUpsertEngine] Adding component "svc-b" with Order 1',
      );
    });

    test('reports a conflict for an existing component and keeps rows', () => {
      const table = createTable([['0', 'svc-a', 'main', '', '']]);

      const outcome = engine.upsert(table, {
        component: 'svc-a',
        branchName: 'release/2.0',
      });

      expect(outcome).toEqual({
        status: 'conflict',
        headers: HEADERS,
        rows: [['0', 'svc-a', 'main', '', '']],
        conflictingRow: ['0', 'svc-a', 'main', '', ''],
      });
      expect(mockLogger.warn).toHaveBeenCalledWith(
        '[TableUpsertEngine] Component "svc-a" already exists (Order 0), refusing to overwrite',
      );
    });

    test('matches components case-insensitively after trimming', () => {
      const table = createTable([
        ['0', 'svc-a', 'main', '', ''],
        ['1', ' Svc-B ', 'dev', 'CR-7', ''],
      ]);

      const outcome = engine.upsert(table, { component: '  SVC-b ' });

      expect(outcome.status).toBe('conflict');
      expect(outcome.rows).toEqual(table.rows);
    });

    test('synthesizes a canonical table when none exists', () => {
      const outcome = engine.upsert(null, {
        component: 'svc-a',
        branchName: 'main',
      });

      expect(outcome).toEqual({
        status: 'added',
        headers: HEADERS,
        rows: [['0', 'svc-a', 'main', '', '']],
        row: ['0', 'svc-a', 'main', '', ''],
      });
    });

    test('treats a decoded table with no headers and rows as absent', () => {
      const outcome = engine.upsert(
        { headers: [], rows: [] },
        { component: 'svc-a' },
      );

      expect(outcome.headers).toEqual(HEADERS);
      expect(outcome.rows).toEqual([['0', 'svc-a', '', '', '']]);
    });

    test('trims every supplied value', () => {
      const outcome = engine.upsert(createTable([]), {
        component: ' svc-a ',
        branchName: ' main ',
        changeRequest: ' CR-1 ',
        externalDependency: ' lib-x ',
      });

      expect(outcome.status).toBe('added');
      expect(outcome.rows).toEqual([['0', 'svc-a', 'main', 'CR-1', 'lib-x']]);
    });

    test('does not mutate the input table', () => {
      const table = createTable([['0', 'svc-a', 'main', '', '']]);

      engine.upsert(table, { component: 'svc-b' });

      expect(table.rows).toEqual([['0', 'svc-a', 'main', '', '']]);
      expect(table.headers).toEqual(HEADERS);
    });

    test('throws EmptyComponentKeyError before looking at the table', () => {
      const badTable: ScopeTable = { headers: ['Col1'], rows: [['x']] };

      expect(() => engine.upsert(badTable, { component: '   ' })).toThrow(
        EmptyComponentKeyError,
      );
    });

    test('throws SchemaMismatchError for unexpected headers', () => {
      const table: ScopeTable = {
        headers: ['Col1', 'Col2'],
        rows: [['0', 'svc-a']],
      };

      expect(() => engine.upsert(table, { component: 'svc-b' })).toThrow(
        SchemaMismatchError,
      );
      expect(table.rows).toEqual([['0', 'svc-a']]);
    });

    test('accepts headers differing only in case and whitespace', () => {
      const table: ScopeTable = {
        headers: [
          ' order ',
          'COMPONENT',
          'branch name',
          'Change request',
          'EXTERNAL DEPENDENCY',
        ],
        rows: [],
      };

      const outcome = engine.upsert(table, { component: 'svc-a' });

      expect(outcome.headers).toEqual(table.headers);
      expect(outcome.status).toBe('added');
    });
  });

  describe('with merge policy', () => {
    let engine: TableUpsertEngine;

    beforeEach(() => {
      engine = new TableUpsertEngine(mockLogger, { conflictPolicy: 'merge' });
    });

    test('overwrites only non-empty supplied fields and keeps order', () => {
      const table = createTable([
        ['0', 'svc-z', 'main', '', ''],
        ['2', 'svc-a', 'main', 'CR-1', ''],
      ]);

      const outcome = engine.upsert(table, {
        component: 'SVC-A',
        branchName: 'release/2.0',
        changeRequest: '  ',
        externalDependency: 'lib-x',
      });

      expect(outcome).toEqual({
        status: 'updated',
        headers: HEADERS,
        rows: [
          ['0', 'svc-z', 'main', '', ''],
          ['2', 'svc-a', 'release/2.0', 'CR-1', 'lib-x'],
        ],
        row: ['2', 'svc-a', 'release/2.0', 'CR-1', 'lib-x'],
        previousRow: ['2', 'svc-a', 'main', 'CR-1', ''],
      });
      expect(mockLogger.info).toHaveBeenCalledWith(
        '[TableUpsertEngine] Updating component "SVC-A" (Order 2)',
      );
    });

    test('still appends components that are not present', () => {
      const outcome = engine.upsert(createTable([]), { component: 'svc-a' });

      expect(outcome.status).toBe('added');
    });
  });

  describe('nextOrder', () => {
    test('returns 0 for an empty table', () => {
      expect(TableUpsertEngine.nextOrder([])).toBe('0');
    });

    test('returns one more than the highest order', () => {
      expect(
        TableUpsertEngine.nextOrder([
          ['5', 'a'],
          ['2', 'b'],
        ]),
      ).toBe('6');
    });

    test('ignores non-numeric and empty orders when numeric ones exist', () => {
      expect(
        TableUpsertEngine.nextOrder([
          ['3', 'a'],
          ['abc', 'b'],
          ['', 'c'],
        ]),
      ).toBe('4');
    });

    test('falls back to the row count without numeric orders', () => {
      expect(
        TableUpsertEngine.nextOrder([
          ['x', 'a'],
          ['', 'b'],
        ]),
      ).toBe('2');
    });

    test('clamps a negative maximum to 0', () => {
      expect(TableUpsertEngine.nextOrder([['-4', 'a']])).toBe('0');
    });

    test('does not parse decimals as integers', () => {
      expect(TableUpsertEngine.nextOrder([['1.5', 'a']])).toBe('1');
    });

    test('keeps every digit of orders beyond the safe integer range', () => {
      expect(
        TableUpsertEngine.nextOrder([
          ['9007199254740993', 'a'],
          ['9007199254740992', 'b'],
        ]),
      ).toBe('9007199254740994');
      expect(
        TableUpsertEngine.nextOrder([['1000000000000000000000', 'a']]),
      ).toBe('1000000000000000000001');
    });

    test('reads an explicit plus sign', () => {
      expect(TableUpsertEngine.nextOrder([['+7', 'a']])).toBe('8');
    });
  });

  describe('findComponentRow', () => {
    test('returns the first matching index', () => {
      const rows = [
        ['0', 'svc-a'],
        ['1', 'svc-a'],
      ];

      expect(TableUpsertEngine.findComponentRow(rows, 'SVC-A')).toBe(0);
    });

    test('returns -1 when absent', () => {
      expect(TableUpsertEngine.findComponentRow([['0', 'x']], 'y')).toBe(-1);
    });

    test('treats short rows as having an empty component', () => {
      expect(TableUpsertEngine.findComponentRow([['0']], 'svc-a')).toBe(-1);
    });
  });

  describe('validateSchema', () => {
    test('rejects a reordered schema', () => {
      expect(() =>
        TableUpsertEngine.validateSchema([
          'Component',
          'Order',
          'Branch Name',
          'Change Request',
          'External Dependency',
        ]),
      ).toThrow(SchemaMismatchError);
    });

    test('rejects extra columns', () => {
      expect(() =>
        TableUpsertEngine.validateSchema([...HEADERS, 'Notes']),
      ).toThrow(SchemaMismatchError);
    });
  });
});
