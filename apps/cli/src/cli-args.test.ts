import { describe, expect, test } from 'vitest';

import { parseBlockedStatuses, parseCliArgs } from './cli-args';
import { CommandError } from './errors';

describe('parseCliArgs', () => {
  test('parses an upsert with defaults', () => {
    expect(
      parseCliArgs([
        '--command',
        'upsert',
        '--jira-key',
        'REL-1',
        '--component',
        ' svc-a ',
        '--branch-name=release/2.0',
      ]),
    ).toEqual({
      command: 'upsert',
      issueType: 'REL-SCOPE',
      permissionFieldId: undefined,
      blockedStatuses: ['APPROVED', 'CLOSED'],
      jiraKey: 'REL-1',
      component: 'svc-a',
      branchName: 'release/2.0',
      changeRequest: undefined,
      externalDependency: undefined,
      conflictPolicy: 'reject',
    });
  });

  test('parses a lookup', () => {
    const args = parseCliArgs([
      '--command=lookup',
      '--project=REL',
      '--state=Open',
      '--release-branch=release/2.0',
      '--component=svc-a',
      '--issuetype=Scope',
    ]);

    expect(args).toMatchObject({
      command: 'lookup',
      issueType: 'Scope',
      project: 'REL',
      state: 'Open',
      releaseBranch: 'release/2.0',
      component: 'svc-a',
    });
  });

  test('accepts repeated and comma separated blocked statuses', () => {
    const args = parseCliArgs([
      '--command=get-state',
      '--jira-key=REL-1',
      '--blocked-statuses=APPROVED, DONE',
      '--blocked-statuses',
      'CLOSED',
    ]);

    expect(args.blockedStatuses).toEqual(['APPROVED', 'DONE', 'CLOSED']);
  });

  test.each([
    [
      'upsert',
      ['--jira-key=REL-1', '--component=svc-a'],
      'Upsert command requires --jira-key, --branch-name, and --component arguments',
    ],
    [
      'lookup',
      ['--project=REL', '--state=Open', '--component=svc-a'],
      'Lookup command requires --project, --state, --release-branch, and --component arguments',
    ],
    ['get-state', [], 'Get-state command requires --jira-key argument'],
    [
      'validate-upsert-prereqs',
      ['--jira-key=  '],
      'Validate-upsert-prereqs command requires --jira-key argument',
    ],
  ])('reports missing arguments for %s', (command, rest, message) => {
    expect(() => parseCliArgs([`--command=${command}`, ...rest])).toThrow(
      new CommandError(message),
    );
  });

  test('rejects an unknown command', () => {
    expect(() => parseCliArgs(['--command=delete'])).toThrow(
      '--command must be one of: upsert, lookup, get-state, validate-upsert-prereqs',
    );
  });

  test('rejects a missing command', () => {
    expect(() => parseCliArgs([])).toThrow(CommandError);
  });

  test('rejects an unknown conflict policy', () => {
    expect(() =>
      parseCliArgs([
        '--command=upsert',
        '--jira-key=REL-1',
        '--component=svc-a',
        '--branch-name=main',
        '--conflict-policy=overwrite',
      ]),
    ).toThrow("--conflict-policy must be 'reject' or 'merge'");
  });

  test('rejects unknown options', () => {
    expect(() =>
      parseCliArgs(['--command=get-state', '--jira-key=REL-1', '--verbose']),
    ).toThrow(CommandError);
  });
});

describe('parseBlockedStatuses', () => {
  test('defaults when the option is absent', () => {
    expect(parseBlockedStatuses(undefined)).toEqual(['APPROVED', 'CLOSED']);
  });

  test('allows an explicitly empty list', () => {
    expect(parseBlockedStatuses([''])).toEqual([]);
  });
});
