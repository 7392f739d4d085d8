import { describe, expect, test } from 'vitest';

import { JiraIssueSchema } from '../schemas';
import { getFieldDisplayValue, getIssueOverview } from './issue-fields';

describe('getIssueOverview', () => {
  test('flattens the reported fields', () => {
    const issue = JiraIssueSchema.parse({
      key: 'REL-7',
      fields: {
        summary: '  Release 3.1  ',
        issuetype: { name: 'REL-SCOPE' },
        status: { name: 'In Progress' },
        description: { type: 'doc', version: 1, content: [] },
      },
    });

    expect(getIssueOverview(issue)).toEqual({
      key: 'REL-7',
      issueType: 'REL-SCOPE',
      summary: 'Release 3.1',
      status: 'In Progress',
      description: { type: 'doc', version: 1, content: [] },
    });
  });

  test('uses empty strings for absent fields', () => {
    const issue = JiraIssueSchema.parse({
      key: 'REL-8',
      fields: { summary: null, issuetype: null },
    });

    expect(getIssueOverview(issue)).toEqual({
      key: 'REL-8',
      issueType: '',
      summary: '',
      status: '',
      description: undefined,
    });
  });
});

describe('getFieldDisplayValue', () => {
  test.each<[string, unknown, string | null]>([
    ['a select option', { value: 'Allowed', id: '1' }, 'Allowed'],
    ['an object without value', { id: '1' }, ''],
    ['a string', 'allowed', 'allowed'],
    ['a number', 3, '3'],
    ['a boolean', true, 'true'],
    ['an array', ['a', 'b'], '["a","b"]'],
    ['null', null, null],
  ])('reads %s', (_label, value, expected) => {
    const issue = JiraIssueSchema.parse({
      key: 'REL-1',
      fields: { customfield_1: value },
    });

    expect(getFieldDisplayValue(issue, 'customfield_1')).toBe(expected);
  });

  test('returns null for a field that is not present', () => {
    const issue = JiraIssueSchema.parse({ key: 'REL-1', fields: {} });

    expect(getFieldDisplayValue(issue, 'customfield_1')).toBeNull();
  });
});
