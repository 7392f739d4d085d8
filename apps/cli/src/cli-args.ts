import { type ParseArgsConfig, parseArgs } from 'node:util';
import { z } from 'zod';

import {
  COMMANDS,
  DEFAULT_BLOCKED_STATUSES,
  DEFAULT_ISSUE_TYPE,
  REQUIRED_ARGUMENTS_MESSAGES,
} from './config/constants';
import { CommandError } from './errors';

const OPTIONS = {
  command: { type: 'string' },
  component: { type: 'string' },
  issuetype: { type: 'string' },
  'jira-key': { type: 'string' },
  'branch-name': { type: 'string' },
  'change-request': { type: 'string' },
  'external-dependency': { type: 'string' },
  'upsert-permission-field-id': { type: 'string' },
  'blocked-statuses': { type: 'string', multiple: true },
  'conflict-policy': { type: 'string' },
  project: { type: 'string' },
  state: { type: 'string' },
  'release-branch': { type: 'string' },
} as const satisfies ParseArgsConfig['options'];

const requiredText = z.string().min(1);

const CommonArgsShape = {
  issueType: z.string().min(1),
  permissionFieldId: z.string().optional(),
  blockedStatuses: z.array(z.string()),
};

const UpsertArgsSchema = z.object({
  command: z.literal('upsert'),
  ...CommonArgsShape,
  jiraKey: requiredText,
  component: requiredText,
  branchName: requiredText,
  changeRequest: z.string().optional(),
  externalDependency: z.string().optional(),
  conflictPolicy: z
    .enum(['reject', 'merge'], {
      errorMap: () => ({
        message: "--conflict-policy must be 'reject' or 'merge'",
      }),
    })
    .default('reject'),
});

const LookupArgsSchema = z.object({
  command: z.literal('lookup'),
  ...CommonArgsShape,
  project: requiredText,
  state: requiredText,
  releaseBranch: requiredText,
  component: requiredText,
});

const GetStateArgsSchema = z.object({
  command: z.literal('get-state'),
  ...CommonArgsShape,
  jiraKey: requiredText,
});

const ValidateArgsSchema = z.object({
  command: z.literal('validate-upsert-prereqs'),
  ...CommonArgsShape,
  jiraKey: requiredText,
});

export const CliArgsSchema = z.discriminatedUnion('command', [
  UpsertArgsSchema,
  LookupArgsSchema,
  GetStateArgsSchema,
  ValidateArgsSchema,
]);

export type CliArgs = z.infer<typeof CliArgsSchema>;
export type UpsertArgs = z.infer<typeof UpsertArgsSchema>;
export type LookupArgs = z.infer<typeof LookupArgsSchema>;
export type GetStateArgs = z.infer<typeof GetStateArgsSchema>;
export type ValidateArgs = z.infer<typeof ValidateArgsSchema>;

const CommandSchema = z.enum(COMMANDS);

const clean = (value: string | undefined): string | undefined =>
  value?.trim() ? value.trim() : undefined;

/**
 * Split repeated and comma separated status lists into one list
 */
export function parseBlockedStatuses(
  values: string[] | undefined,
): string[] {
  if (values === undefined) {
    return [...DEFAULT_BLOCKED_STATUSES];
  }
  return values
    .flatMap((value) => value.split(','))
    .map((status) => status.trim())
    .filter((status) => status.length > 0);
}

function readOptionValues(argv: string[]) {
  try {
    return parseArgs({ args: argv, options: OPTIONS, strict: true }).values;
  } catch (error) {
    throw new CommandError(CommandError.getErrorMessage(error), {
      cause: error,
    });
  }
}

/**
 * Parse and validate command-line arguments
 *
 * @throws {CommandError} On unknown options, an unknown command or missing
 * arguments for the chosen command
 */
export function parseCliArgs(argv: string[]): CliArgs {
  const values = readOptionValues(argv);

  const command = CommandSchema.safeParse(values.command);
  if (!command.success) {
    throw new CommandError(
      `--command must be one of: ${COMMANDS.join(', ')}`,
    );
  }

  const result = CliArgsSchema.safeParse({
    command: command.data,
    issueType: clean(values.issuetype) ?? DEFAULT_ISSUE_TYPE,
    permissionFieldId: clean(values['upsert-permission-field-id']),
    blockedStatuses: parseBlockedStatuses(values['blocked-statuses']),
    jiraKey: clean(values['jira-key']),
    component: clean(values.component),
    branchName: clean(values['branch-name']),
    changeRequest: clean(values['change-request']),
    externalDependency: clean(values['external-dependency']),
    conflictPolicy: clean(values['conflict-policy']),
    project: clean(values.project),
    state: clean(values.state),
    releaseBranch: clean(values['release-branch']),
  });

  if (!result.success) {
    const missingRequired = result.error.issues.some(
      (issue) => issue.code === 'invalid_type' && issue.received === 'undefined',
    );
    throw new CommandError(
      missingRequired
        ? REQUIRED_ARGUMENTS_MESSAGES[command.data]
        : result.error.issues.map((issue) => issue.message).join('; '),
      { cause: result.error },
    );
  }

  return result.data;
}
