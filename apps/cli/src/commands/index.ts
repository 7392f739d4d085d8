export { GetStateCommand } from './get-state-command';
export { LookupCommand } from './lookup-command';
export { UpsertCommand } from './upsert-command';
export { ValidatePrereqsCommand } from './validate-prereqs-command';
export type { CommandContext } from './types';
