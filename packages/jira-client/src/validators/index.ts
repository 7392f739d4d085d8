export { UpsertPrerequisiteValidator } from './upsert-prerequisite-validator';
export type {
  UpsertPrerequisiteDetails,
  UpsertPrerequisiteOptions,
  UpsertPrerequisiteResult,
} from './upsert-prerequisite-validator';
