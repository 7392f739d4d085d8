export { TableUpsertEngine } from './table-upsert-engine';
export type { TableUpsertEngineOptions } from './table-upsert-engine';
