export { ActionsReporter } from './actions-reporter';
export type { ActionsReporterOptions } from './actions-reporter';
