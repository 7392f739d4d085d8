export { TableBuilder } from './table-builder';
