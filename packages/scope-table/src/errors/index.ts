export {
  DuplicateComponentError,
  EmptyComponentKeyError,
  SchemaMismatchError,
  ScopeTableError,
} from './scope-table-error';
