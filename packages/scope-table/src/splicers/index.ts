export { TreeSplicer } from './tree-splicer';
