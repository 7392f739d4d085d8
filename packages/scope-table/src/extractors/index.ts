export { TableExtractor } from './table-extractor';
export { TextExtractor } from './text-extractor';
