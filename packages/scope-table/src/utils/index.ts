export { MarkdownConverter } from './markdown-converter';
