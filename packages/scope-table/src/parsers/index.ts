export { childrenOf, classifyNode, isJsonObject } from './adf-node-classifier';
