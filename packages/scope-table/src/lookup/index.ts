export { ComponentLookup } from './component-lookup';
