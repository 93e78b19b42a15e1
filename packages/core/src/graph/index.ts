/**
 * Type graph access
 */
export { TypeGraph } from './TypeGraph.js';
export { loadTypeGraph, loadTypeGraphs, parseTypeGraph } from './TypeGraphLoader.js';
export {
  idKey,
  itemKind,
  functionSignature,
  genericParamCount,
  pathRefName,
  hasAttribute,
  typeVariant,
} from './items.js';
export type { ItemKind } from './items.js';
