export { GraphBuilder } from './builder.js';
export type {
  HierarchyGraph,
  GraphNode,
  GraphEdge,
  GraphFormat,
  GraphOptions,
} from './types.js';
