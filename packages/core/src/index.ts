// src/index.ts
// Main entry point for @nodepatch/core (no I/O)
// File loading lives in ./node-runtime.ts

// Errors
export * from './errors.js';

// Catalog
export {
  NodeCatalog,
  CONTROL_WIDGET_NAME,
  CONTROL_WIDGET_OPTIONS,
  assertCatalogCovers,
  filterCatalog,
  parseSearchTerms,
} from './catalog.js';
export * from './ports.js';
export { ANY_TYPE, areSlotTypesCompatible, checkWidgetValue, parseSlotTypes } from './sockets.js';
export { TYPE_SHORTHANDS, shortType, shorthandLegend } from './type-registry.js';

// Graph types
export {
  type NodeId,
  type GraphNode,
  type SlotRef,
  type GraphLink,
  type GraphGroup,
  type WorkflowLayout,
  type WorkflowGraph,
  NODE_ID_PATTERN,
  createEmptyGraph,
  cloneGraph,
  compareNodeIds,
  sortedNodeIds,
  sortedLinks,
  classesInGraph,
  nodeTitle,
  getNode,
  hasNode,
  appendGroups,
} from './graph.js';
export {
  type GroupSummary,
  type Subgraph,
  type ModelKind,
  type ModelListing,
  MODEL_KINDS,
  isInsideGroup,
  listGroups,
  nodesInGroup,
  subgraphOf,
  extractSubgraph,
  listModels,
} from './extraction.js';
export {
  validateGraph,
  hasCycles,
  parseWorkflowGraph,
  WorkflowGraphSchema,
  type ValidationResult,
} from './validator.js';

// Formats
export { CODEC_HEADER, encodeGraph, encodeLinkLine, decodeGraph, graphsLogicallyEqual } from './codec.js';
export {
  importWorkflow,
  exportWorkflow,
  type NativeWorkflow,
  type NativeNodeOut,
  type NativeLinkOut,
} from './litegraph.js';

// Operations
export {
  type Operation,
  type OperationKind,
  type OperationList,
  type AddNodeOperation,
  type RemoveNodeOperation,
  type ConnectOperation,
  type DisconnectOperation,
  type SetWidgetOperation,
  OPERATION_LIST_VERSION,
  OperationSchema,
  assertNever,
  ops,
  serializeOperationList,
  parseOperationList,
  describeOperation,
} from './operations.js';
export { checkOperation, applyOperation } from './graph-tools.js';

// Pipeline
export {
  type Brief,
  type GroupToAdd,
  type NodeRef,
  type Endpoint,
  BriefSchema,
  extractBriefJson,
  parseBrief,
} from './brief.js';
export { compile, type CompileResult } from './compiler.js';
export { execute, type ExecuteResult } from './executor.js';

// Version info
export const VERSION = '0.1.0';
