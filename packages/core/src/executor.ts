// src/executor.ts
// Applies an Operation List to a graph, all or nothing

import { type NodeCatalog, assertCatalogCovers } from './catalog.js';
import { CatalogError, ExecutionError } from './errors.js';
import { type WorkflowGraph, cloneGraph } from './graph.js';
import { applyOperation, checkOperation } from './graph-tools.js';
import type { OperationList } from './operations.js';

export type ExecuteResult =
  | { ok: true; graph: WorkflowGraph }
  | { ok: false; error: ExecutionError | CatalogError };

/**
 * Re-check and apply each operation in order on a private copy of the graph.
 * The copy is returned only when every operation succeeds; the input graph
 * is never modified.
 */
export function execute(
  operations: OperationList,
  graph: WorkflowGraph,
  catalog: NodeCatalog,
): ExecuteResult {
  try {
    assertCatalogCovers(catalog, graph);
  } catch (e) {
    if (e instanceof CatalogError) return { ok: false, error: e };
    throw e;
  }

  const working = cloneGraph(graph);
  for (const [index, op] of operations.entries()) {
    const violation = checkOperation(working, op, catalog);
    if (violation) {
      return { ok: false, error: new ExecutionError(index, op.kind, violation) };
    }
    applyOperation(working, op);
  }
  return { ok: true, graph: working };
}
