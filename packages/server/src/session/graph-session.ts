// In-memory session workflow with update listeners (WebSocket push)
import { type WorkflowGraph, createEmptyGraph } from '@nodepatch/core';

export type GraphUpdateListener = (graph: WorkflowGraph) => void;

/**
 * GraphSession holds the one workflow this server edits.
 * A commit replaces it whole; listeners see every committed graph.
 */
export class GraphSession {
  private current: WorkflowGraph;
  private readonly listeners = new Set<GraphUpdateListener>();

  constructor(initial: WorkflowGraph = createEmptyGraph()) {
    this.current = initial;
  }

  get graph(): WorkflowGraph {
    return this.current;
  }

  get listenerCount(): number {
    return this.listeners.size;
  }

  commit(graph: WorkflowGraph): void {
    this.current = graph;
    for (const listener of this.listeners) {
      listener(graph);
    }
  }

  onUpdate(listener: GraphUpdateListener): () => void {
    this.listeners.add(listener);
    return () => {
      this.listeners.delete(listener);
    };
  }

  clearListeners(): void {
    this.listeners.clear();
  }
}
