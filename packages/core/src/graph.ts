// src/graph.ts
// Logical workflow graph: nodes keyed by id, links between numbered slots

import type { WidgetValue } from './ports.js';
import { compareCodeUnits, ownValue, setOwn } from './utils/canonical.js';

// ============ Core Types ============

export type NodeId = string;

export interface GraphNode {
  type: string;
  widgets: Record<string, WidgetValue>;
  /** Non-logic metadata (title, notes, host properties). Preserved, never interpreted. */
  meta: Record<string, unknown>;
  position?: [number, number];
  size?: [number, number];
}

export interface SlotRef {
  node: NodeId;
  slot: number;
}

export interface GraphLink {
  from: SlotRef; // output slot
  to: SlotRef;   // input slot
}

export interface GraphGroup {
  title: string;
  bounding: [number, number, number, number];
  color?: string;
}

export interface WorkflowLayout {
  groups?: GraphGroup[];
  /** Canvas offset and zoom as stored by the host editor. */
  viewport?: Record<string, unknown>;
}

export interface WorkflowGraph {
  nodes: Record<NodeId, GraphNode>;
  links: GraphLink[];
  meta: Record<string, unknown>;
  layout?: WorkflowLayout;
}

export const NODE_ID_PATTERN = /^[A-Za-z0-9_-]+$/;

// ============ Factory ============

export function createEmptyGraph(meta: Record<string, unknown> = {}): WorkflowGraph {
  return { nodes: {}, links: [], meta };
}

export function cloneGraph(graph: WorkflowGraph): WorkflowGraph {
  return structuredClone(graph);
}

// ============ Node Access ============

/** Node stored under `id`. Ids such as `constructor` only match real nodes. */
export function getNode(graph: WorkflowGraph, id: NodeId): GraphNode | undefined {
  return ownValue(graph.nodes, id);
}

export function hasNode(graph: WorkflowGraph, id: NodeId): boolean {
  return Object.hasOwn(graph.nodes, id);
}

export function putNode(graph: WorkflowGraph, id: NodeId, node: GraphNode): void {
  setOwn(graph.nodes, id, node);
}

/** Append layout groups to a working graph in place. */
export function appendGroups(graph: WorkflowGraph, groups: readonly GraphGroup[]): void {
  if (groups.length === 0) return;
  const layout: WorkflowLayout = graph.layout ?? {};
  layout.groups = [...(layout.groups ?? []), ...groups.map((g) => structuredClone(g))];
  graph.layout = layout;
}

// ============ Ordering ============

export function isNumericId(id: string): boolean {
  return /^\d+$/.test(id);
}

/**
 * Canonical node id order: all-digit ids first, by numeric value,
 * then every other id by code unit.
 */
export function compareNodeIds(a: NodeId, b: NodeId): number {
  const an = isNumericId(a);
  const bn = isNumericId(b);
  if (an && bn) {
    const diff = BigInt(a) - BigInt(b);
    if (diff !== 0n) return diff < 0n ? -1 : 1;
    return compareCodeUnits(a, b);
  }
  if (an) return -1;
  if (bn) return 1;
  return compareCodeUnits(a, b);
}

export function compareLinks(a: GraphLink, b: GraphLink): number {
  return (
    compareNodeIds(a.from.node, b.from.node) ||
    a.from.slot - b.from.slot ||
    compareNodeIds(a.to.node, b.to.node) ||
    a.to.slot - b.to.slot
  );
}

export function sortedNodeIds(graph: WorkflowGraph): NodeId[] {
  return Object.keys(graph.nodes).sort(compareNodeIds);
}

export function sortedLinks(graph: WorkflowGraph): GraphLink[] {
  return [...graph.links].sort(compareLinks);
}

/** Largest all-digit node id, or 0n when there is none. */
export function maxNumericId(graph: WorkflowGraph): bigint {
  return largestNumericId(Object.keys(graph.nodes));
}

/** Largest all-digit id among `ids`, compared exactly, or 0n. */
export function largestNumericId(ids: Iterable<string>, start = 0n): bigint {
  let max = start;
  for (const id of ids) {
    if (isNumericId(id)) {
      const value = BigInt(id);
      if (value > max) max = value;
    }
  }
  return max;
}

// ============ Link Helpers ============

export function formatEndpoint(ref: SlotRef): string {
  return `${ref.node}.${ref.slot}`;
}

export function linkKey(link: GraphLink): string {
  return `${formatEndpoint(link.from)}>${formatEndpoint(link.to)}`;
}

export function sameLink(a: GraphLink, b: GraphLink): boolean {
  return (
    a.from.node === b.from.node &&
    a.from.slot === b.from.slot &&
    a.to.node === b.to.node &&
    a.to.slot === b.to.slot
  );
}

export function findLinkIntoInput(graph: WorkflowGraph, to: SlotRef): GraphLink | undefined {
  return graph.links.find((l) => l.to.node === to.node && l.to.slot === to.slot);
}

/** Is `target` reachable from `start` by following links downstream? */
export function isReachable(graph: WorkflowGraph, start: NodeId, target: NodeId): boolean {
  const adj = new Map<NodeId, NodeId[]>();
  for (const link of graph.links) {
    const next = adj.get(link.from.node);
    if (next) next.push(link.to.node);
    else adj.set(link.from.node, [link.to.node]);
  }
  const seen = new Set<NodeId>([start]);
  const stack: NodeId[] = [start];
  for (let current = stack.pop(); current !== undefined; current = stack.pop()) {
    if (current === target) return true;
    for (const next of adj.get(current) ?? []) {
      if (!seen.has(next)) {
        seen.add(next);
        stack.push(next);
      }
    }
  }
  return false;
}

/** Class names used by the graph, sorted. */
export function classesInGraph(graph: WorkflowGraph): string[] {
  const names = new Set(Object.values(graph.nodes).map((n) => n.type));
  return [...names].sort(compareCodeUnits);
}

/** Title stored in node metadata, when it is a string. */
export function nodeTitle(node: GraphNode): string | undefined {
  const title = node.meta.title;
  return typeof title === 'string' ? title : undefined;
}
