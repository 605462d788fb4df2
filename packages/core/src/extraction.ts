// src/extraction.ts
// Read-only views over a workflow: group membership, focused subgraphs,
// model files offered by loader widgets

import type { NodeCatalog } from './catalog.js';
import {
  type GraphGroup,
  type GraphLink,
  type NodeId,
  type WorkflowGraph,
  getNode,
  putNode,
  sortedLinks,
  sortedNodeIds,
} from './graph.js';
import { compareCodeUnits, setOwn } from './utils/canonical.js';

// ============ Groups ============

export interface GroupSummary {
  title: string;
  bounding: [number, number, number, number];
  color?: string;
  /** Member node ids in canonical order. */
  nodes: NodeId[];
}

/**
 * A node belongs to a group when its position lies inside the group's
 * bounding box, edges included. Nodes without a position belong to none.
 */
export function isInsideGroup(position: readonly [number, number] | undefined, group: GraphGroup): boolean {
  if (!position) return false;
  const [x, y, w, h] = group.bounding;
  const [nx, ny] = position;
  return nx >= x && nx <= x + w && ny >= y && ny <= y + h;
}

/** Every group of the layout, in layout order, with its member nodes. */
export function listGroups(graph: WorkflowGraph): GroupSummary[] {
  const ids = sortedNodeIds(graph);
  return (graph.layout?.groups ?? []).map((group) => {
    const summary: GroupSummary = {
      title: group.title,
      bounding: group.bounding,
      nodes: ids.filter((id) => isInsideGroup(getNode(graph, id)?.position, group)),
    };
    if (group.color !== undefined) summary.color = group.color;
    return summary;
  });
}

/**
 * Member nodes of the first group whose title matches, case-insensitively.
 * Undefined when the layout has no such group.
 */
export function nodesInGroup(graph: WorkflowGraph, title: string): NodeId[] | undefined {
  const wanted = title.toLowerCase();
  return listGroups(graph).find((g) => g.title.toLowerCase() === wanted)?.nodes;
}

// ============ Subgraphs ============

export interface Subgraph {
  /** Selected nodes and the links between them. */
  graph: WorkflowGraph;
  /** Links with exactly one end in the selection, in canonical order. */
  boundary: GraphLink[];
}

/** The selected nodes of `graph`; ids it does not hold are skipped. */
export function subgraphOf(graph: WorkflowGraph, ids: Iterable<NodeId>): Subgraph {
  const selected = new Set<NodeId>();
  const sub: WorkflowGraph = { nodes: {}, links: [], meta: structuredClone(graph.meta) };
  for (const id of ids) {
    const node = getNode(graph, id);
    if (!node || selected.has(id)) continue;
    selected.add(id);
    putNode(sub, id, structuredClone(node));
  }

  const boundary: GraphLink[] = [];
  for (const link of sortedLinks(graph)) {
    const from = selected.has(link.from.node);
    const to = selected.has(link.to.node);
    if (from && to) sub.links.push(structuredClone(link));
    else if (from || to) boundary.push(structuredClone(link));
  }
  return { graph: sub, boundary };
}

/**
 * Nodes named by the terms: an exact node id, or a class name compared
 * case-insensitively.
 */
export function extractSubgraph(graph: WorkflowGraph, terms: readonly string[]): Subgraph {
  const ids = new Set(terms.filter((t) => t !== ''));
  const classes = new Set([...ids].map((t) => t.toLowerCase()));
  const matches = sortedNodeIds(graph).filter((id) => {
    const node = getNode(graph, id);
    return ids.has(id) || (node !== undefined && classes.has(node.type.toLowerCase()));
  });
  return subgraphOf(graph, matches);
}

// ============ Models ============

export type ModelKind = 'checkpoints' | 'loras' | 'vaes' | 'unets' | 'clips';

/** Model file names by kind, then by folder ("Other" for top-level files). */
export type ModelListing = Record<ModelKind, Record<string, string[]>>;

export const MODEL_KINDS: readonly ModelKind[] = ['checkpoints', 'loras', 'vaes', 'unets', 'clips'];

const OTHER_CATEGORY = 'Other';

function modelKindOf(widget: string): ModelKind | undefined {
  switch (widget) {
    case 'ckpt_name':
      return 'checkpoints';
    case 'lora_name':
      return 'loras';
    case 'vae_name':
      return 'vaes';
    case 'unet_name':
      return 'unets';
    default:
      return widget.includes('clip_name') ? 'clips' : undefined;
  }
}

function modelCategory(file: string): string {
  const cut = file.search(/[\\/]/);
  return cut > 0 ? file.slice(0, cut) : OTHER_CATEGORY;
}

function compareCaseless(a: string, b: string): number {
  return compareCodeUnits(a.toLowerCase(), b.toLowerCase()) || compareCodeUnits(a, b);
}

/**
 * Model files offered by loader widgets (`ckpt_name`, `lora_name`,
 * `vae_name`, `unet_name`, `*clip_name*`) across the catalog.
 * Folders and files are sorted case-insensitively; duplicates collapse.
 */
export function listModels(catalog: NodeCatalog): ModelListing {
  const found = new Map<ModelKind, Map<string, Set<string>>>();
  for (const name of catalog.names()) {
    for (const widget of catalog.require(name).widgets) {
      const kind = modelKindOf(widget.name);
      if (!kind || widget.type !== 'COMBO') continue;
      for (const option of widget.options ?? []) {
        const file = String(option).trim();
        if (file === '' || file === 'None') continue;
        const byCategory = found.get(kind) ?? new Map<string, Set<string>>();
        found.set(kind, byCategory);
        const category = modelCategory(file);
        const files = byCategory.get(category) ?? new Set<string>();
        byCategory.set(category, files);
        files.add(file);
      }
    }
  }

  const listing: ModelListing = { checkpoints: {}, loras: {}, vaes: {}, unets: {}, clips: {} };
  for (const kind of MODEL_KINDS) {
    const byCategory = found.get(kind);
    if (!byCategory) continue;
    for (const category of [...byCategory.keys()].sort(compareCaseless)) {
      setOwn(listing[kind], category, [...(byCategory.get(category) ?? [])].sort(compareCaseless));
    }
  }
  return listing;
}
