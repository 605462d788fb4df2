// src/context.ts
// Deterministic context text for the reasoning agent

import {
  type NodeCatalog,
  type NodeDefinition,
  type NodeId,
  type WorkflowGraph,
  MODEL_KINDS,
  classesInGraph,
  encodeGraph,
  encodeLinkLine,
  extractSubgraph,
  filterCatalog,
  listGroups,
  listModels,
  nodesInGroup,
  shortType,
  shorthandLegend,
  subgraphOf,
} from '@nodepatch/core';

export const WORKFLOW_HEADING = '=== CURRENT WORKFLOW (compact) ===';
export const GROUPS_HEADING = '=== GROUPS ===';
export const DEFINITIONS_HEADING = '=== NODE DEFINITIONS ===';
export const MODELS_HEADING = '=== MODELS ===';
export const BRIEF_HEADING = '=== CHANGE BRIEF ===';

export interface AgentContextInput {
  graph: WorkflowGraph;
  catalog: NodeCatalog;
  /** Extra class name search terms; classes already in the graph are always listed. */
  terms?: readonly string[];
  /**
   * Node ids or class names. When set (or `groups` is), the workflow section
   * holds only the selected nodes, followed by the links that leave them.
   */
  focus?: readonly string[];
  /** Group titles whose member nodes join the selection. */
  groups?: readonly string[];
  /** List the model files offered by loader widgets. */
  models?: boolean;
  brief?: string;
}

export interface AgentContextStats {
  classCount: number;
  workflowLines: number;
  characters: number;
}

export interface AgentContext {
  text: string;
  stats: AgentContextStats;
}

/**
 * Render the workflow, the relevant class signatures and an optional brief.
 * Equal inputs always produce identical text.
 */
export function buildAgentContext(input: AgentContextInput): AgentContext {
  const { graph, catalog } = input;
  const [shown, workflow] = renderWorkflow(input);

  const names = new Set(classesInGraph(shown));
  if (input.terms && input.terms.length > 0) {
    for (const name of filterCatalog(catalog, input.terms).names()) names.add(name);
  }
  const signatures = [...names]
    .sort()
    .map((name) => catalog.get(name))
    .filter((def): def is NodeDefinition => def !== undefined)
    .map(formatSignature);

  const sections = [`${WORKFLOW_HEADING}\n${workflow}`];
  const groups = listGroups(graph);
  if (groups.length > 0) {
    const lines = groups.map(
      (g) => `"${g.title}" [${g.bounding.join(', ')}]: ${g.nodes.length > 0 ? g.nodes.join(', ') : '(empty)'}`,
    );
    sections.push([GROUPS_HEADING, ...lines].join('\n'));
  }
  sections.push([DEFINITIONS_HEADING, `types: ${shorthandLegend().join(' ')}`, ...signatures].join('\n'));
  if (input.models) {
    const listing = listModels(catalog);
    const lines = MODEL_KINDS.flatMap((kind) => {
      const files = Object.values(listing[kind]).flat();
      return files.length > 0 ? [`${kind}: ${files.join(', ')}`] : [];
    });
    sections.push([MODELS_HEADING, ...(lines.length > 0 ? lines : ['(none)'])].join('\n'));
  }
  const brief = input.brief?.trim();
  if (brief) sections.push(`${BRIEF_HEADING}\n${brief}`);

  const text = sections.join('\n\n');
  return {
    text,
    stats: {
      classCount: signatures.length,
      workflowLines: workflow.split('\n').length,
      characters: text.length,
    },
  };
}

/** The graph (or selected part of it) being shown, and its text. */
function renderWorkflow(input: AgentContextInput): [WorkflowGraph, string] {
  const { graph, catalog } = input;
  const focus = input.focus ?? [];
  const groups = input.groups ?? [];
  if (focus.length === 0 && groups.length === 0) {
    return [graph, encodeGraph(graph, catalog)];
  }
  const ids = new Set<NodeId>(Object.keys(extractSubgraph(graph, focus).graph.nodes));
  for (const title of groups) {
    for (const id of nodesInGroup(graph, title) ?? []) ids.add(id);
  }
  const selection = subgraphOf(graph, ids);
  const text = [encodeGraph(selection.graph, catalog), ...selection.boundary.map(encodeLinkLine)].join('\n');
  return [selection.graph, text];
}

/**
 * One line per class: `@Name +required:T ?optional:T %widget:TYPE -OUT`.
 */
export function formatSignature(def: NodeDefinition): string {
  const parts = [`@${def.name}`];
  for (const input of def.inputs) {
    parts.push(`${input.required ? '+' : '?'}${input.name}:${input.types.map(shortType).join(',')}`);
  }
  for (const widget of def.widgets) {
    parts.push(`%${widget.name}:${widget.type}`);
  }
  for (const output of def.outputs) {
    parts.push(`-${shortType(output.type)}`);
  }
  return parts.join(' ');
}
