// src/validator.ts
// Validates Workflow Graph structure and semantic correctness against a catalog

import { z } from 'zod';
import type { NodeCatalog } from './catalog.js';
import { FormatError, type ValidationError } from './errors.js';
import { type WorkflowGraph, NODE_ID_PATTERN, formatEndpoint, getNode, linkKey, sortedNodeIds } from './graph.js';
import { checkLinkEndpoints, widgetViolations } from './graph-tools.js';

export interface ValidationResult {
  valid: boolean;
  errors: ValidationError[];
}

// ============ Structural Schema ============

const WidgetValueSchema = z.union([z.string(), z.number(), z.boolean()]);
const SlotRefSchema = z.object({ node: z.string(), slot: z.number().int().nonnegative() });

export const WorkflowGraphSchema = z.object({
  nodes: z.record(
    z.object({
      type: z.string().min(1),
      widgets: z.record(WidgetValueSchema).default({}),
      meta: z.record(z.unknown()).default({}),
      position: z.tuple([z.number(), z.number()]).optional(),
      size: z.tuple([z.number(), z.number()]).optional(),
    }),
  ),
  links: z.array(z.object({ from: SlotRefSchema, to: SlotRefSchema })).default([]),
  meta: z.record(z.unknown()).default({}),
  layout: z
    .object({
      groups: z
        .array(
          z.object({
            title: z.string(),
            bounding: z.tuple([z.number(), z.number(), z.number(), z.number()]),
            color: z.string().optional(),
          }),
        )
        .optional(),
      viewport: z.record(z.unknown()).optional(),
    })
    .optional(),
});

/**
 * Check that untrusted JSON has the Workflow Graph shape.
 * Semantic rules are left to validateGraph.
 */
export function parseWorkflowGraph(data: unknown): WorkflowGraph {
  const parsed = WorkflowGraphSchema.safeParse(data);
  if (!parsed.success) {
    const errors: ValidationError[] = parsed.error.issues.map((issue): ValidationError => ({
      path: issue.path.join('.'),
      rule: 'malformed_input',
      message: issue.message,
    }));
    throw FormatError.fromValidation(errors);
  }
  return parsed.data;
}

// ============ Semantic Validation ============

/**
 * Validate a Workflow Graph against the catalog: node ids, classes, widget
 * sets, link endpoints, slot types, link uniqueness, one link per input and
 * acyclicity. All errors are reported, nodes first in canonical order.
 */
export function validateGraph(graph: WorkflowGraph, catalog: NodeCatalog): ValidationResult {
  const errors: ValidationError[] = [];

  for (const id of sortedNodeIds(graph)) {
    const node = getNode(graph, id);
    if (!node) continue;
    const path = `nodes.${id}`;
    if (!NODE_ID_PATTERN.test(id)) {
      errors.push({ path, rule: 'invalid_node_id', message: `Node id "${id}" must match ${NODE_ID_PATTERN.source}` });
    }
    const def = catalog.get(node.type);
    if (!def) {
      errors.push({ path: `${path}.type`, rule: 'unknown_class', message: `Unknown node class "${node.type}"` });
      continue;
    }
    for (const v of widgetViolations(def, node.widgets, `${path}.widgets`)) {
      errors.push({ path: v.field, rule: v.rule, message: v.message });
    }
  }

  const seen = new Set<string>();
  const occupied = new Map<string, string>();
  graph.links.forEach((link, i) => {
    const path = `links[${i}]`;
    const problem = checkLinkEndpoints(graph, link, catalog, `${path}.`);
    if (problem) {
      errors.push({ path: problem.field, rule: problem.rule, message: problem.message });
      return;
    }
    const key = linkKey(link);
    if (seen.has(key)) {
      errors.push({ path, rule: 'duplicate_link', message: `Duplicate link ${key}` });
      return;
    }
    seen.add(key);
    const input = formatEndpoint(link.to);
    const feeder = occupied.get(input);
    if (feeder !== undefined) {
      errors.push({
        path,
        rule: 'input_occupied',
        message: `Input ${input} is fed by both ${feeder} and ${formatEndpoint(link.from)}`,
      });
      return;
    }
    occupied.set(input, formatEndpoint(link.from));
  });

  if (hasCycles(graph)) {
    errors.push({ path: 'links', rule: 'cycle', message: 'Links form a cycle' });
  }

  return { valid: errors.length === 0, errors };
}

/**
 * Check for cycles in the graph using DFS.
 */
export function hasCycles(graph: WorkflowGraph): boolean {
  const adj = new Map<string, string[]>();

  for (const id of Object.keys(graph.nodes)) {
    adj.set(id, []);
  }
  for (const link of graph.links) {
    adj.get(link.from.node)?.push(link.to.node);
  }

  const visited = new Set<string>();
  const inStack = new Set<string>();

  function dfs(node: string): boolean {
    visited.add(node);
    inStack.add(node);

    for (const neighbor of adj.get(node) ?? []) {
      if (inStack.has(neighbor)) return true;
      if (!visited.has(neighbor) && dfs(neighbor)) return true;
    }

    inStack.delete(node);
    return false;
  }

  for (const node of adj.keys()) {
    if (!visited.has(node) && dfs(node)) return true;
  }

  return false;
}
