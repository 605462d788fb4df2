// src/graph-tools.ts
// Per-operation rule checks and mutation helpers shared by compiler and executor

import type { NodeCatalog } from './catalog.js';
import type { Violation } from './errors.js';
import {
  type GraphLink,
  type GraphNode,
  type NodeId,
  type SlotRef,
  type WorkflowGraph,
  NODE_ID_PATTERN,
  findLinkIntoInput,
  formatEndpoint,
  getNode,
  hasNode,
  isReachable,
  putNode,
  sameLink,
} from './graph.js';
import { type Operation, assertNever } from './operations.js';
import { type NodeDefinition, type WidgetValue, findWidget } from './ports.js';
import { areSlotTypesCompatible, checkWidgetValue, formatSlotTypes } from './sockets.js';
import { setOwn } from './utils/canonical.js';

// ============ Widget Checks ============

/**
 * Every problem with a full widget set: undeclared names, invalid values,
 * declared widgets that are missing.
 */
export function widgetViolations(
  def: NodeDefinition,
  widgets: Readonly<Record<string, WidgetValue>>,
  prefix = 'widgets',
): Violation[] {
  const out: Violation[] = [];
  for (const [name, value] of Object.entries(widgets)) {
    const spec = findWidget(def, name);
    if (!spec) {
      out.push({
        rule: 'unknown_widget',
        field: `${prefix}.${name}`,
        message: `${def.name} has no widget "${name}"`,
      });
      continue;
    }
    const problem = checkWidgetValue(spec, value);
    if (problem) {
      out.push({
        rule: 'invalid_widget_value',
        field: `${prefix}.${name}`,
        message: `Widget "${name}" of ${def.name}: ${problem}`,
      });
    }
  }
  for (const spec of def.widgets) {
    if (!Object.hasOwn(widgets, spec.name)) {
      out.push({
        rule: 'missing_widget_value',
        field: `${prefix}.${spec.name}`,
        message: `Widget "${spec.name}" of ${def.name} has no value`,
      });
    }
  }
  return out;
}

// ============ Link Checks ============

/**
 * Endpoint existence, slot range and type compatibility of one link.
 * Duplicate, occupancy and cycle rules depend on the rest of the graph
 * and are checked by the callers.
 */
export function checkLinkEndpoints(
  graph: WorkflowGraph,
  link: GraphLink,
  catalog: NodeCatalog,
  prefix = '',
): Violation | null {
  const source = resolveEndpoint(graph, link.from, catalog, `${prefix}from`);
  if ('rule' in source) return source;
  const target = resolveEndpoint(graph, link.to, catalog, `${prefix}to`);
  if ('rule' in target) return target;

  const output = source.def.outputs[link.from.slot];
  if (!output) {
    return {
      rule: 'slot_out_of_range',
      field: `${prefix}from.slot`,
      message: `${source.def.name} (node ${link.from.node}) has no output slot ${link.from.slot}; it has ${source.def.outputs.length}`,
    };
  }
  const input = target.def.inputs[link.to.slot];
  if (!input) {
    return {
      rule: 'slot_out_of_range',
      field: `${prefix}to.slot`,
      message: `${target.def.name} (node ${link.to.node}) has no input slot ${link.to.slot}; it has ${target.def.inputs.length}`,
    };
  }
  if (!areSlotTypesCompatible(output, input)) {
    return {
      rule: 'type_mismatch',
      field: `${prefix}to.slot`,
      message: `Output "${output.name}" (${output.type}) of node ${link.from.node} cannot feed input "${input.name}" (${formatSlotTypes(input)}) of node ${link.to.node}`,
    };
  }
  return null;
}

function resolveEndpoint(
  graph: WorkflowGraph,
  ref: SlotRef,
  catalog: NodeCatalog,
  field: string,
): { def: NodeDefinition } | Violation {
  const node = getNode(graph, ref.node);
  if (!node) {
    return { rule: 'unknown_node', field: `${field}.node`, message: `Node ${ref.node} does not exist` };
  }
  const def = catalog.get(node.type);
  if (!def) {
    return { rule: 'unknown_class', field: `${field}.node`, message: `Node ${ref.node} has unknown class "${node.type}"` };
  }
  return { def };
}

// ============ Operation Checks ============

/**
 * Check one operation against the graph it would be applied to.
 * Returns the first violated rule, or null when the operation is legal.
 */
export function checkOperation(
  graph: WorkflowGraph,
  op: Operation,
  catalog: NodeCatalog,
): Violation | null {
  switch (op.kind) {
    case 'add_node': {
      if (!NODE_ID_PATTERN.test(op.id)) {
        return { rule: 'invalid_node_id', field: 'id', message: `Node id "${op.id}" must match ${NODE_ID_PATTERN.source}` };
      }
      if (hasNode(graph, op.id)) {
        return { rule: 'duplicate_node', field: 'id', message: `Node ${op.id} already exists` };
      }
      const def = catalog.get(op.type);
      if (!def) {
        return { rule: 'unknown_class', field: 'type', message: `Unknown node class "${op.type}"` };
      }
      return widgetViolations(def, op.widgets)[0] ?? null;
    }

    case 'remove_node':
      return hasNode(graph, op.id)
        ? null
        : { rule: 'unknown_node', field: 'id', message: `Node ${op.id} does not exist` };

    case 'connect': {
      const link: GraphLink = { from: op.from, to: op.to };
      const problem = checkLinkEndpoints(graph, link, catalog);
      if (problem) return problem;
      if (graph.links.some((l) => sameLink(l, link))) {
        return { rule: 'duplicate_link', field: 'to', message: `Link ${describeLink(link)} already exists` };
      }
      const occupant = findLinkIntoInput(graph, op.to);
      if (occupant) {
        return {
          rule: 'input_occupied',
          field: 'to',
          message: `Input ${formatEndpoint(op.to)} is already fed by ${formatEndpoint(occupant.from)}`,
        };
      }
      if (op.from.node === op.to.node || isReachable(graph, op.to.node, op.from.node)) {
        return { rule: 'cycle', field: 'to', message: `Link ${describeLink(link)} would create a cycle` };
      }
      return null;
    }

    case 'disconnect': {
      const link: GraphLink = { from: op.from, to: op.to };
      const problem = checkLinkEndpoints(graph, link, catalog);
      if (problem && problem.rule !== 'type_mismatch') return problem;
      if (!graph.links.some((l) => sameLink(l, link))) {
        return { rule: 'missing_link', field: 'to', message: `Link ${describeLink(link)} does not exist` };
      }
      return null;
    }

    case 'set_widget': {
      const node = getNode(graph, op.id);
      if (!node) {
        return { rule: 'unknown_node', field: 'id', message: `Node ${op.id} does not exist` };
      }
      const def = catalog.get(node.type);
      if (!def) {
        return { rule: 'unknown_class', field: 'id', message: `Node ${op.id} has unknown class "${node.type}"` };
      }
      const spec = findWidget(def, op.widget);
      if (!spec) {
        return { rule: 'unknown_widget', field: 'widget', message: `${def.name} has no widget "${op.widget}"` };
      }
      const problem = checkWidgetValue(spec, op.value);
      return problem
        ? { rule: 'invalid_widget_value', field: 'value', message: `Widget "${op.widget}" of ${def.name}: ${problem}` }
        : null;
    }

    default:
      return assertNever(op);
  }
}

// ============ Mutation Helpers ============

/**
 * Apply an already-checked operation to a working graph in place.
 * Removing a node removes every link touching it.
 */
export function applyOperation(graph: WorkflowGraph, op: Operation): void {
  switch (op.kind) {
    case 'add_node': {
      const node: GraphNode = {
        type: op.type,
        widgets: { ...op.widgets },
        meta: op.meta ? structuredClone({ ...op.meta }) : {},
      };
      if (op.position) node.position = [op.position[0], op.position[1]];
      putNode(graph, op.id, node);
      return;
    }
    case 'remove_node':
      removeNode(graph, op.id);
      return;
    case 'connect':
      graph.links.push({ from: { ...op.from }, to: { ...op.to } });
      return;
    case 'disconnect': {
      const link: GraphLink = { from: op.from, to: op.to };
      graph.links = graph.links.filter((l) => !sameLink(l, link));
      return;
    }
    case 'set_widget': {
      const node = getNode(graph, op.id);
      if (node) setOwn(node.widgets, op.widget, op.value);
      return;
    }
    default:
      assertNever(op);
  }
}

function removeNode(graph: WorkflowGraph, id: NodeId): void {
  delete graph.nodes[id];
  graph.links = graph.links.filter((l) => l.from.node !== id && l.to.node !== id);
}

export function describeLink(link: GraphLink): string {
  return `${formatEndpoint(link.from)} -> ${formatEndpoint(link.to)}`;
}
