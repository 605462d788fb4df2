// src/compiler.ts
// Change Brief -> Operation List, checked step by step against a virtual graph

import {
  type Brief,
  type BriefWidgets,
  type Endpoint,
  type ExplicitOperation,
  type GroupToAdd,
  type NodeRef,
  type SlotName,
  parseBrief,
} from './brief.js';
import { type NodeCatalog, assertCatalogCovers } from './catalog.js';
import { CatalogError, CompileError } from './errors.js';
import {
  type GraphGroup,
  type NodeId,
  type SlotRef,
  type WorkflowGraph,
  cloneGraph,
  findLinkIntoInput,
  formatEndpoint,
  getNode,
  hasNode,
  largestNumericId,
  maxNumericId,
  nodeTitle,
  sortedNodeIds,
} from './graph.js';
import { applyOperation, checkOperation } from './graph-tools.js';
import { type Operation, assertNever, describeOperation, ops } from './operations.js';
import type { NodeDefinition, WidgetValue } from './ports.js';
import { setOwn } from './utils/canonical.js';

export type CompileResult =
  | { ok: true; operations: Operation[]; summary: string; groups: GraphGroup[] }
  | { ok: false; error: CompileError | CatalogError };

type LinkKind = 'connect' | 'disconnect';

const PLACEHOLDER = /^NODE_\d+$/;
const EXISTING_PREFIX = 'EXISTING_';

/**
 * Compile a brief against a graph. The graph is not touched; every emitted
 * operation is checked against, then applied to, a private working copy.
 * `groups` are layout additions carried beside the operations.
 */
export function compile(brief: string, graph: WorkflowGraph, catalog: NodeCatalog): CompileResult {
  try {
    assertCatalogCovers(catalog, graph);
    const parsed = parseBrief(brief);
    const operations = new BriefCompiler(graph, catalog).run(parsed);
    const groups = (parsed.groups_to_add ?? []).map(toGraphGroup);
    const lines = operations.map(describeOperation);
    const plan = parsed.plan_summary?.trim();
    if (plan) lines.unshift(plan);
    for (const group of groups) lines.push(`Add group "${group.title}"`);
    return { ok: true, operations, summary: lines.join('\n'), groups };
  } catch (e) {
    if (e instanceof CompileError || e instanceof CatalogError) {
      return { ok: false, error: e };
    }
    throw e;
  }
}

function toGraphGroup(group: GroupToAdd): GraphGroup {
  const out: GraphGroup = { title: group.title, bounding: group.bounding };
  if (group.color !== undefined) out.color = group.color;
  return out;
}

// ============ Virtual Graph ============

/** Working snapshot that records each operation as it is checked and applied. */
class VirtualGraph {
  readonly graph: WorkflowGraph;
  readonly operations: Operation[] = [];

  constructor(
    source: WorkflowGraph,
    private readonly catalog: NodeCatalog,
  ) {
    this.graph = cloneGraph(source);
  }

  get nextIndex(): number {
    return this.operations.length;
  }

  emit(op: Operation, field: string): void {
    const violation = checkOperation(this.graph, op, this.catalog);
    if (violation) {
      throw new CompileError(violation.rule, violation.message, {
        field,
        index: this.nextIndex,
        operation: op.kind,
      });
    }
    applyOperation(this.graph, op);
    this.operations.push(op);
  }

  classOf(id: NodeId): NodeDefinition | undefined {
    const node = getNode(this.graph, id);
    return node ? this.catalog.get(node.type) : undefined;
  }

  matching(predicate: (id: NodeId) => boolean): NodeId[] {
    return sortedNodeIds(this.graph).filter(predicate);
  }
}

// ============ Compiler ============

class BriefCompiler {
  private readonly state: VirtualGraph;
  /** Ids declared by nodes_to_add and explicit add_node, keyed by the id the brief used. */
  private readonly declared = new Map<string, NodeId>();

  constructor(
    graph: WorkflowGraph,
    private readonly catalog: NodeCatalog,
  ) {
    this.state = new VirtualGraph(graph, catalog);
  }

  run(brief: Brief): Operation[] {
    this.allocateIds(brief);

    brief.links_to_remove?.forEach((link, i) => {
      const field = `links_to_remove[${i}]`;
      this.emitDisconnect(link.from, link.to, field);
    });

    brief.nodes_to_delete?.forEach((ref, i) => {
      const field = `nodes_to_delete[${i}]`;
      this.state.emit(ops.removeNode(this.resolveNode(ref, field, 'remove_node')), field);
    });

    brief.nodes_to_add?.forEach((node, i) => {
      const field = `nodes_to_add[${i}]`;
      const id = this.declaredId(node.id);
      const widgets = this.widgetsForNewNode(node.type, node.widgets, field, 'add_node');
      const meta: Record<string, unknown> = {};
      if (node.title !== undefined) meta.title = node.title;
      if (node.color !== undefined) meta.color = node.color;
      const op = ops.addNode(id, node.type, widgets, Object.keys(meta).length > 0 ? meta : undefined, node.position);
      this.state.emit(op, field);
    });

    brief.nodes_to_update?.forEach((update, i) => {
      const field = `nodes_to_update[${i}]`;
      const id = this.resolveNode(update.target, `${field}.target`, 'set_widget');
      const current = this.state.classOf(id);
      if (update.type && current && update.type !== current.name) {
        throw this.error(
          'type_mismatch',
          `Node ${id} is a ${current.name}; an update cannot change it to ${update.type}`,
          `${field}.type`,
          'set_widget',
        );
      }
      for (const [name, value] of this.widgetUpdates(id, update.widgets, field)) {
        this.state.emit(ops.setWidget(id, name, value), `${field}.widgets.${name}`);
      }
    });

    brief.nodes_to_add?.forEach((node, i) => {
      const id = this.declaredId(node.id);
      node.inputs?.forEach((conn, j) => {
        const field = `nodes_to_add[${i}].inputs[${j}]`;
        const from = this.resolveEndpoint(conn.from, 'output', `${field}.from`);
        const to = { node: id, slot: this.resolveSlot(id, conn.input, 'input', `${field}.input`) };
        this.state.emit(ops.connect(from, to), field);
      });
      node.outputs?.forEach((conn, j) => {
        const slot = this.resolveSlot(id, conn.output, 'output', `nodes_to_add[${i}].outputs[${j}].output`);
        conn.to.forEach((target, k) => {
          const field = `nodes_to_add[${i}].outputs[${j}].to[${k}]`;
          const to = this.resolveEndpoint(target, 'input', field);
          this.state.emit(ops.connect({ node: id, slot }, to), field);
        });
      });
    });

    brief.links_to_add?.forEach((link, i) => {
      const field = `links_to_add[${i}]`;
      const from = this.resolveEndpoint(link.from, 'output', `${field}.from`);
      const to = this.resolveEndpoint(link.to, 'input', `${field}.to`);
      if (link.replace) {
        const occupant = findLinkIntoInput(this.state.graph, to);
        if (!occupant) {
          throw this.error('missing_link', `Input ${formatEndpoint(to)} has no link to replace`, field, 'disconnect');
        }
        this.state.emit(ops.disconnect(occupant.from, to), field);
      }
      this.state.emit(ops.connect(from, to), field);
    });

    brief.operations?.forEach((op, i) => {
      const field = `operations[${i}]`;
      this.state.emit(this.resolveExplicit(op, field), field);
    });

    return this.state.operations;
  }

  // ============ Ids ============

  /**
   * `NODE_<n>` placeholders get fresh numeric ids in brief order, after the
   * largest numeric id already in the graph or requested explicitly.
   */
  private allocateIds(brief: Brief): void {
    const requested: { id: string; field: string }[] = [];
    brief.nodes_to_add?.forEach((n, i) => requested.push({ id: n.id, field: `nodes_to_add[${i}].id` }));
    brief.operations?.forEach((op, i) => {
      if (op.kind === 'add_node') requested.push({ id: op.id, field: `operations[${i}].id` });
    });

    let next = largestNumericId(
      requested.map((r) => r.id),
      maxNumericId(this.state.graph),
    );
    for (const { id, field } of requested) {
      if (this.declared.has(id)) {
        throw new CompileError('duplicate_node', `Node id "${id}" is declared twice`, { field });
      }
      this.declared.set(id, PLACEHOLDER.test(id) ? String(++next) : id);
    }
  }

  private declaredId(requested: string): NodeId {
    return this.declared.get(requested) ?? requested;
  }

  private resolveNode(ref: NodeRef, field: string, operation: Operation['kind']): NodeId {
    if (typeof ref === 'number') return this.resolveNode(String(ref), field, operation);
    if (typeof ref === 'string') {
      const declared = this.declared.get(ref);
      const id = declared ?? (ref.startsWith(EXISTING_PREFIX) ? ref.slice(EXISTING_PREFIX.length) : ref);
      if (!hasNode(this.state.graph, id)) {
        const why = declared !== undefined ? `is not in the graph at this point` : `does not exist`;
        throw this.error('unresolved_reference', `Node reference "${ref}" ${why}`, field, operation);
      }
      return id;
    }

    const [criterion, matches]: [string, NodeId[]] =
      'title' in ref
        ? [`title "${ref.title}"`, this.state.matching((id) => this.titleOf(id) === ref.title)]
        : [`class ${ref.type}`, this.state.matching((id) => getNode(this.state.graph, id)?.type === ref.type)];
    const [only, ...rest] = matches;
    if (only === undefined) {
      throw this.error('unresolved_reference', `No node with ${criterion}`, field, operation);
    }
    if (rest.length > 0) {
      throw this.error(
        'ambiguous_reference',
        `${matches.length} nodes with ${criterion}: ${matches.join(', ')}`,
        field,
        operation,
      );
    }
    return only;
  }

  private titleOf(id: NodeId): string | undefined {
    const node = getNode(this.state.graph, id);
    return node ? nodeTitle(node) : undefined;
  }

  // ============ Slots ============

  private resolveEndpoint(
    endpoint: Endpoint,
    direction: 'input' | 'output',
    field: string,
    operation: LinkKind = 'connect',
  ): SlotRef {
    const node = this.resolveNode(endpoint.node, `${field}.node`, operation);
    return { node, slot: this.resolveSlot(node, endpoint.slot, direction, `${field}.slot`, operation) };
  }

  private resolveSlot(
    node: NodeId,
    slot: SlotName,
    direction: 'input' | 'output',
    field: string,
    operation: LinkKind = 'connect',
  ): number {
    if (typeof slot === 'number') return slot;
    const def = this.state.classOf(node);
    const slots = direction === 'input' ? def?.inputs : def?.outputs;
    const index = slots?.findIndex((s) => s.name === slot) ?? -1;
    if (index >= 0) return index;
    if (/^\d+$/.test(slot)) return Number(slot);
    const names = slots?.map((s) => s.name).join(', ') ?? '';
    throw this.error(
      'slot_out_of_range',
      `${def?.name ?? 'Node'} (node ${node}) has no ${direction} named "${slot}" (${direction}s: ${names || 'none'})`,
      field,
      operation,
    );
  }

  // ============ Widgets ============

  private widgetsForNewNode(
    type: string,
    given: BriefWidgets | undefined,
    field: string,
    operation: Operation['kind'],
  ): Record<string, WidgetValue> {
    const def = this.catalog.get(type);
    if (!def) {
      throw this.error('unknown_class', `Unknown node class "${type}"`, `${field}.type`, operation);
    }
    const byName = this.widgetsByName(def, given ?? {}, field, operation);
    const widgets: Record<string, WidgetValue> = {};
    for (const spec of def.widgets) {
      const value = byName.get(spec.name) ?? spec.default;
      if (value === undefined) {
        throw this.error(
          'missing_widget_value',
          `Widget "${spec.name}" of ${def.name} has no value and no default`,
          `${field}.widgets.${spec.name}`,
          operation,
        );
      }
      setOwn(widgets, spec.name, value);
    }
    // undeclared names stay in so the add_node check reports them
    for (const [name, value] of byName) {
      if (!Object.hasOwn(widgets, name)) setOwn(widgets, name, value);
    }
    return widgets;
  }

  private widgetUpdates(id: NodeId, given: BriefWidgets, field: string): [string, WidgetValue][] {
    const def = this.state.classOf(id);
    if (!def) return Object.entries(Array.isArray(given) ? {} : given);
    const byName = this.widgetsByName(def, given, field, 'set_widget');
    const declared = def.widgets.map((w) => w.name).filter((name) => byName.has(name));
    const undeclared = [...byName.keys()].filter((name) => !declared.includes(name));
    return [...declared, ...undeclared].flatMap((name): [string, WidgetValue][] => {
      const value = byName.get(name);
      return value === undefined ? [] : [[name, value]];
    });
  }

  private widgetsByName(
    def: NodeDefinition,
    given: BriefWidgets,
    field: string,
    operation: Operation['kind'],
  ): Map<string, WidgetValue> {
    if (!Array.isArray(given)) return new Map(Object.entries(given));
    if (given.length > def.widgets.length) {
      throw this.error(
        'unknown_widget',
        `${def.name} declares ${def.widgets.length} widgets, got ${given.length} positional values`,
        `${field}.widgets`,
        operation,
      );
    }
    const byName = new Map<string, WidgetValue>();
    given.forEach((value, i) => {
      const spec = def.widgets[i];
      if (spec) byName.set(spec.name, value);
    });
    return byName;
  }

  // ============ Explicit Operations ============

  private resolveExplicit(op: ExplicitOperation, field: string): Operation {
    switch (op.kind) {
      case 'add_node':
        return ops.addNode(
          this.declaredId(op.id),
          op.type,
          this.widgetsForNewNode(op.type, op.widgets, field, op.kind),
          op.meta,
        );
      case 'remove_node':
        return ops.removeNode(this.resolveNode(op.id, `${field}.id`, op.kind));
      case 'connect':
      case 'disconnect': {
        const from = this.resolveEndpoint(op.from, 'output', `${field}.from`, op.kind);
        const to = this.resolveEndpoint(op.to, 'input', `${field}.to`, op.kind);
        return op.kind === 'connect' ? ops.connect(from, to) : ops.disconnect(from, to);
      }
      case 'set_widget':
        return ops.setWidget(this.resolveNode(op.id, `${field}.id`, op.kind), op.widget, op.value);
      default:
        return assertNever(op);
    }
  }

  private emitDisconnect(from: Endpoint, to: Endpoint, field: string): void {
    const source = this.resolveEndpoint(from, 'output', `${field}.from`, 'disconnect');
    const target = this.resolveEndpoint(to, 'input', `${field}.to`, 'disconnect');
    this.state.emit(ops.disconnect(source, target), field);
  }

  private error(
    rule: CompileError['rule'],
    message: string,
    field: string,
    operation: Operation['kind'],
  ): CompileError {
    return new CompileError(rule, message, { field, index: this.state.nextIndex, operation });
  }
}
