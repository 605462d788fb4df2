// src/litegraph.ts
// Import and export of the host editor's native (LiteGraph) workflow JSON

import { z } from 'zod';
import type { NodeCatalog } from './catalog.js';
import { FormatError } from './errors.js';
import {
  type GraphGroup,
  type GraphNode,
  type NodeId,
  type WorkflowGraph,
  type WorkflowLayout,
  getNode,
  isNumericId,
  maxNumericId,
  putNode,
  sortedLinks,
  sortedNodeIds,
} from './graph.js';
import { type WidgetValue, findInputIndex } from './ports.js';
import { isRecord, ownValue, setOwn } from './utils/canonical.js';
import { validateGraph } from './validator.js';

export const NATIVE_WORKFLOW_VERSION = 0.4;

const DEFAULT_NODE_SIZE: [number, number] = [300, 100];

/** Key under `properties` that carries node meta with no native field. */
export const META_PROPERTY = 'nodepatch_meta';

// ============ Native Shape ============

const PairSchema = z
  .union([
    z.tuple([z.number(), z.number()]),
    z.object({ '0': z.number(), '1': z.number() }).passthrough(),
  ])
  .transform((p): [number, number] => (Array.isArray(p) ? [p[0], p[1]] : [p['0'], p['1']]));

const NativeIdSchema = z.union([z.number().int().nonnegative(), z.string().min(1)]);

const NativeNodeSchema = z
  .object({
    id: NativeIdSchema,
    type: z.string().min(1),
    pos: PairSchema.optional(),
    size: PairSchema.optional(),
    mode: z.number().optional(),
    title: z.string().optional(),
    color: z.string().optional(),
    bgcolor: z.string().optional(),
    properties: z.record(z.unknown()).optional(),
    inputs: z
      .array(z.object({ name: z.string(), link: z.number().nullable().optional() }).passthrough())
      .optional(),
    outputs: z.array(z.object({ name: z.string() }).passthrough()).optional(),
    widgets_values: z.array(z.unknown()).optional(),
  })
  .passthrough();

const NativeLinkSchema = z.union([
  z
    .tuple([z.number(), NativeIdSchema, z.number().int(), NativeIdSchema, z.number().int()])
    .rest(z.unknown())
    .transform(([id, fromNode, fromSlot, toNode, toSlot]) => ({ id, fromNode, fromSlot, toNode, toSlot })),
  z
    .object({
      id: z.number(),
      origin_id: NativeIdSchema,
      origin_slot: z.number().int(),
      target_id: NativeIdSchema,
      target_slot: z.number().int(),
    })
    .passthrough()
    .transform((l) => ({
      id: l.id,
      fromNode: l.origin_id,
      fromSlot: l.origin_slot,
      toNode: l.target_id,
      toSlot: l.target_slot,
    })),
]);

const NativeWorkflowSchema = z
  .object({
    nodes: z.array(NativeNodeSchema),
    links: z.array(NativeLinkSchema).default([]),
    groups: z
      .array(
        z
          .object({
            title: z.string().default(''),
            bounding: z.tuple([z.number(), z.number(), z.number(), z.number()]),
            color: z.string().optional(),
          })
          .passthrough(),
      )
      .default([]),
    extra: z.record(z.unknown()).default({}),
  })
  .passthrough();

type NativeNode = z.infer<typeof NativeNodeSchema>;

// ============ Native Output Types ============

export interface NativeInput {
  name: string;
  type: string;
  link: number | null;
}

export interface NativeOutput {
  name: string;
  type: string;
  links: number[];
  slot_index: number;
}

export interface NativeNodeOut {
  id: number;
  type: string;
  pos: [number, number];
  size: [number, number];
  flags: Record<string, unknown>;
  order: number;
  mode: number;
  inputs: NativeInput[];
  outputs: NativeOutput[];
  properties: Record<string, unknown>;
  widgets_values: WidgetValue[];
  title?: string;
  color?: string;
  bgcolor?: string;
}

export type NativeLinkOut = [number, number, number, number, number, string];

export interface NativeWorkflow {
  last_node_id: number;
  last_link_id: number;
  nodes: NativeNodeOut[];
  links: NativeLinkOut[];
  groups: GraphGroup[];
  config: Record<string, unknown>;
  extra: Record<string, unknown>;
  version: number;
}

// ============ Import ============

/**
 * Convert a native workflow into a validated Workflow Graph.
 * Input slots are matched to the catalog by name, widget values by position.
 */
export function importWorkflow(json: unknown, catalog: NodeCatalog): WorkflowGraph {
  const parsed = NativeWorkflowSchema.safeParse(json);
  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    const field = issue ? issue.path.join('.') : '';
    throw new FormatError('malformed_input', `${field || 'workflow'}: ${issue?.message ?? 'invalid'}`, field);
  }
  const wf = parsed.data;

  const nativeById = new Map<string, { node: NativeNode; index: number }>();
  const graph: WorkflowGraph = { nodes: {}, links: [], meta: {} };

  wf.nodes.forEach((native, index) => {
    const id = String(native.id);
    const field = `nodes[${index}]`;
    if (nativeById.has(id)) {
      throw new FormatError('duplicate_node', `${field}: node ${id} appears twice`, `${field}.id`);
    }
    nativeById.set(id, { node: native, index });
    putNode(graph, id, importNode(native, field, catalog));
  });

  const linkIds = new Set<number>();
  wf.links.forEach((link, i) => {
    const field = `links[${i}]`;
    linkIds.add(link.id);
    const toId = String(link.toNode);
    const target = nativeById.get(toId);
    const targetNode = getNode(graph, toId);
    if (!target || !targetNode) {
      throw new FormatError('unknown_node', `${field}: target node ${toId} does not exist`, field);
    }
    const inputName = target.node.inputs?.[link.toSlot]?.name;
    const slot = inputName === undefined ? -1 : findInputIndex(catalog.require(targetNode.type), inputName);
    if (slot < 0) {
      throw new FormatError(
        'slot_out_of_range',
        `${field}: ${targetNode.type} (node ${toId}) has no input for native slot ${link.toSlot}${inputName ? ` "${inputName}"` : ''}`,
        field,
      );
    }
    graph.links.push({
      from: { node: String(link.fromNode), slot: link.fromSlot },
      to: { node: toId, slot },
    });
  });

  wf.nodes.forEach((native, index) => {
    native.inputs?.forEach((input, j) => {
      if (input.link !== null && input.link !== undefined && !linkIds.has(input.link)) {
        const field = `nodes[${index}].inputs[${j}].link`;
        throw new FormatError('missing_link', `${field}: link ${input.link} is not in the link table`, field);
      }
    });
  });

  const { ds, ...extra } = wf.extra;
  graph.meta = extra;
  const layout: WorkflowLayout = {};
  if (wf.groups.length > 0) {
    layout.groups = wf.groups.map((g) => {
      const group: GraphGroup = { title: g.title, bounding: g.bounding };
      if (g.color !== undefined) group.color = g.color;
      return group;
    });
  }
  if (isRecord(ds)) layout.viewport = ds;
  if (layout.groups || layout.viewport) graph.layout = layout;

  const result = validateGraph(graph, catalog);
  if (!result.valid) {
    throw FormatError.fromValidation(result.errors);
  }
  return graph;
}

function importNode(native: NativeNode, field: string, catalog: NodeCatalog): GraphNode {
  const def = catalog.get(native.type);
  if (!def) {
    throw new FormatError('unknown_class', `${field}: unknown node class "${native.type}"`, `${field}.type`);
  }

  const values = native.widgets_values ?? [];
  if (values.length !== def.widgets.length) {
    throw new FormatError(
      'malformed_input',
      `${field}: ${def.name} declares ${def.widgets.length} widgets, got ${values.length} values`,
      `${field}.widgets_values`,
    );
  }
  const widgets: Record<string, WidgetValue> = {};
  def.widgets.forEach((spec, i) => {
    const value = values[i];
    if (typeof value !== 'string' && typeof value !== 'number' && typeof value !== 'boolean') {
      throw new FormatError(
        'invalid_widget_value',
        `${field}: widget "${spec.name}" has a non-scalar value`,
        `${field}.widgets_values[${i}]`,
      );
    }
    setOwn(widgets, spec.name, value);
  });

  const node: GraphNode = { type: def.name, widgets, meta: {} };
  const { [META_PROPERTY]: carried, ...properties } = native.properties ?? {};
  if (isRecord(carried)) {
    for (const [key, value] of Object.entries(carried)) setOwn(node.meta, key, value);
  }
  if (native.title !== undefined) node.meta.title = native.title;
  if (Object.keys(properties).length > 0) node.meta.properties = properties;
  if (native.mode) node.meta.mode = native.mode;
  if (native.color !== undefined) node.meta.color = native.color;
  if (native.bgcolor !== undefined) node.meta.bgcolor = native.bgcolor;
  if (native.pos) node.position = native.pos;
  if (native.size) node.size = native.size;
  return node;
}

// ============ Export ============

/**
 * Write a graph back in native form. Non-numeric ids get fresh numbers
 * after the largest numeric id; links are numbered 1..n in canonical order.
 */
export function exportWorkflow(graph: WorkflowGraph, catalog: NodeCatalog): NativeWorkflow {
  const result = validateGraph(graph, catalog);
  if (!result.valid) {
    throw FormatError.fromValidation(result.errors);
  }

  const ids = sortedNodeIds(graph);
  const numeric = new Map<NodeId, number>();
  let next = Number(maxNumericId(graph));
  for (const id of ids) {
    numeric.set(id, isNumericId(id) ? Number(id) : ++next);
  }
  const numberOf = (id: NodeId): number => numeric.get(id) ?? 0;

  const links: NativeLinkOut[] = [];
  const inputLink = new Map<string, number>();
  const outputLinks = new Map<string, number[]>();
  sortedLinks(graph).forEach((link, i) => {
    const linkId = i + 1;
    const source = getNode(graph, link.from.node);
    const type = source ? catalog.require(source.type).outputs[link.from.slot]?.type ?? '*' : '*';
    links.push([linkId, numberOf(link.from.node), link.from.slot, numberOf(link.to.node), link.to.slot, type]);
    inputLink.set(`${link.to.node}.${link.to.slot}`, linkId);
    const key = `${link.from.node}.${link.from.slot}`;
    outputLinks.set(key, [...(outputLinks.get(key) ?? []), linkId]);
  });

  const nodes: NativeNodeOut[] = [];
  ids.forEach((id, order) => {
    const node = getNode(graph, id);
    if (!node) return;
    const def = catalog.require(node.type);
    const { title, properties, mode, color, bgcolor, ...carried } = node.meta;
    const nativeProperties: Record<string, unknown> = isRecord(properties) ? { ...properties } : {};
    if (Object.keys(carried).length > 0) nativeProperties[META_PROPERTY] = carried;
    const out: NativeNodeOut = {
      id: numberOf(id),
      type: node.type,
      pos: node.position ?? [0, 0],
      size: node.size ?? DEFAULT_NODE_SIZE,
      flags: {},
      order,
      mode: typeof mode === 'number' ? mode : 0,
      inputs: def.inputs.map((input, slot) => ({
        name: input.name,
        type: input.types.join(','),
        link: inputLink.get(`${id}.${slot}`) ?? null,
      })),
      outputs: def.outputs.map((output, slot) => ({
        name: output.name,
        type: output.type,
        links: outputLinks.get(`${id}.${slot}`) ?? [],
        slot_index: slot,
      })),
      properties: nativeProperties,
      widgets_values: def.widgets.flatMap((w) => {
        const value = ownValue(node.widgets, w.name);
        return value === undefined ? [] : [value];
      }),
    };
    if (typeof title === 'string') out.title = title;
    if (typeof color === 'string') out.color = color;
    if (typeof bgcolor === 'string') out.bgcolor = bgcolor;
    nodes.push(out);
  });

  const extra: Record<string, unknown> = { ...graph.meta };
  if (graph.layout?.viewport) extra.ds = graph.layout.viewport;

  return {
    last_node_id: Math.max(0, ...nodes.map((n) => n.id)),
    last_link_id: links.length,
    nodes,
    links,
    groups: graph.layout?.groups ?? [],
    config: {},
    extra,
    version: NATIVE_WORKFLOW_VERSION,
  };
}
