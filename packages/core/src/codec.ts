// src/codec.ts
// Compact line format for Workflow Graphs (CG/1)
//
//   CG/1
//   M:{"title":"portrait"}
//   N4:CheckpointLoaderSimple|v1-5.safetensors
//   N3:KSampler|42;randomize;20;8;euler;normal;1
//   L4.0>3.0

import type { NodeCatalog } from './catalog.js';
import { FormatError } from './errors.js';
import {
  type GraphLink,
  type GraphNode,
  type WorkflowGraph,
  getNode,
  hasNode,
  linkKey,
  putNode,
  sortedLinks,
  sortedNodeIds,
} from './graph.js';
import type { WidgetSpec, WidgetValue } from './ports.js';
import { canonicalJson, isRecord, ownValue, setOwn } from './utils/canonical.js';
import { validateGraph } from './validator.js';

export const CODEC_HEADER = 'CG/1';

/** Field written for a widget that has no value. */
export const ABSENT_WIDGET = '~';

const ESCAPES: Readonly<Record<string, string>> = {
  '%': '%25',
  ';': '%3B',
  '|': '%7C',
  '\n': '%0A',
  '\r': '%0D',
  '~': '%7E',
};

const UNESCAPES: Readonly<Record<string, string>> = Object.fromEntries(
  Object.entries(ESCAPES).map(([ch, code]) => [code.slice(1), ch]),
);

const NODE_LINE = /^N([A-Za-z0-9_-]+):(.*)$/;
const LINK_LINE = /^L([A-Za-z0-9_-]+)\.(\d+)>([A-Za-z0-9_-]+)\.(\d+)$/;
const NUMBER_TEXT = /^-?(\d+\.?\d*|\.\d+)([eE][+-]?\d+)?$/;

// ============ Escaping ============

export function escapeField(text: string): string {
  return text.replace(/[%;|\n\r~]/g, (ch) => ESCAPES[ch] ?? ch);
}

export function unescapeField(raw: string, field = ''): string {
  return raw.replace(/%(.{0,2})/g, (match, code: string) => {
    const ch = UNESCAPES[code.toUpperCase()];
    if (ch === undefined) {
      throw new FormatError('malformed_input', `${field}: invalid escape "${match}"`, field);
    }
    return ch;
  });
}

// ============ Encode ============

/**
 * Encode a valid graph. Equal logical graphs produce identical text;
 * position, size and layout are not carried.
 * Throws FormatError when the graph does not validate.
 */
export function encodeGraph(graph: WorkflowGraph, catalog: NodeCatalog): string {
  const result = validateGraph(graph, catalog);
  if (!result.valid) {
    throw FormatError.fromValidation(result.errors);
  }

  const lines = [CODEC_HEADER];
  if (Object.keys(graph.meta).length > 0) {
    lines.push(`M:${canonicalJson(graph.meta)}`);
  }
  for (const id of sortedNodeIds(graph)) {
    const node = getNode(graph, id);
    if (!node) continue;
    const def = catalog.require(node.type);
    const widgets = def.widgets.map((spec) => encodeWidget(ownValue(node.widgets, spec.name)));
    let line = `N${id}:${escapeField(node.type)}|${widgets.join(';')}`;
    if (Object.keys(node.meta).length > 0) {
      line += `|${canonicalJson(node.meta)}`;
    }
    lines.push(line);
  }
  for (const link of sortedLinks(graph)) {
    lines.push(encodeLinkLine(link));
  }
  return lines.join('\n');
}

export function encodeLinkLine(link: GraphLink): string {
  return `L${link.from.node}.${link.from.slot}>${link.to.node}.${link.to.slot}`;
}

function encodeWidget(value: WidgetValue | undefined): string {
  if (value === undefined) return ABSENT_WIDGET;
  if (typeof value === 'string') return escapeField(value);
  return String(value);
}

// ============ Decode ============

/**
 * Decode compact text into a validated graph.
 * Throws FormatError naming the offending line.
 */
export function decodeGraph(text: string, catalog: NodeCatalog): WorkflowGraph {
  const lines = text.split(/\r?\n/);
  if (lines.length > 1 && lines[lines.length - 1] === '') lines.pop();

  if (lines[0] !== CODEC_HEADER) {
    throw new FormatError('malformed_input', `Expected header "${CODEC_HEADER}", got "${lines[0] ?? ''}"`, 'line 1');
  }

  const graph: WorkflowGraph = { nodes: {}, links: [], meta: {} };

  lines.forEach((line, i) => {
    if (i === 0) return;
    const field = `line ${i + 1}`;
    if (line.startsWith('M:')) {
      if (i !== 1) {
        throw new FormatError('malformed_input', `${field}: metadata line must follow the header`, field);
      }
      graph.meta = parseJsonRecord(line.slice(2), field);
      return;
    }
    if (line.startsWith('N')) {
      decodeNodeLine(graph, line, field, catalog);
      return;
    }
    if (line.startsWith('L')) {
      graph.links.push(decodeLinkLine(line, field));
      return;
    }
    throw new FormatError('malformed_input', `${field}: unrecognized line "${line}"`, field);
  });

  const result = validateGraph(graph, catalog);
  if (!result.valid) {
    throw FormatError.fromValidation(result.errors);
  }
  return graph;
}

function decodeNodeLine(graph: WorkflowGraph, line: string, field: string, catalog: NodeCatalog): void {
  const m = NODE_LINE.exec(line);
  if (!m) {
    throw new FormatError('malformed_input', `${field}: malformed node line`, field);
  }
  const [, id = '', rest = ''] = m;
  if (hasNode(graph, id)) {
    throw new FormatError('duplicate_node', `${field}: node ${id} is declared twice`, field);
  }

  const classEnd = rest.indexOf('|');
  if (classEnd < 0) {
    throw new FormatError('malformed_input', `${field}: node line has no widget field`, field);
  }
  const type = unescapeField(rest.slice(0, classEnd), field);
  const afterClass = rest.slice(classEnd + 1);
  const widgetEnd = afterClass.indexOf('|');
  const widgetField = widgetEnd < 0 ? afterClass : afterClass.slice(0, widgetEnd);

  const def = catalog.get(type);
  if (!def) {
    throw new FormatError('unknown_class', `${field}: unknown node class "${type}"`, field);
  }

  const raws = widgetField === '' && def.widgets.length === 0 ? [] : widgetField.split(';');
  if (raws.length !== def.widgets.length) {
    throw new FormatError(
      'malformed_input',
      `${field}: ${def.name} declares ${def.widgets.length} widgets, got ${raws.length}`,
      field,
    );
  }

  const widgets: Record<string, WidgetValue> = {};
  def.widgets.forEach((spec, i) => {
    const raw = raws[i] ?? ABSENT_WIDGET;
    if (raw === ABSENT_WIDGET) return;
    setOwn(widgets, spec.name, decodeWidget(spec, raw, `${field} widget "${spec.name}"`));
  });

  const node: GraphNode = { type, widgets, meta: {} };
  if (widgetEnd >= 0) {
    node.meta = parseJsonRecord(afterClass.slice(widgetEnd + 1), field);
  }
  putNode(graph, id, node);
}

function decodeWidget(spec: WidgetSpec, raw: string, field: string): WidgetValue {
  switch (spec.type) {
    case 'INT':
    case 'FLOAT': {
      const n = Number(raw);
      if (!NUMBER_TEXT.test(raw) || !Number.isFinite(n)) {
        throw new FormatError('malformed_input', `${field}: "${raw}" is not a number`, field);
      }
      return n;
    }
    case 'BOOLEAN':
      if (raw === 'true') return true;
      if (raw === 'false') return false;
      throw new FormatError('malformed_input', `${field}: "${raw}" is not a boolean`, field);
    case 'STRING':
      return unescapeField(raw, field);
    case 'COMBO': {
      const text = unescapeField(raw, field);
      // options keep their declared type; the text form alone cannot tell 1 from "1"
      const match = (spec.options ?? []).find((o) => String(o) === text);
      return match ?? text;
    }
  }
}

function decodeLinkLine(line: string, field: string): GraphLink {
  const m = LINK_LINE.exec(line);
  if (!m) {
    throw new FormatError('malformed_input', `${field}: malformed link line`, field);
  }
  const [, fromNode = '', fromSlot = '', toNode = '', toSlot = ''] = m;
  return {
    from: { node: fromNode, slot: Number(fromSlot) },
    to: { node: toNode, slot: Number(toSlot) },
  };
}

function parseJsonRecord(text: string, field: string): Record<string, unknown> {
  let value: unknown;
  try {
    value = JSON.parse(text);
  } catch (e) {
    throw new FormatError(
      'malformed_input',
      `${field}: metadata is not valid JSON (${e instanceof Error ? e.message : String(e)})`,
      field,
    );
  }
  if (!isRecord(value)) {
    throw new FormatError('malformed_input', `${field}: metadata must be a JSON object`, field);
  }
  return value;
}

// ============ Comparison ============

/**
 * Logical equality: same node ids, classes, widget values, metadata and
 * link set. Presentation fields are ignored.
 */
export function graphsLogicallyEqual(a: WorkflowGraph, b: WorkflowGraph): boolean {
  const ids = sortedNodeIds(a);
  const otherIds = sortedNodeIds(b);
  if (ids.length !== otherIds.length || ids.some((id, i) => id !== otherIds[i])) return false;
  if (canonicalJson(a.meta) !== canonicalJson(b.meta)) return false;

  for (const id of ids) {
    const x = getNode(a, id);
    const y = getNode(b, id);
    if (!x || !y || x.type !== y.type) return false;
    if (canonicalJson(x.widgets) !== canonicalJson(y.widgets)) return false;
    if (canonicalJson(x.meta) !== canonicalJson(y.meta)) return false;
  }

  const linksA = new Set(a.links.map(linkKey));
  const linksB = new Set(b.links.map(linkKey));
  return linksA.size === linksB.size && [...linksA].every((k) => linksB.has(k));
}
