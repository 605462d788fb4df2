// src/catalog.ts
// Read-only node class catalog, built from the host's object_info document

import { z } from 'zod';
import { CatalogError } from './errors.js';
import { type WorkflowGraph, classesInGraph } from './graph.js';
import {
  type InputSlotSpec,
  type NodeDefinition,
  type OutputSlotSpec,
  type WidgetSpec,
  type WidgetValue,
  isWidgetType,
} from './ports.js';
import { checkWidgetValue, parseSlotTypes } from './sockets.js';
import { compareCodeUnits, isRecord } from './utils/canonical.js';

export const CONTROL_WIDGET_NAME = 'control_after_generate';
export const CONTROL_WIDGET_OPTIONS: readonly string[] = ['fixed', 'increment', 'decrement', 'randomize'];

// ============ object_info shape ============

const ScalarSchema = z.union([z.string(), z.number(), z.boolean()]);

const InputOptionsSchema = z
  .object({
    default: z.unknown().optional(),
    min: z.number().optional(),
    max: z.number().optional(),
    multiline: z.boolean().optional(),
    forceInput: z.boolean().optional(),
    control_after_generate: z.union([z.boolean(), z.string()]).optional(),
    options: z.array(ScalarSchema).optional(),
  })
  .passthrough();

const InputSectionSchema = z.record(z.array(z.unknown()).min(1));

const ObjectInfoEntrySchema = z
  .object({
    input: z
      .object({
        required: InputSectionSchema.optional(),
        optional: InputSectionSchema.optional(),
        hidden: z.record(z.unknown()).optional(),
      })
      .passthrough()
      .optional(),
    input_order: z
      .object({
        required: z.array(z.string()).optional(),
        optional: z.array(z.string()).optional(),
      })
      .passthrough()
      .optional(),
    output: z.array(z.union([z.string(), z.array(z.unknown())])).optional(),
    output_name: z.array(z.string()).optional(),
    output_is_list: z.array(z.boolean()).optional(),
    display_name: z.string().optional(),
    category: z.string().optional(),
    description: z.string().optional(),
  })
  .passthrough();

// ============ Catalog ============

/**
 * Immutable registry of node classes keyed by class name.
 * Instances are deeply frozen and safe to share between concurrent calls.
 */
export class NodeCatalog {
  private readonly defs: ReadonlyMap<string, NodeDefinition>;

  constructor(definitions: Iterable<NodeDefinition>) {
    const defs = new Map<string, NodeDefinition>();
    for (const def of definitions) {
      assertDefinition(def);
      if (defs.has(def.name)) {
        throw new CatalogError(`Duplicate node class "${def.name}"`, { className: def.name });
      }
      defs.set(def.name, deepFreeze(structuredClone(def)));
    }
    this.defs = defs;
    Object.freeze(this);
  }

  /**
   * Build a catalog from an object_info document (optionally wrapped in
   * `{ node_definitions: … }`). Any malformed entry rejects the whole document.
   */
  static fromObjectInfo(data: unknown): NodeCatalog {
    if (!isRecord(data)) {
      throw new CatalogError('Node definitions must be a JSON object');
    }
    const root = isRecord(data.node_definitions) ? data.node_definitions : data;
    const definitions: NodeDefinition[] = [];
    for (const [className, raw] of Object.entries(root)) {
      definitions.push(normalizeEntry(className, raw));
    }
    return new NodeCatalog(definitions);
  }

  get size(): number {
    return this.defs.size;
  }

  has(className: string): boolean {
    return this.defs.has(className);
  }

  get(className: string): NodeDefinition | undefined {
    return this.defs.get(className);
  }

  require(className: string): NodeDefinition {
    const def = this.defs.get(className);
    if (!def) {
      throw new CatalogError(`Unknown node class "${className}"`, {
        className,
        rule: 'unknown_class',
      });
    }
    return def;
  }

  /** Class names in code-unit order. */
  names(): string[] {
    return [...this.defs.keys()].sort(compareCodeUnits);
  }

  definitions(): NodeDefinition[] {
    return this.names().map((n) => this.require(n));
  }
}

/**
 * Sub-catalog of the classes matching any search term: an exact name first,
 * then a case-insensitive name, and only when neither exists, every class
 * whose name contains the term.
 */
export function filterCatalog(catalog: NodeCatalog, terms: readonly string[]): NodeCatalog {
  const picked = new Set<string>();
  const names = catalog.names();
  for (const raw of terms) {
    const term = raw.trim();
    if (!term) continue;
    if (catalog.has(term)) {
      picked.add(term);
      continue;
    }
    const lower = term.toLowerCase();
    const caseless = names.find((n) => n.toLowerCase() === lower);
    if (caseless) {
      picked.add(caseless);
      continue;
    }
    for (const n of names) {
      if (n.toLowerCase().includes(lower)) picked.add(n);
    }
  }
  return new NodeCatalog([...picked].map((n) => catalog.require(n)));
}

/**
 * Throw CatalogError when the graph uses a class the catalog does not define.
 * Compiling or executing against such a catalog is refused up front.
 */
export function assertCatalogCovers(catalog: NodeCatalog, graph: WorkflowGraph): void {
  const missing = classesInGraph(graph).filter((name) => !catalog.has(name));
  const [first] = missing;
  if (first !== undefined) {
    throw new CatalogError(`Catalog has no definition for ${missing.map((n) => `"${n}"`).join(', ')}`, {
      className: first,
      rule: 'unknown_class',
    });
  }
}

/** Split a free-form search string on commas, plus signs and whitespace. */
export function parseSearchTerms(query: string): string[] {
  return query.split(/[,+\s]+/).filter((t) => t.length > 0);
}

// ============ Normalization ============

function normalizeEntry(className: string, raw: unknown): NodeDefinition {
  if (!className) {
    throw new CatalogError('Node class name must be non-empty');
  }
  const parsed = ObjectInfoEntrySchema.safeParse(raw);
  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    const field = issue ? [className, ...issue.path].join('.') : className;
    throw new CatalogError(`${field}: ${issue?.message ?? 'invalid entry'}`, { className, field });
  }
  const entry = parsed.data;

  const inputs: InputSlotSpec[] = [];
  const widgets: WidgetSpec[] = [];
  let controlCount = 0;

  for (const section of ['required', 'optional'] as const) {
    const specs = entry.input?.[section] ?? {};
    for (const name of orderedNames(specs, entry.input_order?.[section])) {
      const spec = specs[name];
      if (!spec) continue;
      const field = `${className}.input.${section}.${name}`;
      const result = normalizeInput(name, spec, section === 'required', field, className);
      if (result.kind === 'slot') {
        inputs.push(result.slot);
        continue;
      }
      widgets.push(result.widget);
      if (result.control) {
        controlCount += 1;
        widgets.push({
          name: controlCount === 1 ? CONTROL_WIDGET_NAME : `${CONTROL_WIDGET_NAME}_${controlCount}`,
          type: 'COMBO',
          options: CONTROL_WIDGET_OPTIONS,
          default: 'randomize',
        });
      }
    }
  }

  const outputs: OutputSlotSpec[] = (entry.output ?? []).map((type, i) => {
    const typeName = typeof type === 'string' ? type : 'COMBO';
    const out: OutputSlotSpec = { name: entry.output_name?.[i] ?? typeName, type: typeName };
    if (entry.output_is_list?.[i]) out.isList = true;
    return out;
  });

  const def: NodeDefinition = { name: className, inputs, outputs, widgets };
  if (entry.display_name !== undefined) def.displayName = entry.display_name;
  if (entry.category !== undefined) def.category = entry.category;
  if (entry.description) def.description = entry.description;
  return def;
}

type NormalizedInput =
  | { kind: 'slot'; slot: InputSlotSpec }
  | { kind: 'widget'; widget: WidgetSpec; control: boolean };

function normalizeInput(
  name: string,
  spec: unknown[],
  required: boolean,
  field: string,
  className: string,
): NormalizedInput {
  const [type, rawOptions] = spec;
  const parsedOptions = InputOptionsSchema.safeParse(rawOptions ?? {});
  if (!parsedOptions.success) {
    throw new CatalogError(`${field}: invalid input options`, { className, field });
  }
  const options = parsedOptions.data;

  if (Array.isArray(type)) {
    const choices = z.array(ScalarSchema).safeParse(type);
    if (!choices.success) {
      throw new CatalogError(`${field}: combo choices must be scalars`, { className, field });
    }
    return { kind: 'widget', widget: buildWidget(name, 'COMBO', options, choices.data, field, className), control: false };
  }
  if (typeof type !== 'string') {
    throw new CatalogError(`${field}: input type must be a string or a list of choices`, { className, field });
  }

  if (type === 'COMBO') {
    return { kind: 'widget', widget: buildWidget(name, 'COMBO', options, options.options ?? [], field, className), control: false };
  }
  if (isWidgetType(type) && !options.forceInput) {
    const control = type === 'INT' && Boolean(options.control_after_generate);
    return { kind: 'widget', widget: buildWidget(name, type, options, undefined, field, className), control };
  }
  return { kind: 'slot', slot: { name, types: parseSlotTypes(type), required } };
}

function buildWidget(
  name: string,
  type: WidgetSpec['type'],
  options: z.infer<typeof InputOptionsSchema>,
  choices: WidgetValue[] | undefined,
  field: string,
  className: string,
): WidgetSpec {
  const widget: WidgetSpec = { name, type };
  if (choices !== undefined) widget.options = choices;
  if (type === 'INT' || type === 'FLOAT') {
    if (options.min !== undefined) widget.min = options.min;
    if (options.max !== undefined) widget.max = options.max;
  }
  if (type === 'STRING' && options.multiline) widget.multiline = true;
  if (options.default !== undefined) {
    const problem = checkWidgetValue(widget, options.default);
    if (problem !== null || !isScalar(options.default)) {
      throw new CatalogError(`${field}: default ${problem ?? 'must be a scalar'}`, { className, field });
    }
    widget.default = options.default;
  }
  return widget;
}

function orderedNames(specs: Record<string, unknown>, order: string[] | undefined): string[] {
  const keys = Object.keys(specs);
  if (!order) return keys;
  const listed = order.filter((n) => Object.hasOwn(specs, n));
  return [...listed, ...keys.filter((k) => !listed.includes(k))];
}

// ============ Definition checks ============

function assertDefinition(def: NodeDefinition): void {
  if (!def.name) {
    throw new CatalogError('Node class name must be non-empty');
  }
  // inputs and widgets share one namespace; outputs are addressed by index and may repeat names
  const inputNames = new Set<string>();
  const claim = (names: Set<string>, kind: string, name: string) => {
    if (!name || names.has(name)) {
      throw new CatalogError(`${def.name}: ${name ? 'duplicate' : 'unnamed'} ${kind} "${name}"`, {
        className: def.name,
        field: `${def.name}.${kind}s.${name}`,
      });
    }
    names.add(name);
  };
  for (const input of def.inputs) {
    claim(inputNames, 'input', input.name);
    if (input.types.length === 0) {
      throw new CatalogError(`${def.name}: input "${input.name}" accepts no types`, { className: def.name });
    }
  }
  for (const widget of def.widgets) {
    claim(inputNames, 'widget', widget.name);
    if (widget.default !== undefined) {
      const problem = checkWidgetValue(widget, widget.default);
      if (problem) {
        throw new CatalogError(`${def.name}: default of "${widget.name}" ${problem}`, {
          className: def.name,
          field: `${def.name}.widgets.${widget.name}`,
        });
      }
    }
  }
}

// ============ Helpers ============

function isScalar(value: unknown): value is WidgetValue {
  return typeof value === 'string' || typeof value === 'number' || typeof value === 'boolean';
}

function deepFreeze<T>(value: T): T {
  if (typeof value === 'object' && value !== null) {
    for (const child of Object.values(value)) deepFreeze(child);
    Object.freeze(value);
  }
  return value;
}
