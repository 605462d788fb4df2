// src/brief.ts
// Change Brief extraction and schema

import { z } from 'zod';
import { CompileError } from './errors.js';
import { isRecord } from './utils/canonical.js';

// ============ Schema ============

const WidgetValueSchema = z.union([z.string(), z.number(), z.boolean()]);

/**
 * `EXISTING_<id>`, `NODE_<n>`, a bare id (string or integer), or a lookup
 * by title or class.
 */
export const NodeRefSchema = z.union([
  z.string().min(1),
  z.number().int().nonnegative(),
  z.object({ title: z.string().min(1) }).strict(),
  z.object({ type: z.string().min(1) }).strict(),
]);

/** Slot index, or slot name on the resolved node's class. */
export const SlotNameSchema = z.union([z.number().int().nonnegative(), z.string().min(1)]);

export const EndpointSchema = z.object({ node: NodeRefSchema, slot: SlotNameSchema }).strict();

/** Widget values by name, or positionally in declared order. */
export const BriefWidgetsSchema = z.union([z.record(WidgetValueSchema), z.array(WidgetValueSchema)]);

/**
 * Accept `alias` keys as another spelling of their canonical name. A key
 * given under both spellings is left alone, so the strict schema rejects it.
 */
function withAliases<T extends z.ZodTypeAny>(aliases: Readonly<Record<string, string>>, schema: T) {
  return z.preprocess((value) => {
    if (!isRecord(value)) return value;
    const out: Record<string, unknown> = { ...value };
    for (const [alias, name] of Object.entries(aliases)) {
      if (Object.hasOwn(out, alias) && !Object.hasOwn(out, name)) {
        out[name] = out[alias];
        delete out[alias];
      }
    }
    return out;
  }, schema);
}

const PointSchema = z.tuple([z.number(), z.number()]);

const NodeInputSchema = withAliases(
  { input_name: 'input' },
  z.object({ input: SlotNameSchema, from: EndpointSchema }).strict(),
);

const NodeOutputSchema = withAliases(
  { output_name: 'output' },
  z.object({ output: SlotNameSchema, to: z.array(EndpointSchema) }).strict(),
);

const NodeToAddSchema = withAliases(
  { placeholder_id: 'id' },
  z
    .object({
      id: z.string().min(1),
      type: z.string().min(1),
      title: z.string().optional(),
      color: z.string().optional(),
      position: PointSchema.optional(),
      widgets: BriefWidgetsSchema.optional(),
      inputs: z.array(NodeInputSchema).optional(),
      outputs: z.array(NodeOutputSchema).optional(),
    })
    .strict(),
);

/** `type`, when given, must name the class the target already has. */
const NodeToUpdateSchema = z
  .object({
    target: NodeRefSchema,
    type: z.string().min(1).nullable().optional(),
    widgets: BriefWidgetsSchema,
  })
  .strict();

const GroupToAddSchema = z
  .object({
    title: z.string(),
    bounding: z.tuple([z.number(), z.number(), z.number(), z.number()]),
    color: z.string().optional(),
  })
  .strict();

const LinkSpecSchema = z.object({ from: EndpointSchema, to: EndpointSchema }).strict();

const LinkToAddSchema = z
  .object({ from: EndpointSchema, to: EndpointSchema, replace: z.boolean().optional() })
  .strict();

export const ExplicitOperationSchema = z.discriminatedUnion('kind', [
  z
    .object({
      kind: z.literal('add_node'),
      id: z.string().min(1),
      type: z.string().min(1),
      widgets: BriefWidgetsSchema.optional(),
      meta: z.record(z.unknown()).optional(),
    })
    .strict(),
  z.object({ kind: z.literal('remove_node'), id: NodeRefSchema }).strict(),
  z.object({ kind: z.literal('connect'), from: EndpointSchema, to: EndpointSchema }).strict(),
  z.object({ kind: z.literal('disconnect'), from: EndpointSchema, to: EndpointSchema }).strict(),
  z
    .object({
      kind: z.literal('set_widget'),
      id: NodeRefSchema,
      widget: z.string().min(1),
      value: WidgetValueSchema,
    })
    .strict(),
]);

export const BriefSchema = z
  .object({
    plan_summary: z.string().optional(),
    nodes_to_delete: z.array(NodeRefSchema).optional(),
    nodes_to_add: z.array(NodeToAddSchema).optional(),
    nodes_to_update: z.array(NodeToUpdateSchema).optional(),
    links_to_remove: z.array(LinkSpecSchema).optional(),
    links_to_add: z.array(LinkToAddSchema).optional(),
    groups_to_add: z.array(GroupToAddSchema).optional(),
    operations: z.array(ExplicitOperationSchema).optional(),
  })
  .strict();

export type Brief = z.infer<typeof BriefSchema>;
export type NodeRef = z.infer<typeof NodeRefSchema>;
export type SlotName = z.infer<typeof SlotNameSchema>;
export type Endpoint = z.infer<typeof EndpointSchema>;
export type BriefWidgets = z.infer<typeof BriefWidgetsSchema>;
export type NodeToAdd = z.infer<typeof NodeToAddSchema>;
export type GroupToAdd = z.infer<typeof GroupToAddSchema>;
export type ExplicitOperation = z.infer<typeof ExplicitOperationSchema>;

// ============ Extraction ============

const FENCED_BLOCK = /```([A-Za-z0-9_-]*)[ \t]*\r?\n([\s\S]*?)```/g;

/**
 * Find the JSON object carried by a brief: the whole text, else the first
 * fenced json (or unlabeled) block that parses, else the span between the
 * first `{` and the last `}`.
 */
export function extractBriefJson(text: string): Record<string, unknown> | undefined {
  const whole = tryParseObject(text.trim());
  if (whole) return whole;

  for (const match of text.matchAll(FENCED_BLOCK)) {
    const [, label = '', body = ''] = match;
    if (label !== '' && label.toLowerCase() !== 'json') continue;
    const block = tryParseObject(body.trim());
    if (block) return block;
  }

  const start = text.indexOf('{');
  const end = text.lastIndexOf('}');
  if (start >= 0 && end > start) {
    return tryParseObject(text.slice(start, end + 1));
  }
  return undefined;
}

function tryParseObject(text: string): Record<string, unknown> | undefined {
  if (!text.startsWith('{')) return undefined;
  try {
    const value: unknown = JSON.parse(text);
    return isRecord(value) ? value : undefined;
  } catch {
    return undefined;
  }
}

/**
 * Extract and schema-check a brief. Blank text is a brief with no edits.
 * Throws CompileError (`malformed_brief`) naming the offending field.
 */
export function parseBrief(text: string): Brief {
  if (text.trim() === '') return {};
  const data = extractBriefJson(text);
  if (data === undefined) {
    throw new CompileError('malformed_brief', 'No JSON object found in the brief', { field: '' });
  }
  const parsed = BriefSchema.safeParse(data);
  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    const field = issue ? formatFieldPath(issue.path) : '';
    throw new CompileError('malformed_brief', `${field || 'brief'}: ${issue?.message ?? 'invalid brief'}`, { field });
  }
  return parsed.data;
}

/** `['nodes_to_add', 0, 'widgets']` -> `nodes_to_add[0].widgets` */
export function formatFieldPath(path: readonly (string | number)[]): string {
  return path.reduce<string>((acc, part) => {
    if (typeof part === 'number') return `${acc}[${part}]`;
    return acc ? `${acc}.${part}` : part;
  }, '');
}
