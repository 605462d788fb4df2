// src/operations.ts
// Primitive graph edits: the only contract between compiler and executor

import { z } from 'zod';
import { FormatError } from './errors.js';
import { type NodeId, type SlotRef, formatEndpoint } from './graph.js';
import type { WidgetValue } from './ports.js';
import { canonicalJson } from './utils/canonical.js';

// ============ Operation Types ============

export interface AddNodeOperation {
  readonly kind: 'add_node';
  readonly id: NodeId;
  readonly type: string;
  readonly widgets: Readonly<Record<string, WidgetValue>>;
  readonly meta?: Readonly<Record<string, unknown>>;
  /** Canvas position; presentation only. */
  readonly position?: readonly [number, number];
}

export interface RemoveNodeOperation {
  readonly kind: 'remove_node';
  readonly id: NodeId;
}

export interface ConnectOperation {
  readonly kind: 'connect';
  readonly from: Readonly<SlotRef>;
  readonly to: Readonly<SlotRef>;
}

export interface DisconnectOperation {
  readonly kind: 'disconnect';
  readonly from: Readonly<SlotRef>;
  readonly to: Readonly<SlotRef>;
}

export interface SetWidgetOperation {
  readonly kind: 'set_widget';
  readonly id: NodeId;
  readonly widget: string;
  readonly value: WidgetValue;
}

export type Operation =
  | AddNodeOperation
  | RemoveNodeOperation
  | ConnectOperation
  | DisconnectOperation
  | SetWidgetOperation;

export type OperationKind = Operation['kind'];

export type OperationList = readonly Operation[];

export const OPERATION_LIST_VERSION = 1;

export function assertNever(value: never): never {
  throw new Error(`Unhandled operation: ${JSON.stringify(value)}`);
}

// ============ Schema ============

const WidgetValueSchema = z.union([z.string(), z.number(), z.boolean()]);

const SlotRefSchema = z
  .object({
    node: z.string().min(1),
    slot: z.number().int().nonnegative(),
  })
  .strict();

export const OperationSchema = z.discriminatedUnion('kind', [
  z
    .object({
      kind: z.literal('add_node'),
      id: z.string().min(1),
      type: z.string().min(1),
      widgets: z.record(WidgetValueSchema),
      meta: z.record(z.unknown()).optional(),
      position: z.tuple([z.number(), z.number()]).optional(),
    })
    .strict(),
  z.object({ kind: z.literal('remove_node'), id: z.string().min(1) }).strict(),
  z.object({ kind: z.literal('connect'), from: SlotRefSchema, to: SlotRefSchema }).strict(),
  z.object({ kind: z.literal('disconnect'), from: SlotRefSchema, to: SlotRefSchema }).strict(),
  z
    .object({
      kind: z.literal('set_widget'),
      id: z.string().min(1),
      widget: z.string().min(1),
      value: WidgetValueSchema,
    })
    .strict(),
]);

const OperationListDocumentSchema = z
  .object({
    version: z.literal(OPERATION_LIST_VERSION),
    operations: z.array(OperationSchema),
  })
  .strict();

// ============ Serialization ============

/** Stable text form: `{"operations":[…],"version":1}` with keys sorted. */
export function serializeOperationList(operations: OperationList): string {
  return canonicalJson({ version: OPERATION_LIST_VERSION, operations });
}

/**
 * Parse a serialized Operation List (text or already-parsed JSON).
 * Throws FormatError naming the first offending field.
 */
export function parseOperationList(input: unknown): OperationList {
  let data = input;
  if (typeof input === 'string') {
    try {
      data = JSON.parse(input);
    } catch (e) {
      throw new FormatError('malformed_input', `Operation list is not valid JSON: ${e instanceof Error ? e.message : String(e)}`);
    }
  }
  const parsed = OperationListDocumentSchema.safeParse(data);
  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    const field = issue ? issue.path.join('.') : '';
    throw new FormatError('malformed_input', `${field || 'document'}: ${issue?.message ?? 'invalid'}`, field);
  }
  return parsed.data.operations.map(freezeOperation);
}

function freezeOperation<T extends Operation>(op: T): T {
  for (const value of Object.values(op)) {
    if (typeof value === 'object' && value !== null) Object.freeze(value);
  }
  Object.freeze(op);
  return op;
}

// ============ Factories ============

export const ops = {
  addNode(
    id: NodeId,
    type: string,
    widgets: Record<string, WidgetValue>,
    meta?: Record<string, unknown>,
    position?: readonly [number, number],
  ): AddNodeOperation {
    const op: { -readonly [K in keyof AddNodeOperation]: AddNodeOperation[K] } = {
      kind: 'add_node',
      id,
      type,
      widgets: { ...widgets },
    };
    if (meta) op.meta = { ...meta };
    if (position) op.position = [position[0], position[1]];
    return freezeOperation(op);
  },
  removeNode(id: NodeId): RemoveNodeOperation {
    return freezeOperation<RemoveNodeOperation>({ kind: 'remove_node', id });
  },
  connect(from: SlotRef, to: SlotRef): ConnectOperation {
    return freezeOperation<ConnectOperation>({ kind: 'connect', from: { ...from }, to: { ...to } });
  },
  disconnect(from: SlotRef, to: SlotRef): DisconnectOperation {
    return freezeOperation<DisconnectOperation>({ kind: 'disconnect', from: { ...from }, to: { ...to } });
  },
  setWidget(id: NodeId, widget: string, value: WidgetValue): SetWidgetOperation {
    return freezeOperation<SetWidgetOperation>({ kind: 'set_widget', id, widget, value });
  },
};

// ============ Description ============

/** One human-readable line per operation. Informational only. */
export function describeOperation(op: Operation): string {
  switch (op.kind) {
    case 'add_node': {
      const title = typeof op.meta?.title === 'string' ? ` "${op.meta.title}"` : '';
      return `Add ${op.type}${title} as node ${op.id}`;
    }
    case 'remove_node':
      return `Remove node ${op.id} and its links`;
    case 'connect':
      return `Connect ${formatEndpoint(op.from)} -> ${formatEndpoint(op.to)}`;
    case 'disconnect':
      return `Disconnect ${formatEndpoint(op.from)} -> ${formatEndpoint(op.to)}`;
    case 'set_widget':
      return `Set ${op.id}.${op.widget} = ${JSON.stringify(op.value)}`;
    default:
      return assertNever(op);
  }
}
