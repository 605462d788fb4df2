// HTTP request bodies and WebSocket push messages
import { z } from 'zod';

// ============ Request Bodies ============

export const EncodeBodySchema = z.object({
  graph: z.unknown(), // Workflow Graph - shape checked by parseWorkflowGraph
});

export const TextBodySchema = z.object({
  text: z.string(),
});

export const ImportBodySchema = z.object({
  workflow: z.record(z.unknown()),
});

/** A brief is opaque text; a JSON object is accepted and serialized as-is. */
const BriefFieldSchema = z.union([z.string(), z.record(z.unknown())]);

export const CompileBodySchema = z.object({
  brief: BriefFieldSchema,
  text: z.string().optional(),
});

export const ExecuteBodySchema = z.object({
  operations: z.unknown(), // serialized Operation List - checked by parseOperationList
  text: z.string().optional(),
});

export const ApplyBodySchema = z.object({
  brief: BriefFieldSchema,
});

/** Node ids or class names to narrow the workflow to, and group titles to add. */
const SelectionFields = {
  focus: z.string().optional(),
  groups: z.array(z.string().min(1)).optional(),
};

export const ContextBodySchema = z.object({
  query: z.string().optional(),
  brief: z.string().optional(),
  ...SelectionFields,
  models: z.boolean().optional(),
});

export const ExtractBodySchema = z.object(SelectionFields);

export type CompileBody = z.infer<typeof CompileBodySchema>;

export function briefText(brief: CompileBody['brief']): string {
  return typeof brief === 'string' ? brief : JSON.stringify(brief);
}

// ============ Server → Client Messages ============

/**
 * Graph message - the session workflow after a commit.
 */
export const ServerGraphMessageSchema = z.object({
  type: z.literal('graph'),
  text: z.string(),
});

export type ServerGraphMessage = z.infer<typeof ServerGraphMessageSchema>;

/**
 * Error message - the session workflow could not be rendered.
 */
export const ServerErrorMessageSchema = z.object({
  type: z.literal('error'),
  message: z.string(),
});

export type ServerErrorMessage = z.infer<typeof ServerErrorMessageSchema>;

export type ServerMessage = ServerGraphMessage | ServerErrorMessage;

export function buildGraphMessage(text: string): ServerGraphMessage {
  return { type: 'graph', text };
}

export function buildErrorMessage(message: string): ServerErrorMessage {
  return { type: 'error', message };
}
