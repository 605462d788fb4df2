// src/graph-tool-schema.ts
// Function-calling tool definitions handed to the reasoning agent.
// The agent never edits the graph directly: it reads the graph and catalog,
// then submits a Change Brief that the compiler turns into operations.

import type { Brief } from '@nodepatch/core';

// ============ Tool Input Types ============

export interface GetGraphInput {
  /** Comma or space separated node ids or class names. */
  focus?: string;
  groups?: string[];
}

export interface GetNodeTypesInput {
  /** Comma or space separated class name search terms. */
  query?: string;
}

export type SubmitBriefInput = Brief;

// ============ Brief JSON Schema ============

const NODE_REF = {
  description:
    'Node reference: "EXISTING_<id>" or a bare id for nodes in the workflow, "NODE_<n>" for nodes added by this brief, or a lookup object',
  oneOf: [
    { type: 'string', minLength: 1 },
    { type: 'integer', minimum: 0 },
    {
      type: 'object',
      properties: { title: { type: 'string', minLength: 1 } },
      required: ['title'],
      additionalProperties: false,
    },
    {
      type: 'object',
      properties: { type: { type: 'string', minLength: 1 } },
      required: ['type'],
      additionalProperties: false,
    },
  ],
};

const SLOT = {
  description: 'Slot index, or slot name on the node class',
  oneOf: [
    { type: 'integer', minimum: 0 },
    { type: 'string', minLength: 1 },
  ],
};

const WIDGET_VALUE = { type: ['string', 'number', 'boolean'] };

const WIDGETS = {
  description: 'Widget values by name, or positionally in declared order',
  oneOf: [
    { type: 'object', additionalProperties: WIDGET_VALUE },
    { type: 'array', items: WIDGET_VALUE },
  ],
};

const ENDPOINT = {
  type: 'object',
  properties: { node: NODE_REF, slot: SLOT },
  required: ['node', 'slot'],
  additionalProperties: false,
};

const LINK = {
  type: 'object',
  properties: { from: ENDPOINT, to: ENDPOINT },
  required: ['from', 'to'],
  additionalProperties: false,
};

/** Exactly one of the two spellings of a required field. */
const oneOfNames = (a: string, b: string) => [{ required: [a] }, { required: [b] }];

const POINT = { type: 'array', items: { type: 'number' }, minItems: 2, maxItems: 2 };

const explicitOperation = (kind: string, properties: Record<string, unknown>, required: string[]) => ({
  type: 'object',
  properties: { kind: { const: kind }, ...properties },
  required: ['kind', ...required],
  additionalProperties: false,
});

export const BRIEF_JSON_SCHEMA: Record<string, unknown> = {
  title: 'ChangeBrief',
  type: 'object',
  properties: {
    plan_summary: { type: 'string', description: 'One or two sentences describing the intended change' },
    nodes_to_delete: { type: 'array', items: NODE_REF },
    nodes_to_add: {
      type: 'array',
      items: {
        type: 'object',
        properties: {
          id: { type: 'string', description: 'Placeholder "NODE_<n>" or a requested id' },
          placeholder_id: { type: 'string', description: 'Same as id' },
          type: { type: 'string', description: 'Node class name from the catalog' },
          title: { type: 'string' },
          color: { type: 'string' },
          position: { ...POINT, description: 'Canvas position [x, y]' },
          widgets: WIDGETS,
          inputs: {
            type: 'array',
            items: {
              type: 'object',
              properties: { input: SLOT, input_name: SLOT, from: ENDPOINT },
              required: ['from'],
              oneOf: oneOfNames('input', 'input_name'),
              additionalProperties: false,
            },
          },
          outputs: {
            type: 'array',
            items: {
              type: 'object',
              properties: { output: SLOT, output_name: SLOT, to: { type: 'array', items: ENDPOINT } },
              required: ['to'],
              oneOf: oneOfNames('output', 'output_name'),
              additionalProperties: false,
            },
          },
        },
        required: ['type'],
        oneOf: oneOfNames('id', 'placeholder_id'),
        additionalProperties: false,
      },
    },
    nodes_to_update: {
      type: 'array',
      items: {
        type: 'object',
        properties: {
          target: NODE_REF,
          type: { type: ['string', 'null'], description: 'Must be the class the target already has' },
          widgets: WIDGETS,
        },
        required: ['target', 'widgets'],
        additionalProperties: false,
      },
    },
    links_to_remove: { type: 'array', items: LINK },
    links_to_add: {
      type: 'array',
      items: {
        type: 'object',
        properties: {
          from: ENDPOINT,
          to: ENDPOINT,
          replace: { type: 'boolean', description: 'Disconnect whatever feeds the input first' },
        },
        required: ['from', 'to'],
        additionalProperties: false,
      },
    },
    groups_to_add: {
      type: 'array',
      description: 'Layout groups drawn around nodes; presentation only',
      items: {
        type: 'object',
        properties: {
          title: { type: 'string' },
          bounding: { type: 'array', items: { type: 'number' }, minItems: 4, maxItems: 4 },
          color: { type: 'string' },
        },
        required: ['title', 'bounding'],
        additionalProperties: false,
      },
    },
    operations: {
      type: 'array',
      description: 'Explicit operations, applied after everything else',
      items: {
        oneOf: [
          explicitOperation(
            'add_node',
            { id: { type: 'string' }, type: { type: 'string' }, widgets: WIDGETS, meta: { type: 'object' } },
            ['id', 'type'],
          ),
          explicitOperation('remove_node', { id: NODE_REF }, ['id']),
          explicitOperation('connect', { from: ENDPOINT, to: ENDPOINT }, ['from', 'to']),
          explicitOperation('disconnect', { from: ENDPOINT, to: ENDPOINT }, ['from', 'to']),
          explicitOperation(
            'set_widget',
            { id: NODE_REF, widget: { type: 'string' }, value: WIDGET_VALUE },
            ['id', 'widget', 'value'],
          ),
        ],
      },
    },
  },
  additionalProperties: false,
};

// ============ Tool Definitions (for function-calling) ============

export interface ToolDefinition {
  name: string;
  description: string;
  parameters: Record<string, unknown>;
}

export const GRAPH_TOOLS: ToolDefinition[] = [
  {
    name: 'get_graph',
    description: 'Get the current workflow in compact text form, whole or narrowed to some nodes',
    parameters: {
      type: 'object',
      properties: {
        focus: { type: 'string', description: 'Node ids or class names, e.g. "3, KSampler"' },
        groups: { type: 'array', items: { type: 'string' }, description: 'Group titles to extract' },
      },
      required: [],
    },
  },
  {
    name: 'get_groups',
    description: 'List the layout groups with the nodes inside each',
    parameters: {
      type: 'object',
      properties: {},
      required: [],
    },
  },
  {
    name: 'get_node_types',
    description: 'List node class signatures matching the search terms',
    parameters: {
      type: 'object',
      properties: {
        query: { type: 'string', description: 'Class name search terms, e.g. "KSampler, upscale"' },
      },
      required: [],
    },
  },
  {
    name: 'get_models',
    description: 'List the model files offered by loader nodes, by kind and folder',
    parameters: {
      type: 'object',
      properties: {},
      required: [],
    },
  },
  {
    name: 'submit_brief',
    description: 'Submit a Change Brief; it is compiled and applied as a whole or rejected with a reason',
    parameters: BRIEF_JSON_SCHEMA,
  },
  {
    name: 'validate',
    description: 'Validate the current workflow against the node catalog',
    parameters: {
      type: 'object',
      properties: {},
      required: [],
    },
  },
];
