// src/index.ts
// Main entry point for @nodepatch/agent

// Tool schema and definitions (for LLM function-calling)
export {
  BRIEF_JSON_SCHEMA,
  GRAPH_TOOLS,
  type ToolDefinition,
  type GetGraphInput,
  type GetNodeTypesInput,
  type SubmitBriefInput,
} from './graph-tool-schema.js';

// Context building
export {
  buildAgentContext,
  formatSignature,
  WORKFLOW_HEADING,
  GROUPS_HEADING,
  DEFINITIONS_HEADING,
  MODELS_HEADING,
  BRIEF_HEADING,
  type AgentContext,
  type AgentContextInput,
  type AgentContextStats,
} from './context.js';
