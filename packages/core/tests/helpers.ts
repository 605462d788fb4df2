// tests/helpers.ts
// Shared fixtures for core tests

import { fileURLToPath } from 'url';
import { decodeGraph } from '../src/codec.js';
import { loadCatalogFile } from '../src/files.js';
import type { NodeCatalog } from '../src/catalog.js';
import type { WorkflowGraph } from '../src/graph.js';

export const OBJECT_INFO_PATH = fileURLToPath(new URL('./fixtures/object_info.json', import.meta.url));

export const catalog: NodeCatalog = loadCatalogFile(OBJECT_INFO_PATH);

/** Text-to-image pipeline: checkpoint, two prompts, sampler, decode, save. */
export const BASE_WORKFLOW = [
  'CG/1',
  'N3:KSampler|42;fixed;20;8;euler;normal;1',
  'N4:CheckpointLoaderSimple|v1-5-pruned.safetensors',
  'N5:EmptyLatentImage|512;512;1',
  'N6:CLIPTextEncode|a photo of a cat|{"title":"Positive"}',
  'N7:CLIPTextEncode|blurry|{"title":"Negative"}',
  'N8:VAEDecode|',
  'N9:SaveImage|ComfyUI',
  'L3.0>8.0',
  'L4.0>3.0',
  'L4.1>6.0',
  'L4.1>7.0',
  'L4.2>8.1',
  'L5.0>3.3',
  'L6.0>3.1',
  'L7.0>3.2',
  'L8.0>9.0',
].join('\n');

export function baseGraph(): WorkflowGraph {
  return decodeGraph(BASE_WORKFLOW, catalog);
}

/** Brief text wrapped the way a model usually answers. */
export function fenced(brief: unknown): string {
  return `Here is the plan.\n\n\`\`\`json\n${JSON.stringify(brief, null, 2)}\n\`\`\`\n`;
}
