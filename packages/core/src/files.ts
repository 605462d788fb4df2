// src/files.ts
// Loading catalogs and workflows from disk (Node.js only)

import * as fs from 'fs';
import * as path from 'path';
import { NodeCatalog } from './catalog.js';
import { decodeGraph } from './codec.js';
import { CatalogError, FormatError } from './errors.js';
import type { WorkflowGraph } from './graph.js';
import { importWorkflow } from './litegraph.js';

/**
 * Read an object_info JSON document and build a catalog from it.
 */
export function loadCatalogFile(filePath: string): NodeCatalog {
  const text = fs.readFileSync(filePath, 'utf-8');
  let data: unknown;
  try {
    data = JSON.parse(text);
  } catch (e) {
    throw new CatalogError(`${path.basename(filePath)} is not valid JSON: ${e instanceof Error ? e.message : String(e)}`);
  }
  return NodeCatalog.fromObjectInfo(data);
}

/**
 * Read a workflow from disk: `.json` files are native workflows, anything
 * else is compact text.
 */
export function loadGraphFile(filePath: string, catalog: NodeCatalog): WorkflowGraph {
  const text = fs.readFileSync(filePath, 'utf-8');
  if (path.extname(filePath).toLowerCase() !== '.json') {
    return decodeGraph(text, catalog);
  }
  let data: unknown;
  try {
    data = JSON.parse(text);
  } catch (e) {
    throw new FormatError(
      'malformed_input',
      `${path.basename(filePath)} is not valid JSON: ${e instanceof Error ? e.message : String(e)}`,
    );
  }
  return importWorkflow(data, catalog);
}
