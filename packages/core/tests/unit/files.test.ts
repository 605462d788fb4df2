import * as fs from 'fs';
import * as os from 'os';
import * as path from 'path';
import { afterEach, beforeEach, describe, expect, test } from 'vitest';
import { encodeGraph } from '../../src/codec.js';
import { FormatError } from '../../src/errors.js';
import { loadGraphFile } from '../../src/files.js';
import { exportWorkflow } from '../../src/litegraph.js';
import { BASE_WORKFLOW, baseGraph, catalog } from '../helpers.js';

let dir: string;

beforeEach(() => {
  dir = fs.mkdtempSync(path.join(os.tmpdir(), 'nodepatch-'));
});

afterEach(() => {
  fs.rmSync(dir, { recursive: true, force: true });
});

describe('loadGraphFile', () => {
  test('reads compact text', () => {
    const file = path.join(dir, 'workflow.cg');
    fs.writeFileSync(file, BASE_WORKFLOW);
    expect(encodeGraph(loadGraphFile(file, catalog), catalog)).toBe(BASE_WORKFLOW);
  });

  test('reads native workflow JSON', () => {
    const file = path.join(dir, 'workflow.json');
    fs.writeFileSync(file, JSON.stringify(exportWorkflow(baseGraph(), catalog)));
    expect(encodeGraph(loadGraphFile(file, catalog), catalog)).toBe(BASE_WORKFLOW);
  });

  test('rejects broken JSON with a format error', () => {
    const file = path.join(dir, 'broken.JSON');
    fs.writeFileSync(file, '{"nodes": [');
    expect(() => loadGraphFile(file, catalog)).toThrow(FormatError);
    expect(() => loadGraphFile(file, catalog)).toThrow(/^broken\.JSON is not valid JSON: /);
  });
});
