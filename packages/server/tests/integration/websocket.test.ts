/**
 * Integration tests for the session update stream
 */

import { afterEach, beforeEach, describe, expect, test } from 'vitest';
import type { FastifyInstance } from 'fastify';
import { createServer } from '../../src/app.js';
import { BASE_WORKFLOW, baseGraph, catalog } from '../../../core/tests/helpers.js';

let app: FastifyInstance;

beforeEach(async () => {
  app = await createServer({ catalog, graph: baseGraph(), logger: false });
  await app.ready();
});

afterEach(async () => {
  await app.close();
});

describe('GET /api/v1/graph/updates', () => {
  test('pushes the workflow after each commit', async () => {
    const ws = await app.injectWS('/api/v1/graph/updates');
    const received = new Promise<string>((resolve) => {
      ws.once('message', (data) => resolve(data.toString()));
    });

    const res = await app.inject({
      method: 'POST',
      url: '/api/v1/graph/load',
      payload: { text: 'CG/1\nN1:PreviewImage|' },
    });
    expect(res.statusCode).toBe(200);

    expect(JSON.parse(await received)).toEqual({ type: 'graph', text: 'CG/1\nN1:PreviewImage|' });
    expect(app.session.listenerCount).toBe(1);
    ws.terminate();
  });

  test('a rejected apply pushes nothing', async () => {
    const ws = await app.injectWS('/api/v1/graph/updates');
    const messages: string[] = [];
    ws.on('message', (data) => messages.push(data.toString()));

    const rejected = await app.inject({
      method: 'POST',
      url: '/api/v1/graph/apply',
      payload: { brief: { nodes_to_delete: ['EXISTING_42'] } },
    });
    expect(rejected.statusCode).toBe(422);

    const received = new Promise<string>((resolve) => {
      ws.once('message', (data) => resolve(data.toString()));
    });
    await app.inject({
      method: 'POST',
      url: '/api/v1/graph/apply',
      payload: { brief: { nodes_to_delete: ['EXISTING_9'] } },
    });
    expect(JSON.parse(await received)).toEqual({
      type: 'graph',
      text: BASE_WORKFLOW.replace('\nN9:SaveImage|ComfyUI', '').replace('\nL8.0>9.0', ''),
    });
    expect(messages).toHaveLength(1);
    ws.terminate();
  });
});
