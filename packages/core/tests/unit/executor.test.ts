import { describe, expect, test } from 'vitest';
import { encodeGraph } from '../../src/codec.js';
import { CatalogError, ExecutionError } from '../../src/errors.js';
import { execute } from '../../src/executor.js';
import { getNode } from '../../src/graph.js';
import { ops, parseOperationList, serializeOperationList } from '../../src/operations.js';
import { BASE_WORKFLOW, baseGraph, catalog } from '../helpers.js';

describe('execute', () => {
  test('applies every operation to a copy', () => {
    const graph = baseGraph();
    const result = execute(
      [
        ops.setWidget('3', 'steps', 30),
        ops.addNode('10', 'PreviewImage', {}),
        ops.connect({ node: '8', slot: 0 }, { node: '10', slot: 0 }),
      ],
      graph,
      catalog,
    );
    expect(result.ok).toBe(true);
    if (!result.ok) return;

    expect(result.graph.nodes['3']?.widgets.steps).toBe(30);
    expect(result.graph.nodes['10']).toEqual({ type: 'PreviewImage', widgets: {}, meta: {} });
    expect(result.graph.links).toHaveLength(10);
    expect(encodeGraph(graph, catalog)).toBe(BASE_WORKFLOW);
  });

  test('an empty list returns an equal but separate graph', () => {
    const graph = baseGraph();
    const result = execute([], graph, catalog);
    expect(result.ok).toBe(true);
    if (!result.ok) return;
    expect(result.graph).toEqual(graph);
    expect(result.graph).not.toBe(graph);
  });

  test('stops at the first failing operation and leaves the input untouched', () => {
    const graph = baseGraph();
    const before = structuredClone(graph);
    const result = execute(
      [
        ops.setWidget('3', 'steps', 30),
        ops.removeNode('4'),
        ops.connect({ node: '4', slot: 0 }, { node: '3', slot: 0 }),
        ops.addNode('10', 'PreviewImage', {}),
        ops.setWidget('3', 'cfg', 5),
      ],
      graph,
      catalog,
    );
    expect(result.ok).toBe(false);
    if (result.ok) return;

    expect(result.error).toBeInstanceOf(ExecutionError);
    expect(result.error.toJSON()).toEqual({
      kind: 'execution',
      rule: 'unknown_node',
      message: 'Operation 2 (connect): Node 4 does not exist',
      field: 'from.node',
      index: 2,
      operation: 'connect',
    });
    expect(graph).toEqual(before);
    expect(encodeGraph(graph, catalog)).toBe(BASE_WORKFLOW);
  });

  test('looks node ids up as own keys only', () => {
    const removed = execute([ops.removeNode('constructor')], baseGraph(), catalog);
    expect(removed.ok).toBe(false);
    if (removed.ok) return;
    expect(removed.error.rule).toBe('unknown_node');

    const added = execute([ops.addNode('constructor', 'PreviewImage', {})], baseGraph(), catalog);
    expect(added.ok).toBe(true);
    if (!added.ok) return;
    expect(Object.hasOwn(added.graph.nodes, 'constructor')).toBe(true);
    expect(getNode(added.graph, 'constructor')).toEqual({ type: 'PreviewImage', widgets: {}, meta: {} });
  });

  test('places an added node at its requested position', () => {
    const result = execute([ops.addNode('10', 'PreviewImage', {}, undefined, [100, 200])], baseGraph(), catalog);
    expect(result.ok).toBe(true);
    if (!result.ok) return;
    expect(result.graph.nodes['10']).toEqual({ type: 'PreviewImage', widgets: {}, meta: {}, position: [100, 200] });
  });

  test('re-checks operations that were valid when compiled', () => {
    const list = parseOperationList(serializeOperationList([ops.connect({ node: '5', slot: 0 }, { node: '3', slot: 3 })]));
    const result = execute(list, baseGraph(), catalog);
    expect(result.ok).toBe(false);
    if (result.ok) return;
    expect(result.error.rule).toBe('duplicate_link');
  });

  test('refuses a graph whose classes the catalog lacks', () => {
    const graph = {
      nodes: { '1': { type: 'Upscaler', widgets: {}, meta: {} } },
      links: [],
      meta: {},
    };
    const result = execute([ops.removeNode('1')], graph, catalog);
    expect(result.ok).toBe(false);
    if (result.ok) return;
    expect(result.error).toBeInstanceOf(CatalogError);
    expect(result.error.message).toBe('Catalog has no definition for "Upscaler"');
  });
});
