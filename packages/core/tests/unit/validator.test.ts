import { describe, expect, test } from 'vitest';
import { FormatError } from '../../src/errors.js';
import type { WorkflowGraph } from '../../src/graph.js';
import { hasCycles, parseWorkflowGraph, validateGraph } from '../../src/validator.js';
import { baseGraph, catalog } from '../helpers.js';

describe('validateGraph', () => {
  test('accepts the base workflow', () => {
    expect(validateGraph(baseGraph(), catalog)).toEqual({ valid: true, errors: [] });
  });

  test('reports every node problem in canonical id order', () => {
    const graph: WorkflowGraph = {
      nodes: {
        'bad id': { type: 'PreviewImage', widgets: {}, meta: {} },
        '2': { type: 'Nope', widgets: {}, meta: {} },
        '1': { type: 'EmptyLatentImage', widgets: { width: 512, height: 512, batch_size: 1, extra: 2 }, meta: {} },
      },
      links: [],
      meta: {},
    };
    const result = validateGraph(graph, catalog);
    expect(result.valid).toBe(false);
    expect(result.errors).toEqual([
      { path: 'nodes.1.widgets.extra', rule: 'unknown_widget', message: 'EmptyLatentImage has no widget "extra"' },
      { path: 'nodes.2.type', rule: 'unknown_class', message: 'Unknown node class "Nope"' },
      { path: 'nodes.bad id', rule: 'invalid_node_id', message: 'Node id "bad id" must match ^[A-Za-z0-9_-]+$' },
    ]);
  });

  test('reports duplicate links and doubly fed inputs', () => {
    const graph = baseGraph();
    graph.nodes['10'] = { type: 'EmptyLatentImage', widgets: { width: 512, height: 512, batch_size: 1 }, meta: {} };
    graph.links.push({ from: { node: '4', slot: 1 }, to: { node: '6', slot: 0 } });
    graph.links.push({ from: { node: '10', slot: 0 }, to: { node: '3', slot: 3 } });

    expect(validateGraph(graph, catalog).errors).toEqual([
      { path: 'links[9]', rule: 'duplicate_link', message: 'Duplicate link 4.1>6.0' },
      { path: 'links[10]', rule: 'input_occupied', message: 'Input 3.3 is fed by both 5.0 and 10.0' },
    ]);
  });

  test('reports slot ranges against the class declaration', () => {
    const graph = baseGraph();
    graph.links.push({ from: { node: '5', slot: 1 }, to: { node: '3', slot: 3 } });
    expect(validateGraph(graph, catalog).errors).toEqual([
      {
        path: 'links[9].from.slot',
        rule: 'slot_out_of_range',
        message: 'EmptyLatentImage (node 5) has no output slot 1; it has 1',
      },
    ]);
  });
});

describe('hasCycles', () => {
  test('finds a loop through links', () => {
    const graph: WorkflowGraph = {
      nodes: {
        a: { type: 'LoraLoader', widgets: {}, meta: {} },
        b: { type: 'LoraLoader', widgets: {}, meta: {} },
      },
      links: [{ from: { node: 'a', slot: 0 }, to: { node: 'b', slot: 0 } }],
      meta: {},
    };
    expect(hasCycles(graph)).toBe(false);
    graph.links.push({ from: { node: 'b', slot: 1 }, to: { node: 'a', slot: 1 } });
    expect(hasCycles(graph)).toBe(true);
  });
});

describe('parseWorkflowGraph', () => {
  test('fills in optional members', () => {
    expect(parseWorkflowGraph({ nodes: { '1': { type: 'PreviewImage' } } })).toEqual({
      nodes: { '1': { type: 'PreviewImage', widgets: {}, meta: {} } },
      links: [],
      meta: {},
    });
  });

  test('rejects a malformed document', () => {
    try {
      parseWorkflowGraph({ nodes: 5 });
      expect.unreachable();
    } catch (e) {
      expect(e).toBeInstanceOf(FormatError);
      if (!(e instanceof FormatError)) return;
      expect(e.rule).toBe('malformed_input');
      expect(e.field).toBe('nodes');
    }
  });
});
