import { describe, expect, test } from 'vitest';
import { NodeCatalog } from '../../src/catalog.js';
import { decodeGraph } from '../../src/codec.js';
import { applyOperation, checkOperation } from '../../src/graph-tools.js';
import { ops } from '../../src/operations.js';
import { baseGraph, catalog } from '../helpers.js';

const LORA_CHAIN = [
  'CG/1',
  'N1:LoraLoader|detail.safetensors;1;1',
  'N2:LoraLoader|style.safetensors;0.5;0.5',
  'L1.0>2.0',
  'L1.1>2.1',
].join('\n');

describe('checkOperation: add_node', () => {
  test('accepts a complete widget set', () => {
    const op = ops.addNode('10', 'EmptyLatentImage', { width: 768, height: 512, batch_size: 2 });
    expect(checkOperation(baseGraph(), op, catalog)).toBeNull();
  });

  test('rejects a taken id', () => {
    expect(checkOperation(baseGraph(), ops.addNode('3', 'PreviewImage', {}), catalog)).toEqual({
      rule: 'duplicate_node',
      field: 'id',
      message: 'Node 3 already exists',
    });
  });

  test('rejects an id outside the allowed alphabet', () => {
    expect(checkOperation(baseGraph(), ops.addNode('a b', 'PreviewImage', {}), catalog)?.rule).toBe(
      'invalid_node_id',
    );
  });

  test('rejects an unknown class', () => {
    expect(checkOperation(baseGraph(), ops.addNode('10', 'Upscaler', {}), catalog)).toEqual({
      rule: 'unknown_class',
      field: 'type',
      message: 'Unknown node class "Upscaler"',
    });
  });

  test('rejects a missing widget', () => {
    expect(checkOperation(baseGraph(), ops.addNode('10', 'EmptyLatentImage', { width: 512 }), catalog)).toEqual({
      rule: 'missing_widget_value',
      field: 'widgets.height',
      message: 'Widget "height" of EmptyLatentImage has no value',
    });
  });
});

describe('checkOperation: ids and widget names shared with object members', () => {
  test('a node id like constructor is free until added', () => {
    expect(checkOperation(baseGraph(), ops.addNode('constructor', 'PreviewImage', {}), catalog)).toBeNull();
    expect(checkOperation(baseGraph(), ops.removeNode('toString'), catalog)).toEqual({
      rule: 'unknown_node',
      field: 'id',
      message: 'Node toString does not exist',
    });
    expect(checkOperation(baseGraph(), ops.setWidget('hasOwnProperty', 'steps', 1), catalog)?.rule).toBe('unknown_node');
  });

  test('a widget named toString still needs a value', () => {
    const notes = NodeCatalog.fromObjectInfo({
      Note: { input: { required: { toString: ['STRING', { default: '' }] } }, output: [] },
    });
    const graph = { nodes: {}, links: [], meta: {} };
    expect(checkOperation(graph, ops.addNode('1', 'Note', {}), notes)).toEqual({
      rule: 'missing_widget_value',
      field: 'widgets.toString',
      message: 'Widget "toString" of Note has no value',
    });
    expect(checkOperation(graph, ops.addNode('1', 'Note', { toString: 'hi' }), notes)).toBeNull();
  });
});

describe('checkOperation: connect', () => {
  test('rejects incompatible slot types', () => {
    const op = ops.connect({ node: '4', slot: 0 }, { node: '8', slot: 1 });
    expect(checkOperation(baseGraph(), op, catalog)).toEqual({
      rule: 'type_mismatch',
      field: 'to.slot',
      message: 'Output "MODEL" (MODEL) of node 4 cannot feed input "vae" (VAE) of node 8',
    });
  });

  test('rejects an output slot the class does not have', () => {
    const op = ops.connect({ node: '9', slot: 0 }, { node: '8', slot: 0 });
    expect(checkOperation(baseGraph(), op, catalog)).toEqual({
      rule: 'slot_out_of_range',
      field: 'from.slot',
      message: 'SaveImage (node 9) has no output slot 0; it has 0',
    });
  });

  test('rejects an existing link', () => {
    const op = ops.connect({ node: '4', slot: 1 }, { node: '6', slot: 0 });
    expect(checkOperation(baseGraph(), op, catalog)?.message).toBe('Link 4.1 -> 6.0 already exists');
  });

  test('rejects an input that is already fed', () => {
    const op = ops.connect({ node: '7', slot: 0 }, { node: '3', slot: 1 });
    expect(checkOperation(baseGraph(), op, catalog)).toEqual({
      rule: 'input_occupied',
      field: 'to',
      message: 'Input 3.1 is already fed by 6.0',
    });
  });

  test('rejects links that close a loop', () => {
    const graph = decodeGraph(LORA_CHAIN, catalog);
    const back = ops.connect({ node: '2', slot: 0 }, { node: '1', slot: 0 });
    expect(checkOperation(graph, back, catalog)).toEqual({
      rule: 'cycle',
      field: 'to',
      message: 'Link 2.0 -> 1.0 would create a cycle',
    });
    const self = ops.connect({ node: '1', slot: 1 }, { node: '1', slot: 1 });
    expect(checkOperation(graph, self, catalog)?.rule).toBe('cycle');
  });
});

describe('checkOperation: disconnect, remove_node, set_widget', () => {
  test('disconnect needs the exact link', () => {
    const op = ops.disconnect({ node: '5', slot: 0 }, { node: '3', slot: 1 });
    expect(checkOperation(baseGraph(), op, catalog)).toEqual({
      rule: 'missing_link',
      field: 'to',
      message: 'Link 5.0 -> 3.1 does not exist',
    });
    expect(checkOperation(baseGraph(), ops.disconnect({ node: '5', slot: 0 }, { node: '3', slot: 3 }), catalog)).toBeNull();
  });

  test('remove_node needs an existing node', () => {
    expect(checkOperation(baseGraph(), ops.removeNode('42'), catalog)).toEqual({
      rule: 'unknown_node',
      field: 'id',
      message: 'Node 42 does not exist',
    });
  });

  test('set_widget checks the name and the value', () => {
    expect(checkOperation(baseGraph(), ops.setWidget('3', 'seeds', 1), catalog)).toEqual({
      rule: 'unknown_widget',
      field: 'widget',
      message: 'KSampler has no widget "seeds"',
    });
    expect(checkOperation(baseGraph(), ops.setWidget('3', 'sampler_name', 'heun'), catalog)).toEqual({
      rule: 'invalid_widget_value',
      field: 'value',
      message: 'Widget "sampler_name" of KSampler: "heun" is not one of ["euler", "euler_ancestral", "dpmpp_2m"]',
    });
    expect(checkOperation(baseGraph(), ops.setWidget('3', 'steps', 2.5), catalog)?.message).toBe(
      'Widget "steps" of KSampler: expected an integer, got 2.5',
    );
  });
});

describe('applyOperation', () => {
  test('removing a node drops every link touching it', () => {
    const graph = baseGraph();
    applyOperation(graph, ops.removeNode('4'));
    expect(graph.nodes['4']).toBeUndefined();
    expect(graph.links).toHaveLength(5);
    expect(graph.links.some((l) => l.from.node === '4')).toBe(false);
  });

  test('added nodes own their widgets and metadata', () => {
    const graph = baseGraph();
    const op = ops.addNode('10', 'PreviewImage', {}, { title: 'Check' });
    applyOperation(graph, op);
    const node = graph.nodes['10'];
    expect(node).toEqual({ type: 'PreviewImage', widgets: {}, meta: { title: 'Check' } });
    if (!node) return;
    node.meta.title = 'Changed';
    expect(op.meta?.title).toBe('Check');
  });

  test('set_widget replaces one value', () => {
    const graph = baseGraph();
    applyOperation(graph, ops.setWidget('3', 'steps', 30));
    expect(graph.nodes['3']?.widgets.steps).toBe(30);
  });
});
