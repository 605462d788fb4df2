import * as fs from 'fs';
import * as os from 'os';
import * as path from 'path';
import { describe, expect, test } from 'vitest';
import {
  CONTROL_WIDGET_OPTIONS,
  NodeCatalog,
  assertCatalogCovers,
  filterCatalog,
  parseSearchTerms,
} from '../../src/catalog.js';
import { CatalogError } from '../../src/errors.js';
import { loadCatalogFile } from '../../src/files.js';
import { catalog } from '../helpers.js';

describe('NodeCatalog.fromObjectInfo', () => {
  test('lists classes in code-unit order', () => {
    expect(catalog.size).toBe(9);
    expect(catalog.names()).toEqual([
      'CLIPTextEncode',
      'CheckpointLoaderSimple',
      'EmptyLatentImage',
      'ImageScale',
      'KSampler',
      'LoraLoader',
      'PreviewImage',
      'SaveImage',
      'VAEDecode',
    ]);
  });

  test('splits link inputs from widgets in declared order', () => {
    const def = catalog.require('KSampler');
    expect(def.inputs.map((i) => i.name)).toEqual(['model', 'positive', 'negative', 'latent_image']);
    expect(def.widgets.map((w) => w.name)).toEqual([
      'seed',
      'control_after_generate',
      'steps',
      'cfg',
      'sampler_name',
      'scheduler',
      'denoise',
    ]);
    expect(def.outputs).toEqual([{ name: 'LATENT', type: 'LATENT' }]);
  });

  test('adds a control widget after a seed-like INT', () => {
    const control = catalog.require('KSampler').widgets[1];
    expect(control).toEqual({
      name: 'control_after_generate',
      type: 'COMBO',
      options: CONTROL_WIDGET_OPTIONS,
      default: 'randomize',
    });
  });

  test('keeps widget declarations', () => {
    const seed = catalog.require('KSampler').widgets[0];
    expect(seed).toEqual({ name: 'seed', type: 'INT', default: 0, min: 0, max: 1125899906842624 });

    const text = catalog.require('CLIPTextEncode').widgets[0];
    expect(text).toEqual({ name: 'text', type: 'STRING', multiline: true });

    const prefix = catalog.require('SaveImage').widgets[0];
    expect(prefix).toEqual({ name: 'filename_prefix', type: 'STRING', default: 'ComfyUI' });
  });

  test('keeps display name and category', () => {
    const def = catalog.require('CheckpointLoaderSimple');
    expect(def.displayName).toBe('Load Checkpoint');
    expect(def.category).toBe('loaders');
  });

  test('definitions are frozen', () => {
    const def = catalog.require('KSampler');
    expect(Object.isFrozen(def)).toBe(true);
    expect(Object.isFrozen(def.widgets)).toBe(true);
    expect(Object.isFrozen(def.widgets[0])).toBe(true);
  });

  test('accepts a node_definitions wrapper', () => {
    const wrapped = NodeCatalog.fromObjectInfo({
      node_definitions: { PreviewImage: { input: { required: { images: ['IMAGE'] } }, output: [] } },
    });
    expect(wrapped.names()).toEqual(['PreviewImage']);
  });

  test('forceInput turns a widget type into a link input', () => {
    const cat = NodeCatalog.fromObjectInfo({
      Offset: { input: { required: { amount: ['INT', { forceInput: true }] } }, output: ['INT'] },
    });
    const def = cat.require('Offset');
    expect(def.inputs).toEqual([{ name: 'amount', types: ['INT'], required: true }]);
    expect(def.widgets).toEqual([]);
  });

  test('optional inputs follow required ones and honour input_order', () => {
    const cat = NodeCatalog.fromObjectInfo({
      Blend: {
        input: {
          required: { b: ['IMAGE'], a: ['IMAGE'] },
          optional: { mask: ['MASK'] },
        },
        input_order: { required: ['a', 'b'] },
        output: ['IMAGE'],
      },
    });
    expect(cat.require('Blend').inputs).toEqual([
      { name: 'a', types: ['IMAGE'], required: true },
      { name: 'b', types: ['IMAGE'], required: true },
      { name: 'mask', types: ['MASK'], required: false },
    ]);
  });

  test('splits comma separated slot types', () => {
    const cat = NodeCatalog.fromObjectInfo({
      Inspect: { input: { required: { value: ['IMAGE,MASK'] } }, output: [] },
    });
    expect(cat.require('Inspect').inputs[0]?.types).toEqual(['IMAGE', 'MASK']);
  });

  test('rejects a non-object document', () => {
    expect(() => NodeCatalog.fromObjectInfo([])).toThrow('Node definitions must be a JSON object');
  });

  test('rejects a default outside the declared range', () => {
    const build = () =>
      NodeCatalog.fromObjectInfo({
        Bad: { input: { required: { n: ['INT', { default: 5, max: 3 }] } } },
      });
    expect(build).toThrow(CatalogError);
    expect(build).toThrow('Bad.input.required.n: default 5 is above the maximum 3');
  });

  test('rejects an input type that is neither a name nor a choice list', () => {
    expect(() =>
      NodeCatalog.fromObjectInfo({ X: { input: { required: { a: [5] } } } }),
    ).toThrow('X.input.required.a: input type must be a string or a list of choices');
  });

  test('reports the field of a malformed entry', () => {
    try {
      NodeCatalog.fromObjectInfo({ X: { output: 5 } });
      expect.unreachable();
    } catch (e) {
      expect(e).toBeInstanceOf(CatalogError);
      if (!(e instanceof CatalogError)) return;
      expect(e.rule).toBe('malformed_catalog');
      expect(e.className).toBe('X');
      expect(e.field).toBe('X.output');
    }
  });

  test('rejects a widget name shared with an input', () => {
    expect(
      () =>
        new NodeCatalog([
          {
            name: 'Clash',
            inputs: [{ name: 'value', types: ['INT'], required: true }],
            outputs: [],
            widgets: [{ name: 'value', type: 'INT' }],
          },
        ]),
    ).toThrow('Clash: duplicate widget "value"');
  });

  test('rejects duplicate class names', () => {
    const def = { name: 'Twice', inputs: [], outputs: [], widgets: [] };
    expect(() => new NodeCatalog([def, def])).toThrow('Duplicate node class "Twice"');
  });

  test('require throws for an unknown class', () => {
    expect(() => catalog.require('Upscaler')).toThrow('Unknown node class "Upscaler"');
  });
});

describe('filterCatalog', () => {
  test('an exact or case-insensitive name picks one class', () => {
    expect(filterCatalog(catalog, ['KSampler']).names()).toEqual(['KSampler']);
    expect(filterCatalog(catalog, ['ksampler']).names()).toEqual(['KSampler']);
  });

  test('otherwise matches every class containing the term', () => {
    expect(filterCatalog(catalog, ['image']).names()).toEqual([
      'EmptyLatentImage',
      'ImageScale',
      'PreviewImage',
      'SaveImage',
    ]);
  });

  test('ignores blank terms and unions the rest', () => {
    expect(filterCatalog(catalog, [' ', 'vae', 'lora']).names()).toEqual(['LoraLoader', 'VAEDecode']);
  });
});

describe('parseSearchTerms', () => {
  test('splits on commas, plus signs and whitespace', () => {
    expect(parseSearchTerms('vae, lora+scale  x')).toEqual(['vae', 'lora', 'scale', 'x']);
    expect(parseSearchTerms('')).toEqual([]);
  });
});

describe('assertCatalogCovers', () => {
  test('names every class the catalog lacks', () => {
    const graph = {
      nodes: {
        '1': { type: 'Upscaler', widgets: {}, meta: {} },
        '2': { type: 'PreviewImage', widgets: {}, meta: {} },
        '3': { type: 'FaceFix', widgets: {}, meta: {} },
      },
      links: [],
      meta: {},
    };
    try {
      assertCatalogCovers(catalog, graph);
      expect.unreachable();
    } catch (e) {
      expect(e).toBeInstanceOf(CatalogError);
      if (!(e instanceof CatalogError)) return;
      expect(e.message).toBe('Catalog has no definition for "FaceFix", "Upscaler"');
      expect(e.rule).toBe('unknown_class');
      expect(e.className).toBe('FaceFix');
    }
  });
});

describe('loadCatalogFile', () => {
  test('reports a file that is not JSON', () => {
    const dir = fs.mkdtempSync(path.join(os.tmpdir(), 'nodepatch-'));
    const file = path.join(dir, 'broken.json');
    fs.writeFileSync(file, '{ not json');
    try {
      expect(() => loadCatalogFile(file)).toThrow(/^broken\.json is not valid JSON: /);
    } finally {
      fs.rmSync(dir, { recursive: true, force: true });
    }
  });
});
