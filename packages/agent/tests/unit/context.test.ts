import { fileURLToPath } from 'url';
import { describe, expect, test } from 'vitest';
import { appendGroups, decodeGraph, getNode } from '@nodepatch/core';
import { loadCatalogFile } from '@nodepatch/core/node-runtime';
import { buildAgentContext, formatSignature } from '../../src/context.js';

const catalog = loadCatalogFile(
  fileURLToPath(new URL('../../../core/tests/fixtures/object_info.json', import.meta.url)),
);

const LEGEND =
  'types: B=BOOLEAN P=CLIP CV=CLIP_VISION CO=CLIP_VISION_OUTPUT L=COMBO C=CONDITIONING T=CONTROL_NET ' +
  'F=FLOAT G=IMAGE I=INT A=LATENT K=MASK M=MODEL S=STRING V=VAE';

const graph = decodeGraph('CG/1\nN1:EmptyLatentImage|512;512;1\nN2:PreviewImage|', catalog);

describe('formatSignature', () => {
  test('lists inputs, widgets and outputs with short types', () => {
    expect(formatSignature(catalog.require('KSampler'))).toBe(
      '@KSampler +model:M +positive:C +negative:C +latent_image:A %seed:INT %control_after_generate:COMBO ' +
        '%steps:INT %cfg:FLOAT %sampler_name:COMBO %scheduler:COMBO %denoise:FLOAT -A',
    );
    expect(formatSignature(catalog.require('PreviewImage'))).toBe('@PreviewImage +images:G');
  });
});

describe('buildAgentContext', () => {
  test('renders workflow, definitions and brief sections', () => {
    const context = buildAgentContext({ graph, catalog, terms: ['vae'], brief: '  add a preview \n' });
    const expected = [
      '=== CURRENT WORKFLOW (compact) ===',
      'CG/1',
      'N1:EmptyLatentImage|512;512;1',
      'N2:PreviewImage|',
      '',
      '=== NODE DEFINITIONS ===',
      LEGEND,
      '@EmptyLatentImage %width:INT %height:INT %batch_size:INT -A',
      '@PreviewImage +images:G',
      '@VAEDecode +samples:A +vae:V -G',
      '',
      '=== CHANGE BRIEF ===',
      'add a preview',
    ].join('\n');
    expect(context.text).toBe(expected);
    expect(context.stats).toEqual({ classCount: 3, workflowLines: 3, characters: expected.length });
  });

  test('omits the brief section when there is no brief', () => {
    const context = buildAgentContext({ graph, catalog, brief: '   ' });
    expect(context.text.endsWith('@PreviewImage +images:G')).toBe(true);
    expect(context.stats.classCount).toBe(2);
  });

  test('is byte-identical for equal inputs', () => {
    const reordered = decodeGraph('CG/1\nN2:PreviewImage|\nN1:EmptyLatentImage|512;512;1', catalog);
    expect(buildAgentContext({ graph: reordered, catalog, terms: ['VAEDecode'] }).text).toBe(
      buildAgentContext({ graph, catalog, terms: ['VAEDecode'] }).text,
    );
  });

  test('lists layout groups after the workflow', () => {
    const grouped = decodeGraph('CG/1\nN1:EmptyLatentImage|512;512;1\nN2:PreviewImage|', catalog);
    const latent = getNode(grouped, '1');
    if (latent) latent.position = [5, 5];
    appendGroups(grouped, [
      { title: 'Latent', bounding: [0, 0, 10, 10] },
      { title: 'Spare', bounding: [50, 50, 10, 10] },
    ]);
    const sections = buildAgentContext({ graph: grouped, catalog }).text.split('\n\n');
    expect(sections[1]).toBe('=== GROUPS ===\n"Latent" [0, 0, 10, 10]: 1\n"Spare" [50, 50, 10, 10]: (empty)');
  });

  test('narrows the workflow to focused nodes and the links leaving them', () => {
    const chain = decodeGraph(
      'CG/1\nN1:EmptyLatentImage|512;512;1\nN2:VAEDecode|\nN3:PreviewImage|\nL1.0>2.0\nL2.0>3.0',
      catalog,
    );
    const context = buildAgentContext({ graph: chain, catalog, focus: ['2'] });
    expect(context.text).toBe(
      [
        '=== CURRENT WORKFLOW (compact) ===',
        'CG/1',
        'N2:VAEDecode|',
        'L1.0>2.0',
        'L2.0>3.0',
        '',
        '=== NODE DEFINITIONS ===',
        LEGEND,
        '@VAEDecode +samples:A +vae:V -G',
      ].join('\n'),
    );
    expect(context.stats.workflowLines).toBe(4);
  });

  test('selects group members by title and ignores unknown titles', () => {
    const grouped = decodeGraph('CG/1\nN1:EmptyLatentImage|512;512;1\nN2:PreviewImage|', catalog);
    const preview = getNode(grouped, '2');
    if (preview) preview.position = [0, 0];
    appendGroups(grouped, [{ title: 'Output', bounding: [0, 0, 100, 100] }]);
    const context = buildAgentContext({ graph: grouped, catalog, groups: ['output', 'Missing'] });
    expect(context.text.startsWith('=== CURRENT WORKFLOW (compact) ===\nCG/1\nN2:PreviewImage|\n\n')).toBe(true);
    expect(context.stats.classCount).toBe(1);
  });

  test('lists model files when asked', () => {
    const context = buildAgentContext({ graph, catalog, models: true });
    expect(
      context.text.endsWith(
        '=== MODELS ===\n' +
          'checkpoints: sdxl_base.safetensors, v1-5-pruned.safetensors\n' +
          'loras: detail.safetensors, style.safetensors',
      ),
    ).toBe(true);
  });
});
