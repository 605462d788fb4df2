// src/node-runtime.ts
// Node runtime entry point: everything from index plus file loading

export * from './index.js';

export { loadCatalogFile, loadGraphFile } from './files.js';
