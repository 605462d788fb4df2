// Server entry point: environment -> catalog -> session workflow -> listen
import 'dotenv/config';
import { loadCatalogFile, loadGraphFile } from '@nodepatch/core/node-runtime';
import { createServer } from './app.js';
import { loadConfig } from './config.js';

async function main() {
  const config = loadConfig();
  const catalog = loadCatalogFile(config.CATALOG_PATH);
  const graph = config.WORKFLOW_PATH ? loadGraphFile(config.WORKFLOW_PATH, catalog) : undefined;

  const app = await createServer({ catalog, graph, logger: { level: config.LOG_LEVEL } });

  try {
    await app.listen({ port: config.PORT, host: config.HOST });
  } catch (err) {
    app.log.error(err);
    process.exit(1);
  }
}

main().catch((err: unknown) => {
  console.error(err);
  process.exit(1);
});
