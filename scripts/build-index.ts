/**
 * Rebuild the embedding index from every case, script and active article
 * Usage: npm run index:build
 */

import { SYSTEM_ACTOR } from '../src/types/index.js';

import { bootstrapEngine } from './engine.js';

async function main(): Promise<void> {
  const engine = bootstrapEngine();
  const actor = { ...SYSTEM_ACTOR, requestId: 'build-index' };

  console.log(`Building index with ${engine.embeddingService.model}...`);
  const result = await engine.indexingService.rebuildIndex(actor);

  if (!result.success) {
    console.error(`Index build failed: ${result.error.code} ${result.error.message}`);
    process.exit(1);
  }

  const report = result.data;
  console.log(`Cases:    ${report.cases}`);
  console.log(`Scripts:  ${report.scripts}`);
  console.log(`Articles: ${report.articles}`);
  console.log(`Chunks:   ${report.chunks}`);

  if (report.failures.length > 0) {
    console.error(`\n${report.failures.length} source(s) failed:`);
    for (const f of report.failures) {
      console.error(`  ${f.sourceKind} ${f.sourceId}: ${f.code} ${f.message}`);
    }
    process.exit(1);
  }
}

main().catch((err: unknown) => {
  console.error('Index build crashed:', err);
  process.exit(1);
});
