import { loadOutputConfig } from './config.js';
import { renderDashboard } from './writer.js';

async function main(): Promise<void> {
  const { outputDir } = loadOutputConfig();
  const outPath = await renderDashboard(outputDir);
  console.log(`[metrics] Dashboard rendered to ${outPath}`);
}

main().catch((err: unknown) => {
  console.error('[metrics] render failed:', err instanceof Error ? err.message : err);
  process.exitCode = 1;
});
