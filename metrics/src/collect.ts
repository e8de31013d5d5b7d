import { MetricsCollector } from './collector.js';
import { loadMetricsConfig } from './config.js';
import { GitHubClient } from './githubClient.js';
import { writeReport } from './writer.js';

async function main(): Promise<void> {
  const config = loadMetricsConfig();
  const collector = new MetricsCollector(new GitHubClient({ token: config.token }), config);
  const report = await collector.collectAll();
  const outPath = await writeReport(report, config.outputDir);
  console.log(`[metrics] Metrics collected and written to ${outPath}`);
  console.log(JSON.stringify(report, null, 2));
}

main().catch((err: unknown) => {
  console.error('[metrics] collection failed:', err instanceof Error ? err.message : err);
  process.exitCode = 1;
});
