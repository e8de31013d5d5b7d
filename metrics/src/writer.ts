import { copyFile, mkdir, writeFile } from 'fs/promises';
import path from 'path';
import { fileURLToPath } from 'url';
import type { MetricsReport } from './report.js';

export const METRICS_FILE = 'metrics.json';
export const DASHBOARD_FILE = 'index.html';

const thisDir = path.dirname(fileURLToPath(import.meta.url));
export const DASHBOARD_TEMPLATE_PATH = path.resolve(thisDir, '..', 'templates', 'index.html');

export async function writeReport(report: MetricsReport, outDir: string): Promise<string> {
  await mkdir(outDir, { recursive: true });
  const outPath = path.join(outDir, METRICS_FILE);
  await writeFile(outPath, JSON.stringify(report, null, 2), 'utf8');
  return outPath;
}

/** Copies the dashboard template into `outDir` unchanged; it loads metrics.json at view time. */
export async function renderDashboard(outDir: string, templatePath: string = DASHBOARD_TEMPLATE_PATH): Promise<string> {
  await mkdir(outDir, { recursive: true });
  const outPath = path.join(outDir, DASHBOARD_FILE);
  await copyFile(templatePath, outPath);
  return outPath;
}
