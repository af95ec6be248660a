import path from 'path';
import { loadConfig } from '../lib/config.js';
import { createConsoleLogger } from '../lib/logger.js';
import { isCovered, linePercentage } from '../lib/model.js';
import { createOrchestrator } from './shared.js';

export async function fileCommand(target: string, opts: { lcovFile?: string; json?: boolean }) {
  const cfg = await loadConfig();
  const lcovPath = opts.lcovFile ? path.resolve(opts.lcovFile) : path.resolve(cfg.packagePath, cfg.lcovFile);
  const file = await createOrchestrator(cfg, createConsoleLogger()).getFileCoverage(lcovPath, target);

  if (!file) {
    console.error(`No coverage recorded for ${target}`);
    process.exitCode = 1;
    return;
  }
  if (opts.json) {
    console.log(JSON.stringify(file, null, 2));
    return;
  }
  const uncovered = file.lines.filter((l) => !isCovered(l)).map((l) => l.lineNumber);
  console.log(
    `${file.path}: ${linePercentage(file.summary).toFixed(1)}% (${file.summary.linesHit}/${file.summary.linesFound} lines)`,
  );
  if (uncovered.length) console.log(`  Uncovered lines: ${uncovered.join(', ')}`);
}
