import chalk from 'chalk';
import path from 'path';
import { loadConfig, resolveOptions } from '../lib/config.js';
import { writeDebugReport } from '../lib/debug-report.js';
import { createConsoleLogger } from '../lib/logger.js';
import type { AnalysisResult } from '../lib/orchestrator.js';
import { formatConsoleSummary, toJsonReport, writeReports } from '../lib/report.js';
import { createOrchestrator } from './shared.js';

export type AnalyzeCommandOptions = {
  config?: string;
  lcovFile?: string;
  baseBranch?: string;
  packagePath?: string;
  outputDir?: string;
  formats?: string[];
  json?: boolean;
  verbose?: boolean;
  debug?: boolean;
};

function describeScope(result: AnalysisResult): string {
  if (result.mode === 'scoped') {
    return `Scope: ${result.data.files.length} changed file(s) with coverage (${result.targets.length} changed)`;
  }
  return 'Scope: all files';
}

export async function analyzeCommand(opts: AnalyzeCommandOptions) {
  // Under --json stdout carries the payload alone.
  const logger = createConsoleLogger({ verbose: opts.verbose, stderr: opts.json });
  const cfg = resolveOptions(await loadConfig(process.cwd(), opts.config), opts);

  // Paths from the command line are relative to the working directory,
  // paths from the config file to the package.
  const packageRoot = path.resolve(cfg.packagePath);
  const lcovPath = opts.lcovFile ? path.resolve(opts.lcovFile) : path.resolve(packageRoot, cfg.lcovFile);
  const outputDir = opts.outputDir ? path.resolve(opts.outputDir) : path.resolve(packageRoot, cfg.outputDir);
  const orchestrator = createOrchestrator(cfg, logger);

  logger.debug(`Coverage file: ${lcovPath}`);
  const started = Date.now();
  let result: AnalysisResult;
  try {
    result = await orchestrator.analyze({ lcovPath, baseBranch: cfg.baseBranch, packageRoot });
  } catch (err: unknown) {
    if (opts.debug) {
      const p = await writeDebugReport({
        config: cfg,
        packageRoot,
        lcovPath,
        outputDir,
        analysisMs: Date.now() - started,
        error: err,
      });
      logger.error(`Debug report written for the failed analysis: ${p}`);
    }
    throw err;
  }
  const analysisMs = Date.now() - started;
  logger.debug(`Analysis took ${analysisMs}ms`);

  if (opts.json) {
    const payload = { mode: result.mode, reason: result.reason, targets: result.targets, ...toJsonReport(result.data) };
    console.log(JSON.stringify(payload, null, 2));
  } else if (cfg.outputFormats.includes('console')) {
    console.log(chalk.bold(describeScope(result)));
    console.log(formatConsoleSummary(result.data));
  }

  const written = await writeReports(result.data, outputDir, cfg.outputFormats);
  for (const p of written) logger.info(`Report written: ${p}`);

  if (opts.debug) {
    const p = await writeDebugReport({ config: cfg, packageRoot, lcovPath, outputDir, analysisMs, result });
    logger.info(`Debug report written: ${p}`);
  }
}
