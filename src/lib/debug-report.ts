import fs from 'fs-extra';
import path from 'path';
import type { ScopecovConfig } from '../types.js';
import { writeJSON } from './fsutils.js';
import type { AnalysisResult } from './orchestrator.js';

export const DEBUG_REPORT_FILE = 'scopecov-debug.json';

export type DebugReport = {
  generatedAt: string;
  environment: { node: string; platform: string; cwd: string };
  config: ScopecovConfig;
  paths: { packageRoot: string; lcovFile: string; lcovFileExists: boolean; outputDir: string };
  analysisMs: number;
  result?: { mode: AnalysisResult['mode']; reason: AnalysisResult['reason']; targets: string[]; files: number };
  error?: string;
};

export type DebugReportInput = {
  config: ScopecovConfig;
  packageRoot: string;
  lcovPath: string;
  outputDir: string;
  analysisMs: number;
  result?: AnalysisResult;
  error?: unknown;
};

export async function buildDebugReport(input: DebugReportInput, now = new Date()): Promise<DebugReport> {
  const { result, error } = input;
  return {
    generatedAt: now.toISOString(),
    environment: { node: process.version, platform: process.platform, cwd: process.cwd() },
    config: input.config,
    paths: {
      packageRoot: input.packageRoot,
      lcovFile: input.lcovPath,
      lcovFileExists: await fs.pathExists(input.lcovPath),
      outputDir: input.outputDir,
    },
    analysisMs: input.analysisMs,
    ...(result
      ? { result: { mode: result.mode, reason: result.reason, targets: result.targets, files: result.data.files.length } }
      : {}),
    ...(error === undefined ? {} : { error: error instanceof Error ? error.message : String(error) }),
  };
}

/** Writes `scopecov-debug.json` into `outputDir` and returns its path. */
export async function writeDebugReport(input: DebugReportInput): Promise<string> {
  const p = path.join(input.outputDir, DEBUG_REPORT_FILE);
  await writeJSON(p, await buildDebugReport(input));
  return p;
}
