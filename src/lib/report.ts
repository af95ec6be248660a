import path from 'path';
import type { JsonReport, JsonSummary, OutputFormat } from '../types.js';
import { writeJSON, writeText } from './fsutils.js';
import { formatLcov } from './lcov.js';
import { branchPercentage, functionPercentage, isCovered, linePercentage } from './model.js';
import type { CoverageData, CoverageSummary } from './model.js';

function round2(n: number): number {
  return Math.round(n * 100) / 100;
}

function jsonSummary(s: CoverageSummary): JsonSummary {
  return {
    ...s,
    linePercentage: round2(linePercentage(s)),
    functionPercentage: round2(functionPercentage(s)),
    branchPercentage: round2(branchPercentage(s)),
  };
}

export function toJsonReport(data: CoverageData): JsonReport {
  return {
    summary: jsonSummary(data.summary),
    files: data.files.map((f) => ({
      path: f.path,
      summary: jsonSummary(f.summary),
      lines: f.lines.map((l) => ({ lineNumber: l.lineNumber, hitCount: l.hitCount, isCovered: isCovered(l) })),
    })),
  };
}

function statusMark(pct: number): string {
  if (pct >= 80) return '✔';
  if (pct >= 60) return '!';
  return '✘';
}

export function formatConsoleSummary(data: CoverageData, maxFiles = 10): string {
  const s = data.summary;
  const out = [
    'Coverage Summary:',
    `  Files analyzed: ${data.files.length}`,
    `  Lines found: ${s.linesFound}`,
    `  Lines hit: ${s.linesHit}`,
    `  Line coverage: ${linePercentage(s).toFixed(1)}%`,
  ];
  if (s.functionsFound > 0) out.push(`  Function coverage: ${functionPercentage(s).toFixed(1)}%`);
  if (s.branchesFound > 0) out.push(`  Branch coverage: ${branchPercentage(s).toFixed(1)}%`);

  if (data.files.length) {
    out.push('', 'File Coverage:');
    for (const f of data.files.slice(0, maxFiles)) {
      const pct = linePercentage(f.summary);
      out.push(`  ${statusMark(pct)} ${f.path}: ${pct.toFixed(1)}%`);
    }
    if (data.files.length > maxFiles) {
      out.push(`  ... and ${data.files.length - maxFiles} more files`);
    }
  }
  return out.join('\n');
}

/** Writes the file-based formats into `outputDir`; returns the written paths. */
export async function writeReports(
  data: CoverageData,
  outputDir: string,
  formats: readonly OutputFormat[],
): Promise<string[]> {
  const written: string[] = [];
  if (formats.includes('json')) {
    const p = path.join(outputDir, 'coverage.json');
    await writeJSON(p, toJsonReport(data));
    written.push(p);
  }
  if (formats.includes('lcov')) {
    const p = path.join(outputDir, 'coverage.lcov');
    await writeText(p, formatLcov(data));
    written.push(p);
  }
  return written;
}
