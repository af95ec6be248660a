import { createCoverageData, emptySummary, isCovered } from './model.js';
import type { CoverageData, CoverageSummary, FileCoverage, LineCoverage } from './model.js';

function lineSummary(lines: readonly LineCoverage[]): CoverageSummary {
  return {
    ...emptySummary(),
    linesFound: lines.length,
    linesHit: lines.filter(isCovered).length,
  };
}

function firstByKey<T, K>(items: readonly T[], key: (item: T) => K): Map<K, T> {
  const map = new Map<K, T>();
  for (const item of items) {
    const k = key(item);
    if (!map.has(k)) map.set(k, item);
  }
  return map;
}

/**
 * Per-line hit-count change from `base` to `current`, keyed by exact path.
 *
 * A line in both snapshots contributes `current - base` when that is non-zero
 * (so `hitCount` may be negative here); lines and files only present in
 * `current` are carried over unchanged. Files whose lines did not change are
 * left out. Only line counters survive in the delta summaries.
 */
export function calculateCoverageDelta(base: CoverageData, current: CoverageData): CoverageData {
  const baseFiles = firstByKey(base.files, (f) => f.path);
  const out: FileCoverage[] = [];

  for (const file of current.files) {
    const baseFile = baseFiles.get(file.path);
    if (!baseFile) {
      out.push(file);
      continue;
    }

    const baseLines = firstByKey(baseFile.lines, (l) => l.lineNumber);
    const lines: LineCoverage[] = [];
    for (const line of file.lines) {
      const before = baseLines.get(line.lineNumber);
      if (!before) {
        lines.push(line);
        continue;
      }
      const diff = line.hitCount - before.hitCount;
      if (diff !== 0) lines.push({ lineNumber: line.lineNumber, hitCount: diff });
    }

    if (lines.length) {
      out.push({ path: file.path, lines, summary: lineSummary(lines) });
    }
  }

  return createCoverageData(out);
}
