export type CoverageSummary = {
  readonly linesFound: number;
  readonly linesHit: number;
  readonly functionsFound: number;
  readonly functionsHit: number;
  readonly branchesFound: number;
  readonly branchesHit: number;
};

export type LineCoverage = {
  /** 1-based. */
  readonly lineNumber: number;
  readonly hitCount: number;
};

/**
 * Coverage for one source file as recorded by the producing tool.
 *
 * `summary` comes from the record's LF/LH/FNF/FNH/BRF/BRH totals and is not
 * derived from `lines`, so `summary.linesFound` and `lines.length` may differ.
 */
export type FileCoverage = {
  readonly path: string;
  readonly lines: readonly LineCoverage[];
  readonly summary: CoverageSummary;
};

/** Files are not deduplicated by path; `summary` is always the sum of `files[*].summary`. */
export type CoverageData = {
  readonly files: readonly FileCoverage[];
  readonly summary: CoverageSummary;
};

export function emptySummary(): CoverageSummary {
  return {
    linesFound: 0,
    linesHit: 0,
    functionsFound: 0,
    functionsHit: 0,
    branchesFound: 0,
    branchesHit: 0,
  };
}

function percentage(hit: number, found: number): number {
  if (found <= 0) return 0;
  return Math.min(100, Math.max(0, (hit / found) * 100));
}

export function linePercentage(s: CoverageSummary): number {
  return percentage(s.linesHit, s.linesFound);
}

export function functionPercentage(s: CoverageSummary): number {
  return percentage(s.functionsHit, s.functionsFound);
}

export function branchPercentage(s: CoverageSummary): number {
  return percentage(s.branchesHit, s.branchesFound);
}

export function isCovered(line: LineCoverage): boolean {
  return line.hitCount > 0;
}

export function sumSummaries(summaries: Iterable<CoverageSummary>): CoverageSummary {
  let linesFound = 0;
  let linesHit = 0;
  let functionsFound = 0;
  let functionsHit = 0;
  let branchesFound = 0;
  let branchesHit = 0;
  for (const s of summaries) {
    linesFound += s.linesFound;
    linesHit += s.linesHit;
    functionsFound += s.functionsFound;
    functionsHit += s.functionsHit;
    branchesFound += s.branchesFound;
    branchesHit += s.branchesHit;
  }
  return { linesFound, linesHit, functionsFound, functionsHit, branchesFound, branchesHit };
}

/** The only way CoverageData is built: the summary is recomputed from `files`. */
export function createCoverageData(files: readonly FileCoverage[]): CoverageData {
  return {
    files: [...files],
    summary: sumSummaries(files.map((f) => f.summary)),
  };
}

export function emptyCoverageData(): CoverageData {
  return createCoverageData([]);
}
