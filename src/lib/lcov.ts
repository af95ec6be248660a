import { createCoverageData, emptySummary } from './model.js';
import type { CoverageData, CoverageSummary, FileCoverage, LineCoverage } from './model.js';

/*
 * LCOV record structure:
 *   TN:<test name>
 *   SF:<source file>
 *   FNF:<functions found>  FNH:<functions hit>
 *   DA:<line number>,<execution count>[,<checksum>]
 *   LF:<lines found>       LH:<lines hit>
 *   BRF:<branches found>   BRH:<branches hit>
 *   end_of_record
 */

const TOTAL_TAGS: Record<string, keyof CoverageSummary> = {
  'LF:': 'linesFound',
  'LH:': 'linesHit',
  'FNF:': 'functionsFound',
  'FNH:': 'functionsHit',
  'BRF:': 'branchesFound',
  'BRH:': 'branchesHit',
};

const INTEGER = /^\d+$/;

function toInt(s: string): number | null {
  if (!INTEGER.test(s)) return null;
  return Number(s);
}

type Accumulator = {
  path: string;
  lines: LineCoverage[];
  summary: { -readonly [K in keyof CoverageSummary]: number };
};

// DA:<line>,<count>[,<checksum>]; body is everything after "DA:".
function parseDataLine(body: string): LineCoverage | null {
  const first = body.indexOf(',');
  if (first === -1) return null;
  const second = body.indexOf(',', first + 1);
  const lineNumber = toInt(body.slice(0, first));
  const hitCount = toInt(second === -1 ? body.slice(first + 1) : body.slice(first + 1, second));
  if (lineNumber === null || hitCount === null || lineNumber < 1) return null;
  return { lineNumber, hitCount };
}

function totalTag(line: string): { key: keyof CoverageSummary; value: string } | null {
  const colon = line.indexOf(':');
  if (colon === -1) return null;
  const key = TOTAL_TAGS[line.slice(0, colon + 1)];
  return key ? { key, value: line.slice(colon + 1) } : null;
}

/**
 * Parse LCOV text into CoverageData. Never throws on malformed content:
 * unparseable DA lines are skipped, unparseable totals count as 0, and
 * unknown tags are ignored.
 */
export function parseLcovContent(content: string): CoverageData {
  const files: FileCoverage[] = [];
  let current: Accumulator | null = null;

  const flush = () => {
    if (current) {
      files.push({ path: current.path, lines: current.lines, summary: { ...current.summary } });
      current = null;
    }
  };

  for (const raw of content.split('\n')) {
    const line = raw.endsWith('\r') ? raw.slice(0, -1) : raw;

    if (line.startsWith('SF:')) {
      flush();
      current = { path: line.slice(3), lines: [], summary: { ...emptySummary() } };
    } else if (line.startsWith('DA:')) {
      const parsed = parseDataLine(line.slice(3));
      if (current && parsed) current.lines.push(parsed);
    } else if (line === 'end_of_record') {
      flush();
    } else if (current) {
      const total = totalTag(line);
      if (total) current.summary[total.key] = toInt(total.value) ?? 0;
    }
  }
  flush();

  return createCoverageData(files);
}

/** Serialize CoverageData back to LCOV; parsing the result yields equal data. */
export function formatLcov(data: CoverageData): string {
  const out: string[] = [];
  for (const file of data.files) {
    const s = file.summary;
    out.push('TN:', `SF:${file.path}`, `FNF:${s.functionsFound}`, `FNH:${s.functionsHit}`);
    for (const l of file.lines) out.push(`DA:${l.lineNumber},${l.hitCount}`);
    out.push(
      `LF:${s.linesFound}`,
      `LH:${s.linesHit}`,
      `BRF:${s.branchesFound}`,
      `BRH:${s.branchesHit}`,
      'end_of_record',
    );
  }
  return out.length ? out.join('\n') + '\n' : '';
}
