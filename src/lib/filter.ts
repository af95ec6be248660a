import { silentLogger } from './logger.js';
import type { Logger } from './logger.js';
import { createCoverageData, emptyCoverageData } from './model.js';
import type { CoverageData, FileCoverage } from './model.js';

/** `\` becomes `/`, then one leading `./` or `/` is dropped. */
export function normalizeCoveragePath(p: string): string {
  return p.replace(/\\/g, '/').replace(/^\.?\//, '');
}

function basename(p: string): string {
  const i = p.lastIndexOf('/');
  return i === -1 ? p : p.slice(i + 1);
}

/**
 * Whether a recorded coverage path refers to a target path. Both sides are
 * normalized first. The last rule (same basename, and the target minus its
 * first `lib/` is contained in the recorded path) bridges package roots in
 * monorepos and can match unrelated files that share a name.
 */
export function matchesTarget(recordPath: string, targetPath: string): boolean {
  const p = normalizeCoveragePath(recordPath);
  const t = normalizeCoveragePath(targetPath);
  if (p === t) return true;
  if (p.endsWith(t)) return true;
  if (t.endsWith(p)) return true;
  return basename(p) === basename(t) && p.includes(t.replace('lib/', ''));
}

/** Subset of `data.files` matching any target. No targets means nothing matches. */
export function filterByTargets(
  data: CoverageData,
  targets: readonly string[],
  logger: Logger = silentLogger,
): CoverageData {
  if (targets.length === 0) {
    logger.debug('No target files to filter by; returning empty coverage data');
    return emptyCoverageData();
  }

  const unique = [...new Set(targets)];
  const files = data.files.filter((f) => unique.some((t) => matchesTarget(f.path, t)));

  logger.debug(
    `Filtered coverage: ${files.length} of ${data.files.length} file(s) matched ${unique.length} target(s)`,
  );
  if (files.length === 0) {
    logger.debug(`  target example: ${unique[0]}`);
    logger.debug(`  coverage example: ${data.files[0]?.path ?? 'none'}`);
  }

  return createCoverageData(files);
}

export function findFileCoverage(data: CoverageData, filePath: string): FileCoverage | undefined {
  return filterByTargets(data, [filePath]).files[0];
}
