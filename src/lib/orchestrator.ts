import { calculateCoverageDelta } from './delta.js';
import type { FileDiscovery } from './discovery.js';
import { VcsUnavailableError } from './errors.js';
import { filterByTargets, findFileCoverage } from './filter.js';
import { silentLogger } from './logger.js';
import type { Logger } from './logger.js';
import type { CoverageData, FileCoverage } from './model.js';
import { CoverageParser } from './parser.js';

export type AnalysisMode = 'full' | 'scoped';

export type AnalysisReason =
  | 'no-base-branch'
  | 'vcs-unavailable'
  | 'no-targets'
  | 'no-matches'
  | 'matched';

export type AnalysisResult = {
  data: CoverageData;
  mode: AnalysisMode;
  reason: AnalysisReason;
  /** Files reported by discovery; empty when discovery was skipped or unavailable. */
  targets: string[];
};

export type AnalyzeOptions = {
  lcovPath: string;
  baseBranch?: string;
  packageRoot?: string;
};

type TargetLookup = { kind: 'targets'; files: string[] } | { kind: 'vcs-unavailable'; error: VcsUnavailableError };

const FALLBACK_MESSAGES: Record<Exclude<AnalysisReason, 'matched' | 'no-base-branch'>, string> = {
  'vcs-unavailable': 'Git is not available for this package; reporting coverage for all files.',
  'no-targets': 'No changed files detected; reporting coverage for all files.',
  'no-matches': 'None of the changed files appear in the coverage data; reporting coverage for all files.',
};

/**
 * Decides whether a run reports coverage for the changed files only or for
 * the whole coverage source.
 */
export class CoverageOrchestrator {
  private readonly discovery: FileDiscovery;
  private readonly parser: CoverageParser;
  private readonly logger: Logger;

  constructor(deps: { discovery: FileDiscovery; parser?: CoverageParser; logger?: Logger }) {
    this.discovery = deps.discovery;
    this.parser = deps.parser ?? new CoverageParser();
    this.logger = deps.logger ?? silentLogger;
  }

  async analyze(opts: AnalyzeOptions): Promise<AnalysisResult> {
    if (!opts.baseBranch) {
      this.logger.debug('No base branch configured; analyzing all files');
      return this.full(opts.lcovPath, 'no-base-branch');
    }

    const lookup = await this.lookupTargets(opts.baseBranch, opts.packageRoot ?? '.');
    if (lookup.kind === 'vcs-unavailable') {
      this.logger.debug(lookup.error.message);
      return this.full(opts.lcovPath, 'vcs-unavailable');
    }
    if (lookup.files.length === 0) {
      return this.full(opts.lcovPath, 'no-targets');
    }

    const all = await this.parser.parseFile(opts.lcovPath);
    const scoped = filterByTargets(all, lookup.files, this.logger);
    if (scoped.files.length === 0) {
      return this.fallback(all, 'no-matches', lookup.files);
    }
    return { data: scoped, mode: 'scoped', reason: 'matched', targets: lookup.files };
  }

  async getFileCoverage(lcovPath: string, filePath: string): Promise<FileCoverage | undefined> {
    const all = await this.parser.parseFile(lcovPath);
    return findFileCoverage(all, filePath);
  }

  async calculateDelta(baseLcovPath: string, currentLcovPath: string): Promise<CoverageData> {
    const base = await this.parser.parseFile(baseLcovPath);
    const current = await this.parser.parseFile(currentLcovPath);
    return calculateCoverageDelta(base, current);
  }

  private async lookupTargets(baseBranch: string, root: string): Promise<TargetLookup> {
    try {
      return { kind: 'targets', files: await this.discovery.targetFiles(baseBranch, root) };
    } catch (err: unknown) {
      if (err instanceof VcsUnavailableError) return { kind: 'vcs-unavailable', error: err };
      throw err;
    }
  }

  private async full(
    lcovPath: string,
    reason: Exclude<AnalysisReason, 'matched' | 'no-matches'>,
  ): Promise<AnalysisResult> {
    const data = await this.parser.parseFile(lcovPath);
    if (reason === 'no-base-branch') {
      return { data, mode: 'full', reason, targets: [] };
    }
    return this.fallback(data, reason, []);
  }

  private fallback(
    data: CoverageData,
    reason: Exclude<AnalysisReason, 'matched' | 'no-base-branch'>,
    targets: string[],
  ): AnalysisResult {
    this.logger.info(FALLBACK_MESSAGES[reason]);
    return { data, mode: 'full', reason, targets };
  }
}
