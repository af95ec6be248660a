import fg from 'fast-glob';
import fs from 'fs-extra';
import micromatch from 'micromatch';
import path from 'path';
import { findRepositoryRoot, getChangedFiles, getUncommittedFiles, runGit } from './git.js';
import type { GitRunner } from './git.js';
import { silentLogger } from './logger.js';
import type { Logger } from './logger.js';

/**
 * Supplies the files a coverage run should be scoped to. Implementations
 * raise VcsUnavailableError, and nothing else, when no revision-control
 * context exists.
 */
export interface FileDiscovery {
  targetFiles(baseBranch: string, root: string): Promise<string[]>;
}

export const DEFAULT_SOURCE_EXTENSIONS = ['.ts', '.tsx', '.js', '.jsx', '.mjs', '.cjs', '.dart'];

export const DEFAULT_EXCLUDE = [
  'node_modules/**',
  '**/node_modules/**',
  'dist/**',
  'build/**',
  'coverage/**',
  '.dart_tool/**',
  '**/generated/**',
  '**/*.d.ts',
  '**/*.g.dart',
  '**/*.freezed.dart',
];

export type GitFileDiscoveryOptions = {
  sourceExtensions?: string[];
  exclude?: string[];
  git?: GitRunner;
  logger?: Logger;
};

function toPosix(p: string): string {
  return p.replace(/\\/g, '/');
}

/**
 * Changed files of the package at `root`, relative to that package.
 *
 * Tries the committed diff against the base branch, then uncommitted changes
 * against HEAD, then every source file in the package.
 */
export class GitFileDiscovery implements FileDiscovery {
  private readonly sourceExtensions: string[];
  private readonly exclude: string[];
  private readonly git: GitRunner;
  private readonly logger: Logger;

  constructor(opts: GitFileDiscoveryOptions = {}) {
    this.sourceExtensions = opts.sourceExtensions ?? DEFAULT_SOURCE_EXTENSIONS;
    this.exclude = opts.exclude ?? DEFAULT_EXCLUDE;
    this.git = opts.git ?? runGit;
    this.logger = opts.logger ?? silentLogger;
  }

  async targetFiles(baseBranch: string, root: string): Promise<string[]> {
    const resolved = path.resolve(root);
    const packageDir = (await fs.pathExists(resolved)) ? await fs.realpath(resolved) : resolved;
    const repoRoot = await findRepositoryRoot(packageDir, this.git);
    const pkg = relativePackagePath(packageDir, repoRoot);

    this.logger.debug(`Git repository found at: ${repoRoot}`);
    this.logger.debug(`Current package: ${pkg || '.'}`);

    const committed = await getChangedFiles(baseBranch, repoRoot, this.git);
    if (committed.files === null) {
      this.logger.warn(`git diff against ${baseBranch} failed: ${committed.stderr}`);
      this.logger.info('Falling back to uncommitted changes...');
      return this.fromUncommitted(repoRoot, pkg, packageDir);
    }

    this.logger.debug(`Found ${committed.files.length} modified file(s) compared to ${baseBranch}`);
    if (committed.files.length === 0) {
      this.logger.info('No committed changes found. Checking uncommitted changes...');
      return this.fromUncommitted(repoRoot, pkg, packageDir);
    }

    const scoped = this.scopeToPackage(committed.files, pkg);
    if (!scoped.length) {
      this.logger.info(`No modified source files found in this package${pkg ? ` (${pkg})` : ''}.`);
      return this.allSourceFiles(packageDir);
    }
    this.logger.debug(`Analyzing ${scoped.length} modified file(s) compared to ${baseBranch}`);
    return scoped;
  }

  /** Every source file under `packageDir`, package-relative, sorted. */
  async allSourceFiles(packageDir: string): Promise<string[]> {
    if (!(await fs.pathExists(packageDir))) return [];
    this.logger.info('Analyzing all source files in the package.');
    const patterns = this.sourceExtensions.map((ext) => `**/*${ext}`);
    const entries = await fg(patterns, {
      cwd: packageDir,
      ignore: this.exclude,
      onlyFiles: true,
      dot: false,
    });
    return entries.map(toPosix).sort();
  }

  /** Keeps the source files inside `pkg` and makes them relative to it. */
  scopeToPackage(files: readonly string[], pkg: string): string[] {
    const prefix = pkg ? `${pkg}/` : '';
    return files
      .map(toPosix)
      .filter((f) => f.startsWith(prefix))
      .map((f) => f.slice(prefix.length))
      .filter((f) => f && this.isSourceFile(f));
  }

  isSourceFile(file: string): boolean {
    if (!this.sourceExtensions.some((ext) => file.endsWith(ext))) return false;
    return !micromatch.isMatch(file, this.exclude, { dot: true });
  }

  private async fromUncommitted(repoRoot: string, pkg: string, packageDir: string): Promise<string[]> {
    const uncommitted = await getUncommittedFiles(repoRoot, this.git);
    if (uncommitted === null) {
      this.logger.info('No uncommitted changes could be read.');
      return this.allSourceFiles(packageDir);
    }
    const scoped = this.scopeToPackage(uncommitted, pkg);
    if (!scoped.length) {
      this.logger.info('No modified source files found in this package.');
      return this.allSourceFiles(packageDir);
    }
    this.logger.debug(`Analyzing ${scoped.length} modified file(s) from uncommitted changes`);
    return scoped;
  }
}

/** `packageDir` relative to `repoRoot` in posix form; '' at the root or outside it. */
export function relativePackagePath(packageDir: string, repoRoot: string): string {
  const rel = toPosix(path.relative(repoRoot, packageDir));
  if (!rel || rel.startsWith('..') || path.isAbsolute(rel)) return '';
  return rel;
}
