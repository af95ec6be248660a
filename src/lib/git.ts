import { execa } from 'execa';
import fs from 'fs-extra';
import path from 'path';
import { VcsUnavailableError } from './errors.js';

export type GitResult = { exitCode: number; stdout: string; stderr: string };

/** Runs `git <args>` in `cwd`. Non-zero exits resolve; only a missing git binary rejects. */
export type GitRunner = (args: string[], cwd: string) => Promise<GitResult>;

function hasExitCode(v: unknown): v is { exitCode: number; stdout?: unknown; stderr?: unknown } {
  if (!v || typeof v !== 'object') return false;
  const o = v as Record<string, unknown>;
  return typeof o.exitCode === 'number';
}

export const runGit: GitRunner = async (args, cwd) => {
  try {
    const { stdout, stderr } = await execa('git', args, { cwd, stdio: 'pipe' });
    return { exitCode: 0, stdout, stderr };
  } catch (err: unknown) {
    if (hasExitCode(err)) {
      return {
        exitCode: err.exitCode,
        stdout: typeof err.stdout === 'string' ? err.stdout : '',
        stderr: typeof err.stderr === 'string' ? err.stderr : '',
      };
    }
    throw new VcsUnavailableError(cwd, { cause: err });
  }
};

export function splitLines(stdout: string): string[] {
  return stdout
    .split('\n')
    .map((s) => s.trim())
    .filter(Boolean);
}

/** Absolute repository root containing `startDir`, or VcsUnavailableError. */
export async function findRepositoryRoot(startDir: string, git: GitRunner = runGit): Promise<string> {
  if (!(await fs.pathExists(startDir))) {
    throw new VcsUnavailableError(startDir);
  }
  const res = await git(['rev-parse', '--show-toplevel'], startDir);
  const root = res.stdout.trim();
  if (res.exitCode !== 0 || !root) {
    throw new VcsUnavailableError(startDir);
  }
  return path.resolve(root);
}

/** Committed changes between `base` and HEAD, repository-relative. `null` when git refuses. */
export async function getChangedFiles(
  base: string,
  repoRoot: string,
  git: GitRunner = runGit,
): Promise<{ files: string[] } | { files: null; stderr: string }> {
  const res = await git(['diff', '--name-only', base, 'HEAD'], repoRoot);
  return res.exitCode === 0 ? { files: splitLines(res.stdout) } : { files: null, stderr: res.stderr.trim() };
}

/** Working-tree changes against HEAD, repository-relative. `null` when git refuses. */
export async function getUncommittedFiles(repoRoot: string, git: GitRunner = runGit): Promise<string[] | null> {
  const res = await git(['diff', '--name-only', 'HEAD'], repoRoot);
  return res.exitCode === 0 ? splitLines(res.stdout) : null;
}
