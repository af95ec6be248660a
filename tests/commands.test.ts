import fs from 'fs-extra';
import path from 'path';
import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';
import { analyzeCommand } from '../src/commands/analyze.js';
import { deltaCommand } from '../src/commands/delta.js';
import { fileCommand } from '../src/commands/file.js';
import { initCommand } from '../src/commands/init.js';
import { DEBUG_REPORT_FILE } from '../src/lib/debug-report.js';
import { ConfigError } from '../src/lib/errors.js';
import { TWO_FILES_LCOV, makeTempDir } from './fixtures.js';

function spyLog() {
  return vi.spyOn(console, 'log').mockImplementation(() => undefined);
}

function spyError() {
  return vi.spyOn(console, 'error').mockImplementation(() => undefined);
}

describe('commands', () => {
  let dir: string;
  let lcovPath: string;

  beforeEach(async () => {
    dir = await makeTempDir();
    lcovPath = path.join(dir, 'lcov.info');
    await fs.writeFile(lcovPath, TWO_FILES_LCOV, 'utf8');
  });

  afterEach(async () => {
    vi.restoreAllMocks();
    process.exitCode = undefined;
    await fs.remove(dir);
  });

  it('analyze writes the requested reports for every file without a base branch', async () => {
    const log = spyLog();
    await analyzeCommand({ packagePath: dir, lcovFile: lcovPath, formats: ['json', 'lcov'] });
    const json = await fs.readJSON(path.join(dir, 'coverage', 'scopecov', 'coverage.json'));
    expect(json.summary.linesFound).toBe(3);
    expect(await fs.readFile(path.join(dir, 'coverage', 'scopecov', 'coverage.lcov'), 'utf8')).toContain('SF:lib/b.dart\n');
    expect(log).toHaveBeenCalledWith(`Report written: ${path.join(dir, 'coverage', 'scopecov', 'coverage.json')}`);
  });

  it('analyze --json prints the mode and the report', async () => {
    const log = spyLog();
    await analyzeCommand({ packagePath: dir, lcovFile: lcovPath, json: true, formats: ['console'] });
    expect(log).toHaveBeenCalledTimes(1);
    const payload = JSON.parse(String(log.mock.calls[0][0]));
    expect(payload.mode).toBe('full');
    expect(payload.reason).toBe('no-base-branch');
    expect(payload.files).toHaveLength(2);
  });

  it('analyze --json keeps stdout to one JSON document when it falls back', async () => {
    const log = spyLog();
    const err = spyError();
    await analyzeCommand({ packagePath: dir, lcovFile: lcovPath, json: true, baseBranch: 'main', formats: ['json'] });
    expect(log).toHaveBeenCalledTimes(1);
    const payload = JSON.parse(String(log.mock.calls[0][0]));
    expect(payload.mode).toBe('full');
    expect(payload.reason).toBe('vcs-unavailable');
    expect(payload.files).toHaveLength(2);
    expect(err).toHaveBeenCalledWith('Git is not available for this package; reporting coverage for all files.');
    expect(err).toHaveBeenCalledWith(`Report written: ${path.join(dir, 'coverage', 'scopecov', 'coverage.json')}`);
  });

  it('analyze resolves a relative --lcov-file and --output-dir against the working directory', async () => {
    spyLog();
    const out = path.join(dir, 'reports');
    await analyzeCommand({
      packagePath: dir,
      lcovFile: path.relative(process.cwd(), lcovPath),
      outputDir: path.relative(process.cwd(), out),
      formats: ['json'],
    });
    expect((await fs.readJSON(path.join(out, 'coverage.json'))).summary.linesFound).toBe(3);
  });

  it('analyze --config reads the named config file, with its paths relative to the package', async () => {
    spyLog();
    const configPath = path.join(dir, 'ci.config.json');
    await fs.writeJSON(configPath, { packagePath: dir, lcovFile: 'lcov.info', outputDir: 'out', outputFormats: ['lcov'] });
    await analyzeCommand({ config: configPath });
    expect(await fs.readFile(path.join(dir, 'out', 'coverage.lcov'), 'utf8')).toContain('SF:lib/a.dart\n');
  });

  it('analyze --config fails for a missing file', async () => {
    const missing = path.join(dir, 'nope.json');
    const run = analyzeCommand({ config: missing });
    await expect(run).rejects.toBeInstanceOf(ConfigError);
    await expect(run).rejects.toThrow(`Config file not found: ${missing}`);
  });

  it('analyze --debug writes a debug report next to the other reports', async () => {
    const log = spyLog();
    await analyzeCommand({ packagePath: dir, lcovFile: lcovPath, formats: ['json'], debug: true });
    const reportPath = path.join(dir, 'coverage', 'scopecov', DEBUG_REPORT_FILE);
    const report = await fs.readJSON(reportPath);
    expect(report.result).toEqual({ mode: 'full', reason: 'no-base-branch', targets: [], files: 2 });
    expect(report.paths).toEqual({
      packageRoot: dir,
      lcovFile: lcovPath,
      lcovFileExists: true,
      outputDir: path.join(dir, 'coverage', 'scopecov'),
    });
    expect(report.config.outputFormats).toEqual(['json']);
    expect(report.error).toBeUndefined();
    expect(log).toHaveBeenCalledWith(`Debug report written: ${reportPath}`);
  });

  it('analyze --debug records a failed run before rethrowing', async () => {
    spyLog();
    const err = spyError();
    const missing = path.join(dir, 'missing.info');
    await expect(analyzeCommand({ packagePath: dir, lcovFile: missing, debug: true })).rejects.toThrow(
      `Coverage file not found: ${missing}`,
    );
    const reportPath = path.join(dir, 'coverage', 'scopecov', DEBUG_REPORT_FILE);
    const report = await fs.readJSON(reportPath);
    expect(report.error).toBe(`Coverage file not found: ${missing}`);
    expect(report.paths.lcovFileExists).toBe(false);
    expect(report.result).toBeUndefined();
    expect(err).toHaveBeenCalledWith(expect.stringContaining(`Debug report written for the failed analysis: ${reportPath}`));
  });

  it('file prints one file and flags a missing one', async () => {
    const log = spyLog();
    await fileCommand('lib/a.dart', { lcovFile: lcovPath });
    expect(log).toHaveBeenCalledWith('lib/a.dart: 50.0% (1/2 lines)');
    expect(log).toHaveBeenCalledWith('  Uncovered lines: 2');

    await fileCommand('lib/b.dart', { lcovFile: path.relative(process.cwd(), lcovPath) });
    expect(log).toHaveBeenLastCalledWith('lib/b.dart: 100.0% (1/1 lines)');

    const err = spyError();
    await fileCommand('lib/zzz.dart', { lcovFile: lcovPath });
    expect(err).toHaveBeenCalledWith('No coverage recorded for lib/zzz.dart');
    expect(process.exitCode).toBe(1);
  });

  it('delta lists changed lines', async () => {
    const log = spyLog();
    const current = path.join(dir, 'current.info');
    await fs.writeFile(current, TWO_FILES_LCOV.replace('DA:1,3', 'DA:1,1'), 'utf8');
    await deltaCommand({ base: lcovPath, current });
    expect(log.mock.calls.map((c) => c[0])).toEqual(['Changed files (1):', '  - lib/b.dart 1:-2']);
  });
});

describe('init', () => {
  let dir: string;

  beforeEach(async () => {
    dir = await makeTempDir();
  });

  afterEach(async () => {
    vi.restoreAllMocks();
    await fs.remove(dir);
  });

  it('writes the given base branch', async () => {
    spyLog();
    await initCommand(dir, { baseBranch: 'develop' });
    expect((await fs.readJSON(path.join(dir, 'scopecov.config.json'))).baseBranch).toBe('develop');
  });

  it('overwrites an existing file only with force', async () => {
    const log = spyLog();
    const p = path.join(dir, 'scopecov.config.json');
    await fs.writeJSON(p, { baseBranch: 'old' });

    await initCommand(dir, { baseBranch: 'new' });
    expect(log).toHaveBeenLastCalledWith('scopecov.config.json already exists. Use --force to overwrite it.');
    expect((await fs.readJSON(p)).baseBranch).toBe('old');

    await initCommand(dir, { force: true, baseBranch: 'new' });
    expect(log).toHaveBeenLastCalledWith('Overwrote scopecov.config.json');
    expect((await fs.readJSON(p)).baseBranch).toBe('new');
  });
});
