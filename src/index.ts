#!/usr/bin/env node
import chalk from 'chalk';
import { Command } from 'commander';
import { analyzeCommand } from './commands/analyze.js';
import { deltaCommand } from './commands/delta.js';
import { fileCommand } from './commands/file.js';
import { DEFAULT_INIT_BASE_BRANCH, initCommand } from './commands/init.js';
import { ScopecovError } from './lib/errors.js';

const splitList = (v: string) =>
  v
    .split(',')
    .map((s) => s.trim())
    .filter(Boolean);

const program = new Command();
program
  .name('scopecov')
  .description('Coverage reports scoped to the files changed against a base branch')
  .version('0.1.0');

program
  .command('init')
  .description('Create a starter scopecov.config.json')
  .option('-f, --force', 'Overwrite an existing config file', false)
  .option('-b, --base-branch <ref>', 'Base branch written to the config', DEFAULT_INIT_BASE_BRANCH)
  .action(async (opts: { force?: boolean; baseBranch?: string }) => {
    await initCommand(process.cwd(), { force: Boolean(opts.force), baseBranch: opts.baseBranch });
  });

program
  .command('analyze')
  .description('Report coverage for modified files, or for all files when none can be determined')
  .option('-c, --config <path>', 'Config file (default: scopecov.config.json in the working directory)')
  .option('-l, --lcov-file <path>', 'LCOV file, relative to the working directory (default from config: coverage/lcov.info in the package)')
  .option('-b, --base-branch <ref>', 'Base branch to diff against; omit to report all files')
  .option('-p, --package-path <path>', 'Package root (default from config: .)')
  .option('-o, --output-dir <path>', 'Directory for json/lcov reports, relative to the working directory')
  .option('-f, --format <list>', 'Comma-separated output formats: console,json,lcov', splitList)
  .option('--json', 'Print the result as JSON', false)
  .option('-v, --verbose', 'Verbose diagnostics', false)
  .option('--debug', 'Write scopecov-debug.json with the settings and outcome of the run', false)
  .action(
    async (opts: {
      config?: string;
      lcovFile?: string;
      baseBranch?: string;
      packagePath?: string;
      outputDir?: string;
      format?: string[];
      json?: boolean;
      verbose?: boolean;
      debug?: boolean;
    }) => {
      await analyzeCommand({
        config: opts.config,
        lcovFile: opts.lcovFile,
        baseBranch: opts.baseBranch,
        packagePath: opts.packagePath,
        outputDir: opts.outputDir,
        formats: opts.format,
        json: Boolean(opts.json),
        verbose: Boolean(opts.verbose),
        debug: Boolean(opts.debug),
      });
    },
  );

program
  .command('file')
  .argument('<path>', 'Source file to look up')
  .description('Show coverage for a single file')
  .option('-l, --lcov-file <path>', 'LCOV file, relative to the working directory (default from config)')
  .option('--json', 'Emit JSON payload', false)
  .action(async (target: string, opts: { lcovFile?: string; json?: boolean }) => {
    await fileCommand(target, opts);
  });

program
  .command('delta')
  .description('Per-line hit count changes between two LCOV files')
  .requiredOption('--base <path>', 'Baseline LCOV file')
  .requiredOption('--current <path>', 'Current LCOV file')
  .option('--json', 'Emit JSON payload', false)
  .action(async (opts: { base: string; current: string; json?: boolean }) => {
    await deltaCommand(opts);
  });

program.parseAsync(process.argv).catch((err: unknown) => {
  if (err instanceof ScopecovError) {
    console.error(chalk.red(err.message));
  } else {
    console.error(err);
  }
  process.exitCode = 1;
});
