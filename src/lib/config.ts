import fs from 'fs-extra';
import path from 'path';
import { z } from 'zod';
import type { OutputFormat, ScopecovConfig } from '../types.js';
import { DEFAULT_EXCLUDE, DEFAULT_SOURCE_EXTENSIONS } from './discovery.js';
import { ConfigError } from './errors.js';
import { CONFIG_FILE } from './fsutils.js';
import { DEFAULT_WORKER_THRESHOLD_BYTES } from './parser.js';

const OutputFormatSchema = z.enum(['console', 'json', 'lcov']);

const Schema = z
  .object({
    packagePath: z.string().default('.'),
    lcovFile: z.string().default('coverage/lcov.info'),
    baseBranch: z.string().min(1).optional(),
    outputDir: z.string().default('coverage/scopecov'),
    outputFormats: z.array(OutputFormatSchema).default(['console']),
    sourceExtensions: z.array(z.string().startsWith('.')).default(DEFAULT_SOURCE_EXTENSIONS),
    exclude: z.array(z.string()).default(DEFAULT_EXCLUDE),
    workerThresholdBytes: z.number().int().positive().default(DEFAULT_WORKER_THRESHOLD_BYTES),
  })
  .strict();

export function defaultConfig(): ScopecovConfig {
  return Schema.parse({});
}

export function parseConfig(raw: unknown, source = CONFIG_FILE): ScopecovConfig {
  const res = Schema.safeParse(raw);
  if (!res.success) {
    const issues = res.error.issues.map((i) => `${i.path.join('.') || '(root)'}: ${i.message}`);
    throw new ConfigError(`Invalid ${source}:\n  ${issues.join('\n  ')}`);
  }
  return res.data;
}

/**
 * Reads `scopecov.config.json` from `cwd`; defaults when the file is absent.
 * A `file` named explicitly must exist.
 */
export async function loadConfig(cwd = process.cwd(), file?: string): Promise<ScopecovConfig> {
  const name = file ?? CONFIG_FILE;
  const p = path.resolve(cwd, name);
  const exists = await fs.pathExists(p);
  if (!exists) {
    if (file !== undefined) throw new ConfigError(`Config file not found: ${p}`);
    return defaultConfig();
  }
  const json = await fs.readFile(p, 'utf8');
  let parsed: unknown;
  try {
    parsed = JSON.parse(json);
  } catch (err: unknown) {
    throw new ConfigError(`${name} is not valid JSON`, { cause: err });
  }
  return parseConfig(parsed, name);
}

export type CliOverrides = {
  lcovFile?: string;
  baseBranch?: string;
  packagePath?: string;
  outputDir?: string;
  formats?: string[];
};

/** Command-line values win over the config file. */
export function resolveOptions(cfg: ScopecovConfig, cli: CliOverrides): ScopecovConfig {
  let outputFormats: OutputFormat[] = cfg.outputFormats;
  if (cli.formats?.length) {
    const res = z.array(OutputFormatSchema).safeParse(cli.formats);
    if (!res.success) {
      throw new ConfigError(`Unknown output format in "${cli.formats.join(',')}". Supported: console, json, lcov.`);
    }
    outputFormats = res.data;
  }
  return {
    ...cfg,
    lcovFile: cli.lcovFile ?? cfg.lcovFile,
    baseBranch: cli.baseBranch ?? cfg.baseBranch,
    packagePath: cli.packagePath ?? cfg.packagePath,
    outputDir: cli.outputDir ?? cfg.outputDir,
    outputFormats,
  };
}
