import fs from 'fs-extra';
import path from 'path';
import { defaultConfig } from '../lib/config.js';
import { CONFIG_FILE } from '../lib/fsutils.js';

export const DEFAULT_INIT_BASE_BRANCH = 'origin/main';

export type InitCommandOptions = {
  force?: boolean;
  baseBranch?: string;
};

export async function initCommand(cwd = process.cwd(), opts: InitCommandOptions = {}) {
  const p = path.join(cwd, CONFIG_FILE);
  const exists = await fs.pathExists(p);
  if (exists && !opts.force) {
    console.log(`${CONFIG_FILE} already exists. Use --force to overwrite it.`);
    return;
  }
  const cfg = { ...defaultConfig(), baseBranch: opts.baseBranch ?? DEFAULT_INIT_BASE_BRANCH };
  await fs.writeFile(p, JSON.stringify(cfg, null, 2) + '\n', 'utf8');
  console.log(`${exists ? 'Overwrote' : 'Created'} ${CONFIG_FILE}`);
}
