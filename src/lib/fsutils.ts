import fs from 'fs-extra';
import path from 'path';

export const CONFIG_FILE = 'scopecov.config.json';

export async function writeJSON<T>(p: string, data: T) {
  await fs.ensureDir(path.dirname(p));
  await fs.writeFile(p, JSON.stringify(data, null, 2) + '\n', 'utf8');
}

export async function writeText(p: string, text: string) {
  await fs.ensureDir(path.dirname(p));
  await fs.writeFile(p, text, 'utf8');
}
