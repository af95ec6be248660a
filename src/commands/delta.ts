import { loadConfig } from '../lib/config.js';
import { createConsoleLogger } from '../lib/logger.js';
import { toJsonReport } from '../lib/report.js';
import { createOrchestrator } from './shared.js';

export async function deltaCommand(opts: { base: string; current: string; json?: boolean }) {
  const cfg = await loadConfig();
  const delta = await createOrchestrator(cfg, createConsoleLogger()).calculateDelta(opts.base, opts.current);

  if (opts.json) {
    console.log(JSON.stringify(toJsonReport(delta), null, 2));
    return;
  }
  console.log(`Changed files (${delta.files.length}):`);
  for (const f of delta.files) {
    const changes = f.lines.map((l) => `${l.lineNumber}:${l.hitCount > 0 ? '+' : ''}${l.hitCount}`);
    console.log(`  - ${f.path} ${changes.join(' ')}`);
  }
}
