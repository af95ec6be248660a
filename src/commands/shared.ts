import { GitFileDiscovery } from '../lib/discovery.js';
import type { Logger } from '../lib/logger.js';
import { CoverageOrchestrator } from '../lib/orchestrator.js';
import { CoverageParser } from '../lib/parser.js';
import type { ScopecovConfig } from '../types.js';

export function createOrchestrator(cfg: ScopecovConfig, logger: Logger): CoverageOrchestrator {
  return new CoverageOrchestrator({
    discovery: new GitFileDiscovery({ sourceExtensions: cfg.sourceExtensions, exclude: cfg.exclude, logger }),
    parser: new CoverageParser({ thresholdBytes: cfg.workerThresholdBytes }),
    logger,
  });
}
