import fs from 'fs-extra';
import { Worker } from 'node:worker_threads';
import { NotFoundError, ParseWorkerError } from './errors.js';
import { parseLcovContent } from './lcov.js';
import type { CoverageData } from './model.js';
import { decodeParseResponse } from './wire.js';
import type { ParseRequest } from './wire.js';

export const DEFAULT_WORKER_THRESHOLD_BYTES = 1024 * 1024;

/** Runs one parse off the calling thread and resolves with its result. */
export interface ParseRunner {
  run(content: string): Promise<CoverageData>;
}

export class WorkerThreadRunner implements ParseRunner {
  constructor(private readonly entry: URL = new URL('./parse-worker.js', import.meta.url)) {}

  run(content: string): Promise<CoverageData> {
    return new Promise<CoverageData>((resolve, reject) => {
      const worker = new Worker(this.entry);
      let settled = false;
      const settle = (fn: () => void) => {
        if (settled) return;
        settled = true;
        fn();
        void worker.terminate();
      };

      worker.once('message', (message: unknown) => {
        settle(() => {
          try {
            const response = decodeParseResponse(message);
            if (response.ok) resolve(response.data);
            else reject(new ParseWorkerError(`LCOV parsing failed: ${response.error}`));
          } catch (err: unknown) {
            reject(new ParseWorkerError('LCOV parse worker sent an invalid response', { cause: err }));
          }
        });
      });
      worker.once('error', (err: Error) => {
        settle(() => reject(new ParseWorkerError(`LCOV parse worker crashed: ${err.message}`, { cause: err })));
      });
      worker.once('exit', (code: number) => {
        settle(() => reject(new ParseWorkerError(`LCOV parse worker exited with code ${code} before replying`)));
      });

      const request: ParseRequest = { content };
      worker.postMessage(request);
    });
  }
}

export type CoverageParserOptions = {
  thresholdBytes?: number;
  runner?: ParseRunner;
};

/**
 * Parses LCOV text inline when it is small and on a worker thread when it is
 * at or above `thresholdBytes`. Both paths run `parseLcovContent`.
 */
export class CoverageParser {
  readonly thresholdBytes: number;
  private readonly runner: ParseRunner;

  constructor(opts: CoverageParserOptions = {}) {
    this.thresholdBytes = opts.thresholdBytes ?? DEFAULT_WORKER_THRESHOLD_BYTES;
    this.runner = opts.runner ?? new WorkerThreadRunner();
  }

  async parseContent(content: string): Promise<CoverageData> {
    return this.parseSized(content, Buffer.byteLength(content, 'utf8'));
  }

  async parseFile(filePath: string): Promise<CoverageData> {
    if (!(await fs.pathExists(filePath))) {
      throw new NotFoundError(filePath);
    }
    const stat = await fs.stat(filePath);
    const content = await fs.readFile(filePath, 'utf8');
    return this.parseSized(content, stat.size);
  }

  private async parseSized(content: string, size: number): Promise<CoverageData> {
    if (size >= this.thresholdBytes) {
      return this.runner.run(content);
    }
    return parseLcovContent(content);
  }
}
