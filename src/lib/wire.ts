import { z } from 'zod';
import type { CoverageData } from './model.js';

const count = z.number().int().nonnegative();

export const CoverageSummarySchema = z.object({
  linesFound: count,
  linesHit: count,
  functionsFound: count,
  functionsHit: count,
  branchesFound: count,
  branchesHit: count,
});

/** Message posted to the parse worker. */
export type ParseRequest = { content: string };

/** Message posted back by the parse worker. */
export type ParseResponse = { ok: true; data: CoverageData } | { ok: false; error: string };

// Only the outer shape is checked. The records were built by parseLcovContent
// on the other side and arrive through a structured clone.
function hasCoverageShape(v: unknown): boolean {
  return (
    typeof v === 'object' &&
    v !== null &&
    'files' in v &&
    Array.isArray(v.files) &&
    'summary' in v &&
    CoverageSummarySchema.safeParse(v.summary).success
  );
}

const CoverageDataShape = z.custom<CoverageData>(hasCoverageShape, 'expected { files: [...], summary: {...} }');

export const ParseResponseSchema = z.discriminatedUnion('ok', [
  z.object({ ok: z.literal(true), data: CoverageDataShape }),
  z.object({ ok: z.literal(false), error: z.string() }),
]);

export function decodeParseResponse(message: unknown): ParseResponse {
  return ParseResponseSchema.parse(message);
}
