import { parseLcovContent } from './lcov.js';
import type { ParseResponse } from './wire.js';

function isParseRequest(v: unknown): v is { content: string } {
  if (!v || typeof v !== 'object') return false;
  const o = v as Record<string, unknown>;
  return typeof o.content === 'string';
}

/** Work done on the far side of the worker boundary. */
export function handleParseRequest(message: unknown): ParseResponse {
  if (!isParseRequest(message)) {
    return { ok: false, error: 'Invalid parse request: expected { content: string }' };
  }
  try {
    return { ok: true, data: parseLcovContent(message.content) };
  } catch (err: unknown) {
    return { ok: false, error: err instanceof Error ? err.message : String(err) };
  }
}
