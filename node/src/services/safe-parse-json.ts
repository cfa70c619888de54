/**
 * Shared JSON parse for model output: strips markdown fences and normalizes quotes.
 * Used by the query rewriter and the field extractor; callers validate the shape with zod.
 */
import { logger } from '@/services/logger';

export type JsonParseResult =
  | { ok: true; value: Record<string, unknown> }
  | { ok: false; error: string };

function stripFences(raw: string): string {
  let txt = raw.trim();
  if (txt.startsWith('```')) {
    const firstNewline = txt.indexOf('\n');
    const lastFence = txt.lastIndexOf('```');
    if (firstNewline !== -1 && lastFence > firstNewline) {
      txt = txt.slice(firstNewline + 1, lastFence).trim();
    } else {
      txt = txt.replace(/^```\w*\n?/, '').replace(/\n?```$/, '').trim();
    }
  }
  return txt;
}

function asObject(parsed: unknown): Record<string, unknown> | null {
  if (typeof parsed !== 'object' || parsed === null || Array.isArray(parsed)) return null;
  return Object.fromEntries(Object.entries(parsed));
}

export function safeParseJson(raw: string, context: string): JsonParseResult {
  const txt = stripFences(raw);

  for (const candidate of [txt, txt.replace(/'/g, '"')]) {
    try {
      const obj = asObject(JSON.parse(candidate));
      if (obj) return { ok: true, value: obj };
      logger.warn('safeParseJson:non_object', { context, raw: txt.slice(0, 300) });
      return { ok: false, error: 'JSON value is not an object' };
    } catch {
      // try the quote-normalized form next
    }
  }

  logger.warn('safeParseJson:parse_error', {
    context,
    error: 'Invalid JSON after stripping fences',
    raw: txt.slice(0, 300),
  });
  return { ok: false, error: 'Invalid JSON' };
}
