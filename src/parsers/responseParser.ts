import type { z } from 'zod';
import type { JsonValue, ParseOutcome } from '../types.js';

export interface RawResponseWrapper {
  raw_response: string;
}

/** Text between the first `start` marker and the next `end` marker, trimmed. */
export function extractBetween(raw: string, start: string, end: string): ParseOutcome<string> {
  const from = raw.indexOf(start);
  const to = from === -1 ? -1 : raw.indexOf(end, from + start.length);
  if (from === -1 || to === -1) {
    return {
      kind: 'degraded',
      value: raw,
      warning: `Response dividers ${start} / ${end} not found; returning the raw response`,
    };
  }
  return { kind: 'ok', value: raw.slice(from + start.length, to).trim() };
}

/**
 * Parses the greedy `{ ... }` span of a completion. Never throws: anything that
 * is not a JSON object comes back degraded as `{ raw_response }`.
 *
 * Key order follows JSON.parse: string keys keep their order, but integer-like
 * keys (`"2"`) are enumerated first in ascending order.
 */
export function parseJsonObject(raw: string): ParseOutcome<{ [key: string]: JsonValue } | RawResponseWrapper> {
  const first = raw.indexOf('{');
  const last = raw.lastIndexOf('}');
  const malformed = (why: string) => ({
    kind: 'degraded' as const,
    value: { raw_response: raw },
    warning: `MalformedResponse: ${why}`,
  });

  if (first === -1 || last < first) return malformed('no JSON object in response');

  let parsed: JsonValue;
  try {
    parsed = JSON.parse(raw.slice(first, last + 1));
  } catch (err) {
    return malformed(err instanceof Error ? err.message : String(err));
  }
  if (parsed === null || typeof parsed !== 'object' || Array.isArray(parsed)) {
    return malformed('response JSON is not an object');
  }
  return { kind: 'ok', value: parsed };
}

/**
 * Narrows a JSON-mode outcome to a typed record. Degraded parses and schema
 * mismatches both fall back to `fallback`, keeping the warning.
 */
export function validateJson<S extends z.ZodTypeAny>(
  outcome: ParseOutcome<unknown>,
  schema: S,
  fallback: z.output<S>,
): ParseOutcome<z.output<S>> {
  if (outcome.kind === 'failed') return outcome;
  if (outcome.kind === 'degraded') {
    return { kind: 'degraded', value: fallback, warning: outcome.warning };
  }
  const checked = schema.safeParse(outcome.value);
  if (!checked.success) {
    const issues = checked.error.issues.map((i) => `${i.path.join('.') || '(root)'}: ${i.message}`).join('; ');
    return { kind: 'degraded', value: fallback, warning: `Response did not match the expected shape: ${issues}` };
  }
  return { kind: 'ok', value: checked.data };
}

export function warningOf<T>(outcome: ParseOutcome<T>): string | undefined {
  return outcome.kind === 'degraded' ? outcome.warning : undefined;
}
