import { z } from 'zod';
import type { FilterSpec, JobRecord, ParseOutcome } from '../types.js';
import { EMPTY_FILTER_SPEC } from '../types.js';

const DAY_MS = 24 * 60 * 60 * 1000;

export function splitValues(raw: string): string[] {
  return raw
    .split(',')
    .map((v) => v.trim())
    .filter(Boolean);
}

function escapeRegExp(value: string): string {
  return value.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');
}

function textMatcher(raw: string): ((value: string | null) => boolean) | null {
  const values = splitValues(raw);
  if (values.length === 0) return null;
  const pattern = new RegExp(values.map(escapeRegExp).join('|'), 'i');
  return (value) => value !== null && pattern.test(value);
}

function categoryMatcher(raw: string): ((value: string | null) => boolean) | null {
  const values = new Set(splitValues(raw));
  if (values.size === 0) return null;
  return (value) => value !== null && values.has(value);
}

/** Whole, non-negative day count, or null when the value is unusable. */
export function parseDaysAgo(raw: string | number): number | null {
  if (typeof raw === 'number') {
    return Number.isInteger(raw) && raw >= 0 ? raw : null;
  }
  const trimmed = raw.trim();
  return /^\d+$/.test(trimmed) ? Number(trimmed) : null;
}

const ZONELESS_DATE_TIME = /^(\d{4}-\d{2}-\d{2})[T ](\d{2}:\d{2}(?::\d{2}(?:\.\d+)?)?)$/;

/** Epoch ms of a posting date. Date-only and offset-less date-times are read as UTC. */
export function parsePostingDate(raw: string | null): number | null {
  if (!raw) return null;
  const trimmed = raw.trim();
  const zoneless = ZONELESS_DATE_TIME.exec(trimmed);
  const ms = Date.parse(zoneless ? `${zoneless[1]}T${zoneless[2]}Z` : trimmed);
  return Number.isNaN(ms) ? null : ms;
}

type RowPredicate = (row: JobRecord) => boolean;

function buildPredicates(spec: FilterSpec, now: Date): RowPredicate[] {
  const predicates: RowPredicate[] = [];

  if (spec.job_title) {
    const match = textMatcher(spec.job_title);
    if (match) predicates.push((row) => match(row.title));
  }
  if (spec.company_name) {
    const match = textMatcher(spec.company_name);
    if (match) predicates.push((row) => match(row.companyName) || match(row.advertiserName));
  }
  if (spec.location) {
    const match = textMatcher(spec.location);
    if (match) predicates.push((row) => match(row.location));
  }
  if (spec.work_type) {
    const match = categoryMatcher(spec.work_type);
    if (match) predicates.push((row) => match(row.workType));
  }
  if (spec.work_arrangement) {
    const match = categoryMatcher(spec.work_arrangement);
    if (match) predicates.push((row) => match(row.workArrangement));
  }
  if (spec.posting_date !== null) {
    const days = parseDaysAgo(spec.posting_date);
    if (days === null) {
      console.warn(`[filter] ignoring posting_date "${spec.posting_date}": not a whole number of days`);
    } else {
      const cutoff = now.getTime() - days * DAY_MS;
      predicates.push((row) => {
        const posted = parsePostingDate(row.postingDate);
        return posted !== null && posted >= cutoff;
      });
    }
  }

  return predicates;
}

/**
 * Applies every populated FilterSpec field (AND across fields, OR across the
 * comma-separated values of one field). Row order is preserved; a spec with no
 * usable field returns `rows` itself.
 */
export function filterJobs(rows: JobRecord[], spec: FilterSpec, now: Date = new Date()): JobRecord[] {
  const predicates = buildPredicates(spec, now);
  if (predicates.length === 0) return rows;
  return rows.filter((row) => predicates.every((p) => p(row)));
}

const optionalText = z.preprocess(
  (v) => (typeof v === 'string' && v.trim() === '' ? null : v),
  z.string().nullable().catch(null),
);

const FilterSpecSchema = z.object({
  job_title: optionalText.default(null),
  work_arrangement: optionalText.default(null),
  work_type: optionalText.default(null),
  posting_date: z
    .preprocess((v) => (typeof v === 'string' && v.trim() === '' ? null : v), z.union([z.string(), z.number()]).nullable().catch(null))
    .default(null),
  company_name: optionalText.default(null),
  location: optionalText.default(null),
});

/** Narrows JSON-mode output into a FilterSpec; anything unusable yields the empty spec. */
export function parseFilterSpec(outcome: ParseOutcome<unknown>): ParseOutcome<FilterSpec> {
  if (outcome.kind === 'failed') return outcome;
  if (outcome.kind === 'degraded') {
    return { kind: 'degraded', value: { ...EMPTY_FILTER_SPEC }, warning: outcome.warning };
  }
  const checked = FilterSpecSchema.safeParse(outcome.value);
  if (!checked.success) {
    return {
      kind: 'degraded',
      value: { ...EMPTY_FILTER_SPEC },
      warning: 'Filter response was not a JSON object of filter fields',
    };
  }
  return { kind: 'ok', value: checked.data };
}

export function isEmptyFilterSpec(spec: FilterSpec): boolean {
  return Object.values(spec).every((v) => v === null);
}
