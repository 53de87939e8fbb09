import fs from 'fs/promises';
import axios from 'axios';
import * as cheerio from 'cheerio';
import { z } from 'zod';
import type { JobRecord } from '../types.js';
import { normalizeWhitespace } from '../parsers/pdfText.js';

const HEADERS = {
  'User-Agent': 'Mozilla/5.0 (Windows NT 10.0; Win64; x64) AppleWebKit/537.36 (KHTML, like Gecko) Chrome/120.0.0.0 Safari/537.36',
  Accept: 'application/json',
};

const optionalString = z.string().nullish();

/** One item of a scraped job-board export. Only the fields the dataset keeps are checked. */
const RawListingSchema = z.object({
  id: z.union([z.string().min(1), z.number()]).transform(String),
  title: z.string(),
  companyName: optionalString,
  url: z.string(),
  listingDate: z.string(),
  teaser: z.string(),
  roleId: optionalString,
  salaryLabel: optionalString,
  content: z.string(),
  isFeatured: z.boolean().nullish(),
  advertiser: z.object({ description: z.string() }),
  locations: z.array(z.object({ label: z.string(), countryCode: z.string() })).min(1),
  bulletPoints: z.array(z.string()).nullish(),
  workArrangements: z.object({
    data: z.array(z.object({ label: z.object({ text: z.string() }) })).min(1),
  }),
  workTypes: z.array(z.string()).min(1),
});

export type RawListing = z.output<typeof RawListingSchema>;

export interface PreprocessReport {
  jobs: JobRecord[];
  total: number;
  featured: number;
  duplicates: number;
  invalid: number;
  errors: string[];
}

const BLOCK_ELEMENTS = 'br, p, div, li, ul, ol, h1, h2, h3, h4, h5, h6, tr, td, th, section';

/** Visible text of an HTML fragment, with block boundaries kept as spaces. */
export function htmlToText(html: string): string {
  if (!html) return '';
  const $ = cheerio.load(html);
  $('script, style, noscript, iframe').remove();
  $(BLOCK_ELEMENTS).after(' ');
  return normalizeWhitespace($.root().text());
}

function titleCase(value: string): string {
  return value.toLowerCase().replace(/\b[a-z]/g, (c) => c.toUpperCase());
}

/** "data-analyst" becomes "Data Analyst"; appended to the title when the title doesn't already say it. */
export function titleWithRole(title: string, roleId: string | null | undefined): string {
  if (!roleId) return title;
  const role = titleCase(roleId.replace(/-/g, ' '));
  return titleCase(title).includes(role) ? title : `${title} | ${role}`;
}

export function toJobRecord(item: RawListing): JobRecord {
  const highlights = (item.bulletPoints ?? []).map((b) => b.trim()).filter(Boolean).slice(0, 3);
  const location = item.locations[0];
  const description = normalizeWhitespace(
    [item.teaser, highlights.join('; '), htmlToText(item.content)].join(' | '),
  );

  return {
    jobId: item.id,
    title: titleWithRole(item.title, item.roleId),
    companyName: item.companyName?.trim() || item.advertiser.description,
    advertiserName: item.advertiser.description,
    location: `${location.label} - ${location.countryCode}`,
    workType: item.workTypes[0],
    workArrangement: item.workArrangements.data[0].label.text,
    postingDate: item.listingDate,
    salaryRange: item.salaryLabel?.trim() || null,
    teaser: item.teaser,
    highlights,
    description,
    url: item.url,
  };
}

/**
 * Flattens raw listing items into dataset rows. Featured listings and
 * repeated ids are dropped; items missing a required field are counted and skipped.
 */
export function preprocessListings(items: unknown[]): PreprocessReport {
  const report: PreprocessReport = { jobs: [], total: items.length, featured: 0, duplicates: 0, invalid: 0, errors: [] };
  const seen = new Set<string>();

  items.forEach((raw, index) => {
    const parsed = RawListingSchema.safeParse(raw);
    if (!parsed.success) {
      report.invalid++;
      const issue = parsed.error.issues[0];
      report.errors.push(`item ${index}: ${issue.path.join('.')}: ${issue.message}`);
      return;
    }
    const item = parsed.data;
    if (item.isFeatured === true) {
      report.featured++;
      return;
    }
    if (seen.has(item.id)) {
      report.duplicates++;
      return;
    }
    seen.add(item.id);
    report.jobs.push(toJobRecord(item));
  });

  const uniqueErrors = new Set(report.errors.map((e) => e.replace(/^item \d+: /, '')));
  console.log(
    `[preprocess] ${report.jobs.length}/${report.total} listings kept ` +
      `(${report.featured} featured, ${report.duplicates} duplicates, ${report.invalid} invalid; ${uniqueErrors.size} distinct errors)`,
  );
  uniqueErrors.forEach((e) => console.warn(`[preprocess]   ${e}`));
  return report;
}

function isUrl(source: string): boolean {
  return /^https?:\/\//i.test(source);
}

/** Raw listing items from an HTTP JSON endpoint or a local JSON file. */
export async function loadRawListings(source: string): Promise<unknown[]> {
  let data: unknown;
  if (isUrl(source)) {
    console.log(`[preprocess] fetching ${source}`);
    const response = await axios.get<unknown>(source, { headers: HEADERS, timeout: 60_000, responseType: 'json' });
    data = response.data;
  } else {
    data = JSON.parse(await fs.readFile(source, 'utf-8'));
  }
  if (!Array.isArray(data)) {
    throw new Error(`Expected a JSON array of listings from ${source}`);
  }
  console.log(`[preprocess] loaded ${data.length} raw listings`);
  return data;
}
