import fs from 'fs/promises';
import path from 'path';
import { z } from 'zod';
import type { ExtractedDetails, JobRecord } from '../types.js';
import { DatasetInvalidError, DatasetUnavailableError, describeError } from '../errors.js';

/** Column names of the job dataset file, in export order. */
export const DATASET_COLUMNS = [
  'Job Id',
  'Job Title',
  'Company Name',
  'Advertiser Name',
  'Work Type',
  'Work Arrangement',
  'Location',
  'Posting Date',
  'Salary Range',
  'Job Teaser',
  'Highlights',
  'Highlight Point 1',
  'Highlight Point 2',
  'Highlight Point 3',
  'Job Description',
  'Job Url',
  'Extracted Details',
] as const;

export type DatasetColumn = (typeof DATASET_COLUMNS)[number];
export type DatasetRow = Partial<Record<DatasetColumn, string | ExtractedDetails | null>>;

const cell = z
  .union([z.string(), z.number(), z.null()])
  .optional()
  .transform((v) => {
    if (v === undefined || v === null) return null;
    const s = String(v).trim();
    return s === '' ? null : s;
  });

const RequirementItemSchema = z.object({
  requirement: z.string(),
  assessment: z.string().default(''),
});

export const ExtractedDetailsSchema = z.object({
  responsibilities: z.array(RequirementItemSchema).default([]),
  qualifications: z.array(RequirementItemSchema).default([]),
  skills: z.array(RequirementItemSchema).default([]),
});

const detailsCell = z
  .unknown()
  .transform((v, ctx): ExtractedDetails | undefined => {
    if (v === undefined || v === null || v === '') return undefined;
    let value = v;
    if (typeof value === 'string') {
      try {
        value = JSON.parse(value);
      } catch {
        ctx.addIssue({ code: z.ZodIssueCode.custom, message: 'Extracted Details is not valid JSON' });
        return z.NEVER;
      }
    }
    const parsed = ExtractedDetailsSchema.safeParse(value);
    if (!parsed.success) {
      ctx.addIssue({ code: z.ZodIssueCode.custom, message: 'Extracted Details has an unexpected shape' });
      return z.NEVER;
    }
    return parsed.data;
  });

const RowSchema = z.object({
  'Job Id': z.union([z.string().min(1), z.number()]).transform(String),
  'Job Title': cell,
  'Company Name': cell,
  'Advertiser Name': cell,
  'Work Type': cell,
  'Work Arrangement': cell,
  Location: cell,
  'Posting Date': cell,
  'Salary Range': cell,
  'Job Teaser': cell,
  Highlights: cell,
  'Highlight Point 1': cell,
  'Highlight Point 2': cell,
  'Highlight Point 3': cell,
  'Job Description': cell,
  'Job Url': cell,
  'Extracted Details': detailsCell,
});

type ParsedRow = z.output<typeof RowSchema>;

function toJobRecord(row: ParsedRow): JobRecord {
  const points = [row['Highlight Point 1'], row['Highlight Point 2'], row['Highlight Point 3']].filter(
    (p): p is string => p !== null,
  );
  const highlights =
    points.length > 0
      ? points
      : (row.Highlights ?? '')
          .split(';')
          .map((h) => h.trim())
          .filter(Boolean)
          .slice(0, 3);

  const record: JobRecord = {
    jobId: row['Job Id'],
    title: row['Job Title'],
    companyName: row['Company Name'],
    advertiserName: row['Advertiser Name'],
    location: row.Location,
    workType: row['Work Type'],
    workArrangement: row['Work Arrangement'],
    postingDate: row['Posting Date'],
    salaryRange: row['Salary Range'],
    teaser: row['Job Teaser'],
    highlights,
    description: row['Job Description'],
    url: row['Job Url'],
  };
  if (row['Extracted Details']) record.extractedDetails = row['Extracted Details'];
  return record;
}

export function toDatasetRow(job: JobRecord): DatasetRow {
  return {
    'Job Id': job.jobId,
    'Job Title': job.title,
    'Company Name': job.companyName,
    'Advertiser Name': job.advertiserName,
    'Work Type': job.workType,
    'Work Arrangement': job.workArrangement,
    Location: job.location,
    'Posting Date': job.postingDate,
    'Salary Range': job.salaryRange,
    'Job Teaser': job.teaser,
    Highlights: job.highlights.join('; ') || null,
    'Highlight Point 1': job.highlights[0] ?? null,
    'Highlight Point 2': job.highlights[1] ?? null,
    'Highlight Point 3': job.highlights[2] ?? null,
    'Job Description': job.description,
    'Job Url': job.url,
    'Extracted Details': job.extractedDetails ?? null,
  };
}

export function parseDataset(json: unknown): JobRecord[] {
  if (!Array.isArray(json)) throw new DatasetInvalidError('expected a JSON array of job rows');

  const records: JobRecord[] = [];
  const seen = new Set<string>();
  json.forEach((raw: unknown, index) => {
    const parsed = RowSchema.safeParse(raw);
    if (!parsed.success) {
      const issue = parsed.error.issues[0];
      throw new DatasetInvalidError(`row ${index}: ${issue.path.join('.') || '(row)'}: ${issue.message}`);
    }
    const record = toJobRecord(parsed.data);
    if (seen.has(record.jobId)) throw new DatasetInvalidError(`duplicate Job Id ${record.jobId}`);
    seen.add(record.jobId);
    records.push(record);
  });
  return records;
}

/** Reads the dataset fresh from disk; callers get an independent snapshot each time. */
export async function loadDataset(datasetPath: string): Promise<JobRecord[]> {
  let raw: string;
  try {
    raw = await fs.readFile(datasetPath, 'utf-8');
  } catch (err) {
    if (err instanceof Error && 'code' in err && err.code === 'ENOENT') {
      throw new DatasetUnavailableError(datasetPath);
    }
    throw new DatasetInvalidError(describeError(err));
  }
  let json: unknown;
  try {
    json = JSON.parse(raw);
  } catch (err) {
    throw new DatasetInvalidError(`not valid JSON (${describeError(err)})`);
  }
  return parseDataset(json);
}

export async function writeDataset(datasetPath: string, jobs: JobRecord[]): Promise<void> {
  await fs.mkdir(path.dirname(datasetPath), { recursive: true });
  await fs.writeFile(datasetPath, JSON.stringify(jobs.map(toDatasetRow), null, 2), 'utf-8');
}
