import fs from 'fs/promises';
import path from 'path';
import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import { loadDataset, parseDataset, toDatasetRow, writeDataset } from './dataset.js';
import { DatasetInvalidError, DatasetUnavailableError } from '../errors.js';
import { job, tempDir } from '../testing/fixtures.js';

let dir: string;

beforeEach(async () => {
  dir = await tempDir();
});

afterEach(async () => {
  await fs.rm(dir, { recursive: true, force: true });
});

describe('parseDataset', () => {
  it('maps columns onto job records and blanks empty cells', () => {
    const [record] = parseDataset([
      {
        'Job Id': 81234567,
        'Job Title': ' Data Analyst ',
        'Company Name': '',
        'Advertiser Name': 'Acme Recruitment',
        'Work Type': 'Full time',
        'Work Arrangement': 'Remote',
        Location: 'Sydney NSW - AU',
        'Posting Date': '2024-01-10T00:00:00Z',
        Highlights: 'Great team; Flexible hours; Free lunch; Gym',
        'Job Description': 'Analyse things.',
      },
    ]);

    expect(record).toEqual(
      job('81234567', {
        title: 'Data Analyst',
        advertiserName: 'Acme Recruitment',
        workType: 'Full time',
        workArrangement: 'Remote',
        location: 'Sydney NSW - AU',
        postingDate: '2024-01-10T00:00:00Z',
        highlights: ['Great team', 'Flexible hours', 'Free lunch'],
        description: 'Analyse things.',
      }),
    );
  });

  it('prefers the numbered highlight columns', () => {
    const [record] = parseDataset([
      { 'Job Id': 'j1', Highlights: 'ignored', 'Highlight Point 1': 'One', 'Highlight Point 3': 'Three' },
    ]);
    expect(record.highlights).toEqual(['One', 'Three']);
  });

  it('reads Extracted Details from an object or a JSON string', () => {
    const details = { responsibilities: [{ requirement: 'Ship', assessment: 'Look' }], skills: [] };
    const rows = parseDataset([
      { 'Job Id': 'a', 'Extracted Details': details },
      { 'Job Id': 'b', 'Extracted Details': JSON.stringify(details) },
    ]);
    const expected = { responsibilities: [{ requirement: 'Ship', assessment: 'Look' }], qualifications: [], skills: [] };
    expect(rows.map((r) => r.extractedDetails)).toEqual([expected, expected]);
  });

  it('rejects a non-array, a bad row and a duplicate id', () => {
    expect(() => parseDataset({})).toThrow('Job dataset is invalid: expected a JSON array of job rows');
    expect(() => parseDataset([{ 'Job Id': 'a' }, { 'Job Title': 'x' }])).toThrow(DatasetInvalidError);
    expect(() => parseDataset([{ 'Job Id': 'a', 'Extracted Details': '{oops' }])).toThrow(
      'Job dataset is invalid: row 0: Extracted Details: Extracted Details is not valid JSON',
    );
    expect(() => parseDataset([{ 'Job Id': 'a' }, { 'Job Id': 'a' }])).toThrow(
      'Job dataset is invalid: duplicate Job Id a',
    );
  });
});

describe('dataset files', () => {
  it('round-trips records through writeDataset and loadDataset', async () => {
    const file = path.join(dir, 'data', 'jobs.json');
    const jobs = [
      job('1', { title: 'Engineer', highlights: ['Remote first'] }),
      job('2', {
        companyName: 'Acme',
        extractedDetails: { responsibilities: [], qualifications: [], skills: [{ requirement: 'SQL', assessment: 'Look for SQL' }] },
      }),
    ];
    await writeDataset(file, jobs);
    await expect(loadDataset(file)).resolves.toEqual(jobs);
  });

  it('writes the column names of the dataset', () => {
    const row = toDatasetRow(job('7', { highlights: ['a', 'b'] }));
    expect(row['Job Id']).toBe('7');
    expect(row.Highlights).toBe('a; b');
    expect(row['Highlight Point 2']).toBe('b');
    expect(row['Highlight Point 3']).toBeNull();
    expect(row['Extracted Details']).toBeNull();
  });

  it('distinguishes a missing file from a corrupt one', async () => {
    await expect(loadDataset(path.join(dir, 'missing.json'))).rejects.toBeInstanceOf(DatasetUnavailableError);
    const corrupt = path.join(dir, 'corrupt.json');
    await fs.writeFile(corrupt, '[{"Job Id": ');
    await expect(loadDataset(corrupt)).rejects.toBeInstanceOf(DatasetInvalidError);
  });
});
