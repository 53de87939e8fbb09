import fs from 'fs/promises';
import os from 'os';
import path from 'path';
import type { AppConfig, JobRecord } from '../types.js';
import type { CompletionClient } from '../analyzer/claude.js';
import type { CompletionPrompt } from '../analyzer/prompts.js';

export function job(jobId: string, overrides: Partial<JobRecord> = {}): JobRecord {
  return {
    jobId,
    title: null,
    companyName: null,
    advertiserName: null,
    location: null,
    workType: null,
    workArrangement: null,
    postingDate: null,
    salaryRange: null,
    teaser: null,
    highlights: [],
    description: null,
    url: null,
    ...overrides,
  };
}

export async function tempDir(prefix = 'fitfinder-'): Promise<string> {
  return fs.mkdtemp(path.join(os.tmpdir(), prefix));
}

export function testConfig(dir: string, overrides: Partial<AppConfig> = {}): AppConfig {
  return {
    anthropicApiKey: undefined,
    model: 'test-model',
    maxTokens: 1024,
    timeoutMs: 1000,
    retryDelaysMs: [],
    port: 0,
    datasetPath: path.join(dir, 'jobs.json'),
    rawListingsPath: path.join(dir, 'raw_listings.json'),
    spreadsheetPath: path.join(dir, 'jobs.xlsx'),
    resumeTextDir: path.join(dir, 'resumes'),
    resumeJsonDir: path.join(dir, 'resume_json'),
    assessmentDir: path.join(dir, 'assessments'),
    batchConcurrency: 2,
    ...overrides,
  };
}

/** Completion client that answers from a function and records every prompt it was sent. */
export class ScriptedCompletion implements CompletionClient {
  readonly prompts: CompletionPrompt[] = [];

  constructor(private readonly reply: (prompt: CompletionPrompt) => string | Promise<string>) {}

  async complete(prompt: CompletionPrompt): Promise<string> {
    this.prompts.push(prompt);
    return this.reply(prompt);
  }
}

/**
 * A one-page PDF whose page draws `lines` in Helvetica, one per line. With no
 * lines the content stream is empty. Offsets in the xref table are byte exact.
 */
export function onePagePdf(lines: string[] = []): Buffer {
  const content = lines.length
    ? `BT /F1 12 Tf 72 720 Td 14 TL ${lines.map((l) => `(${l.replace(/[()\\]/g, '\\$&')}) Tj`).join(' T* ')} ET`
    : '';
  const objects = [
    '<< /Type /Catalog /Pages 2 0 R >>',
    '<< /Type /Pages /Kids [3 0 R] /Count 1 >>',
    '<< /Type /Page /Parent 2 0 R /MediaBox [0 0 612 792] /Contents 4 0 R /Resources << /Font << /F1 5 0 R >> >> >>',
    `<< /Length ${content.length} >>\nstream\n${content}\nendstream`,
    '<< /Type /Font /Subtype /Type1 /BaseFont /Helvetica /Encoding /WinAnsiEncoding >>',
  ];

  let pdf = '%PDF-1.4\n';
  const offsets = objects.map((body, i) => {
    const offset = pdf.length;
    pdf += `${i + 1} 0 obj\n${body}\nendobj\n`;
    return offset;
  });
  const xref = pdf.length;
  pdf += `xref\n0 ${objects.length + 1}\n0000000000 65535 f \n`;
  pdf += offsets.map((o) => `${String(o).padStart(10, '0')} 00000 n \n`).join('');
  pdf += `trailer\n<< /Size ${objects.length + 1} /Root 1 0 R >>\nstartxref\n${xref}\n%%EOF\n`;
  return Buffer.from(pdf, 'latin1');
}
