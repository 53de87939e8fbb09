import fs from 'fs/promises';
import path from 'path';
import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';
import { Workflows } from './workflows.js';
import { createContext } from '../context.js';
import type { CompletionPrompt } from '../analyzer/prompts.js';
import { writeDataset } from '../jobs/dataset.js';
import { BadRequestError, DatasetUnavailableError, NotFoundError } from '../errors.js';
import type { AppConfig, JobRecord } from '../types.js';
import { ScriptedCompletion, job, tempDir, testConfig } from '../testing/fixtures.js';

const NOW = new Date('2024-01-11T00:00:00Z');

const details = {
  responsibilities: [{ requirement: 'Build data pipelines', assessment: 'Look for ETL work' }],
  qualifications: [{ requirement: 'Degree in computer science', assessment: 'Check education' }],
  skills: [],
};

const JOBS: JobRecord[] = [
  job('j1', { title: 'Data Engineer', workArrangement: 'Remote', postingDate: '2024-01-10', extractedDetails: details }),
  job('j2', { title: 'Analyst', workArrangement: 'On-site', postingDate: '2024-01-10', description: 'Build dashboards.' }),
  job('j3', { title: 'Platform Engineer', workArrangement: 'Remote', postingDate: '2023-12-01' }),
];

let dir: string;
let config: AppConfig;

function workflowsWith(reply: (prompt: CompletionPrompt) => string) {
  const completion = new ScriptedCompletion(reply);
  return { completion, workflows: new Workflows(createContext(config, { completion, now: () => NOW })) };
}

beforeEach(async () => {
  dir = await tempDir();
  config = testConfig(dir);
  await writeDataset(config.datasetPath, JOBS);
  vi.spyOn(console, 'log').mockImplementation(() => {});
  vi.spyOn(console, 'warn').mockImplementation(() => {});
});

afterEach(async () => {
  vi.restoreAllMocks();
  await fs.rm(dir, { recursive: true, force: true });
});

describe('formatResume', () => {
  it('returns the text between the resume dividers', async () => {
    const { workflows, completion } = workflowsWith(() => 'Sure.\n---RESUME-START---\nJANE DOE\n---RESUME-END---');
    await expect(workflows.formatResume('jane doe')).resolves.toEqual({ formatted: 'JANE DOE' });
    expect(completion.prompts.map((p) => p.task)).toEqual(['format_resume']);
  });

  it('falls back to the raw reply with a warning when dividers are missing', async () => {
    const { workflows } = workflowsWith(() => 'JANE DOE');
    const result = await workflows.formatResume('jane doe');
    expect(result.formatted).toBe('JANE DOE');
    expect(result.warning).toBe('Response dividers ---RESUME-START--- / ---RESUME-END--- not found; returning the raw response');
  });

  it('requires text before calling the model', async () => {
    const { workflows, completion } = workflowsWith(() => '');
    await expect(workflows.formatResume('   ')).rejects.toThrow('No text to format available. Please parse a resume first.');
    expect(completion.prompts).toHaveLength(0);
  });

  it('shares one model call between identical concurrent submissions', async () => {
    const { workflows, completion } = workflowsWith(() => '---RESUME-START---X---RESUME-END---');
    const [a, b] = await Promise.all([workflows.formatResume('cv'), workflows.formatResume('cv')]);
    expect(a).toEqual(b);
    expect(completion.prompts).toHaveLength(1);
  });
});

describe('extractResumeJson', () => {
  it('returns the parsed profile', async () => {
    const { workflows } = workflowsWith(() => '{"name": "Jane Doe", "skills": ["SQL"]}');
    await expect(workflows.extractResumeJson('cv')).resolves.toEqual({ profile: { name: 'Jane Doe', skills: ['SQL'] } });
  });

  it('wraps a malformed reply instead of failing', async () => {
    const { workflows } = workflowsWith(() => 'I could not do that');
    await expect(workflows.extractResumeJson('cv')).resolves.toEqual({
      profile: { raw_response: 'I could not do that' },
      warning: 'MalformedResponse: no JSON object in response',
    });
  });
});

describe('searchJobs', () => {
  it('filters the dataset with the filters the model extracted', async () => {
    const { workflows, completion } = workflowsWith(() => '{"work_arrangement": "Remote", "posting_date": 2}');
    const result = await workflows.searchJobs('  remote jobs from the last two days ');

    expect(result.query).toBe('remote jobs from the last two days');
    expect(result.filters).toEqual({
      job_title: null,
      work_arrangement: 'Remote',
      work_type: null,
      posting_date: 2,
      company_name: null,
      location: null,
    });
    expect(result.jobs.map((j) => j.jobId)).toEqual(['j1']);
    expect(result.total).toBe(3);
    expect(result.warning).toBeUndefined();
    expect(completion.prompts[0].human).toContain('remote jobs from the last two days');
  });

  it('returns every job with a warning when the filters are unreadable', async () => {
    const { workflows } = workflowsWith(() => 'no idea');
    const result = await workflows.searchJobs('anything');
    expect(result.jobs).toHaveLength(3);
    expect(result.warning).toBe('MalformedResponse: no JSON object in response');
  });

  it('rejects a blank query', async () => {
    const { workflows } = workflowsWith(() => '{}');
    await expect(workflows.searchJobs(' ')).rejects.toBeInstanceOf(BadRequestError);
  });

  it('reports a missing dataset without calling the model', async () => {
    await fs.rm(config.datasetPath);
    const { workflows, completion } = workflowsWith(() => '{}');
    await expect(workflows.searchJobs('data')).rejects.toBeInstanceOf(DatasetUnavailableError);
    expect(completion.prompts).toHaveLength(0);
  });
});

describe('assessResume', () => {
  const assessmentReply = JSON.stringify({
    responsibilities: [{ requirement: 'Build data pipelines', score: 0.5, rationale: 'Some ETL.' }],
    qualifications: [{ requirement: 'Degree in computer science', score: 1, rationale: 'BSc.' }],
    skills: [],
  });

  it('scores the resume against the stored requirements', async () => {
    const { workflows, completion } = workflowsWith(() => assessmentReply);
    const result = await workflows.assessResume('Jane Doe resume', 'j1');

    expect(completion.prompts.map((p) => p.task)).toEqual(['assess_resume']);
    expect(result.warnings).toEqual([]);
    expect(result.assessment.categories.responsibilities.score).toBe(50);
    expect(result.assessment.categories.qualifications.score).toBe(100);
    expect(result.assessment.overall).toBe(75);
    expect(result.savedTo).toBeUndefined();
  });

  it('extracts requirements first when the job has none stored', async () => {
    const { workflows, completion } = workflowsWith((prompt) =>
      prompt.task === 'extract_job_requirements'
        ? JSON.stringify({ skills: [{ requirement: 'Looker', assessment: 'Look for BI tools' }] })
        : JSON.stringify({ skills: [{ requirement: 'Looker', score: 0.4, rationale: 'Used Tableau.' }] }),
    );
    const result = await workflows.assessResume('Jane Doe resume', 'j2');

    expect(completion.prompts.map((p) => p.task)).toEqual(['extract_job_requirements', 'assess_resume']);
    expect(result.assessment.categories.skills.score).toBe(40);
    expect(result.assessment.overall).toBe(40);
  });

  it('warns and scores nothing when no requirements can be extracted', async () => {
    const { workflows, completion } = workflowsWith(() => '{}');
    const result = await workflows.assessResume('Jane Doe resume', 'j2');

    expect(completion.prompts.map((p) => p.task)).toEqual(['extract_job_requirements']);
    expect(result.warnings).toEqual(['No requirements could be extracted for job j2.']);
    expect(result.assessment.overall).toBeNull();
  });

  it('saves the assessment when asked', async () => {
    const { workflows } = workflowsWith(() => assessmentReply);
    const result = await workflows.assessResume('Jane Doe resume', 'j1', true);

    expect(result.savedTo).toBe(path.join(config.assessmentDir, 'assessment_j1_20240111_000000.json'));
    const saved: unknown = JSON.parse(await fs.readFile(path.join(config.assessmentDir, 'assessment_j1_20240111_000000.json'), 'utf-8'));
    expect(saved).toEqual(result.assessment);
  });

  it('rejects an unknown job and a job without a description', async () => {
    const { workflows } = workflowsWith(() => assessmentReply);
    await expect(workflows.assessResume('resume', 'nope')).rejects.toBeInstanceOf(NotFoundError);
    await expect(workflows.assessResume('resume', 'j3')).rejects.toThrow('Job j3 has no description to assess against.');
  });
});

describe('saving', () => {
  it('writes formatted text and profiles under their own directories', async () => {
    const { workflows } = workflowsWith(() => '');
    await expect(workflows.saveResumeText('JANE')).resolves.toBe(path.join(config.resumeTextDir, 'resume_20240111_000000.txt'));
    await expect(workflows.saveResumeJson({ name: 'Jane' })).resolves.toBe(
      path.join(config.resumeJsonDir, 'resume_20240111_000000.json'),
    );
  });
});
