import type { ExtractedDetails } from '../types.js';

export type PromptTask =
  | 'format_resume'
  | 'extract_resume_json'
  | 'extract_job_filters'
  | 'extract_job_requirements'
  | 'assess_resume';

export interface Delimiters {
  start: string;
  end: string;
}

export interface CompletionPrompt {
  task: PromptTask;
  system: string;
  human: string;
  mode: 'delimiter' | 'json';
  delimiters?: Delimiters;
}

export type PromptPayload<T extends PromptTask> = T extends 'assess_resume'
  ? { resumeText: string; requirements: ExtractedDetails }
  : { text: string };

export const INPUT_START = '---INPUT-START---';
export const INPUT_END = '---INPUT-END---';
export const RESUME_DELIMITERS: Delimiters = { start: '---RESUME-START---', end: '---RESUME-END---' };

function block(label: string, body: string): string {
  return `${label}:\n${INPUT_START}\n${body}\n${INPUT_END}`;
}

interface Template<T extends PromptTask> {
  system: string;
  mode: 'delimiter' | 'json';
  delimiters?: Delimiters;
  human: (payload: PromptPayload<T>) => string;
}

type TemplateTable = { [T in PromptTask]: Template<T> };

const TEMPLATES: TemplateTable = {
  format_resume: {
    system: 'You are an assistant that formats resumes.',
    mode: 'delimiter',
    delimiters: RESUME_DELIMITERS,
    human: ({ text }) => `Format the resume text below into a clear, structured plain-text outline.
Don't assume or add anything by yourself.
Return the resume between the following dividers: '${RESUME_DELIMITERS.start}' and '${RESUME_DELIMITERS.end}'

${block('Resume text', text)}`,
  },

  extract_resume_json: {
    system: 'You are an assistant that extracts structured data from resumes in JSON format.',
    mode: 'json',
    human: ({ text }) => `Extract the resume below into a single JSON object with exactly this structure:
{
  "name": "string or null",
  "contact": { "email": "string or null", "phone": "string or null", "location": "string or null", "links": ["string"] },
  "summary": "string or null",
  "experience": [
    { "title": "string", "company": "string", "start": "YYYY-MM or null", "end": "YYYY-MM, 'present' or null", "highlights": ["string"] }
  ],
  "education": [ { "degree": "string", "institution": "string", "year": "YYYY or null" } ],
  "skills": ["string"],
  "certifications": ["string"]
}

Rules:
- Use only facts present in the resume; never invent values. Use null or [] when a value is missing.
- Dates use the formats shown above.
- Output only the JSON object, with no markdown fences or commentary.

${block('Resume text', text)}`,
  },

  extract_job_filters: {
    system: 'You are an assistant that turns job-search requests into structured filters in JSON format.',
    mode: 'json',
    human: ({ text }) => `Read the job-search request below and return a single JSON object with exactly these keys:
{
  "job_title": "string or null",
  "work_arrangement": "string or null",
  "work_type": "string or null",
  "posting_date": "integer or null",
  "company_name": "string or null",
  "location": "string or null"
}

Rules:
- When the request names several alternatives for a field, join them with ", " (e.g. "Data Analyst, Data Engineer").
- work_arrangement values must come from: "Remote", "Hybrid", "On-site".
- work_type values must come from: "Full time", "Part time", "Contract/Temp", "Casual/Vacation".
- posting_date is the maximum listing age in whole days ("last week" = 7, "past month" = 30).
- Use null for every field the request does not mention. Do not guess.
- Output only the JSON object.

${block('Search request', text)}`,
  },

  extract_job_requirements: {
    system: 'You are an assistant that extracts structured requirements from job descriptions in JSON format.',
    mode: 'json',
    human: ({ text }) => `Analyze the job description below and extract its requirements as bullet points, grouped into three categories.
Return a single JSON object with exactly this structure:
{
  "responsibilities": [ { "requirement": "string", "assessment": "string" } ],
  "qualifications": [ { "requirement": "string", "assessment": "string" } ],
  "skills": [ { "requirement": "string", "assessment": "string" } ]
}

Rules:
- "requirement" is one concise requirement stated by the job description.
- "assessment" is an instruction for judging whether a resume shows that requirement (what evidence to look for).
- skills lists specific technical skills, tools, languages and platforms, one per entry; split combined skills.
- Use [] for a category with no requirements. Output only the JSON object.

${block('Job description', text)}`,
  },

  assess_resume: {
    system: 'You are an assistant that assesses how well a resume meets job requirements, in JSON format.',
    mode: 'json',
    human: ({ resumeText, requirements }) => `Score the resume against every requirement listed below, following each requirement's assessment instruction.
Return a single JSON object with exactly this structure:
{
  "responsibilities": [ { "requirement": "string", "score": 0.0, "rationale": "string" } ],
  "qualifications": [ { "requirement": "string", "score": 0.0, "rationale": "string" } ],
  "skills": [ { "requirement": "string", "score": 0.0, "rationale": "string" } ]
}

Rules:
- Keep every requirement, in the given order and under its given category; copy the requirement text verbatim.
- score is a relevancy fraction between 0 and 1 (0 = no evidence, 1 = fully demonstrated), rounded to 2 decimals.
- rationale is one sentence citing the resume evidence, or its absence.
- Output only the JSON object.

${block('Resume', resumeText)}

${block('Requirements', JSON.stringify(requirements, null, 2))}`,
  },
};

export function buildPrompt<T extends PromptTask>(task: T, payload: PromptPayload<T>): CompletionPrompt {
  const template: Template<T> = TEMPLATES[task];
  return {
    task,
    system: template.system,
    human: template.human(payload),
    mode: template.mode,
    ...(template.delimiters ? { delimiters: template.delimiters } : {}),
  };
}
