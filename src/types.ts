export interface UploadedDocument {
  filename: string;
  data: Buffer;
}

export interface ExtractedText {
  text: string;
  pageCount: number;
}

export interface RequirementItem {
  requirement: string;
  assessment: string;
}

export type RequirementCategory = 'responsibilities' | 'qualifications' | 'skills';

export const REQUIREMENT_CATEGORIES: readonly RequirementCategory[] = [
  'responsibilities',
  'qualifications',
  'skills',
];

export type ExtractedDetails = Record<RequirementCategory, RequirementItem[]>;

export interface JobRecord {
  jobId: string;
  title: string | null;
  companyName: string | null;
  advertiserName: string | null;
  location: string | null;
  workType: string | null;
  workArrangement: string | null;
  postingDate: string | null;
  salaryRange: string | null;
  teaser: string | null;
  highlights: string[];
  description: string | null;
  url: string | null;
  extractedDetails?: ExtractedDetails;
}

export interface FilterSpec {
  job_title: string | null;
  work_arrangement: string | null;
  work_type: string | null;
  posting_date: string | number | null;
  company_name: string | null;
  location: string | null;
}

export const EMPTY_FILTER_SPEC: FilterSpec = {
  job_title: null,
  work_arrangement: null,
  work_type: null,
  posting_date: null,
  company_name: null,
  location: null,
};

export interface ScoredBullet {
  requirement: string;
  score: number;
  rationale: string;
}

export interface CategoryAssessment {
  bullets: ScoredBullet[];
  score: number | null;
}

export interface AssessmentResult {
  jobId: string;
  categories: Record<RequirementCategory, CategoryAssessment>;
  overall: number | null;
}

export type ParseOutcome<T> =
  | { kind: 'ok'; value: T }
  | { kind: 'degraded'; value: T; warning: string }
  | { kind: 'failed'; error: Error };

export type JsonValue = string | number | boolean | null | JsonValue[] | { [key: string]: JsonValue };

export interface AppConfig {
  anthropicApiKey: string | undefined;
  model: string;
  maxTokens: number;
  timeoutMs: number;
  retryDelaysMs: number[];
  port: number;
  datasetPath: string;
  rawListingsPath: string;
  spreadsheetPath: string;
  resumeTextDir: string;
  resumeJsonDir: string;
  assessmentDir: string;
  batchConcurrency: number;
}
