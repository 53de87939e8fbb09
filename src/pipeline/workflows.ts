import type { AppContext } from '../context.js';
import type {
  AssessmentResult,
  ExtractedDetails,
  ExtractedText,
  FilterSpec,
  JobRecord,
  JsonValue,
  UploadedDocument,
} from '../types.js';
import { REQUIREMENT_CATEGORIES } from '../types.js';
import { RESUME_DELIMITERS, buildPrompt } from '../analyzer/prompts.js';
import { AssessmentResponseSchema, EMPTY_ASSESSMENT_RESPONSE, scoreAssessment } from '../analyzer/assessment.js';
import { extractPdfText } from '../parsers/pdfText.js';
import { extractBetween, parseJsonObject, validateJson, warningOf } from '../parsers/responseParser.js';
import type { RawResponseWrapper } from '../parsers/responseParser.js';
import { ExtractedDetailsSchema, loadDataset } from '../jobs/dataset.js';
import { filterJobs, parseFilterSpec } from '../jobs/filterEngine.js';
import { saveOutput } from '../output/sink.js';
import { SingleFlight } from '../util/singleFlight.js';
import { BadRequestError, NotFoundError } from '../errors.js';

export interface FormatResult {
  formatted: string;
  warning?: string;
}

export interface ResumeJsonResult {
  profile: { [key: string]: JsonValue } | RawResponseWrapper;
  warning?: string;
}

export interface SearchResult {
  query: string;
  filters: FilterSpec;
  jobs: JobRecord[];
  total: number;
  warning?: string;
}

export interface RequirementsResult {
  details: ExtractedDetails;
  warning?: string;
}

export interface AssessResult {
  assessment: AssessmentResult;
  warnings: string[];
  savedTo?: string;
}

export const EMPTY_DETAILS: ExtractedDetails = { responsibilities: [], qualifications: [], skills: [] };

export function hasRequirements(details: ExtractedDetails | undefined): details is ExtractedDetails {
  return details !== undefined && REQUIREMENT_CATEGORIES.some((c) => details[c].length > 0);
}

function requireText(text: string | undefined, what: string): string {
  if (!text || !text.trim()) throw new BadRequestError(`No ${what} available. Please parse a resume first.`);
  return text;
}

function reportWarning(warning: string | undefined): { warning?: string } {
  if (!warning) return {};
  console.warn(`[pipeline] ${warning}`);
  return { warning };
}

/**
 * The user-triggered actions of the résumé and job-search flows. Each action
 * runs to completion; identical concurrent submissions share one run.
 */
export class Workflows {
  private readonly formatFlight = new SingleFlight<FormatResult>('format');
  private readonly resumeJsonFlight = new SingleFlight<ResumeJsonResult>('extract-resume');
  private readonly searchFlight = new SingleFlight<SearchResult>('search');
  private readonly assessFlight = new SingleFlight<AssessResult>('assess');

  constructor(private readonly ctx: AppContext) {}

  parseResume(doc: UploadedDocument): Promise<ExtractedText> {
    return extractPdfText(doc);
  }

  async formatResume(text: string | undefined): Promise<FormatResult> {
    const raw = requireText(text, 'text to format');
    return this.formatFlight.run({ raw }, async () => {
      const completion = await this.ctx.completion.complete(buildPrompt('format_resume', { text: raw }));
      const outcome = extractBetween(completion, RESUME_DELIMITERS.start, RESUME_DELIMITERS.end);
      if (outcome.kind === 'failed') throw outcome.error;
      console.log(`[format] ${outcome.value.length} characters of formatted text`);
      return { formatted: outcome.value, ...reportWarning(warningOf(outcome)) };
    });
  }

  async extractResumeJson(text: string | undefined): Promise<ResumeJsonResult> {
    const raw = requireText(text, 'resume text');
    return this.resumeJsonFlight.run({ raw }, async () => {
      const completion = await this.ctx.completion.complete(buildPrompt('extract_resume_json', { text: raw }));
      const outcome = parseJsonObject(completion);
      if (outcome.kind === 'failed') throw outcome.error;
      return { profile: outcome.value, ...reportWarning(warningOf(outcome)) };
    });
  }

  async listJobs(): Promise<JobRecord[]> {
    return loadDataset(this.ctx.config.datasetPath);
  }

  async extractFilters(query: string): Promise<{ filters: FilterSpec; warning?: string }> {
    const completion = await this.ctx.completion.complete(buildPrompt('extract_job_filters', { text: query }));
    const outcome = parseFilterSpec(parseJsonObject(completion));
    if (outcome.kind === 'failed') throw outcome.error;
    return { filters: outcome.value, ...reportWarning(warningOf(outcome)) };
  }

  async searchJobs(query: string | undefined): Promise<SearchResult> {
    if (!query || !query.trim()) throw new BadRequestError('Enter a search request first.');
    const trimmed = query.trim();
    return this.searchFlight.run({ trimmed }, async () => {
      const rows = await this.listJobs();
      const { filters, warning } = await this.extractFilters(trimmed);
      const jobs = filterJobs(rows, filters, this.ctx.now());
      console.log(`[search] "${trimmed}": ${jobs.length}/${rows.length} jobs match ${JSON.stringify(filters)}`);
      return { query: trimmed, filters, jobs, total: rows.length, ...(warning ? { warning } : {}) };
    });
  }

  async extractJobRequirements(description: string): Promise<RequirementsResult> {
    const completion = await this.ctx.completion.complete(
      buildPrompt('extract_job_requirements', { text: description }),
    );
    const outcome = validateJson(parseJsonObject(completion), ExtractedDetailsSchema, EMPTY_DETAILS);
    if (outcome.kind === 'failed') throw outcome.error;
    return { details: outcome.value, ...reportWarning(warningOf(outcome)) };
  }

  async assessResume(resumeText: string | undefined, jobId: string, save = false): Promise<AssessResult> {
    const resume = requireText(resumeText, 'resume text');
    return this.assessFlight.run({ resume, jobId, save }, async () => {
      const jobs = await this.listJobs();
      const job = jobs.find((j) => j.jobId === jobId);
      if (!job) throw new NotFoundError(`Job ${jobId}`);

      const warnings: string[] = [];
      let requirements = job.extractedDetails;
      if (!hasRequirements(requirements)) {
        if (!job.description) throw new BadRequestError(`Job ${jobId} has no description to assess against.`);
        const extracted = await this.extractJobRequirements(job.description);
        if (extracted.warning) warnings.push(extracted.warning);
        requirements = extracted.details;
      }

      let assessment: AssessmentResult;
      if (!hasRequirements(requirements)) {
        warnings.push(`No requirements could be extracted for job ${jobId}.`);
        assessment = scoreAssessment(jobId, EMPTY_DETAILS, EMPTY_ASSESSMENT_RESPONSE);
      } else {
        const completion = await this.ctx.completion.complete(
          buildPrompt('assess_resume', { resumeText: resume, requirements }),
        );
        const outcome = validateJson(parseJsonObject(completion), AssessmentResponseSchema, EMPTY_ASSESSMENT_RESPONSE);
        if (outcome.kind === 'failed') throw outcome.error;
        const { warning } = reportWarning(warningOf(outcome));
        if (warning) warnings.push(warning);
        assessment = scoreAssessment(jobId, requirements, outcome.value);
      }
      console.log(`[assess] job ${jobId}: overall ${assessment.overall ?? 'n/a'}`);

      const result: AssessResult = { assessment, warnings };
      if (save) result.savedTo = await this.saveAssessment(assessment);
      return result;
    });
  }

  async saveResumeText(text: string | undefined): Promise<string> {
    const formatted = requireText(text, 'formatted text to save');
    return saveOutput(this.ctx.config.resumeTextDir, 'resume', formatted, 'txt', this.ctx.now());
  }

  saveResumeJson(profile: object): Promise<string> {
    return saveOutput(this.ctx.config.resumeJsonDir, 'resume', profile, 'json', this.ctx.now());
  }

  saveAssessment(assessment: AssessmentResult): Promise<string> {
    return saveOutput(this.ctx.config.assessmentDir, `assessment_${assessment.jobId}`, assessment, 'json', this.ctx.now());
  }
}
