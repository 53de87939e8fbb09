import fs from 'fs';
import path from 'path';
import { z } from 'zod';
import type { AppConfig } from '../types.js';

const CONFIG_FILE = 'fitfinder.config.json';

export const DEFAULT_MODEL = 'claude-sonnet-4-5';

const FileConfigSchema = z
  .object({
    model: z.string().min(1),
    max_tokens: z.number().int().positive(),
    timeout_ms: z.number().int().positive(),
    retry_delays_ms: z.array(z.number().int().nonnegative()),
    port: z.number().int().min(0).max(65535),
    dataset_path: z.string().min(1),
    raw_listings_path: z.string().min(1),
    spreadsheet_path: z.string().min(1),
    resume_text_dir: z.string().min(1),
    resume_json_dir: z.string().min(1),
    assessment_dir: z.string().min(1),
    batch_concurrency: z.number().int().positive(),
  })
  .partial();

type FileConfig = z.infer<typeof FileConfigSchema>;

function readConfigFile(configPath: string): FileConfig {
  if (!fs.existsSync(configPath)) return {};
  const raw = fs.readFileSync(configPath, 'utf-8');
  let json: unknown;
  try {
    json = JSON.parse(raw);
  } catch (err) {
    throw new Error(`${configPath} is not valid JSON: ${err instanceof Error ? err.message : String(err)}`);
  }
  const parsed = FileConfigSchema.safeParse(json);
  if (!parsed.success) {
    const issues = parsed.error.issues.map((i) => `${i.path.join('.')}: ${i.message}`).join('; ');
    throw new Error(`Invalid ${path.basename(configPath)}: ${issues}`);
  }
  return parsed.data;
}

function envPort(raw: string | undefined): number | undefined {
  if (!raw) return undefined;
  const port = Number(raw);
  return Number.isInteger(port) && port >= 0 && port <= 65535 ? port : undefined;
}

/**
 * Resolves configuration from `fitfinder.config.json` (optional) and the environment.
 * Environment variables win over the file; relative paths resolve against `cwd`.
 */
export function loadConfig(
  env: NodeJS.ProcessEnv = process.env,
  cwd: string = process.cwd(),
): AppConfig {
  const file = readConfigFile(path.join(cwd, CONFIG_FILE));
  const resolve = (p: string) => path.resolve(cwd, p);

  return {
    anthropicApiKey: env.ANTHROPIC_API_KEY?.trim() || undefined,
    model: env.FITFINDER_MODEL?.trim() || file.model || DEFAULT_MODEL,
    maxTokens: file.max_tokens ?? 4096,
    timeoutMs: file.timeout_ms ?? 120_000,
    retryDelaysMs: file.retry_delays_ms ?? [2_000, 5_000, 15_000],
    port: envPort(env.PORT) ?? file.port ?? 3000,
    datasetPath: resolve(file.dataset_path ?? 'data/jobs/jobs.json'),
    rawListingsPath: resolve(file.raw_listings_path ?? 'data/jobs/raw_listings.json'),
    spreadsheetPath: resolve(file.spreadsheet_path ?? 'data/jobs/jobs.xlsx'),
    resumeTextDir: resolve(file.resume_text_dir ?? 'data/formatted_resumes_files'),
    resumeJsonDir: resolve(file.resume_json_dir ?? 'data/resume_json_files'),
    assessmentDir: resolve(file.assessment_dir ?? 'data/assessments'),
    batchConcurrency: file.batch_concurrency ?? 4,
  };
}
