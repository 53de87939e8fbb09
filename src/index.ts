#!/usr/bin/env node
import 'dotenv/config';
import fs from 'fs/promises';
import path from 'path';
import { loadConfig } from './config/appConfig.js';
import { createContext } from './context.js';
import type { AppContext } from './context.js';
import { startServer } from './server.js';
import { Workflows } from './pipeline/workflows.js';
import { extractAllDetails } from './batch/extractDetails.js';
import { loadRawListings, preprocessListings } from './scout/listings.js';
import { writeDataset } from './jobs/dataset.js';
import { writeSpreadsheet } from './jobs/spreadsheet.js';

const USAGE = `Usage: fitfinder <command> [options]

Commands:
  serve [--port <n>]                          Start the JSON API
  parse --file <resume.pdf>                   Print the extracted resume text
  format --file <resume.pdf> [--save]         Format a resume with the LLM
  search <free-text query>                    Search the job dataset
  preprocess --source <url|file> [--out <p>]  Build the job dataset from raw listings
  extract-details [--concurrency <n>] [--force]
                                              Add extracted requirements to every job`;

interface ParsedArgs {
  command: string | undefined;
  positional: string[];
  get(flag: string): string | undefined;
  has(flag: string): boolean;
}

function parseArgs(argv: string[]): ParsedArgs {
  const [command, ...rest] = argv;
  const flags = new Map<string, string>();
  const positional: string[] = [];
  for (let i = 0; i < rest.length; i++) {
    const arg = rest[i];
    if (arg.startsWith('--')) {
      const next = rest[i + 1];
      if (next !== undefined && !next.startsWith('--')) {
        flags.set(arg, next);
        i++;
      } else {
        flags.set(arg, '');
      }
    } else {
      positional.push(arg);
    }
  }
  return { command, positional, get: (f) => flags.get(f) || undefined, has: (f) => flags.has(f) };
}

function positiveInt(raw: string | undefined, flag: string): number | undefined {
  if (raw === undefined) return undefined;
  const n = Number(raw);
  if (!Number.isInteger(n) || n <= 0) throw new Error(`${flag} must be a positive integer`);
  return n;
}

async function readPdf(args: ParsedArgs) {
  const file = args.get('--file');
  if (!file) throw new Error('--file <resume.pdf> is required');
  const absPath = path.resolve(file);
  return { filename: path.basename(absPath), data: await fs.readFile(absPath) };
}

async function run(ctx: AppContext, args: ParsedArgs): Promise<void> {
  const workflows = new Workflows(ctx);

  switch (args.command) {
    case 'serve': {
      const port = positiveInt(args.get('--port'), '--port');
      const server = await startServer(port ? { ...ctx, config: { ...ctx.config, port } } : ctx);
      process.on('SIGINT', () => {
        server.close(() => process.exit(0));
      });
      return;
    }
    case 'parse': {
      const { text, pageCount } = await workflows.parseResume(await readPdf(args));
      console.log(`\n${text}\n\n(${text.length} characters, ${pageCount} page${pageCount === 1 ? '' : 's'})`);
      return;
    }
    case 'format': {
      const { text } = await workflows.parseResume(await readPdf(args));
      const { formatted, warning } = await workflows.formatResume(text);
      console.log(`\n${formatted}\n`);
      if (warning) console.warn(`⚠  ${warning}`);
      if (args.has('--save')) console.log(`Saved: ${await workflows.saveResumeText(formatted)}`);
      return;
    }
    case 'search': {
      const result = await workflows.searchJobs(args.positional.join(' '));
      console.log(`\nFilters: ${JSON.stringify(result.filters)}`);
      console.log(`Matches: ${result.jobs.length}/${result.total}\n`);
      for (const job of result.jobs) {
        console.log(`  ${job.jobId}  ${job.title ?? '(untitled)'}: ${job.companyName ?? '?'}, ${job.location ?? '?'}`);
        console.log(`      ${[job.workType, job.workArrangement, job.postingDate?.slice(0, 10)].filter(Boolean).join(' · ')}`);
      }
      if (result.warning) console.warn(`\n⚠  ${result.warning}`);
      return;
    }
    case 'preprocess': {
      const source = args.get('--source') ?? ctx.config.rawListingsPath;
      const outArg = args.get('--out');
      const out = outArg ? path.resolve(outArg) : ctx.config.datasetPath;
      const report = preprocessListings(await loadRawListings(source));
      await writeDataset(out, report.jobs);
      await writeSpreadsheet(ctx.config.spreadsheetPath, report.jobs);
      console.log(`Dataset saved: ${out} (${report.jobs.length} jobs)`);
      return;
    }
    case 'extract-details': {
      await extractAllDetails(ctx, {
        concurrency: positiveInt(args.get('--concurrency'), '--concurrency'),
        force: args.has('--force'),
      });
      return;
    }
    default:
      console.error(USAGE);
      process.exitCode = 1;
  }
}

async function main(): Promise<void> {
  const args = parseArgs(process.argv.slice(2));
  const ctx = createContext(loadConfig());
  await run(ctx, args);
}

main().catch((err) => {
  console.error('\nError:', err instanceof Error ? err.message : err);
  process.exit(1);
});
