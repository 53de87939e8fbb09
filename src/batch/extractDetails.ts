import type { AppContext } from '../context.js';
import type { ExtractedDetails, JobRecord } from '../types.js';
import { Workflows, hasRequirements } from '../pipeline/workflows.js';
import { loadDataset, writeDataset } from '../jobs/dataset.js';
import { writeSpreadsheet } from '../jobs/spreadsheet.js';
import { mapPool } from '../util/workerPool.js';
import { CredentialMissingError, describeError } from '../errors.js';

export interface ExtractDetailsOptions {
  concurrency?: number;
  /** Re-extract rows that already carry details. */
  force?: boolean;
  outputPath?: string;
  spreadsheetPath?: string;
}

export interface ExtractDetailsSummary {
  total: number;
  extracted: number;
  skipped: number;
  failed: number;
  outputPath: string;
  spreadsheetPath: string;
}

type RowOutcome = { status: 'extracted' | 'skipped' | 'failed'; details?: ExtractedDetails };

/**
 * Adds Extracted Details to every dataset row with a description, fanning the
 * LLM calls out over a bounded pool. Rows keep their original order.
 */
export async function extractAllDetails(
  ctx: AppContext,
  options: ExtractDetailsOptions = {},
): Promise<ExtractDetailsSummary> {
  const workflows = new Workflows(ctx);
  const concurrency = options.concurrency ?? ctx.config.batchConcurrency;
  const outputPath = options.outputPath ?? ctx.config.datasetPath;
  const spreadsheetPath = options.spreadsheetPath ?? ctx.config.spreadsheetPath;

  const jobs = await loadDataset(ctx.config.datasetPath);
  console.log(`[extract] processing ${jobs.length} job descriptions with ${concurrency} workers`);
  let done = 0;

  const outcomes = await mapPool(jobs, concurrency, async (job, index): Promise<RowOutcome> => {
    const finish = (outcome: RowOutcome): RowOutcome => {
      done++;
      if (outcome.status !== 'skipped') console.log(`[extract] ${done}/${jobs.length} job ${job.jobId}: ${outcome.status}`);
      return outcome;
    };
    if (!job.description || (!options.force && hasRequirements(job.extractedDetails))) {
      return finish({ status: 'skipped', details: job.extractedDetails });
    }
    try {
      const { details } = await workflows.extractJobRequirements(job.description);
      return finish({ status: 'extracted', details });
    } catch (err) {
      if (err instanceof CredentialMissingError) throw err;
      console.error(`[extract] error processing row ${index} (job ${job.jobId}): ${describeError(err)}`);
      return finish({ status: 'failed', details: job.extractedDetails });
    }
  });

  const updated: JobRecord[] = jobs.map((job, index) => ({ ...job, extractedDetails: outcomes[index].details }));

  await writeDataset(outputPath, updated);
  await writeSpreadsheet(spreadsheetPath, updated);

  const count = (status: RowOutcome['status']) => outcomes.filter((o) => o.status === status).length;
  const summary: ExtractDetailsSummary = {
    total: jobs.length,
    extracted: count('extracted'),
    skipped: count('skipped'),
    failed: count('failed'),
    outputPath,
    spreadsheetPath,
  };
  console.log(
    `[extract] complete: ${summary.extracted} extracted, ${summary.skipped} skipped, ${summary.failed} failed. Results saved to ${outputPath}`,
  );
  return summary;
}
