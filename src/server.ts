import express from 'express';
import type { NextFunction, Request, Response } from 'express';
import type { Server } from 'http';
import { z } from 'zod';
import type { AppContext } from './context.js';
import { Workflows } from './pipeline/workflows.js';
import { decodeUpload } from './parsers/pdfText.js';
import { downloadName } from './output/sink.js';
import { BadRequestError, PipelineError, describeError, httpStatusFor } from './errors.js';

const ParseBody = z.object({ filename: z.string().min(1), contents: z.string().min(1) });
const TextBody = z.object({ text: z.string().optional() });
const SaveBody = z.union([
  z.object({ text: z.string() }),
  z.object({ profile: z.record(z.unknown()) }),
]);
const SearchBody = z.object({ query: z.string().optional() });
const AssessBody = z.object({ resumeText: z.string().optional(), save: z.boolean().optional() });

function body<S extends z.ZodTypeAny>(schema: S, req: Request): z.output<S> {
  const parsed = schema.safeParse(req.body ?? {});
  if (!parsed.success) {
    const issues = parsed.error.issues.map((i) => `${i.path.join('.') || 'body'}: ${i.message}`).join('; ');
    throw new BadRequestError(`Invalid request body: ${issues}`);
  }
  return parsed.data;
}

type Handler = (req: Request, res: Response) => Promise<void>;

function route(tag: string, handler: Handler) {
  return (req: Request, res: Response, next: NextFunction): void => {
    handler(req, res).catch((err: unknown) => {
      console.error(`[${tag}] ${describeError(err)}`);
      next(err);
    });
  };
}

/** Builds the JSON API; every pipeline error becomes a `{ status: 'error' }` payload. */
export function createServer(ctx: AppContext): express.Express {
  const workflows = new Workflows(ctx);
  const app = express();
  app.use(express.json({ limit: '25mb' }));

  app.get('/api/health', (_req: Request, res: Response): void => {
    res.json({ status: 'ok', model: ctx.config.model, credentials: Boolean(ctx.config.anthropicApiKey) });
  });

  app.post(
    '/api/resume/parse',
    route('parse', async (req, res) => {
      const { filename, contents } = body(ParseBody, req);
      const { text, pageCount } = await workflows.parseResume(decodeUpload(filename, contents));
      res.json({
        status: 'ok',
        filename,
        text,
        pageCount,
        characterCount: text.length,
        message: `Successfully extracted ${text.length} characters from ${pageCount} page${pageCount === 1 ? '' : 's'}.`,
      });
    }),
  );

  app.post(
    '/api/resume/format',
    route('format', async (req, res) => {
      const { text } = body(TextBody, req);
      const result = await workflows.formatResume(text);
      res.json({ status: result.warning ? 'warning' : 'ok', ...result });
    }),
  );

  app.post(
    '/api/resume/extract',
    route('extract', async (req, res) => {
      const { text } = body(TextBody, req);
      const result = await workflows.extractResumeJson(text);
      res.json({ status: result.warning ? 'warning' : 'ok', ...result });
    }),
  );

  app.post(
    '/api/resume/save',
    route('save', async (req, res) => {
      const saved = body(SaveBody, req);
      const file = 'text' in saved ? await workflows.saveResumeText(saved.text) : await workflows.saveResumeJson(saved.profile);
      res.json({ status: 'ok', file, message: 'Resume saved successfully!' });
    }),
  );

  app.post(
    '/api/resume/download',
    route('download', async (req, res) => {
      const { text } = body(TextBody, req);
      if (!text || !text.trim()) {
        throw new BadRequestError('No text available to download. Please parse and format a resume first.');
      }
      res.attachment(downloadName('resume', 'txt', ctx.now()));
      res.type('text/plain').send(text);
    }),
  );

  app.get(
    '/api/jobs',
    route('jobs', async (_req, res) => {
      const jobs = await workflows.listJobs();
      res.json({ status: 'ok', jobs, total: jobs.length });
    }),
  );

  app.post(
    '/api/jobs/search',
    route('search', async (req, res) => {
      const { query } = body(SearchBody, req);
      const result = await workflows.searchJobs(query);
      res.json({ status: result.warning ? 'warning' : 'ok', ...result });
    }),
  );

  app.post(
    '/api/jobs/:id/assess',
    route('assess', async (req, res) => {
      const { resumeText, save } = body(AssessBody, req);
      const result = await workflows.assessResume(resumeText, req.params.id, save ?? false);
      res.json({ status: result.warnings.length > 0 ? 'warning' : 'ok', ...result });
    }),
  );

  app.use((err: unknown, _req: Request, res: Response, next: NextFunction): void => {
    if (res.headersSent) {
      next(err);
      return;
    }
    // express.json() reports malformed bodies with a `status` of 400
    const isBodyError = err instanceof SyntaxError && 'status' in err && err.status === 400;
    const status = isBodyError ? 400 : httpStatusFor(err);
    const code = err instanceof PipelineError ? err.code : isBodyError ? 'BadRequest' : 'Internal';
    res.status(status).json({ status: 'error', code, message: describeError(err) });
  });

  return app;
}

export function startServer(ctx: AppContext): Promise<Server> {
  const app = createServer(ctx);
  return new Promise((resolve, reject) => {
    const server = app.listen(ctx.config.port, () => {
      console.log(`\nFitFinder API  →  http://localhost:${ctx.config.port}\n`);
      console.log(`Job dataset:  ${ctx.config.datasetPath}`);
      if (!ctx.config.anthropicApiKey) console.warn('ANTHROPIC_API_KEY is not set: LLM actions will fail until it is.');
      console.log('Press Ctrl+C to stop.\n');
      resolve(server);
    });
    server.on('error', reject);
  });
}
