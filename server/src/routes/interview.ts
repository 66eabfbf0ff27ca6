import { Hono } from 'hono';
import type { Context } from 'hono';
import { streamSSE } from 'hono/streaming';
import { z } from 'zod';
import { extractText } from '../documents/text-extraction.js';
import { renderTextReport, reportFilename } from '../documents/report.js';
import { ValidationError, errorMessage } from '../lib/errors.js';
import { isMultipart, parsePositiveInt, rejectOversizedBody } from '../lib/http-body-guard.js';
import { createRunLogger } from '../lib/logger.js';
import { recordRunFinished, recordRunStarted } from '../lib/metrics.js';
import { rateLimitMiddleware } from '../middleware/rate-limit.js';
import { runInterviewPipeline } from '../pipeline/orchestrator.js';
import type { RunDependencies } from '../pipeline/orchestrator.js';
import type { Topic } from '../pipeline/types.js';

export type InterviewRouteDeps = Omit<RunDependencies, 'log' | 'onFinish'>;

const MAX_JSON_BODY_BYTES = 300_000;
const RUNS_PER_WINDOW = parsePositiveInt(process.env.RUN_RATE_LIMIT_PER_MINUTE, 5);

const generateSchema = z
  .object({
    text: z.string().trim().min(20).max(200_000).optional(),
    topics: z.array(z.string().trim().min(1).max(120)).min(1).max(50).optional(),
    source_name: z.string().max(200).optional(),
  })
  .refine((body) => body.text !== undefined || body.topics !== undefined, {
    message: 'Provide document text or a list of topics',
  });

const reportSchema = z.object({
  results: z.array(
    z.object({
      topic: z.string().min(1).max(200),
      items: z.array(z.string()).max(200),
    }),
  ).max(200),
  source_name: z.string().max(200).default('document'),
});

interface RunRequest {
  documentText: string;
  topics?: Topic[];
  sourceName: string;
}

function issueMessage(error: z.ZodError): string {
  return error.issues.map((issue) => issue.message).join('; ');
}

export function createInterviewRoutes(deps: InterviewRouteDeps): Hono {
  const interview = new Hono();

  // ─── Run ───────────────────────────────────────────────────────────

  async function readRunRequest(c: Context): Promise<RunRequest> {
    if (isMultipart(c)) {
      const form = await c.req.parseBody();
      const file = form['file'];
      if (!(file instanceof File)) {
        throw new ValidationError('Multipart requests must include a "file" field');
      }
      const bytes = new Uint8Array(await file.arrayBuffer());
      const documentText = await extractText({ filename: file.name, bytes }, deps.settings.maxUploadBytes);
      return { documentText, sourceName: file.name };
    }

    const raw: unknown = await c.req.json().catch(() => null);
    const parsed = generateSchema.safeParse(raw ?? {});
    if (!parsed.success) {
      throw new ValidationError(issueMessage(parsed.error));
    }
    return {
      documentText: parsed.data.text ?? '',
      topics: parsed.data.topics,
      sourceName: parsed.data.source_name ?? 'document',
    };
  }

  interview.post('/generate', rateLimitMiddleware(RUNS_PER_WINDOW, 60_000), async (c) => {
    const oversized = rejectOversizedBody(c, isMultipart(c) ? deps.settings.maxUploadBytes + 64_000 : MAX_JSON_BODY_BYTES);
    if (oversized) return oversized;

    let request: RunRequest;
    try {
      request = await readRunRequest(c);
    } catch (err) {
      if (err instanceof ValidationError) {
        return c.json({ error: err.message, code: err.code, details: err.details }, 400);
      }
      throw err;
    }

    const runId = c.get('requestId');
    const log = createRunLogger(runId, { source: request.sourceName });
    recordRunStarted();

    return streamSSE(c, async (stream) => {
      let aborted = false;
      stream.onAbort(() => {
        aborted = true;
        log.info('Client disconnected, abandoning run stream');
      });

      await stream.writeSSE({
        event: 'run_started',
        data: JSON.stringify({ run_id: runId, source_name: request.sourceName }),
      });

      const events = runInterviewPipeline(
        { runId, documentText: request.documentText, topics: request.topics },
        { ...deps, log, onFinish: recordRunFinished },
      );
      try {
        for await (const event of events) {
          if (aborted) break;
          await stream.writeSSE({ event: event.type, data: JSON.stringify(event) });
        }
      } catch (err) {
        log.error({ err }, 'Pipeline run failed');
        if (!aborted) {
          await stream.writeSSE({
            event: 'error',
            data: JSON.stringify({ type: 'error', scope: 'run', message: errorMessage(err), error_type: 'unknown' }),
          });
        }
      }
    });
  });

  // ─── Report download ───────────────────────────────────────────────

  interview.post('/report', async (c) => {
    const oversized = rejectOversizedBody(c, MAX_JSON_BODY_BYTES);
    if (oversized) return oversized;

    const raw: unknown = await c.req.json().catch(() => null);
    const parsed = reportSchema.safeParse(raw);
    if (!parsed.success) {
      return c.json({ error: issueMessage(parsed.error), code: 'VALIDATION_ERROR' }, 400);
    }

    const { results, source_name: sourceName } = parsed.data;
    const report = renderTextReport(results, sourceName);
    c.header('Content-Type', 'text/plain; charset=utf-8');
    c.header('Content-Disposition', `attachment; filename="${reportFilename(sourceName)}"`);
    return c.body(report);
  });

  return interview;
}
