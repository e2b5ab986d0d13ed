import express, { type Request, type Response } from 'express';
import { z } from 'zod';
import { isPageSelector } from '../lib/page-selector.js';
import { PipelineError } from '../lib/pipeline-error.js';
import type { AppConfig } from './config.js';
import { FetchSourceError } from './fetch-source.js';
import { runIngest, type IngestDeps } from './ingest.js';

const ingestRequestSchema = z.object({
  source: z.enum(['pdf', 'html']).optional(),
  url: z.string().url().optional(),
  pages: z
    .string()
    .trim()
    .min(1)
    .refine(isPageSelector, value => ({ message: `invalid page selector "${value}"` }))
    .optional(),
});

function noStore(res: Response): void {
  res.setHeader('Cache-Control', 'no-store, no-cache, must-revalidate, proxy-revalidate');
}

function sendError(res: Response, error: unknown): void {
  if (error instanceof PipelineError) {
    res.status(422).json({ ok: false, code: error.code, error: error.message, warnings: error.warnings });
    return;
  }
  // 추출 중 페이지 지정 해석 실패 (parsePageSelector)
  if (error instanceof RangeError) {
    res.status(400).json({ ok: false, error: error.message });
    return;
  }
  if (error instanceof FetchSourceError) {
    res.status(502).json({ ok: false, code: error.code, error: error.message, url: error.url });
    return;
  }
  console.error('[Server] Unexpected error:', error);
  res.status(500).json({ ok: false, error: error instanceof Error ? error.message : String(error) });
}

function firstQueryValue(value: unknown): string | undefined {
  if (typeof value === 'string') return value;
  if (Array.isArray(value) && typeof value[0] === 'string') return value[0];
  return undefined;
}

export function createApp(config: AppConfig, deps: IngestDeps): express.Express {
  const app = express();
  app.use(express.json());

  app.get('/api/health', (_req, res) => {
    noStore(res);
    res.json({ ok: true });
  });

  // 미리보기: 시트에 쓰지 않고 레코드만 돌려준다
  app.get('/api/records', async (req: Request, res: Response) => {
    noStore(res);
    const parsed = ingestRequestSchema.safeParse({
      source: firstQueryValue(req.query.source),
      url: firstQueryValue(req.query.url),
      pages: firstQueryValue(req.query.pages),
    });
    if (!parsed.success) {
      res.status(400).json({ ok: false, error: parsed.error.issues.map(i => i.message).join('; ') });
      return;
    }

    try {
      const { source, url, pages } = parsed.data;
      const result = await runIngest(config, deps, { sourceKind: source, url, pages, dryRun: true });
      res.json({
        ok: true,
        count: result.records.length,
        tableCount: result.tableCount,
        warnings: result.warnings,
        records: result.records,
      });
    } catch (e) {
      sendError(res, e);
    }
  });

  app.post('/api/ingest', async (req: Request, res: Response) => {
    noStore(res);
    const parsed = ingestRequestSchema.safeParse(req.body ?? {});
    if (!parsed.success) {
      res.status(400).json({ ok: false, error: parsed.error.issues.map(i => i.message).join('; ') });
      return;
    }

    try {
      const { source, url, pages } = parsed.data;
      const result = await runIngest(config, deps, { sourceKind: source, url, pages });
      res.json({
        ok: true,
        count: result.records.length,
        appended: result.appended,
        range: result.range ?? null,
        warnings: result.warnings,
      });
    } catch (e) {
      sendError(res, e);
    }
  });

  return app;
}
