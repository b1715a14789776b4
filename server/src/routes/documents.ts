import { Hono, type Context } from 'hono';
import { z } from 'zod';
import { parseJsonBody } from '../lib/http-body-guard.js';
import { pdfFilename, renderPdf } from '../render/pdf.js';
import type { TailoringPipeline, TailoringResult } from '../tailoring/pipeline.js';
import type { ComposedDocument } from '../tailoring/types.js';

const MAX_JOB_DESCRIPTION_CHARS = 100_000;

const staticCvSchema = z.object({
  language: z.enum(['en', 'es']).optional(),
});

const dynamicCvSchema = z.object({
  job_description: z.string().trim().min(1).max(MAX_JOB_DESCRIPTION_CHARS),
});

const coverLetterSchema = z.object({
  job_description: z.string().trim().min(1).max(MAX_JOB_DESCRIPTION_CHARS),
  company: z.string().trim().max(200).optional(),
});

export interface DocumentRouteOptions {
  pipeline: TailoringPipeline;
  maxBodyBytes: number;
}

function wantsJson(c: Context): boolean {
  return c.req.query('format')?.toLowerCase() === 'json';
}

function sendPdf(c: Context, document: ComposedDocument): Response {
  const pdf = renderPdf(document);
  c.header('Content-Type', 'application/pdf');
  c.header('Content-Disposition', `attachment; filename="${pdfFilename(document)}"`);
  c.header('Cache-Control', 'no-store');
  return c.body(pdf, 200);
}

function sendTailored<D extends ComposedDocument>(c: Context, result: TailoringResult<D>): Response {
  if (!wantsJson(c)) return sendPdf(c, result.document);
  return c.json({
    document: result.document,
    signal: result.signal,
    provenance: result.provenance,
    company_facts: result.companyFacts,
  });
}

/**
 * Generation routes. PDF by default; `?format=json` returns the composed
 * document (plus signal and slot provenance for tailored documents).
 */
export function createDocumentRoutes(options: DocumentRouteOptions): Hono {
  const { pipeline, maxBodyBytes } = options;
  const routes = new Hono();

  routes.post('/cv/generate', async (c) => {
    const body = await parseJsonBody(c, staticCvSchema, maxBodyBytes);
    if (!body.ok) return body.response;

    const language = body.data.language ?? pipeline.profile.primaryLanguage;
    const document = pipeline.composeStaticCv(language);
    c.get('log').info({ kind: 'cv', language, experiences: document.experiences.length }, 'Static CV generated');
    return wantsJson(c) ? c.json({ document }) : sendPdf(c, document);
  });

  routes.post('/cv/generate/dynamic', async (c) => {
    const body = await parseJsonBody(c, dynamicCvSchema, maxBodyBytes);
    if (!body.ok) return body.response;
    const result = await pipeline.composeTailoredCv(body.data.job_description);
    return sendTailored(c, result);
  });

  routes.post('/cover-letter/generate', async (c) => {
    const body = await parseJsonBody(c, coverLetterSchema, maxBodyBytes);
    if (!body.ok) return body.response;
    const result = await pipeline.composeCoverLetter(body.data.job_description, body.data.company || undefined);
    return sendTailored(c, result);
  });

  return routes;
}
