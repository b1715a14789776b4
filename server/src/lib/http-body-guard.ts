import type { Context } from 'hono';
import type { z } from 'zod';
import { jsonError } from './http-response.js';

export function rejectOversizedJsonBody(c: Context, maxBytes: number): Response | null {
  const contentLength = c.req.header('content-length');
  if (!contentLength) return null;
  const parsed = Number.parseInt(contentLength, 10);
  if (!Number.isFinite(parsed) || parsed < 0) return null;
  if (parsed <= maxBytes) return null;
  return jsonError(c, 413, `Request too large (max ${maxBytes} bytes)`, 'PAYLOAD_TOO_LARGE');
}

export type JsonBodyParseResult<T = unknown> =
  | { ok: true; data: T }
  | { ok: false; response: Response };

type BodyReadResult =
  | { ok: true; raw: string }
  | { ok: false; response: Response };

async function readUtf8BodyWithLimit(c: Context, maxBytes: number): Promise<BodyReadResult> {
  const req = c.req.raw;
  if (req.bodyUsed) {
    return { ok: false, response: jsonError(c, 400, 'Request body is not readable', 'BAD_REQUEST') };
  }

  const stream = req.body;
  if (!stream) return { ok: true, raw: '' };

  const reader = stream.getReader();
  const chunks: Uint8Array[] = [];
  let totalBytes = 0;

  try {
    while (true) {
      const { done, value } = await reader.read();
      if (done) break;
      if (!value) continue;

      totalBytes += value.byteLength;
      if (totalBytes > maxBytes) {
        await reader.cancel().catch(() => undefined);
        return {
          ok: false,
          response: jsonError(c, 413, `Request too large (max ${maxBytes} bytes)`, 'PAYLOAD_TOO_LARGE'),
        };
      }
      chunks.push(value);
    }
  } catch (err) {
    c.get('log')?.warn({ error: err instanceof Error ? err.message : String(err) }, 'Failed to read request body');
    return { ok: false, response: jsonError(c, 400, 'Failed to read request body', 'BAD_REQUEST') };
  }

  const merged = new Uint8Array(totalBytes);
  let offset = 0;
  for (const chunk of chunks) {
    merged.set(chunk, offset);
    offset += chunk.byteLength;
  }

  return { ok: true, raw: new TextDecoder().decode(merged) };
}

/**
 * JSON body with a real byte-size guard (Content-Length may be absent or
 * wrong). An empty body parses as `{}`; invalid JSON is a 400.
 */
export async function parseJsonBodyWithLimit(c: Context, maxBytes: number): Promise<JsonBodyParseResult> {
  const upfront = rejectOversizedJsonBody(c, maxBytes);
  if (upfront) return { ok: false, response: upfront };

  const contentType = c.req.header('content-type')?.toLowerCase() ?? '';
  if (contentType && !contentType.includes('application/json')) {
    return {
      ok: false,
      response: jsonError(c, 415, 'Unsupported content type. Use application/json.', 'UNSUPPORTED_MEDIA_TYPE'),
    };
  }

  const read = await readUtf8BodyWithLimit(c, maxBytes);
  if (!read.ok) return read;

  if (!read.raw.trim()) return { ok: true, data: {} };
  try {
    const data: unknown = JSON.parse(read.raw);
    return { ok: true, data };
  } catch {
    return { ok: false, response: jsonError(c, 400, 'Request body is not valid JSON', 'BAD_REQUEST') };
  }
}

/** Size-guarded JSON body validated against a zod schema; 400 with the issues otherwise. */
export async function parseJsonBody<S extends z.ZodTypeAny>(
  c: Context,
  schema: S,
  maxBytes: number,
): Promise<JsonBodyParseResult<z.infer<S>>> {
  const body = await parseJsonBodyWithLimit(c, maxBytes);
  if (!body.ok) return body;

  const parsed = schema.safeParse(body.data);
  if (!parsed.success) {
    const issues = parsed.error.issues.map((issue) => ({ path: issue.path.join('.'), message: issue.message }));
    return { ok: false, response: jsonError(c, 400, 'Invalid request body', 'BAD_REQUEST', issues) };
  }
  const data: z.infer<S> = parsed.data;
  return { ok: true, data };
}
