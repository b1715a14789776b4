import type { Context } from 'hono';
import type { ContentfulStatusCode } from 'hono/utils/http-status';
import type { ErrorCode } from './errors.js';

export type HttpErrorCode =
  | ErrorCode
  | 'BAD_REQUEST'
  | 'NOT_FOUND'
  | 'PAYLOAD_TOO_LARGE'
  | 'UNSUPPORTED_MEDIA_TYPE'
  | 'RATE_LIMITED'
  | 'SHUTTING_DOWN'
  | 'INTERNAL_ERROR';

const ERROR_STATUSES = [400, 404, 413, 415, 422, 429, 500, 502, 503] as const satisfies readonly ContentfulStatusCode[];

export type ErrorStatus = (typeof ERROR_STATUSES)[number];

/** Statuses outside the documented set become 500. */
export function toErrorStatus(status: number): ErrorStatus {
  return ERROR_STATUSES.find((s) => s === status) ?? 500;
}

export interface ErrorBody {
  error: string;
  code: HttpErrorCode;
  request_id: string | null;
  details?: unknown;
}

export function jsonError(
  c: Context,
  status: number,
  error: string,
  code: HttpErrorCode,
  details?: unknown,
): Response {
  const body: ErrorBody = { error, code, request_id: c.get('requestId') ?? null };
  if (details !== undefined) body.details = details;
  return c.json(body, toErrorStatus(status));
}
