// apps/http/src/errors.ts
import { ZodError } from 'zod';
import { isLexiruleError } from '@lexirule/core';

export interface ClassifiedError {
  code: string;
  status: number;
  message: string;
  details?: unknown;
}

function statusOf(e: unknown): number | undefined {
  if (typeof e === 'object' && e !== null && 'statusCode' in e && typeof e.statusCode === 'number') {
    return e.statusCode;
  }
  return undefined;
}

export function classifyError(e: unknown): ClassifiedError {
  const message = e instanceof Error ? e.message : String(e);

  if (e instanceof ZodError) {
    const details = e.issues.map((i) => ({ path: i.path.join('.'), msg: i.message, code: i.code }));
    return { code: 'VALIDATION', status: 400, message: 'Request body failed validation', details };
  }

  if (isLexiruleError(e)) {
    switch (e.code) {
      case 'UPSTREAM_DRAFTING':
      case 'UPSTREAM_EMBEDDING':
        return { code: e.code, status: 502, message, details: e.details };
      case 'CONFIG':
      case 'CONFIG_DUPLICATE_KEY':
        return { code: 'CONFIG', status: 500, message };
    }
  }

  // fastify / plugin errors carry their own 4xx status (bad JSON, rate limit, …)
  const status = statusOf(e);
  if (status !== undefined && status >= 400 && status < 500) {
    return { code: status === 429 ? 'RATE_LIMITED' : 'BAD_REQUEST', status, message };
  }

  return { code: 'INTERNAL', status: 500, message };
}
