/**
 * JSON envelope formatter.
 *
 * Every CLI result is a single JSON line on stdout:
 * `{ success: true, result, message?, _meta }` or
 * `{ success: false, result: null, error, _meta }`.
 */

import { randomUUID } from 'node:crypto';
import { ToolError } from './errors.js';
import { getExitCodeName } from '../types/exit-codes.js';

/** Envelope metadata. */
export interface EnvelopeMeta {
  operation: string;
  timestamp: string;
  requestId: string;
}

export interface SuccessEnvelope<T> {
  success: true;
  result: T;
  message?: string;
  _meta: EnvelopeMeta;
}

export interface ErrorEnvelope {
  success: false;
  result: null;
  error: {
    code: number;
    name: string;
    message: string;
    fix?: string;
  };
  _meta: EnvelopeMeta;
}

export type Envelope<T> = SuccessEnvelope<T> | ErrorEnvelope;

function createMeta(operation: string): EnvelopeMeta {
  return {
    operation,
    timestamp: new Date().toISOString(),
    requestId: randomUUID(),
  };
}

/** Format a successful result. `operation` defaults to 'cli.output'. */
export function formatSuccess<T>(data: T, message?: string, operation?: string): string {
  const envelope: SuccessEnvelope<T> = {
    success: true,
    result: data,
    ...(message && { message }),
    _meta: createMeta(operation ?? 'cli.output'),
  };
  return JSON.stringify(envelope);
}

/** Format a ToolError. */
export function formatError(error: ToolError, operation?: string): string {
  const envelope: ErrorEnvelope = {
    success: false,
    result: null,
    error: {
      code: error.code,
      name: getExitCodeName(error.code),
      message: error.message,
      ...(error.fix && { fix: error.fix }),
    },
    _meta: createMeta(operation ?? 'cli.output'),
  };
  return JSON.stringify(envelope);
}
