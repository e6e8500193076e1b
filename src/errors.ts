/**
 * Error taxonomy for the import and reporting pipeline.
 *
 * Errors scoped to one unit of work (a feed year, a raw entry, a lookup id)
 * are caught at that unit. StoreError and ConfigError end the run.
 */

import type { ZodIssue } from 'zod';

export type ErrorCode =
  | 'FETCH_FAILED'
  | 'MALFORMED_RECORD'
  | 'INVALID_SEVERITY_SYSTEM'
  | 'NOT_FOUND'
  | 'STORE_FAILED'
  | 'INVALID_CONFIG';

export class NvdStatsError extends Error {
  readonly code: ErrorCode;

  constructor(code: ErrorCode, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
    this.code = code;
  }
}

export class FetchError extends NvdStatsError {
  readonly year: number;

  constructor(year: number, message: string, cause?: unknown) {
    super('FETCH_FAILED', `Feed ${year}: ${message}`, { cause });
    this.year = year;
  }
}

export class MalformedRecordError extends NvdStatsError {
  readonly recordId: string | undefined;
  readonly issues: ZodIssue[];

  constructor(message: string, details: { recordId?: string; issues?: ZodIssue[] } = {}) {
    const prefix = details.recordId ? `${details.recordId}: ` : '';
    super('MALFORMED_RECORD', `${prefix}${message}`);
    this.recordId = details.recordId;
    this.issues = details.issues ?? [];
  }
}

export class InvalidSeveritySystemError extends NvdStatsError {
  readonly value: string;

  constructor(value: string) {
    super(
      'INVALID_SEVERITY_SYSTEM',
      `Unknown severity system "${value}" (expected V2, V3, COMBINED or ALL)`,
    );
    this.value = value;
  }
}

export class NotFoundError extends NvdStatsError {
  readonly recordId: string;

  constructor(recordId: string) {
    super('NOT_FOUND', `${recordId} not found`);
    this.recordId = recordId;
  }
}

export class StoreError extends NvdStatsError {
  constructor(message: string, cause?: unknown) {
    super('STORE_FAILED', message, { cause });
  }
}

export class ConfigError extends NvdStatsError {
  readonly issues: ZodIssue[];

  constructor(issues: ZodIssue[]) {
    super(
      'INVALID_CONFIG',
      `Invalid configuration: ${issues.map((i) => `${i.path.join('.')}: ${i.message}`).join(', ')}`,
    );
    this.issues = issues;
  }
}

/**
 * Render an unknown thrown value as a one-line message.
 */
export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
