/**
 * Analytics Errors
 * Error kinds surfaced by the sentiment analytics engine
 */

import { ZodError, ZodIssue } from 'zod';

export type AnalyticsErrorCode = 'INVALID_PARAMETER' | 'NOT_FOUND';

export type NotFoundEntity = 'token' | 'network';

export class AnalyticsError extends Error {
  readonly code: AnalyticsErrorCode;

  constructor(code: AnalyticsErrorCode, message: string) {
    super(message);
    this.name = new.target.name;
    this.code = code;
  }
}

export class InvalidParameterError extends AnalyticsError {
  readonly details: ZodIssue[];

  constructor(message: string, details: ZodIssue[] = []) {
    super('INVALID_PARAMETER', message);
    this.details = details;
  }

  static fromZodError(error: ZodError): InvalidParameterError {
    const [first] = error.issues;
    const field = first && first.path.length > 0 ? `${first.path.join('.')}: ` : '';
    const message = first ? `${field}${first.message}` : 'Invalid parameters';
    return new InvalidParameterError(message, error.issues);
  }
}

export class NotFoundError extends AnalyticsError {
  readonly entity: NotFoundEntity;
  readonly missing: string[];

  constructor(entity: NotFoundEntity, missing: string[], message: string) {
    super('NOT_FOUND', message);
    this.entity = entity;
    this.missing = missing;
  }
}

export function isAnalyticsError(error: unknown): error is AnalyticsError {
  return error instanceof AnalyticsError;
}
