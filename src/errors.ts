import type { ZodIssue } from 'zod';

export class EuvdError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }
}

/**
 * Raised when decoded upstream JSON does not have the minimum shape of the
 * record it is being read into.
 */
export class ValidationError extends EuvdError {
  readonly target: string;
  readonly issues: ZodIssue[];

  constructor(target: string, issues: ZodIssue[]) {
    super(`Invalid ${target}: ${formatIssues(issues)}`);
    this.target = target;
    this.issues = issues;
  }
}

/**
 * Network failure, timeout, non-success status or undecodable body while
 * talking to the EUVD API.
 */
export class TransportError extends EuvdError {
  readonly url: string;
  readonly status?: number;

  constructor(url: string, detail: string, options: { status?: number; cause?: unknown } = {}) {
    super(`Failed to fetch data from ${url}: ${detail}`, { cause: options.cause });
    this.url = url;
    this.status = options.status;
  }
}

export class ConfigurationError extends EuvdError {
  readonly issues: ZodIssue[];

  constructor(issues: ZodIssue[]) {
    super(`Invalid configuration: ${formatIssues(issues)}`);
    this.issues = issues;
  }
}

export function formatIssues(issues: ZodIssue[]): string {
  return issues
    .map(issue => `${issue.path.length > 0 ? issue.path.join('.') : '(root)'}: ${issue.message}`)
    .join('; ');
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
