/**
 * Error types shared by the collaborators and the orchestration layer
 */

export function errorMessage(error: unknown): string {
  if (error instanceof Error) {
    return error.message;
  }
  return String(error);
}

export class ConfigError extends Error {
  readonly missing: string[];

  constructor(missing: string[], details: string[] = []) {
    const parts = [];
    if (missing.length > 0) {
      parts.push(`Missing required environment variables: ${missing.join(', ')}`);
    }
    parts.push(...details);
    super(parts.join('\n') || 'Invalid configuration');
    this.name = 'ConfigError';
    this.missing = missing;
  }
}

export class SearchError extends Error {
  readonly status?: number;

  constructor(message: string, options: { status?: number; cause?: unknown } = {}) {
    super(message, { cause: options.cause });
    this.name = 'SearchError';
    this.status = options.status;
  }
}

export class DeliveryError extends Error {
  readonly status?: number;

  constructor(message: string, options: { status?: number; cause?: unknown } = {}) {
    super(message, { cause: options.cause });
    this.name = 'DeliveryError';
    this.status = options.status;
  }
}

/**
 * Raised by the primary pipeline; names the stage that aborted the run
 */
export class StageError extends Error {
  readonly stage: string;

  constructor(stage: string, cause: unknown) {
    super(`Stage "${stage}" failed: ${errorMessage(cause)}`, { cause });
    this.name = 'StageError';
    this.stage = stage;
  }
}

export type FallbackStep = 'fetch-news' | 'generate-summary' | 'deliver';

export class FallbackError extends Error {
  readonly step: FallbackStep;

  constructor(step: FallbackStep, cause: unknown) {
    super(`Fallback step "${step}" failed: ${errorMessage(cause)}`, { cause });
    this.name = 'FallbackError';
    this.step = step;
  }
}
