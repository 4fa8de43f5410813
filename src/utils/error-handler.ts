import * as logger from './logger';

export interface ErrorResult {
  success: false;
  error: string;
}

/**
 * Raised for invalid or incomplete settings detected before the run loop starts.
 */
export class ConfigError extends Error {
  readonly issues: string[];

  constructor(message: string, issues: string[] = []) {
    super(issues.length > 0 ? `${message}:\n  ${issues.join('\n  ')}` : message);
    this.name = 'ConfigError';
    this.issues = issues;
  }
}

export const formatError = (error: unknown): string => {
  return error instanceof Error ? error.message : String(error);
};

export const handleError = (error: unknown, context: string): ErrorResult => {
  const msg = formatError(error);
  logger.error(`${context}: ${msg}`);
  return { success: false, error: msg };
};
