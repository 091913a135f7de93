/**
 * Error taxonomy for the pattern engine.
 *
 * Only configuration and formatting problems are thrown. Malformed records and
 * thin data are reported as warnings on the run result instead.
 */

export type AnalysisErrorCode = 'CONFIGURATION_ERROR' | 'FORMATTING_ERROR';

export class AnalysisError extends Error {
  constructor(
    message: string,
    public readonly code: AnalysisErrorCode
  ) {
    super(message);
    this.name = 'AnalysisError';
  }
}

export class ConfigurationError extends AnalysisError {
  constructor(public readonly issues: string[]) {
    super(`Invalid configuration: ${issues.join('; ')}`, 'CONFIGURATION_ERROR');
    this.name = 'ConfigurationError';
  }
}

export class FormattingError extends AnalysisError {
  constructor(public readonly missingFields: string[]) {
    super(`Cannot build insight payload, missing: ${missingFields.join(', ')}`, 'FORMATTING_ERROR');
    this.name = 'FormattingError';
  }
}

export function isFormattingError(error: unknown): error is FormattingError {
  return error instanceof FormattingError;
}

export type MalformedRecordReason = 'not_an_object' | 'missing_identity' | 'duplicate_id';

export interface MalformedRecord {
  competitorHandle: string;
  index: number;
  reason: MalformedRecordReason;
}

export type RunWarningCode = 'INSUFFICIENT_DATA' | 'MALFORMED_RECORDS' | 'ASSUMED_MINIMAL_REACH';

export interface RunWarning {
  code: RunWarningCode;
  scope: 'competitors' | 'posts' | 'records';
  message: string;
  competitorHandle?: string;
  expected?: number;
  actual?: number;
}
