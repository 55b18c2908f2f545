export type AnalysisErrorReason =
  | 'insufficient_data'
  | 'no_transactions'
  | 'no_holdings'
  | 'missing_price'
  | 'no_shares_held';

// Structured failure returned by analytics instead of throwing.
export interface AnalysisError {
  error: string;
  reason: AnalysisErrorReason;
}

export type AnalysisResult<T> = T | AnalysisError;

export function analysisError(reason: AnalysisErrorReason, error: string): AnalysisError {
  return { error, reason };
}

export function isAnalysisError(value: unknown): value is AnalysisError {
  return (
    typeof value === 'object' &&
    value !== null &&
    'error' in value &&
    'reason' in value &&
    typeof value.error === 'string'
  );
}
