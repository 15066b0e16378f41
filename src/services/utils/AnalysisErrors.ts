/**
 * Error taxonomy for analysis runs
 */

export type AnalysisErrorCode =
  | 'METADATA_UNAVAILABLE'
  | 'TRANSPORT_ERROR'
  | 'ANALYSIS_CANCELLED'
  | 'INVALID_RANGE';

export class AnalysisError extends Error {
  constructor(
    message: string,
    public readonly code: AnalysisErrorCode,
    options?: { cause?: unknown }
  ) {
    super(message, options);
    this.name = new.target.name;
  }
}

/**
 * Pool tokens could not be read; fatal for that pool only
 */
export class MetadataUnavailableError extends AnalysisError {
  constructor(public readonly poolAddress: string, cause?: unknown) {
    super(`Pool metadata unavailable for ${poolAddress}`, 'METADATA_UNAVAILABLE', { cause });
  }
}

export class TransportError extends AnalysisError {
  constructor(message: string, public readonly transport: string, cause?: unknown) {
    super(message, 'TRANSPORT_ERROR', { cause });
  }
}

export class AnalysisCancelledError extends AnalysisError {
  constructor(public readonly lastCompletedBlock: number | null) {
    super('Analysis cancelled', 'ANALYSIS_CANCELLED');
  }
}

export class InvalidRangeError extends AnalysisError {
  constructor(public readonly startBlock: number, public readonly endBlock: number) {
    super(`Invalid block range ${startBlock}-${endBlock}`, 'INVALID_RANGE');
  }
}

export function isAnalysisError(error: unknown): error is AnalysisError {
  return error instanceof AnalysisError;
}
