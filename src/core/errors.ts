export type DisaggregationErrorCode =
  | 'DATA_GAP'
  | 'NO_CLIMATOLOGICAL_BASIS'
  | 'SUM_INVARIANT_VIOLATION'
  | 'MALFORMED_TRIPLE'
  | 'INVALID_RECORD';

/**
 * Base class for every failure the pipeline reports per record.
 */
export class DisaggregationError extends Error {
  readonly code: DisaggregationErrorCode;

  constructor(code: DisaggregationErrorCode, message: string) {
    super(message);
    this.name = 'DisaggregationError';
    this.code = code;
  }
}

/**
 * An hour or a 3-hour block has no usable historical data.
 * Recovered locally by exclusion, never by fabricating values.
 */
export class DataGapError extends DisaggregationError {
  readonly cell_id: number;
  readonly timestamp: Date;

  constructor(cellId: number, timestamp: Date, reason: string) {
    super('DATA_GAP', `No usable data for cell ${cellId} at ${timestamp.toISOString()}: ${reason}`);
    this.name = 'DataGapError';
    this.cell_id = cellId;
    this.timestamp = timestamp;
  }
}

export class NoClimatologicalBasisError extends DisaggregationError {
  readonly cell_id: number;
  readonly timestamp: Date;
  readonly keys_tried: string[];

  constructor(cellId: number, timestamp: Date, keysTried: string[]) {
    super(
      'NO_CLIMATOLOGICAL_BASIS',
      `No candidate weight triples for cell ${cellId} at ${timestamp.toISOString()} (tried ${keysTried.join(', ')})`
    );
    this.name = 'NoClimatologicalBasisError';
    this.cell_id = cellId;
    this.timestamp = timestamp;
    this.keys_tried = keysTried;
  }
}

/**
 * The three hourly values produced for a block do not add back up to the
 * block total. Indicates a corrupt weight table entry.
 */
export class SumInvariantViolation extends DisaggregationError {
  readonly cell_id: number;
  readonly timestamp: Date;
  readonly weight_key: string;
  readonly expected: number;
  readonly actual: number;

  constructor(cellId: number, timestamp: Date, weightKey: string, expected: number, actual: number) {
    super(
      'SUM_INVARIANT_VIOLATION',
      `Hourly values for cell ${cellId} at ${timestamp.toISOString()} sum to ${actual}, expected ${expected} (key ${weightKey})`
    );
    this.name = 'SumInvariantViolation';
    this.cell_id = cellId;
    this.timestamp = timestamp;
    this.weight_key = weightKey;
    this.expected = expected;
    this.actual = actual;
  }
}

export class MalformedTripleError extends DisaggregationError {
  readonly weights: readonly number[];

  constructor(weights: readonly number[], reason: string) {
    super('MALFORMED_TRIPLE', `Rejected weight triple [${weights.join(', ')}]: ${reason}`);
    this.name = 'MalformedTripleError';
    this.weights = weights;
  }
}

export class InvalidRecordError extends DisaggregationError {
  constructor(message: string) {
    super('INVALID_RECORD', message);
    this.name = 'InvalidRecordError';
  }
}

export const getErrorMessage = (error: unknown): string =>
  error instanceof Error ? error.message : 'Unknown error';
