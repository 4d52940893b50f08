import { MalformedTripleError } from '@/core/errors';

export const TRIPLE_TOLERANCE = 1e-9;

export type Weights = readonly [number, number, number];

/**
 * What the disaggregator needs from a candidate: three shares and the year
 * they were observed in.
 */
export interface WeightCandidate {
  readonly weights: Weights;
  readonly source_year: number;
}

export interface TripleProvenance {
  block_count?: number;
  total_mm?: number;
}

const validateComponents = (values: readonly number[]): void => {
  if (values.length !== 3) {
    throw new MalformedTripleError(values, `expected 3 components, got ${values.length}`);
  }
  if (values.some(v => !Number.isFinite(v))) {
    throw new MalformedTripleError(values, 'components must be finite');
  }
  if (values.some(v => v < 0)) {
    throw new MalformedTripleError(values, 'components must be non-negative');
  }
};

const validateYear = (values: readonly number[], year: number): void => {
  if (!Number.isInteger(year) || year < 1000 || year > 9999) {
    throw new MalformedTripleError(values, `invalid source year ${year}`);
  }
};

// Divide by the sum, then let the last share absorb the rounding so the
// stored triple adds up to 1 as closely as doubles allow.
const renormalize = (values: readonly number[], sum: number): Weights => {
  const first = values[0] / sum;
  const second = values[1] / sum;
  const third = Math.max(0, 1 - first - second);
  return [first, second, third];
};

export class WeightTriple implements WeightCandidate {
  readonly weights: Weights;
  readonly source_year: number;
  readonly block_count: number;
  readonly total_mm: number;

  private constructor(weights: Weights, sourceYear: number, provenance: TripleProvenance) {
    this.weights = Object.freeze(weights);
    this.source_year = sourceYear;
    this.block_count = provenance.block_count ?? 0;
    this.total_mm = provenance.total_mm ?? 0;
    Object.freeze(this);
  }

  /**
   * Builds a triple from raw hourly amounts (or any non-negative shares) of
   * one or more 3-hour blocks.
   */
  static fromShares(values: readonly number[], sourceYear: number, provenance: TripleProvenance = {}): WeightTriple {
    validateComponents(values);
    validateYear(values, sourceYear);

    const sum = values[0] + values[1] + values[2];
    if (sum <= 0) {
      throw new MalformedTripleError(values, 'components sum to zero');
    }

    return new WeightTriple(renormalize(values, sum), sourceYear, provenance);
  }

  /**
   * Accepts an already normalized triple (from storage or a CSV file). The
   * components must sum to 1 within `tolerance`; they are renormalized after
   * the check.
   */
  static fromWeights(
    values: readonly number[],
    sourceYear: number,
    provenance: TripleProvenance = {},
    tolerance: number = TRIPLE_TOLERANCE
  ): WeightTriple {
    validateComponents(values);
    validateYear(values, sourceYear);

    const sum = values[0] + values[1] + values[2];
    if (Math.abs(sum - 1) > tolerance) {
      throw new MalformedTripleError(values, `components sum to ${sum}, not 1 within ${tolerance}`);
    }

    return new WeightTriple(renormalize(values, sum), sourceYear, provenance);
  }

  sum(): number {
    return this.weights[0] + this.weights[1] + this.weights[2];
  }
}
