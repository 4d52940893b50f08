import { NoClimatologicalBasisError } from '@/core/errors';
import { CandidateSource, formatWeightKey } from '@/core/weight-table';
import { WeightCandidate } from '@/core/weight-triple';
import { WeightGranularity } from '@/config/index';
import { MatchLevel, WeightKey } from '@/types/precipitation.types';
import { getBlockWindow, getUTCMonth } from '@/utils/time-window.utils';

export interface ResolverOptions {
  granularity: WeightGranularity;
  fallbackEnabled: boolean;
  // Candidates the fine key needs before it wins over the month-only key
  minFineCandidates: number;
}

export interface Resolution {
  key: WeightKey;
  key_id: string;
  candidates: readonly WeightCandidate[];
  match_level: MatchLevel;
}

export function resolveWeightKeys(cellId: number, blockStart: Date): { fine: WeightKey; coarse: WeightKey } {
  const month = getUTCMonth(blockStart);
  return {
    fine: { cell_id: cellId, month, hour_bucket: getBlockWindow(blockStart).hour_bucket },
    coarse: { cell_id: cellId, month, hour_bucket: null },
  };
}

/**
 * Pick the weight key and its candidate triples for a block.
 *
 * month-hour: the fine key is used when it has at least `minFineCandidates`
 * years. Below that, the month key is used if fallback is enabled and it has
 * candidates (recorded as FALLBACK); otherwise a non-empty fine key is still
 * used. month-only: the month key is used directly (COARSE).
 *
 * Throws NoClimatologicalBasisError when no permitted key has candidates.
 */
export function resolvePeriod(
  source: CandidateSource,
  cellId: number,
  blockStart: Date,
  options: ResolverOptions
): Resolution {
  const { fine, coarse } = resolveWeightKeys(cellId, blockStart);

  if (options.granularity === 'month-only') {
    const candidates = source.getCandidates(coarse);
    if (candidates.length === 0) {
      throw new NoClimatologicalBasisError(cellId, blockStart, [formatWeightKey(coarse)]);
    }
    return { key: coarse, key_id: formatWeightKey(coarse), candidates, match_level: 'COARSE' };
  }

  const fineCandidates = source.getCandidates(fine);
  if (fineCandidates.length >= options.minFineCandidates) {
    return { key: fine, key_id: formatWeightKey(fine), candidates: fineCandidates, match_level: 'FINE' };
  }

  if (options.fallbackEnabled) {
    const coarseCandidates = source.getCandidates(coarse);
    if (coarseCandidates.length > 0) {
      return { key: coarse, key_id: formatWeightKey(coarse), candidates: coarseCandidates, match_level: 'FALLBACK' };
    }
  }

  if (fineCandidates.length > 0) {
    return { key: fine, key_id: formatWeightKey(fine), candidates: fineCandidates, match_level: 'FINE' };
  }

  const tried = options.fallbackEnabled
    ? [formatWeightKey(fine), formatWeightKey(coarse)]
    : [formatWeightKey(fine)];
  throw new NoClimatologicalBasisError(cellId, blockStart, tried);
}
