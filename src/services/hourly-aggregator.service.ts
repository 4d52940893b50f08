import { DataGapError } from '@/core/errors';
import { HourlyTotal, Observation } from '@/types/precipitation.types';
import { AggregationResult } from '@/types/run.types';
import { getHourWindow, listHourStarts } from '@/utils/time-window.utils';
import { MissingHourPolicy } from '@/config/index';
import { logger } from '@/utils/logger';

export interface AggregationOptions {
  policy: MissingHourPolicy;
  minObservationsPerHour: number;
  maxObservationMm: number;
}

interface HourBucket {
  sum: number;
  valid: number;
  invalid: number;
}

const isInRange = (value: number, options: AggregationOptions): boolean =>
  Number.isFinite(value) && value >= 0 && value <= options.maxObservationMm;

/**
 * Reduce raw precipitation observations of one cell to per-hour totals over
 * [from, to). Every hour of the range gets exactly one HourlyTotal; hours
 * without complete, in-range data are either marked NO_DATA or zero-filled
 * according to `options.policy`, and the policy is stamped on each record.
 */
export function aggregateHourly(
  cellId: number,
  observations: readonly Observation[],
  from: Date,
  to: Date,
  options: AggregationOptions
): AggregationResult {
  const result: AggregationResult = {
    cell_id: cellId,
    totals: [],
    fill_policy: options.policy,
    observed_hours: 0,
    zero_filled_hours: 0,
    no_data_hours: 0,
    duplicate_observations: 0,
    invalid_observations: 0,
    ignored_observations: 0,
    gaps: [],
  };

  const hours = listHourStarts(from, to);
  if (hours.length === 0) {
    return result;
  }
  const rangeStart = hours[0].getTime();
  const rangeEnd = getHourWindow(hours[hours.length - 1]).end.getTime();

  const buckets = new Map<number, HourBucket>();
  const seenTimestamps = new Set<number>();

  for (const observation of observations) {
    const time = observation.timestamp.getTime();
    if (
      observation.cell_id !== cellId ||
      observation.variable !== 'precipitation' ||
      time < rangeStart ||
      time >= rangeEnd
    ) {
      result.ignored_observations++;
      continue;
    }

    // The store is append-only, so a re-ingested file can repeat timestamps
    if (seenTimestamps.has(time)) {
      result.duplicate_observations++;
      continue;
    }
    seenTimestamps.add(time);

    const hourStart = getHourWindow(observation.timestamp).start.getTime();
    let bucket = buckets.get(hourStart);
    if (!bucket) {
      bucket = { sum: 0, valid: 0, invalid: 0 };
      buckets.set(hourStart, bucket);
    }

    if (isInRange(observation.value, options)) {
      bucket.sum += observation.value;
      bucket.valid++;
    } else {
      bucket.invalid++;
      result.invalid_observations++;
    }
  }

  for (const hour of hours) {
    const bucket = buckets.get(hour.getTime());
    const observationCount = bucket ? bucket.valid + bucket.invalid : 0;

    let reason: string | null = null;
    if (!bucket || observationCount === 0) {
      reason = 'no observations';
    } else if (bucket.invalid > 0) {
      reason = `${bucket.invalid} out-of-range value(s)`;
    } else if (bucket.valid < options.minObservationsPerHour) {
      reason = `${bucket.valid} of ${options.minObservationsPerHour} required observations`;
    }

    if (bucket && reason === null) {
      result.totals.push({
        cell_id: cellId,
        hour,
        value_mm: bucket.sum,
        status: 'OBSERVED',
        observation_count: observationCount,
        fill_policy: options.policy,
      });
      result.observed_hours++;
      continue;
    }

    const gap = new DataGapError(cellId, hour, reason ?? 'incomplete hour');
    result.gaps.push({ cell_id: cellId, timestamp: hour, error: gap.message });

    const total: HourlyTotal = options.policy === 'zero-fill'
      ? { cell_id: cellId, hour, value_mm: 0, status: 'ZERO_FILLED', observation_count: observationCount, fill_policy: options.policy }
      : { cell_id: cellId, hour, value_mm: null, status: 'NO_DATA', observation_count: observationCount, fill_policy: options.policy };

    result.totals.push(total);
    if (total.status === 'ZERO_FILLED') {
      result.zero_filled_hours++;
    } else {
      result.no_data_hours++;
    }
  }

  logger.debug(`Aggregated cell ${cellId} into ${result.totals.length} hourly totals`, {
    cell_id: cellId,
    fill_policy: options.policy,
    observed: result.observed_hours,
    zero_filled: result.zero_filled_hours,
    no_data: result.no_data_hours,
    duplicates: result.duplicate_observations,
    invalid: result.invalid_observations,
  });

  return result;
}
