import { BlockWindow, HourWindow } from '@/types/precipitation.types';

export const HOUR_MS = 60 * 60 * 1000;
export const BLOCK_HOURS = 3;
export const BLOCK_MS = BLOCK_HOURS * HOUR_MS;

export const getHourWindow = (timestamp: Date): HourWindow => {
  const start = new Date(timestamp);
  start.setUTCMinutes(0, 0, 0);  // Set to start of hour in UTC

  const end = new Date(start.getTime() + HOUR_MS);

  return { start, end, hour_index: start.getUTCHours() };
};

/**
 * 3-hour window on the fixed 00/03/.../21 UTC schedule containing `timestamp`.
 */
export const getBlockWindow = (timestamp: Date): BlockWindow => {
  const start = new Date(timestamp);
  start.setUTCMinutes(0, 0, 0);
  const hourBucket = start.getUTCHours() - (start.getUTCHours() % BLOCK_HOURS);
  start.setUTCHours(hourBucket);

  const end = new Date(start.getTime() + BLOCK_MS);

  return { start, end, hour_bucket: hourBucket, block_index: hourBucket / BLOCK_HOURS };
};

export const isBlockAligned = (timestamp: Date): boolean => {
  return timestamp.getTime() === getBlockWindow(timestamp).start.getTime();
};

/**
 * Hour starts covering [from, to). `from` is floored and `to` is rounded up
 * to whole hours.
 */
export const listHourStarts = (from: Date, to: Date): Date[] => {
  const hours: Date[] = [];
  const first = getHourWindow(from).start.getTime();
  const last = Math.ceil(to.getTime() / HOUR_MS) * HOUR_MS;

  for (let t = first; t < last; t += HOUR_MS) {
    hours.push(new Date(t));
  }

  return hours;
};

export const addHours = (timestamp: Date, hours: number): Date => {
  return new Date(timestamp.getTime() + hours * HOUR_MS);
};

export const getUTCMonth = (timestamp: Date): number => timestamp.getUTCMonth() + 1;

export const getUTCYear = (timestamp: Date): number => timestamp.getUTCFullYear();
