import HourlyTotalModel from '@/models/HourlyTotal';
import { HourlyTotal } from '@/types/precipitation.types';

/**
 * Replaces a cell's stored hourly totals with a freshly aggregated set.
 */
export const replaceHourlyTotals = async (cell_id: number, totals: readonly HourlyTotal[]): Promise<number> => {
  await HourlyTotalModel.deleteMany({ cell_id });
  if (totals.length === 0) {
    return 0;
  }
  const inserted = await HourlyTotalModel.insertMany([...totals], { ordered: false });
  return inserted.length;
};
