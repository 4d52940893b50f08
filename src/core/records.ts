import { InvalidRecordError } from '@/core/errors';
import { FutureBlock, Observation, Variable } from '@/types/precipitation.types';
import { isBlockAligned } from '@/utils/time-window.utils';

const VARIABLES: readonly Variable[] = ['precipitation', 'temperature', 'radiation'];

export interface RecordInput {
  timestamp: Date | string;
  cell_id: number;
  value: number;
}

const toDate = (value: Date | string, field: string): Date => {
  const date = value instanceof Date ? new Date(value.getTime()) : new Date(value);
  if (Number.isNaN(date.getTime())) {
    throw new InvalidRecordError(`${field} is not a valid timestamp: ${String(value)}`);
  }
  return date;
};

const assertCellId = (cellId: number): void => {
  if (!Number.isSafeInteger(cellId) || cellId < 0) {
    throw new InvalidRecordError(`cell_id must be a non-negative integer, got ${cellId}`);
  }
};

/**
 * Raw observations are taken as they come; range checks on the value are the
 * aggregator's job, so only the identity fields are validated here.
 */
export const createObservation = (input: RecordInput & { variable: string }): Observation => {
  assertCellId(input.cell_id);
  const variable = VARIABLES.find(v => v === input.variable);
  if (!variable) {
    throw new InvalidRecordError(`Unknown variable: ${input.variable}`);
  }
  if (typeof input.value !== 'number') {
    throw new InvalidRecordError(`Observation value must be a number, got ${typeof input.value}`);
  }

  return Object.freeze({
    timestamp: toDate(input.timestamp, 'timestamp'),
    cell_id: input.cell_id,
    variable,
    value: input.value,
  });
};

export const createFutureBlock = (input: RecordInput): FutureBlock => {
  assertCellId(input.cell_id);
  const blockStart = toDate(input.timestamp, 'block_start');

  if (!isBlockAligned(blockStart)) {
    throw new InvalidRecordError(
      `Block start ${blockStart.toISOString()} for cell ${input.cell_id} is not on the 3-hour schedule`
    );
  }
  if (!Number.isFinite(input.value) || input.value < 0) {
    throw new InvalidRecordError(
      `Block total for cell ${input.cell_id} at ${blockStart.toISOString()} must be a finite non-negative number, got ${input.value}`
    );
  }

  return Object.freeze({
    cell_id: input.cell_id,
    block_start: blockStart,
    total_mm: input.value,
  });
};
