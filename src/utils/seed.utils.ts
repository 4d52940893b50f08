import { FutureBlock } from '@/types/precipitation.types';

export type RandomSource = () => number;
export type RandomSourceFactory = (seed: number) => RandomSource;

export interface IndexedBlock {
  block: FutureBlock;
  record_index: number;
}

/**
 * Per-block seed. A pure function of the base seed and the block's position
 * in the run's global ordering, so worker scheduling never changes it.
 */
export const deriveBlockSeed = (baseSeed: number, recordIndex: number): number => baseSeed + recordIndex;

const TWO_POW_32 = 4294967296;

// murmur3 finalizer; maps 0 to 0
const fmix32 = (value: number): number => {
  let h = value >>> 0;
  h ^= h >>> 16;
  h = Math.imul(h, 0x85EBCA6B);
  h ^= h >>> 13;
  h = Math.imul(h, 0xC2B2AE35);
  h ^= h >>> 16;
  return h >>> 0;
};

/**
 * Folds a seed of up to 53 bits into 32-bit generator state. Seeds below 2^32
 * are used as they are; the high word is mixed in above that, so seeds that
 * differ by a multiple of 2^32 start from different states.
 */
export const seedState = (seed: number): number => {
  const high = Math.floor(seed / TWO_POW_32);
  return ((seed >>> 0) ^ fmix32(high)) >>> 0;
};

/**
 * mulberry32: a small 32-bit generator returning uniform floats in [0, 1).
 * Each call creates an independent instance; nothing is shared between blocks.
 */
export const createSeededRandom: RandomSourceFactory = (seed: number): RandomSource => {
  let state = seedState(seed);

  return () => {
    state = (state + 0x6D2B79F5) >>> 0;
    let t = state;
    t = Math.imul(t ^ (t >>> 15), t | 1);
    t ^= t + Math.imul(t ^ (t >>> 7), t | 61);
    return ((t ^ (t >>> 14)) >>> 0) / TWO_POW_32;
  };
};

/**
 * Uniform index into a list of `count` candidates.
 */
export const pickIndex = (random: RandomSource, count: number): number => {
  if (!Number.isInteger(count) || count < 1) {
    throw new RangeError(`Cannot pick from ${count} candidates`);
  }
  return Math.min(Math.floor(random() * count), count - 1);
};

/**
 * Assigns record indices over blocks ordered by cell_id, then block start.
 * Must run once over the whole run before any partitioning.
 */
export const assignRecordIndices = (blocks: readonly FutureBlock[]): IndexedBlock[] => {
  return [...blocks]
    .sort((a, b) => a.cell_id - b.cell_id || a.block_start.getTime() - b.block_start.getTime())
    .map((block, record_index) => ({ block, record_index }));
};
