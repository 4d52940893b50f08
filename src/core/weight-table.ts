import { WeightCandidate, WeightTriple } from '@/core/weight-triple';
import { WeightKey } from '@/types/precipitation.types';

export interface WeightTableEntry {
  key: WeightKey;
  triple: WeightTriple;
}

/**
 * Read-only lookup of candidate triples. Lets the disaggregator run against
 * anything that can answer "which triples exist for this key".
 */
export interface CandidateSource {
  getCandidates(key: WeightKey): readonly WeightCandidate[];
}

export const formatWeightKey = (key: WeightKey): string => {
  const month = String(key.month).padStart(2, '0');
  return key.hour_bucket === null
    ? `${key.cell_id}:M${month}`
    : `${key.cell_id}:M${month}:H${String(key.hour_bucket).padStart(2, '0')}`;
};

export const coarsenKey = (key: WeightKey): WeightKey => ({ ...key, hour_bucket: null });

/**
 * Immutable weight table shared by every worker of a run. Candidate lists are
 * ordered by source year ascending so the index a generator draws always maps
 * to the same year. A key holds at most one triple per year; a later entry for
 * the same key and year replaces the earlier one.
 */
export class WeightTable implements CandidateSource {
  private readonly entries: ReadonlyMap<string, readonly WeightTriple[]>;
  private readonly keysById: ReadonlyMap<string, WeightKey>;

  private constructor(entries: Map<string, readonly WeightTriple[]>, keysById: Map<string, WeightKey>) {
    this.entries = entries;
    this.keysById = keysById;
    Object.freeze(this);
  }

  static fromEntries(entries: Iterable<WeightTableEntry>): WeightTable {
    const byKey = new Map<string, Map<number, WeightTriple>>();
    const keysById = new Map<string, WeightKey>();

    for (const { key, triple } of entries) {
      const id = formatWeightKey(key);
      let byYear = byKey.get(id);
      if (!byYear) {
        byYear = new Map();
        byKey.set(id, byYear);
        keysById.set(id, Object.freeze({ ...key }));
      }
      byYear.set(triple.source_year, triple);
    }

    const frozen = new Map<string, readonly WeightTriple[]>();
    for (const [id, byYear] of byKey) {
      const ordered = [...byYear.values()].sort((a, b) => a.source_year - b.source_year);
      frozen.set(id, Object.freeze(ordered));
    }

    return new WeightTable(frozen, keysById);
  }

  getCandidates(key: WeightKey): readonly WeightTriple[] {
    return this.entries.get(formatWeightKey(key)) ?? [];
  }

  get size(): number {
    return this.entries.size;
  }

  cellIds(): number[] {
    const ids = new Set<number>();
    for (const key of this.keysById.values()) {
      ids.add(key.cell_id);
    }
    return [...ids].sort((a, b) => a - b);
  }

  toEntries(): WeightTableEntry[] {
    const result: WeightTableEntry[] = [];
    for (const [id, triples] of this.entries) {
      const key = this.keysById.get(id);
      if (!key) {
        continue;
      }
      for (const triple of triples) {
        result.push({ key, triple });
      }
    }
    return result;
  }
}
