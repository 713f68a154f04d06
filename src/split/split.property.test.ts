/**
 * @file Split Property Tests
 *
 * Invariants under test:
 *   1. hashScore_compute is deterministic and always within [0, 1).
 *   2. RatioSplitPolicy sends scores below `train` to TRAIN, scores in
 *      [train, train+val) to VAL and the rest to TEST.
 *   3. records_split loses and duplicates nothing, and every bucket key
 *      is present.
 */

import { describe, it } from 'vitest';
import * as fc from 'fast-check';
import { DatasetSplit, SPLIT_ORDER, SplitScore, hashScore_compute } from './score.js';
import { RatioSplitPolicy } from './policy.js';
import { HashSplitter } from './splitters.js';
import { record_create, type DatasetRecord } from '../dataset/record.js';

// ─── Arbitraries ──────────────────────────────────────────────────────────────

/** Ratios built from integer percentages so they sum to exactly 100. */
const ratios = fc.tuple(fc.integer({ min: 0, max: 100 }), fc.integer({ min: 0, max: 100 }))
    .map(([a, b]): { train: number; val: number; test: number } => {
        const lo: number = Math.min(a, b);
        const hi: number = Math.max(a, b);
        return { train: lo / 100, val: (hi - lo) / 100, test: (100 - hi) / 100 };
    })
    .filter((r): boolean => Math.abs(r.train + r.val + r.test - 1) < 1e-9);

const scores = fc.double({ min: 0, max: 1, maxExcluded: true, noNaN: true });

/** Unique stems like 'img_17'. */
const stems = fc.uniqueArray(fc.integer({ min: 0, max: 9999 }), { maxLength: 40 })
    .map((nums: number[]): string[] => nums.map((n: number): string => `img_${n}`));

// ─── Properties ──────────────────────────────────────────────────────────────

describe('split property invariants', (): void => {
    it('hash scores are deterministic and in [0, 1)', (): void => {
        fc.assert(fc.property(fc.string(), fc.integer(), (key: string, seed: number): boolean => {
            const a: number = hashScore_compute(key, seed).score;
            const b: number = hashScore_compute(key, seed).score;
            return a === b && a >= 0 && a < 1;
        }));
    });

    it('policy assignment follows the cumulative thresholds', (): void => {
        fc.assert(fc.property(ratios, scores, (r, value: number): boolean => {
            const split: DatasetSplit = new RatioSplitPolicy(r).split(new SplitScore(value));
            if (value < r.train) return split === DatasetSplit.TRAIN;
            if (value < r.train + r.val) return split === DatasetSplit.VAL;
            return split === DatasetSplit.TEST;
        }));
    });

    it('records_split partitions without loss or duplication', (): void => {
        fc.assert(fc.property(ratios, fc.integer(), stems, (r, seed: number, names: string[]): boolean => {
            const records: DatasetRecord[] = names.map((n: string): DatasetRecord => record_create(`${n}.png`, `${n}.xml`));
            const splits = new HashSplitter(new RatioSplitPolicy(r), seed).records_split(records);

            if (!SPLIT_ORDER.every((s: DatasetSplit): boolean => Array.isArray(splits[s]))) return false;
            const seen: string[] = SPLIT_ORDER.flatMap((s: DatasetSplit): string[] => splits[s].map((x: DatasetRecord): string => x.stem));
            return seen.length === names.length && new Set(seen).size === names.length;
        }));
    });
});
