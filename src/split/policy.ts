/**
 * @file Split Policy
 *
 * Turns a SplitScore into a DatasetSplit.
 *
 * @module split/policy
 */

import { DatasetSplit, type SplitScore } from './score.js';
import { SplitRatioError } from '../dataset/errors.js';

const RATIO_TOLERANCE: number = 1e-9;

export interface SplitPolicy {
    split(score: SplitScore): DatasetSplit;
}

export interface SplitRatios {
    train: number;
    val: number;
    test: number;
}

/**
 * Cumulative-threshold policy. With ratios (t, v, x) the buckets are
 * [0, t) → TRAIN, [t, t+v) → VAL, [t+v, 1) → TEST; a score equal to a
 * cutoff falls into the next bucket.
 */
export class RatioSplitPolicy implements SplitPolicy {
    readonly train: number;
    readonly val: number;
    readonly test: number;
    private readonly thresholds: ReadonlyArray<readonly [number, DatasetSplit]>;

    constructor(ratios: SplitRatios) {
        const named: Array<[string, number]> = [['train', ratios.train], ['val', ratios.val], ['test', ratios.test]];
        for (const [name, value] of named) {
            if (!Number.isFinite(value) || value < 0) {
                throw new SplitRatioError(`Split ratio '${name}' must be a non-negative number, got ${value}`);
            }
        }
        const total: number = ratios.train + ratios.val + ratios.test;
        if (Math.abs(total - 1.0) >= RATIO_TOLERANCE) {
            throw new SplitRatioError(`Split ratios must sum to 1.0, got ${total}`);
        }

        this.train = ratios.train;
        this.val = ratios.val;
        this.test = ratios.test;
        this.thresholds = Object.freeze([
            [ratios.train, DatasetSplit.TRAIN],
            [ratios.train + ratios.val, DatasetSplit.VAL],
            [1.0, DatasetSplit.TEST],
        ] as const);
        Object.freeze(this);
    }

    split(score: SplitScore): DatasetSplit {
        for (const [limit, split] of this.thresholds) {
            if (score.score < limit) return split;
        }
        // SplitScore is < 1.0 and the last limit is 1.0
        throw new Error(`Unreachable: score ${score.score} above every threshold`);
    }
}
