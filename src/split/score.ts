/**
 * @file Split Score
 *
 * Maps an arbitrary string key to a reproducible value in [0, 1).
 *
 * The value is the first byte of SHA-256("<seed>:<key>") divided by
 * 256, so it depends only on the seed and the key: never on ordering,
 * wall-clock time or process hash seeds.
 *
 * @module split/score
 */

import { createHash } from 'crypto';

export enum DatasetSplit {
    TRAIN = 'train',
    VAL = 'val',
    TEST = 'test',
}

/** Every split, in manifest order. */
export const SPLIT_ORDER: readonly DatasetSplit[] = [DatasetSplit.TRAIN, DatasetSplit.VAL, DatasetSplit.TEST];

/**
 * A point in [0, 1). Construction fails for anything outside that range.
 */
export class SplitScore {
    readonly score: number;

    constructor(score: number) {
        if (!Number.isFinite(score) || score < 0 || score >= 1) {
            throw new RangeError(`SplitScore must be in [0, 1), got ${score}`);
        }
        this.score = score;
        Object.freeze(this);
    }
}

/**
 * First byte (0–255) of SHA-256 over the UTF-8 bytes of `"{seed}:{key}"`.
 */
export function hashByte_compute(key: string, seed: number): number {
    return createHash('sha256').update(`${seed}:${key}`, 'utf8').digest()[0];
}

export function hashScore_compute(key: string, seed: number): SplitScore {
    return new SplitScore(hashByte_compute(key, seed) / 256);
}
