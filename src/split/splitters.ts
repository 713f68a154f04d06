/**
 * @file Splitter Strategies
 *
 * A Splitter assigns each record to exactly one DatasetSplit. Three
 * interchangeable strategies are provided:
 *
 *   HashSplitter     hash of the record stem
 *   CertIdSplitter   hash of the certificate id parsed from the stem, so
 *                    every scan of one physical card lands together
 *   StaticSplitter   explicit stem → split table (tests, pinned rebuilds)
 *
 * @module split/splitters
 */

import fs from 'fs';
import path from 'path';
import type { DatasetRecord } from '../dataset/record.js';
import { ManifestConflictError, SplitLookupError, SplitPartitionError } from '../dataset/errors.js';
import { DatasetSplit, SPLIT_ORDER, hashScore_compute } from './score.js';
import type { SplitPolicy } from './policy.js';
import { identity_extract } from './identity.js';

export type SplitMap = Record<DatasetSplit, DatasetRecord[]>;

export interface Splitter {
    /** Assign one record. */
    split(record: DatasetRecord): DatasetSplit;

    /** Partition a batch; every split key is present, every record appears once. */
    records_split(records: readonly DatasetRecord[]): SplitMap;
}

export type SplitterStrategy = 'hash' | 'certificate';

/** Empty map with all three keys. */
export function splitMap_create(): SplitMap {
    return {
        [DatasetSplit.TRAIN]: [],
        [DatasetSplit.VAL]: [],
        [DatasetSplit.TEST]: [],
    };
}

/**
 * Partition `records` with `assign`, preserving input order within each
 * bucket. Any failing assignment aborts the whole batch.
 *
 * @throws SplitPartitionError if the bucket totals differ from the input count
 */
export function records_partition(
    assign: (record: DatasetRecord) => DatasetSplit,
    records: readonly DatasetRecord[],
): SplitMap {
    const splits: SplitMap = splitMap_create();
    for (const record of records) {
        const bucket: DatasetRecord[] | undefined = splits[assign(record)];
        if (bucket) bucket.push(record);
    }

    const assigned: number = SPLIT_ORDER.reduce(
        (sum: number, split: DatasetSplit): number => sum + splits[split].length,
        0,
    );
    if (assigned !== records.length) {
        throw new SplitPartitionError(assigned, records.length);
    }
    return splits;
}

export class HashSplitter implements Splitter {
    constructor(private readonly policy: SplitPolicy, private readonly seed: number) {}

    split(record: DatasetRecord): DatasetSplit {
        return this.policy.split(hashScore_compute(record.stem, this.seed));
    }

    records_split(records: readonly DatasetRecord[]): SplitMap {
        return records_partition((record: DatasetRecord): DatasetSplit => this.split(record), records);
    }
}

export class CertIdSplitter implements Splitter {
    constructor(private readonly policy: SplitPolicy, private readonly seed: number) {}

    /** @throws IdentityFormatError when the stem carries no certificate id */
    split(record: DatasetRecord): DatasetSplit {
        const { certificateId } = identity_extract(record.stem);
        return this.policy.split(hashScore_compute(certificateId, this.seed));
    }

    records_split(records: readonly DatasetRecord[]): SplitMap {
        return records_partition((record: DatasetRecord): DatasetSplit => this.split(record), records);
    }
}

export class StaticSplitter implements Splitter {
    private readonly mapping: ReadonlyMap<string, DatasetSplit>;

    /** @param entries - stem → split pairs; a Map or `Object.entries(table)` */
    constructor(entries: Iterable<readonly [string, DatasetSplit]>) {
        this.mapping = new Map(entries);
    }

    /** @throws SplitLookupError when the stem has no entry */
    split(record: DatasetRecord): DatasetSplit {
        const split: DatasetSplit | undefined = this.mapping.get(record.stem);
        if (split === undefined) {
            throw new SplitLookupError(record.stem);
        }
        return split;
    }

    records_split(records: readonly DatasetRecord[]): SplitMap {
        return records_partition((record: DatasetRecord): DatasetSplit => this.split(record), records);
    }
}

/**
 * Rebuild a StaticSplitter from the split manifests of an earlier build,
 * so a new build can re-apply a previously published assignment.
 * Missing manifest files contribute no entries.
 *
 * @throws ManifestConflictError when a stem is listed twice, in one
 *   manifest or across two
 */
export function staticSplitter_fromManifests(splitsDir: string): StaticSplitter {
    const mapping = new Map<string, DatasetSplit>();
    for (const split of SPLIT_ORDER) {
        const manifestPath: string = path.join(splitsDir, `${split}.txt`);
        if (!fs.existsSync(manifestPath)) continue;
        const stems: string[] = fs.readFileSync(manifestPath, 'utf-8')
            .split(/\r?\n/)
            .map((line: string): string => line.trim())
            .filter((line: string): boolean => line.length > 0);
        for (const stem of stems) {
            const previous: DatasetSplit | undefined = mapping.get(stem);
            if (previous !== undefined) {
                throw new ManifestConflictError(stem, [`${previous}.txt`, `${split}.txt`]);
            }
            mapping.set(stem, split);
        }
    }
    return new StaticSplitter(mapping);
}

/**
 * Build a named strategy around a policy and seed.
 */
export function splitter_create(strategy: SplitterStrategy, policy: SplitPolicy, seed: number): Splitter {
    switch (strategy) {
        case 'hash':        return new HashSplitter(policy, seed);
        case 'certificate': return new CertIdSplitter(policy, seed);
    }
}
