/**
 * @file Dataset Planner
 *
 * Turns discovered records into an immutable DatasetPlan: where each
 * file is copied and which split it joins. Planning performs no I/O, so
 * every splitter failure surfaces before the first write.
 *
 * @module build/planner
 */

import path from 'path';
import type { DatasetRecord } from '../dataset/record.js';
import type { DatasetLayout } from '../dataset/layout.js';
import { DuplicatePlanError } from '../dataset/errors.js';
import { DatasetSplit } from '../split/score.js';
import type { Splitter } from '../split/splitters.js';

export interface RecordPlan {
    readonly stem: string;
    readonly srcImage: string;
    readonly srcAnnotation: string;
    readonly dstImage: string;
    readonly dstAnnotation: string;
    readonly split: DatasetSplit;
}

/**
 * @property layout - Target repository layout
 * @property tasks - Task names, in the order written to tasks.txt
 * @property recordCopies - One plan per record, in copy order
 */
export interface DatasetPlan {
    readonly layout: DatasetLayout;
    readonly tasks: readonly string[];
    readonly recordCopies: readonly RecordPlan[];
}

function planKey_build(plan: RecordPlan): string {
    return JSON.stringify([plan.stem, plan.srcImage, plan.srcAnnotation, plan.dstImage, plan.dstAnnotation, plan.split]);
}

/**
 * Report identical plans and plans whose destinations collide.
 */
function collisions_find(plans: readonly RecordPlan[]): string[] {
    const collisions: string[] = [];
    const seenPlans = new Set<string>();
    const destinations = new Map<string, string>();

    for (const plan of plans) {
        const key: string = planKey_build(plan);
        if (seenPlans.has(key)) {
            collisions.push(`identical plan for '${plan.stem}' (${plan.srcImage})`);
            continue;
        }
        seenPlans.add(key);

        for (const [dst, src] of [[plan.dstImage, plan.srcImage], [plan.dstAnnotation, plan.srcAnnotation]]) {
            const previous: string | undefined = destinations.get(dst);
            if (previous !== undefined) {
                collisions.push(`${dst} <- ${previous}, ${src}`);
            } else {
                destinations.set(dst, src);
            }
        }
    }
    return collisions;
}

/**
 * Plan a build of `records` into `layout`.
 *
 * @throws DuplicatePlanError if two plans are identical or share a destination
 */
export function dataset_plan(
    records: readonly DatasetRecord[],
    tasks: readonly string[],
    layout: DatasetLayout,
    splitter: Splitter,
): DatasetPlan {
    const recordCopies: RecordPlan[] = records.map((record: DatasetRecord): RecordPlan => Object.freeze({
        stem: record.stem,
        srcImage: record.imagePath,
        srcAnnotation: record.annotationPath,
        dstImage: path.join(layout.records, path.basename(record.imagePath)),
        dstAnnotation: path.join(layout.records, path.basename(record.annotationPath)),
        split: splitter.split(record),
    }));

    const collisions: string[] = collisions_find(recordCopies);
    if (collisions.length > 0) {
        throw new DuplicatePlanError(collisions);
    }

    return Object.freeze({
        layout,
        tasks: Object.freeze([...tasks]),
        recordCopies: Object.freeze(recordCopies),
    });
}

/** Number of planned records per split; every split is present. */
export function plan_summarize(plan: DatasetPlan): Record<DatasetSplit, number> {
    const counts: Record<DatasetSplit, number> = {
        [DatasetSplit.TRAIN]: 0,
        [DatasetSplit.VAL]: 0,
        [DatasetSplit.TEST]: 0,
    };
    for (const copy of plan.recordCopies) {
        counts[copy.split] += 1;
    }
    return counts;
}
