/**
 * @file Dataset Executor
 *
 * Materializes a DatasetPlan on disk:
 *
 *   canonical/
 *     tasks.txt            task names, one per line
 *     records/             byte-for-byte copies of every planned file
 *     splits/{train,val,test}.txt   member stems, one per line
 *
 * The executor is the only writer of the canonical tree. It never
 * overwrites: the canonical root must be absent or empty, and every copy
 * fails if its destination exists. A failed copy aborts the run and
 * leaves whatever was written in place.
 *
 * @module build/executor
 */

import fs from 'fs';
import path from 'path';
import type { DatasetPlan, RecordPlan } from './planner.js';
import { DatasetSplit, SPLIT_ORDER } from '../split/score.js';
import { DirectoryNotEmptyError } from '../dataset/errors.js';
import { logger_create, progress_iterate, type Logger } from '../log/logger.js';

export const TASKS_MANIFEST: string = 'tasks.txt';

export interface ExecuteOptions {
    logger?: Logger;
}

/**
 * @throws DirectoryNotEmptyError when `directory` has entries or is
 *   occupied by something other than a directory
 */
export function directory_ensureEmpty(directory: string): void {
    if (!fs.existsSync(directory)) return;
    if (!fs.statSync(directory).isDirectory() || fs.readdirSync(directory).length > 0) {
        throw new DirectoryNotEmptyError(directory);
    }
}

function lines_write(filePath: string, lines: readonly string[]): void {
    fs.writeFileSync(filePath, lines.join('\n'), 'utf-8');
}

/**
 * Execute `plan`, returning the canonical root.
 */
export function plan_execute(plan: DatasetPlan, options: ExecuteOptions = {}): string {
    const log: Logger = options.logger ?? logger_create('executor');
    const { layout } = plan;

    directory_ensureEmpty(layout.canonical);
    fs.mkdirSync(layout.canonical, { recursive: true });

    log.info(`Found ${plan.tasks.length} tasks`);
    lines_write(path.join(layout.canonical, TASKS_MANIFEST), plan.tasks);

    log.info(`Copying ${plan.recordCopies.length} records to ${path.resolve(layout.records)}`);
    fs.mkdirSync(layout.records);

    const members: Record<DatasetSplit, string[]> = {
        [DatasetSplit.TRAIN]: [],
        [DatasetSplit.VAL]: [],
        [DatasetSplit.TEST]: [],
    };
    for (const copy of progress_iterate<RecordPlan>(plan.recordCopies, 'copied', log)) {
        fs.copyFileSync(copy.srcImage, copy.dstImage, fs.constants.COPYFILE_EXCL);
        fs.copyFileSync(copy.srcAnnotation, copy.dstAnnotation, fs.constants.COPYFILE_EXCL);
        members[copy.split].push(copy.stem);
    }

    fs.mkdirSync(layout.splits);
    for (const split of SPLIT_ORDER) {
        log.info(`${split}: ${members[split].length} records`);
        lines_write(path.join(layout.splits, `${split}.txt`), members[split]);
    }

    return layout.canonical;
}
