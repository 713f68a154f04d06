/**
 * @file Dataset Build Orchestration
 *
 * discover → plan → execute, guarded by an emptiness check on the
 * canonical root before anything is read.
 *
 * @module build/dataset
 */

import fs from 'fs';
import type { DatasetLayout } from '../dataset/layout.js';
import type { Splitter } from '../split/splitters.js';
import { records_discover, type DiscoveryOptions, type DiscoveryResult } from './discovery.js';
import { dataset_plan, type DatasetPlan } from './planner.js';
import { directory_ensureEmpty, plan_execute } from './executor.js';
import { logger_create, type Logger } from '../log/logger.js';

export interface BuildOptions extends DiscoveryOptions {
    logger?: Logger;
}

/**
 * Discover and plan without touching the canonical tree.
 */
export function dataset_preview(layout: DatasetLayout, splitter: Splitter, options: BuildOptions = {}): DatasetPlan {
    const log: Logger = options.logger ?? logger_create('build');
    const discovered: DiscoveryResult = records_discover(layout.cvatRaw, options);
    log.info(`Discovered ${discovered.records.length} records in ${discovered.tasks.length} tasks`);
    return dataset_plan(discovered.records, discovered.tasks, layout, splitter);
}

/**
 * Build the canonical dataset for `layout`.
 *
 * @returns The canonical root
 * @throws DirectoryNotEmptyError before discovery if the canonical root is populated
 */
export function dataset_build(layout: DatasetLayout, splitter: Splitter, options: BuildOptions = {}): string {
    const log: Logger = options.logger ?? logger_create('build');
    directory_ensureEmpty(layout.canonical);

    const plan: DatasetPlan = dataset_preview(layout, splitter, { ...options, logger: log });
    return plan_execute(plan, { logger: log.child('execute') });
}

/** Remove the canonical tree; a missing tree is not an error. */
export function dataset_delete(layout: DatasetLayout): void {
    fs.rmSync(layout.canonical, { recursive: true, force: true });
}

export function dataset_rebuild(layout: DatasetLayout, splitter: Splitter, options: BuildOptions = {}): string {
    dataset_delete(layout);
    return dataset_build(layout, splitter, options);
}
