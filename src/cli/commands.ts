/**
 * @file CLI Command Runner
 *
 * Executes a parsed `CliCommand` and maps every failure to an exit code.
 * Output is a single `✓`/`✗` line per command; progress goes through the
 * logger on stderr.
 *
 * @module cli/commands
 */

import path from 'path';
import chalk from 'chalk';
import { USAGE, type CliCommand, type DatasetAction, type GlobalOptions } from './args.js';
import { config_load, ConfigError } from '../config/loader.js';
import type { AppConfig } from '../config/schemas.js';
import { layout_create, type DatasetLayout } from '../dataset/layout.js';
import { DatasetBuildError, type ErrorKind } from '../dataset/errors.js';
import { RatioSplitPolicy } from '../split/policy.js';
import { splitter_create, type Splitter } from '../split/splitters.js';
import { dataset_build, dataset_delete, dataset_preview, dataset_rebuild } from '../build/dataset.js';
import { plan_summarize, type DatasetPlan } from '../build/planner.js';
import { DatasetSplit, SPLIT_ORDER } from '../split/score.js';
import {
    AuthenticationError,
    CvatClient,
    CvatError,
    TaskNotFoundError,
    type FetchFn,
} from '../cvat/CvatClient.js';
import { logger_create, type Logger } from '../log/logger.js';

// ─── Exit codes ────────────────────────────────────────────────────────────

export enum ExitCode {
    OK = 0,
    UNEXPECTED = 1,
    USAGE = 2,
    CONFIG = 3,
    VALIDATION = 4,
    CONFLICT = 5,
    CONSISTENCY = 6,
    LOOKUP = 7,
    TASK_NOT_FOUND = 8,
    AUTHENTICATION = 9,
    TRANSFER = 10,
    ABORTED = 11,
}

export function errorKind_exitCode(kind: ErrorKind): ExitCode {
    switch (kind) {
        case 'validation':  return ExitCode.VALIDATION;
        case 'conflict':    return ExitCode.CONFLICT;
        case 'consistency': return ExitCode.CONSISTENCY;
        case 'lookup':      return ExitCode.LOOKUP;
    }
}

/** Exit code for anything thrown while running a command. */
export function error_exitCode(error: unknown): ExitCode {
    if (error instanceof DatasetBuildError) return errorKind_exitCode(error.kind);
    if (error instanceof ConfigError) return ExitCode.CONFIG;
    if (error instanceof TaskNotFoundError) return ExitCode.TASK_NOT_FOUND;
    if (error instanceof AuthenticationError) return ExitCode.AUTHENTICATION;
    if (error instanceof CvatError) return ExitCode.TRANSFER;
    return ExitCode.UNEXPECTED;
}

// ─── Runner ────────────────────────────────────────────────────────────────

export interface CommandContext {
    /** Result lines (stdout). */
    out: (line: string) => void;
    /** Failure lines (stderr). */
    err: (line: string) => void;
    confirm: (question: string) => Promise<boolean>;
    env?: Readonly<Record<string, string | undefined>>;
    fetch?: FetchFn;
    logger?: Logger;
}

/** Splitter named by `datasets.splitter`, around `datasets.splits`. */
export function splitter_fromConfig(config: AppConfig): Splitter {
    const { splits, splitter } = config.datasets;
    return splitter_create(splitter, new RatioSplitPolicy(splits), splits.seed);
}

function layout_resolve(config: AppConfig, global: GlobalOptions): DatasetLayout {
    return layout_create(path.resolve(global.datasetRepo ?? config.datasets.dataset_repo));
}

function summary_format(counts: Record<DatasetSplit, number>): string {
    return SPLIT_ORDER.map((split: DatasetSplit): string => `${split}=${counts[split]}`).join(' ');
}

async function dataset_run(
    action: DatasetAction,
    yes: boolean,
    config: AppConfig,
    global: GlobalOptions,
    ctx: CommandContext,
    log: Logger,
): Promise<ExitCode> {
    const layout: DatasetLayout = layout_resolve(config, global);

    if ((action === 'rebuild' || action === 'delete') && !yes) {
        const confirmed: boolean = await ctx.confirm(`This will delete ${layout.canonical}. Continue?`);
        if (!confirmed) {
            ctx.err(chalk.yellow(`✗ Aborted: ${layout.canonical} left untouched`));
            return ExitCode.ABORTED;
        }
    }

    switch (action) {
        case 'delete': {
            dataset_delete(layout);
            ctx.out(chalk.green(`✓ Deleted ${layout.canonical}`));
            return ExitCode.OK;
        }
        case 'plan': {
            const plan: DatasetPlan = dataset_preview(layout, splitter_fromConfig(config), { logger: log });
            ctx.out(chalk.green(
                `✓ Planned ${plan.recordCopies.length} records from ${plan.tasks.length} tasks: ${summary_format(plan_summarize(plan))}`,
            ));
            return ExitCode.OK;
        }
        case 'build':
        case 'rebuild': {
            const run = action === 'build' ? dataset_build : dataset_rebuild;
            const canonical: string = run(layout, splitter_fromConfig(config), { logger: log });
            ctx.out(chalk.green(`✓ Dataset built at ${canonical}`));
            return ExitCode.OK;
        }
    }
}

async function download_run(
    taskId: number,
    format: string,
    config: AppConfig,
    global: GlobalOptions,
    ctx: CommandContext,
    log: Logger,
): Promise<ExitCode> {
    if (!config.cvat) {
        throw new ConfigError("Missing 'cvat' section (url, auth) in configuration");
    }
    const layout: DatasetLayout = layout_resolve(config, global);
    const client = new CvatClient({
        apiUrl: config.cvat.url,
        auth: config.cvat.auth,
        fetch: ctx.fetch,
        logger: log.child('cvat'),
    });
    const taskDir: string = await client.task_fetch(taskId, layout.cvatRaw, format);
    ctx.out(chalk.green(`✓ Task ${taskId} downloaded to ${taskDir}`));
    return ExitCode.OK;
}

/**
 * Run one command. Never throws; every failure becomes a `✗` line and
 * a non-zero exit code.
 */
export async function command_run(command: CliCommand, ctx: CommandContext): Promise<ExitCode> {
    if (command.kind === 'help') {
        ctx.out(USAGE);
        return ExitCode.OK;
    }

    const log: Logger = ctx.logger ?? logger_create('cardset', command.global.verbose ? { level: 'debug' } : {});
    try {
        const config: AppConfig = config_load(command.global.configPath, {
            credentialsPath: command.global.secretsPath,
            stage: command.global.stage,
            env: ctx.env,
            logger: log.child('config'),
        });

        if (command.kind === 'dataset') {
            return await dataset_run(command.action, command.yes, config, command.global, ctx, log.child('dataset'));
        }
        return await download_run(command.taskId, command.format, config, command.global, ctx, log);
    } catch (e: unknown) {
        const message: string = e instanceof Error ? e.message : String(e);
        ctx.err(chalk.red(`✗ ${message}`));
        if (!(e instanceof DatasetBuildError || e instanceof ConfigError || e instanceof CvatError)) {
            log.debug(e instanceof Error && e.stack ? e.stack : message);
        }
        return error_exitCode(e);
    }
}
