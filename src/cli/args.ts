/**
 * @file CLI Argument Parser
 *
 * Usage:
 *   cardset [--config FILE] [--secrets FILE] [--stage NAME]
 *           [--dataset-repo DIR] [--verbose] <command>
 *
 * Commands:
 *   dataset build
 *   dataset rebuild [--yes]
 *   dataset delete  [--yes]
 *   dataset plan
 *   download-task <id> [--format NAME]
 *
 * @module cli/args
 */

import { DEFAULT_EXPORT_FORMAT } from '../cvat/CvatClient.js';

export interface GlobalOptions {
    configPath: string;
    secretsPath: string;
    stage?: string;
    datasetRepo?: string;
    verbose: boolean;
}

export type DatasetAction = 'build' | 'rebuild' | 'delete' | 'plan';

export type CliCommand =
    | { kind: 'help' }
    | { kind: 'dataset'; action: DatasetAction; yes: boolean; global: GlobalOptions }
    | { kind: 'download'; taskId: number; format: string; global: GlobalOptions };

export type ParseResult = { ok: true; command: CliCommand } | { ok: false; error: string };

export const USAGE: string = [
    'Usage: cardset [--config FILE] [--secrets FILE] [--stage NAME] [--dataset-repo DIR] [--verbose] <command>',
    '',
    'Commands:',
    '  dataset build                 build the canonical dataset',
    '  dataset rebuild [--yes]       delete the canonical dataset, then build it',
    '  dataset delete [--yes]        delete the canonical dataset',
    '  dataset plan                  discover and plan without writing',
    `  download-task <id> [--format NAME]   download a CVAT task (default format "${DEFAULT_EXPORT_FORMAT}")`,
].join('\n');

const DATASET_ACTIONS: readonly DatasetAction[] = ['build', 'rebuild', 'delete', 'plan'];

function datasetAction_is(value: string | undefined): value is DatasetAction {
    return DATASET_ACTIONS.some((action: DatasetAction): boolean => action === value);
}

/**
 * Parse argv (without the node and script entries).
 */
export function args_parse(argv: readonly string[]): ParseResult {
    const global: GlobalOptions = { configPath: 'config.yaml', secretsPath: 'secrets.yaml', verbose: false };
    const positionals: string[] = [];
    let yes: boolean = false;
    let format: string = DEFAULT_EXPORT_FORMAT;

    for (let i = 0; i < argv.length; i++) {
        const arg: string = argv[i];
        const valueOptions: Record<string, (value: string) => void> = {
            '--config': (v: string): void => { global.configPath = v; },
            '--secrets': (v: string): void => { global.secretsPath = v; },
            '--stage': (v: string): void => { global.stage = v; },
            '--dataset-repo': (v: string): void => { global.datasetRepo = v; },
            '--format': (v: string): void => { format = v; },
        };

        const setter: ((value: string) => void) | undefined = valueOptions[arg];
        if (setter) {
            const value: string | undefined = argv[i + 1];
            if (value === undefined || value.startsWith('--')) {
                return { ok: false, error: `Option ${arg} requires a value` };
            }
            setter(value);
            i++;
        } else if (arg === '--yes' || arg === '-y') {
            yes = true;
        } else if (arg === '--verbose' || arg === '-v') {
            global.verbose = true;
        } else if (arg === '--help' || arg === '-h') {
            return { ok: true, command: { kind: 'help' } };
        } else if (arg.startsWith('-')) {
            return { ok: false, error: `Unknown option: ${arg}` };
        } else {
            positionals.push(arg);
        }
    }

    const [command, subject, ...rest] = positionals;
    if (command === undefined) {
        return { ok: true, command: { kind: 'help' } };
    }
    if (rest.length > 0) {
        return { ok: false, error: `Unexpected arguments: ${rest.join(' ')}` };
    }

    if (command === 'dataset') {
        if (!datasetAction_is(subject)) {
            return { ok: false, error: `Unknown dataset command: ${subject ?? '(none)'}` };
        }
        return { ok: true, command: { kind: 'dataset', action: subject, yes, global } };
    }

    if (command === 'download-task') {
        const taskId: number = Number(subject);
        if (subject === undefined || !/^\d+$/.test(subject) || !Number.isSafeInteger(taskId)) {
            return { ok: false, error: `download-task requires a numeric task id, got ${subject ?? '(none)'}` };
        }
        return { ok: true, command: { kind: 'download', taskId, format, global } };
    }

    return { ok: false, error: `Unknown command: ${command}` };
}
