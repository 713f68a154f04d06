#!/usr/bin/env node
/**
 * @file cardset CLI entry point
 *
 * Usage:
 *   npx tsx src/cli/main.ts dataset build
 *   npx tsx src/cli/main.ts --stage dev download-task 42
 *
 * @module cli/main
 */

import * as readline from 'readline';
import chalk from 'chalk';
import { args_parse, USAGE, type ParseResult } from './args.js';
import { command_run, ExitCode } from './commands.js';

/** Ask a yes/no question on the terminal; anything but y/yes is no. */
export function confirm_prompt(question: string): Promise<boolean> {
    const rl = readline.createInterface({ input: process.stdin, output: process.stderr });
    return new Promise((resolve: (value: boolean) => void): void => {
        rl.question(`${chalk.yellow(question)} [y/N] `, (answer: string): void => {
            rl.close();
            resolve(/^y(es)?$/i.test(answer.trim()));
        });
    });
}

async function main(): Promise<number> {
    const parsed: ParseResult = args_parse(process.argv.slice(2));
    if (!parsed.ok) {
        console.error(chalk.red(`✗ ${parsed.error}`));
        console.error(USAGE);
        return ExitCode.USAGE;
    }

    return command_run(parsed.command, {
        out: (line: string): void => console.log(line),
        err: (line: string): void => console.error(line),
        confirm: confirm_prompt,
        env: process.env,
    });
}

main()
    .then((code: number): void => {
        process.exitCode = code;
    })
    .catch((e: unknown): void => {
        console.error(chalk.red(`✗ ${e instanceof Error ? e.message : String(e)}`));
        process.exitCode = ExitCode.UNEXPECTED;
    });
