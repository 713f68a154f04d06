/**
 * @file CVAT Client
 *
 * Downloads a task's dataset export (images + annotations) from the
 * CVAT v1 API and unpacks it into `<destDir>/task_<id>/`, which is the
 * layout dataset discovery expects.
 *
 *   GET <api>/tasks/<id>/dataset?action=download&format=<fmt>&filename=task_<id>_dataset.zip
 *
 * The body is streamed to disk. The timeout is an inactivity timeout:
 * it restarts on every received chunk, so a slow but live transfer is
 * never cut off.
 *
 * Failures are surfaced as three distinguishable errors: the task does
 * not exist, the credentials were refused, or anything else went wrong
 * in transfer or extraction. Nothing is retried here.
 *
 * @module cvat
 */

import fs from 'fs';
import path from 'path';
import { Readable, Transform, type TransformCallback } from 'stream';
import { pipeline } from 'stream/promises';
import type { ReadableStream } from 'stream/web';
import AdmZip from 'adm-zip';
import { logger_create, type Logger } from '../log/logger.js';

// ─── Errors ────────────────────────────────────────────────────────────────

export class CvatError extends Error {
    constructor(message: string, options?: { cause?: unknown }) {
        super(message, options);
        this.name = new.target.name;
    }
}

export class TaskNotFoundError extends CvatError {}
export class AuthenticationError extends CvatError {}
export class TransferError extends CvatError {}

// ─── Client ────────────────────────────────────────────────────────────────

/** The part of a fetch Response the client reads. */
export interface FetchResponse {
    ok: boolean;
    status: number;
    statusText: string;
    body: ReadableStream<Uint8Array> | null;
}

export interface FetchInit {
    method: string;
    headers: Record<string, string>;
    signal: AbortSignal;
}

export type FetchFn = (input: string, init: FetchInit) => Promise<FetchResponse>;

export interface CvatClientOptions {
    apiUrl: string;
    /** Full Authorization header value, e.g. `Bearer <token>`. */
    auth: string;
    fetch?: FetchFn;
    logger?: Logger;
}

export interface TaskFetchOptions {
    /** Longest silence tolerated while waiting for headers or body data. */
    timeoutMs?: number;
}

export const DEFAULT_EXPORT_FORMAT: string = 'LabelMe 3.0';
const DEFAULT_TIMEOUT_MS: number = 300_000;

function reason_of(e: unknown): string {
    return e instanceof Error ? e.message : String(e);
}

export class CvatClient {
    readonly apiUrl: string;
    private readonly auth: string;
    private readonly fetchFn: FetchFn;
    private readonly log: Logger;

    constructor(options: CvatClientOptions) {
        this.apiUrl = options.apiUrl.replace(/\/+$/, '');
        this.auth = options.auth;
        this.fetchFn = options.fetch ?? ((input: string, init: FetchInit): Promise<FetchResponse> => fetch(input, init));
        this.log = options.logger ?? logger_create('cvat');
    }

    /** URL of the dataset export for one task. */
    exportUrl_build(taskId: number, format: string): string {
        const params = new URLSearchParams({
            action: 'download',
            format,
            filename: `task_${taskId}_dataset.zip`,
        });
        return `${this.apiUrl}/tasks/${taskId}/dataset?${params.toString()}`;
    }

    /**
     * Download and extract one task.
     *
     * @returns The task directory `<destDir>/task_<id>`
     * @throws TaskNotFoundError on 404, AuthenticationError on 401,
     *   TransferError for any other HTTP, network, write or archive failure
     */
    async task_fetch(
        taskId: number,
        destDir: string,
        format: string = DEFAULT_EXPORT_FORMAT,
        options: TaskFetchOptions = {},
    ): Promise<string> {
        this.log.info(`Starting download for task ${taskId} in format ${format}`);

        const timeoutMs: number = options.timeoutMs ?? DEFAULT_TIMEOUT_MS;
        const controller = new AbortController();
        let idleTimer: NodeJS.Timeout | undefined;
        const idle_reset = (): void => {
            clearTimeout(idleTimer);
            idleTimer = setTimeout((): void => controller.abort(), timeoutMs);
        };
        const stalled = (): TransferError =>
            new TransferError(`Download stalled: no data received for ${timeoutMs} ms`);

        const taskDir: string = path.join(destDir, `task_${taskId}`);
        const zipPath: string = path.join(taskDir, 'dataset.zip');
        try {
            idle_reset();
            let response: FetchResponse;
            try {
                response = await this.fetchFn(this.exportUrl_build(taskId, format), {
                    method: 'GET',
                    headers: { Authorization: this.auth },
                    signal: controller.signal,
                });
            } catch (e: unknown) {
                if (controller.signal.aborted) throw stalled();
                throw new TransferError(`Network error while downloading dataset: ${reason_of(e)}`, { cause: e });
            }

            if (response.status === 404) {
                throw new TaskNotFoundError(`Task ${taskId} not found`);
            }
            if (response.status === 401) {
                throw new AuthenticationError('Authentication failed. Check your auth token.');
            }
            if (!response.ok) {
                throw new TransferError(
                    `Failed to download dataset for task ${taskId}: HTTP ${response.status} ${response.statusText}`,
                );
            }
            if (response.body === null) {
                throw new TransferError(`Empty response body for task ${taskId}`);
            }

            const body: ReadableStream<Uint8Array> = response.body;
            try {
                fs.mkdirSync(taskDir, { recursive: true });
                await pipeline(
                    Readable.fromWeb(body),
                    new Transform({
                        transform(chunk: Buffer, _encoding: BufferEncoding, callback: TransformCallback): void {
                            idle_reset();
                            callback(null, chunk);
                        },
                    }),
                    fs.createWriteStream(zipPath),
                    { signal: controller.signal },
                );
            } catch (e: unknown) {
                if (controller.signal.aborted) throw stalled();
                throw new TransferError(`Failed to save dataset ZIP file: ${reason_of(e)}`, { cause: e });
            }
        } finally {
            clearTimeout(idleTimer);
        }
        this.log.info(`Dataset ZIP saved to ${zipPath}`);

        try {
            new AdmZip(zipPath).extractAllTo(taskDir, true);
        } catch (e: unknown) {
            throw new TransferError(`Invalid ZIP file downloaded: ${reason_of(e)}`, { cause: e });
        }
        this.log.info(`Dataset extracted to ${taskDir}`);

        try {
            fs.unlinkSync(zipPath);
        } catch (e: unknown) {
            this.log.warn(`Failed to remove ZIP file ${zipPath}: ${reason_of(e)}`);
        }

        this.log.info(`Task ${taskId} downloaded successfully to ${taskDir}`);
        return taskDir;
    }
}
