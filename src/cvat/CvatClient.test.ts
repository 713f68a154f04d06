import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import fs from 'fs';
import os from 'os';
import path from 'path';
import { ReadableStream } from 'stream/web';
import AdmZip from 'adm-zip';
import {
    AuthenticationError,
    CvatClient,
    CvatError,
    TaskNotFoundError,
    TransferError,
    type FetchFn,
    type FetchInit,
    type FetchResponse,
} from './CvatClient.js';
import { Logger } from '../log/logger.js';

const quiet = new Logger('test', { sink: (): void => {} });

let dest: string;

beforeEach((): void => {
    dest = fs.mkdtempSync(path.join(os.tmpdir(), 'cardset-cvat-'));
});

afterEach((): void => {
    fs.rmSync(dest, { recursive: true, force: true });
});

function delay_ms(ms: number): Promise<void> {
    return new Promise((resolve: () => void): void => { setTimeout(resolve, ms); });
}

/** Web stream yielding `chunks`, waiting `delayMs` before each one. */
function body_stream(chunks: Uint8Array[], delayMs: number = 0): ReadableStream<Uint8Array> {
    let index: number = 0;
    return new ReadableStream<Uint8Array>({
        async pull(controller): Promise<void> {
            if (delayMs > 0) await delay_ms(delayMs);
            const chunk: Uint8Array | undefined = chunks[index++];
            if (chunk === undefined) {
                controller.close();
            } else {
                controller.enqueue(chunk);
            }
        },
    });
}

/** Split `data` into `count` roughly equal chunks. */
function chunks_split(data: Buffer, count: number): Uint8Array[] {
    const size: number = Math.ceil(data.length / count);
    const chunks: Uint8Array[] = [];
    for (let offset = 0; offset < data.length; offset += size) {
        chunks.push(new Uint8Array(data.subarray(offset, offset + size)));
    }
    return chunks;
}

function response_make(
    status: number,
    body: Buffer | ReadableStream<Uint8Array> = Buffer.alloc(0),
    statusText: string = '',
): FetchResponse {
    return {
        ok: status >= 200 && status < 300,
        status,
        statusText,
        body: Buffer.isBuffer(body) ? body_stream([new Uint8Array(body)]) : body,
    };
}

function archive_make(): Buffer {
    const zip = new AdmZip();
    zip.addFile('images/x.png', Buffer.from('png-bytes'));
    zip.addFile('images/x.xml', Buffer.from('<annotation/>'));
    return zip.toBuffer();
}

interface FetchCall {
    url: string;
    init: FetchInit;
}

function fetch_stub(response: FetchResponse | Error): { fetch: FetchFn; calls: FetchCall[] } {
    const calls: FetchCall[] = [];
    const fetch: FetchFn = async (url: string, init: FetchInit): Promise<FetchResponse> => {
        calls.push({ url, init });
        if (response instanceof Error) throw response;
        return response;
    };
    return { fetch, calls };
}

describe('cvat/CvatClient', (): void => {
    it('strips trailing slashes from the API URL', (): void => {
        const client = new CvatClient({ apiUrl: 'https://cvat.example.test/api/v1/', auth: 'Bearer test-secret', logger: quiet });
        expect(client.apiUrl).toBe('https://cvat.example.test/api/v1');
    });

    it('builds the export URL with action, format and filename', (): void => {
        const client = new CvatClient({ apiUrl: 'https://cvat.example.test/api/v1', auth: 'x', logger: quiet });
        expect(client.exportUrl_build(7, 'LabelMe 3.0')).toBe(
            'https://cvat.example.test/api/v1/tasks/7/dataset?action=download&format=LabelMe+3.0&filename=task_7_dataset.zip',
        );
    });

    it('downloads, extracts and removes the archive', async (): Promise<void> => {
        const { fetch, calls } = fetch_stub(response_make(200, archive_make()));
        const client = new CvatClient({ apiUrl: 'https://cvat.example.test/api/v1', auth: 'Bearer test-secret', fetch, logger: quiet });

        const taskDir: string = await client.task_fetch(12, dest);

        expect(taskDir).toBe(path.join(dest, 'task_12'));
        expect(fs.readFileSync(path.join(taskDir, 'images', 'x.png'), 'utf-8')).toBe('png-bytes');
        expect(fs.readFileSync(path.join(taskDir, 'images', 'x.xml'), 'utf-8')).toBe('<annotation/>');
        expect(fs.existsSync(path.join(taskDir, 'dataset.zip'))).toBe(false);

        expect(calls).toHaveLength(1);
        expect(calls[0].init.method).toBe('GET');
        expect(calls[0].init.headers).toEqual({ Authorization: 'Bearer test-secret' });
        expect(calls[0].url).toContain('format=LabelMe+3.0');
    });

    it('keeps a slow transfer alive while chunks keep arriving', async (): Promise<void> => {
        const chunks: Uint8Array[] = chunks_split(archive_make(), 12);
        const { fetch } = fetch_stub(response_make(200, body_stream(chunks, 50)));
        const client = new CvatClient({ apiUrl: 'https://cvat.example.test', auth: 'x', fetch, logger: quiet });

        const taskDir: string = await client.task_fetch(21, dest, 'LabelMe 3.0', { timeoutMs: 300 });

        expect(chunks.length).toBeGreaterThan(6);
        expect(fs.readFileSync(path.join(taskDir, 'images', 'x.png'), 'utf-8')).toBe('png-bytes');
    });

    it('gives up when the body goes silent', async (): Promise<void> => {
        const silent = new ReadableStream<Uint8Array>({
            start(controller): void {
                controller.enqueue(new Uint8Array([0x50, 0x4b]));
            },
            pull(): Promise<void> {
                return new Promise<void>((): void => {});
            },
        });
        const { fetch } = fetch_stub(response_make(200, silent));
        const client = new CvatClient({ apiUrl: 'https://cvat.example.test', auth: 'x', fetch, logger: quiet });

        const failure = client.task_fetch(22, dest, 'LabelMe 3.0', { timeoutMs: 100 });
        await expect(failure).rejects.toThrow(TransferError);
        await expect(failure).rejects.toThrow('Download stalled: no data received for 100 ms');
    });

    it('passes an abort signal to fetch', async (): Promise<void> => {
        const { fetch, calls } = fetch_stub(response_make(200, archive_make()));
        const client = new CvatClient({ apiUrl: 'https://cvat.example.test', auth: 'x', fetch, logger: quiet });
        await client.task_fetch(23, dest);
        expect(calls[0].init.signal.aborted).toBe(false);
    });

    it('maps 404 to TaskNotFoundError', async (): Promise<void> => {
        const { fetch } = fetch_stub(response_make(404));
        const client = new CvatClient({ apiUrl: 'https://cvat.example.test', auth: 'x', fetch, logger: quiet });
        await expect(client.task_fetch(99, dest)).rejects.toThrow(TaskNotFoundError);
        await expect(client.task_fetch(99, dest)).rejects.toThrow('Task 99 not found');
    });

    it('maps 401 to AuthenticationError', async (): Promise<void> => {
        const { fetch } = fetch_stub(response_make(401));
        const client = new CvatClient({ apiUrl: 'https://cvat.example.test', auth: 'x', fetch, logger: quiet });
        await expect(client.task_fetch(1, dest)).rejects.toThrow(AuthenticationError);
    });

    it('maps other HTTP failures to TransferError', async (): Promise<void> => {
        const { fetch } = fetch_stub(response_make(500, Buffer.alloc(0), 'Internal Server Error'));
        const client = new CvatClient({ apiUrl: 'https://cvat.example.test', auth: 'x', fetch, logger: quiet });
        await expect(client.task_fetch(3, dest)).rejects.toThrow(
            'Failed to download dataset for task 3: HTTP 500 Internal Server Error',
        );
    });

    it('maps network errors to TransferError', async (): Promise<void> => {
        const { fetch } = fetch_stub(new Error('connection refused'));
        const client = new CvatClient({ apiUrl: 'https://cvat.example.test', auth: 'x', fetch, logger: quiet });
        await expect(client.task_fetch(3, dest)).rejects.toThrow(TransferError);
    });

    it('rejects a body that is not a ZIP archive', async (): Promise<void> => {
        const { fetch } = fetch_stub(response_make(200, Buffer.from('not a zip')));
        const client = new CvatClient({ apiUrl: 'https://cvat.example.test', auth: 'x', fetch, logger: quiet });
        const failure = client.task_fetch(4, dest);
        await expect(failure).rejects.toThrow(TransferError);
        await expect(failure).rejects.toThrow(/^Invalid ZIP file downloaded/);
    });

    it('shares a common base class across error kinds', (): void => {
        expect(new TaskNotFoundError('a')).toBeInstanceOf(CvatError);
        expect(new AuthenticationError('a').name).toBe('AuthenticationError');
    });
});
