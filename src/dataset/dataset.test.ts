import { describe, it, expect } from 'vitest';
import path from 'path';
import { record_create, stem_of } from './record.js';
import { layout_create } from './layout.js';
import { DatasetBuildError, RecordMismatchError, StemMismatchError, DuplicateFilesError } from './errors.js';

describe('dataset/record', (): void => {
    it('derives the stem from both paths', (): void => {
        const record = record_create('raw/task_1/images/x.png', 'raw/task_1/ann/x.xml');
        expect(record.stem).toBe('x');
        expect(record.imagePath).toBe('raw/task_1/images/x.png');
        expect(record.annotationPath).toBe('raw/task_1/ann/x.xml');
    });

    it('rejects a pair whose stems differ', (): void => {
        expect((): unknown => record_create('a.png', 'b.xml')).toThrow(RecordMismatchError);
    });

    it('is frozen', (): void => {
        const record = record_create('a.png', 'a.xml');
        expect(Object.isFrozen(record)).toBe(true);
    });

    it('strips only the final extension', (): void => {
        expect(stem_of('dir/scan.v2.png')).toBe('scan.v2');
        expect(stem_of('noext')).toBe('noext');
    });
});

describe('dataset/layout', (): void => {
    it('derives every subpath from the root', (): void => {
        const layout = layout_create('data');
        expect(layout.cvatRaw).toBe(path.join('data', 'cvat_raw'));
        expect(layout.canonical).toBe(path.join('data', 'canonical'));
        expect(layout.records).toBe(path.join('data', 'canonical', 'records'));
        expect(layout.splits).toBe(path.join('data', 'canonical', 'splits'));
    });
});

describe('dataset/errors', (): void => {
    it('tags errors with their kind and class name', (): void => {
        const error = new StemMismatchError(['a'], ['b', 'c']);
        expect(error).toBeInstanceOf(DatasetBuildError);
        expect(error.kind).toBe('consistency');
        expect(error.name).toBe('StemMismatchError');
        expect(error.message).toBe('Mismatched images/annotations. Missing images: [a], Missing annotations: [b, c]');
    });

    it('lists every duplicate group', (): void => {
        const error = new DuplicateFilesError('images', [['t1/x.png', 't2/x.png']]);
        expect(error.kind).toBe('conflict');
        expect(error.message).toBe('Duplicate images found: [t1/x.png, t2/x.png]');
    });
});
