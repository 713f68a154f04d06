/**
 * @file Record
 *
 * The unit of data: one image paired with one annotation file by stem.
 *
 * @module dataset/record
 */

import path from 'path';
import { RecordMismatchError } from './errors.js';

/**
 * @property imagePath - Path to the image file
 * @property annotationPath - Path to the annotation file
 * @property stem - Shared file name without extension; join key of the pair
 */
export interface DatasetRecord {
    readonly imagePath: string;
    readonly annotationPath: string;
    readonly stem: string;
}

/** File name without its final extension (`a/b.c.png` → `b.c`). */
export function stem_of(filePath: string): string {
    const base: string = path.basename(filePath);
    const ext: string = path.extname(base);
    return ext ? base.slice(0, -ext.length) : base;
}

/**
 * Pair an image with its annotation.
 *
 * @throws RecordMismatchError when the two stems differ
 */
export function record_create(imagePath: string, annotationPath: string): DatasetRecord {
    const stem: string = stem_of(imagePath);
    if (stem_of(annotationPath) !== stem) {
        throw new RecordMismatchError(imagePath, annotationPath);
    }
    return Object.freeze({ imagePath, annotationPath, stem });
}
