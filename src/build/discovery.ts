/**
 * @file Dataset Discovery
 *
 * Scans a raw export tree and pairs images with annotations by stem.
 *
 * Expected layout:
 *
 *   <rawRoot>/task_<id>/<subdir>/<stem>.png
 *   <rawRoot>/task_<id>/<subdir>/<stem>.xml
 *
 * The owning task is the image's grand-parent directory, or its parent
 * when the export is flat (`task_<id>/<stem>.png`). Discovery is
 * all-or-nothing: the first violation aborts with no partial result.
 *
 * @module build/discovery
 */

import fs from 'fs';
import path from 'path';
import { record_create, stem_of, type DatasetRecord } from '../dataset/record.js';
import {
    DuplicateFilesError,
    InvalidTaskNameError,
    RawDirectoryMissingError,
    StemMismatchError,
} from '../dataset/errors.js';

export const TASK_PREFIX: string = 'task_';

export interface DiscoveryOptions {
    imageExtension?: string;
    annotationExtension?: string;
}

/**
 * @property records - Paired records in sorted image-path order
 * @property tasks - Distinct task names in first-seen order
 */
export interface DiscoveryResult {
    records: DatasetRecord[];
    tasks: string[];
}

/**
 * Recursively list files under `root` whose extension matches `extension`
 * (case-sensitive), sorted by path.
 */
export function files_find(root: string, extension: string): string[] {
    const found: string[] = [];
    const stack: string[] = [root];
    while (stack.length > 0) {
        const dir: string | undefined = stack.pop();
        if (dir === undefined) break;
        for (const entry of fs.readdirSync(dir, { withFileTypes: true })) {
            const full: string = path.join(dir, entry.name);
            if (entry.isDirectory()) {
                stack.push(full);
            } else if (entry.isFile() && path.extname(entry.name) === extension) {
                found.push(full);
            }
        }
    }
    return found.sort();
}

/**
 * Group paths by stem, returning every group that holds more than one path.
 */
export function duplicateStems_find(paths: readonly string[]): string[][] {
    const byStem = new Map<string, string[]>();
    for (const filePath of paths) {
        const stem: string = stem_of(filePath);
        const group: string[] = byStem.get(stem) ?? [];
        group.push(filePath);
        byStem.set(stem, group);
    }
    return Array.from(byStem.values()).filter((group: string[]): boolean => group.length > 1);
}

/**
 * Name of the task directory that owns `imagePath`.
 *
 * @throws InvalidTaskNameError when neither candidate starts with `task_`
 */
export function taskName_resolve(imagePath: string): string {
    const parent: string = path.dirname(imagePath);
    const grandParentName: string = path.basename(path.dirname(parent));
    if (grandParentName.startsWith(TASK_PREFIX)) return grandParentName;

    const parentName: string = path.basename(parent);
    if (parentName.startsWith(TASK_PREFIX)) return parentName;

    throw new InvalidTaskNameError(grandParentName, imagePath);
}

function stemMap_build(paths: readonly string[]): Map<string, string> {
    return new Map(paths.map((p: string): [string, string] => [stem_of(p), p]));
}

/**
 * Discover every image/annotation pair under `rawRoot`.
 *
 * @throws RawDirectoryMissingError, DuplicateFilesError, StemMismatchError,
 *   InvalidTaskNameError
 */
export function records_discover(rawRoot: string, options: DiscoveryOptions = {}): DiscoveryResult {
    const imageExtension: string = options.imageExtension ?? '.png';
    const annotationExtension: string = options.annotationExtension ?? '.xml';

    if (!fs.existsSync(rawRoot) || !fs.statSync(rawRoot).isDirectory()) {
        throw new RawDirectoryMissingError(rawRoot);
    }

    const imagePaths: string[] = files_find(rawRoot, imageExtension);
    const annotationPaths: string[] = files_find(rawRoot, annotationExtension);

    const duplicateImages: string[][] = duplicateStems_find(imagePaths);
    if (duplicateImages.length > 0) {
        throw new DuplicateFilesError('images', duplicateImages);
    }
    const duplicateAnnotations: string[][] = duplicateStems_find(annotationPaths);
    if (duplicateAnnotations.length > 0) {
        throw new DuplicateFilesError('annotations', duplicateAnnotations);
    }

    const stemToImage: Map<string, string> = stemMap_build(imagePaths);
    const stemToAnnotation: Map<string, string> = stemMap_build(annotationPaths);

    const missingImages: string[] = [...stemToAnnotation.keys()].filter((s: string): boolean => !stemToImage.has(s)).sort();
    const missingAnnotations: string[] = [...stemToImage.keys()].filter((s: string): boolean => !stemToAnnotation.has(s)).sort();
    if (missingImages.length > 0 || missingAnnotations.length > 0) {
        throw new StemMismatchError(missingImages, missingAnnotations);
    }

    const records: DatasetRecord[] = [];
    const tasks = new Set<string>();
    for (const [stem, imagePath] of stemToImage) {
        const annotationPath: string | undefined = stemToAnnotation.get(stem);
        if (annotationPath === undefined) {
            throw new StemMismatchError([], [stem]);
        }
        records.push(record_create(imagePath, annotationPath));
        tasks.add(taskName_resolve(imagePath));
    }

    return { records, tasks: [...tasks] };
}
