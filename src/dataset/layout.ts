/**
 * @file Dataset Layout
 *
 * Path naming for a dataset repository:
 *
 *   <root>/
 *     cvat_raw/            raw exports, one task_<id>/ per task
 *     canonical/
 *       tasks.txt
 *       records/           flat copies of every image and annotation
 *       splits/            train.txt, val.txt, test.txt
 *
 * @module dataset/layout
 */

import path from 'path';

export interface DatasetLayout {
    readonly root: string;
    readonly cvatRaw: string;
    readonly canonical: string;
    readonly records: string;
    readonly splits: string;
}

export function layout_create(root: string): DatasetLayout {
    const canonical: string = path.join(root, 'canonical');
    return Object.freeze({
        root,
        cvatRaw: path.join(root, 'cvat_raw'),
        canonical,
        records: path.join(canonical, 'records'),
        splits: path.join(canonical, 'splits'),
    });
}
