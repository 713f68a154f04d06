/**
 * @file Dataset Error Taxonomy
 *
 * Every failure raised by the dataset core is a `DatasetBuildError`
 * tagged with one of four kinds. The CLI maps kinds to exit codes; the
 * core itself never recovers from any of them.
 *
 *   validation   a value or name has the wrong shape
 *   conflict     two things claim the same place (duplicates, non-empty target)
 *   consistency  two populations that must agree do not
 *   lookup       a required entry is absent from an explicit table
 *
 * @module dataset/errors
 */

export type ErrorKind = 'validation' | 'conflict' | 'consistency' | 'lookup';

export class DatasetBuildError extends Error {
    constructor(message: string, public readonly kind: ErrorKind) {
        super(message);
        this.name = new.target.name;
    }
}

// ─── Validation ─────────────────────────────────────────────────

export class RecordMismatchError extends DatasetBuildError {
    constructor(public readonly imagePath: string, public readonly annotationPath: string) {
        super(`Image and annotation names do not match: ${imagePath} ${annotationPath}`, 'validation');
    }
}

export class IdentityFormatError extends DatasetBuildError {
    constructor(public readonly stem: string) {
        super(
            `Stem does not match RG<9 digits>...-+<8 digits>-+<front|back>_laser: '${stem}'`,
            'validation',
        );
    }
}

export class SplitRatioError extends DatasetBuildError {
    constructor(message: string) {
        super(message, 'validation');
    }
}

export class InvalidTaskNameError extends DatasetBuildError {
    constructor(public readonly taskName: string, public readonly imagePath: string) {
        super(`Invalid task name: '${taskName}' for ${imagePath}`, 'validation');
    }
}

export class RawDirectoryMissingError extends DatasetBuildError {
    constructor(public readonly directory: string) {
        super(`Raw export directory does not exist: ${directory}`, 'validation');
    }
}

// ─── Conflict ───────────────────────────────────────────────────

export class DuplicateFilesError extends DatasetBuildError {
    constructor(public readonly population: 'images' | 'annotations', public readonly groups: string[][]) {
        const listing: string = groups.map((group: string[]): string => `[${group.join(', ')}]`).join('; ');
        super(`Duplicate ${population} found: ${listing}`, 'conflict');
    }
}

export class DuplicatePlanError extends DatasetBuildError {
    constructor(public readonly collisions: string[]) {
        super(`Duplicate record plans: ${collisions.join('; ')}`, 'conflict');
    }
}

export class DirectoryNotEmptyError extends DatasetBuildError {
    constructor(public readonly directory: string) {
        super(
            `Directory is not empty: ${directory}\n` +
            'Refusing to build into a non-empty directory.\n' +
            'Delete it explicitly or use a new dataset root.',
            'conflict',
        );
    }
}

export class ManifestConflictError extends DatasetBuildError {
    constructor(public readonly stem: string, public readonly manifests: string[]) {
        super(`Stem '${stem}' is listed more than once: ${manifests.join(', ')}`, 'conflict');
    }
}

// ─── Consistency ────────────────────────────────────────────────

export class StemMismatchError extends DatasetBuildError {
    constructor(public readonly missingImages: string[], public readonly missingAnnotations: string[]) {
        super(
            'Mismatched images/annotations. ' +
            `Missing images: [${missingImages.join(', ')}], ` +
            `Missing annotations: [${missingAnnotations.join(', ')}]`,
            'consistency',
        );
    }
}

export class SplitPartitionError extends DatasetBuildError {
    constructor(public readonly assigned: number, public readonly expected: number) {
        super(
            `The sums of the splits are not equal to the total number of records: ${assigned} != ${expected}`,
            'consistency',
        );
    }
}

// ─── Lookup ─────────────────────────────────────────────────────

export class SplitLookupError extends DatasetBuildError {
    constructor(public readonly stem: string) {
        super(`No split assignment for stem '${stem}'`, 'lookup');
    }
}
