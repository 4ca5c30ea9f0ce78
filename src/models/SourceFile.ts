/**
 * Data models produced by the walker and the signal extractor
 */

/**
 * A file yielded by the walker
 */
export interface FileDescriptor {
    absolutePath: string;
    /** Root-relative POSIX path */
    path: string;
    size: number;
    extension: string;
    mtimeMs: number;
}

/**
 * Where a file sits in the project, used to gate signal patterns
 */
export type FileContext = 'frontend' | 'backend' | 'shared' | 'test' | 'config';

export type ReferenceKind = 'import' | 're-export' | 'require' | 'dynamic-import';

/**
 * A module reference as written in source, before resolution
 */
export interface RawReference {
    specifier: string;
    kind: ReferenceKind;
}

export interface SignalMatch {
    category: string;
    value: string;
    file: string;
}

export interface RouteEntry {
    method: string;
    path: string;
    handler: string;
    file: string;
}

/**
 * `app.use('/prefix', router)` where router came from `specifier`
 */
export interface RouteMount {
    prefix: string;
    specifier: string;
}

export interface ModelRelationship {
    kind: string;
    target: string;
}

export interface DataModel {
    name: string;
    orm: string;
    fields: string[];
    relationships: ModelRelationship[];
    file: string;
}

/**
 * Everything extracted from a single file
 */
export interface FileExtraction {
    path: string;
    language: string;
    context: FileContext;
    lines: number;
    isTest: boolean;
    isBarrel: boolean;
    references: RawReference[];
    signals: SignalMatch[];
    routes: RouteEntry[];
    routeMounts: RouteMount[];
    models: DataModel[];
}
