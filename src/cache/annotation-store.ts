/**
 * Identifies one annotated-table artifact.
 */
export interface AnnotationCacheKey {
    datasetId: string;
    generatorId: string;
    tableId: string;
}

export interface AnnotationStoreStats {
    backend: 'file' | 'sqlite';
    location: string;
    entries: number;
    bytes: number;
}

/**
 * Write-once key-value store for annotated tables.
 *
 * An entry's presence is its commit marker: `putIfAbsent` never replaces an
 * existing entry, and concurrent writers of one key leave exactly one
 * complete artifact behind.
 */
export interface AnnotationStore {
    get(key: AnnotationCacheKey): string | null;
    has(key: AnnotationCacheKey): boolean;

    /**
     * Store `blob` unless the key already has an entry.
     * @returns true if this call committed the entry
     */
    putIfAbsent(key: AnnotationCacheKey, blob: string): boolean;

    stats(): AnnotationStoreStats;

    /** Remove every entry */
    clear(): void;

    close(): void;
}

export class AnnotationStoreError extends Error {
    constructor(message: string, options?: { cause?: unknown }) {
        super(message, options);
        this.name = 'AnnotationStoreError';
    }
}

function checkSegment(name: string, value: string): string {
    if (!value || value === '.' || value === '..') {
        throw new AnnotationStoreError(`Invalid ${name} for cache key: "${value}"`);
    }
    return encodeURIComponent(value);
}

/**
 * Path segments of a cache key, URI-component encoded.
 */
export function cacheKeySegments(key: AnnotationCacheKey): [string, string, string] {
    return [
        checkSegment('dataset id', key.datasetId),
        checkSegment('generator id', key.generatorId),
        checkSegment('table id', key.tableId),
    ];
}

/**
 * @throws AnnotationStoreError when a segment is empty, `.` or `..`
 */
export function validateCacheKey(key: AnnotationCacheKey): void {
    cacheKeySegments(key);
}

/**
 * `annotations/<dataset_id>/<generator_id>/<table_id>`
 */
export function cacheKeyPath(key: AnnotationCacheKey): string {
    return ['annotations', ...cacheKeySegments(key)].join('/');
}
