import {
    existsSync,
    linkSync,
    mkdirSync,
    readdirSync,
    readFileSync,
    rmSync,
    statSync,
    writeFileSync,
} from 'node:fs';
import { dirname, join } from 'node:path';
import { randomUUID } from 'node:crypto';
import { getLogger } from '../utils/logger.js';
import {
    AnnotationStoreError,
    cacheKeyPath,
    type AnnotationCacheKey,
    type AnnotationStore,
    type AnnotationStoreStats,
} from './annotation-store.js';

const ARTIFACT_EXT = '.json';

function isErrnoException(error: unknown): error is NodeJS.ErrnoException {
    return error instanceof Error && 'code' in error;
}

/**
 * File-system annotation store.
 *
 * One JSON artifact per key at `<rootDir>/annotations/<dataset>/<generator>/<table>.json`.
 * Writes go to a unique temp file that is then hard-linked into place;
 * `link` fails if the target exists, so an entry appears complete or not at all
 * and is never overwritten.
 */
export class FileAnnotationStore implements AnnotationStore {
    private readonly rootDir: string;

    constructor(options: { rootDir?: string } = {}) {
        this.rootDir = options.rootDir ?? '.cellink-cache';
        mkdirSync(this.rootDir, { recursive: true });
        getLogger().debug({ rootDir: this.rootDir }, 'File annotation store initialized');
    }

    /**
     * Absolute-or-relative file path of an artifact.
     */
    pathFor(key: AnnotationCacheKey): string {
        return join(this.rootDir, `${cacheKeyPath(key)}${ARTIFACT_EXT}`);
    }

    get(key: AnnotationCacheKey): string | null {
        const filePath = this.pathFor(key);
        if (!existsSync(filePath)) return null;

        try {
            const blob = readFileSync(filePath, 'utf-8');
            getLogger().debug({ ...key }, 'Annotation cache hit');
            return blob;
        } catch (error) {
            throw new AnnotationStoreError(`Failed to read cached annotations at ${filePath}`, { cause: error });
        }
    }

    has(key: AnnotationCacheKey): boolean {
        return existsSync(this.pathFor(key));
    }

    putIfAbsent(key: AnnotationCacheKey, blob: string): boolean {
        const filePath = this.pathFor(key);
        if (existsSync(filePath)) return false;

        mkdirSync(dirname(filePath), { recursive: true });
        const tmpPath = `${filePath}.${process.pid}.${randomUUID()}.tmp`;

        try {
            writeFileSync(tmpPath, blob, 'utf-8');
            linkSync(tmpPath, filePath);
            getLogger().debug({ ...key }, 'Annotations stored');
            return true;
        } catch (error) {
            if (isErrnoException(error) && error.code === 'EEXIST') {
                getLogger().debug({ ...key }, 'Annotations already stored by another writer');
                return false;
            }
            throw new AnnotationStoreError(`Failed to store annotations at ${filePath}`, { cause: error });
        } finally {
            rmSync(tmpPath, { force: true });
        }
    }

    stats(): AnnotationStoreStats {
        let entries = 0;
        let bytes = 0;

        const walk = (dir: string): void => {
            if (!existsSync(dir)) return;
            for (const entry of readdirSync(dir, { withFileTypes: true })) {
                const path = join(dir, entry.name);
                if (entry.isDirectory()) {
                    walk(path);
                } else if (entry.name.endsWith(ARTIFACT_EXT)) {
                    entries += 1;
                    bytes += statSync(path).size;
                }
            }
        };

        walk(join(this.rootDir, 'annotations'));
        return { backend: 'file', location: this.rootDir, entries, bytes };
    }

    clear(): void {
        rmSync(join(this.rootDir, 'annotations'), { recursive: true, force: true });
        getLogger().info({ rootDir: this.rootDir }, 'File annotation store cleared');
    }

    close(): void {
        // Nothing held open
    }
}
