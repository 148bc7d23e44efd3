import { join } from 'node:path';
import type { CacheConfig } from '../types/index.js';
import { SqliteAnnotationStore } from '../storage/sqlite-store.js';
import type { AnnotationStore } from './annotation-store.js';
import { FileAnnotationStore } from './file-store.js';

export const SQLITE_STORE_FILE = 'annotations.db';

/**
 * Open the annotation store selected by config.
 */
export function createAnnotationStore(config: CacheConfig): AnnotationStore {
    switch (config.backend) {
        case 'sqlite':
            return new SqliteAnnotationStore(join(config.dir, SQLITE_STORE_FILE));
        case 'file':
        default:
            return new FileAnnotationStore({ rootDir: config.dir });
    }
}
