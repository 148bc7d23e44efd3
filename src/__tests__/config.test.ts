import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import fs from 'node:fs';
import path from 'node:path';
import { DEFAULT_CONFIG } from '../types/index.js';
import { loadConfigFile, loadEnvVars, mergeConfig } from '../utils/config.js';
import { makeTempDir, removeDir } from './helpers.js';

describe('mergeConfig', () => {
    it('should return the defaults without layers', () => {
        expect(mergeConfig()).toEqual(DEFAULT_CONFIG);
        expect(mergeConfig(null, undefined)).toEqual(DEFAULT_CONFIG);
    });

    it('should let later layers win, merging nested objects', () => {
        const merged = mergeConfig(
            { generator: 'sparql-label', maxWorkers: 2, fusion: { alpha: 0.3 } },
            { cache: { dir: '/env-cache' } },
            { maxWorkers: 8, fusion: { enabled: true } }
        );

        expect(merged.generator).toBe('sparql-label');
        expect(merged.maxWorkers).toBe(8);
        expect(merged.fusion).toEqual({ enabled: true, alpha: 0.3 });
        expect(merged.cache).toEqual({ backend: 'file', dir: '/env-cache' });
        expect(merged.lookup).toEqual(DEFAULT_CONFIG.lookup);
    });

    it('should not let undefined values mask lower layers', () => {
        const merged = mergeConfig(
            { generator: 'sparql-label', fusion: { alpha: 0.2 } },
            { generator: undefined, fusion: { alpha: undefined, enabled: true } }
        );

        expect(merged.generator).toBe('sparql-label');
        expect(merged.fusion).toEqual({ enabled: true, alpha: 0.2 });
    });

    it('should not modify the defaults', () => {
        mergeConfig({ kg: { sparqlEndpoint: 'http://sparql.test/sparql' } });
        expect(DEFAULT_CONFIG.kg.sparqlEndpoint).toBe('https://dbpedia.org/sparql');
    });
});

describe('loadEnvVars', () => {
    it('should read CELLINK_ variables', () => {
        expect(
            loadEnvVars({
                CELLINK_DATASETS_DIR: '/data',
                CELLINK_CACHE_DIR: '/cache',
                CELLINK_SPARQL_ENDPOINT: 'http://sparql.test/sparql',
                UNRELATED: 'x',
            })
        ).toEqual({
            datasetsDir: '/data',
            cache: { dir: '/cache' },
            kg: { sparqlEndpoint: 'http://sparql.test/sparql' },
        });
    });

    it('should ignore empty variables', () => {
        expect(loadEnvVars({ CELLINK_DATASETS_DIR: '' })).toEqual({});
    });
});

describe('loadConfigFile', () => {
    let dir: string;

    beforeEach(() => {
        dir = makeTempDir();
    });

    afterEach(() => {
        removeDir(dir);
    });

    function writeConfig(content: unknown): void {
        fs.writeFileSync(path.join(dir, 'cellink.config.json'), JSON.stringify(content), 'utf-8');
    }

    it('should load a valid file', async () => {
        writeConfig({ generator: 'sparql-label', fusion: { enabled: true, alpha: 0.4 } });

        expect(await loadConfigFile(dir)).toEqual({ generator: 'sparql-label', fusion: { enabled: true, alpha: 0.4 } });
    });

    it('should ignore a file with invalid values', async () => {
        writeConfig({ maxWorkers: 0 });
        expect(await loadConfigFile(dir)).toBeNull();
    });

    it('should ignore a file with unknown keys', async () => {
        writeConfig({ fusion: { alpha: 0.5, beta: 1 } });
        expect(await loadConfigFile(dir)).toBeNull();
    });

    it('should return null without a file', async () => {
        expect(await loadConfigFile(dir)).toBeNull();
    });
});
