import { cosmiconfig } from 'cosmiconfig';
import { z } from 'zod';
import { DEFAULT_CONFIG, type CellinkConfig } from '../types/index.js';
import { getLogger } from './logger.js';

/**
 * Overrides accepted from CLI flags: any top-level field, nested objects partial.
 */
export type ConfigOverrides = Partial<Omit<CellinkConfig, 'searchKey' | 'fusion' | 'lookup' | 'kg' | 'cache'>> & {
    searchKey?: Partial<CellinkConfig['searchKey']>;
    fusion?: Partial<CellinkConfig['fusion']>;
    lookup?: Partial<CellinkConfig['lookup']>;
    kg?: Partial<CellinkConfig['kg']>;
    cache?: Partial<CellinkConfig['cache']>;
};

const ConfigFileSchema = z
    .object({
        datasetsDir: z.string(),
        dataset: z.string(),
        generator: z.enum(['lookup', 'sparql-label']),
        maxWorkers: z.number().int().positive(),
        failurePolicy: z.enum(['fail-fast', 'collect']),
        searchKey: z.object({ simplify: z.boolean() }).partial().strict(),
        fusion: z
            .object({
                enabled: z.boolean(),
                alpha: z.number().min(0).max(1),
                defaultScore: z.number().nonnegative(),
                abstractMaxTokens: z.number().int().positive(),
            })
            .partial()
            .strict(),
        lookup: z
            .object({ endpoint: z.string().url(), maxResults: z.number().int().positive() })
            .partial()
            .strict(),
        kg: z
            .object({
                sparqlEndpoint: z.string().url(),
                defaultGraph: z.string(),
                resourcePrefix: z.string(),
                embeddingEndpoint: z.string().url(),
                textEmbedderEndpoint: z.string().url(),
            })
            .partial()
            .strict(),
        cache: z.object({ backend: z.enum(['file', 'sqlite']), dir: z.string() }).partial().strict(),
        logLevel: z.enum(['error', 'warn', 'info', 'debug']),
        jsonLogs: z.boolean(),
    })
    .partial()
    .strict();

/**
 * Load configuration from cellink.config.json using cosmiconfig.
 * Returns null if no usable config file is found (defaults are used).
 */
export async function loadConfigFile(searchFrom?: string): Promise<ConfigOverrides | null> {
    const explorer = cosmiconfig('cellink', {
        searchPlaces: ['cellink.config.json'],
    });

    try {
        const result = await explorer.search(searchFrom);
        if (!result || result.isEmpty) return null;

        const parsed = ConfigFileSchema.safeParse(result.config);
        if (!parsed.success) {
            getLogger().warn(
                { path: result.filepath, issues: parsed.error.issues.map((i) => `${i.path.join('.')}: ${i.message}`) },
                'Invalid config file, using defaults'
            );
            return null;
        }

        getLogger().debug({ path: result.filepath }, 'Loaded config file');
        return parsed.data;
    } catch (error) {
        getLogger().warn({ error }, 'Failed to load config file, using defaults');
    }

    return null;
}

/**
 * Read relevant environment variables.
 */
export function loadEnvVars(env: NodeJS.ProcessEnv = process.env): ConfigOverrides {
    const config: ConfigOverrides = {};

    if (env['CELLINK_DATASETS_DIR']) config.datasetsDir = env['CELLINK_DATASETS_DIR'];
    if (env['CELLINK_CACHE_DIR']) config.cache = { dir: env['CELLINK_CACHE_DIR'] };
    if (env['CELLINK_LOOKUP_ENDPOINT']) config.lookup = { endpoint: env['CELLINK_LOOKUP_ENDPOINT'] };

    const kg: Partial<CellinkConfig['kg']> = {};
    if (env['CELLINK_SPARQL_ENDPOINT']) kg.sparqlEndpoint = env['CELLINK_SPARQL_ENDPOINT'];
    if (env['CELLINK_EMBEDDING_ENDPOINT']) kg.embeddingEndpoint = env['CELLINK_EMBEDDING_ENDPOINT'];
    if (env['CELLINK_TEXT_EMBEDDER_ENDPOINT']) kg.textEmbedderEndpoint = env['CELLINK_TEXT_EMBEDDER_ENDPOINT'];
    if (Object.keys(kg).length > 0) config.kg = kg;

    return config;
}

/**
 * Drop keys whose value is undefined, so they do not mask lower layers.
 */
function defined<T extends object>(value: T | null | undefined): Partial<T> {
    if (!value) return {};
    const result: Partial<T> = {};
    for (const key in value) {
        if (value[key] !== undefined) result[key] = value[key];
    }
    return result;
}

/**
 * Merge configuration layers.
 * Precedence: CLI flags > environment variables > config file > defaults;
 * nested objects are merged one level deep.
 */
export function mergeConfig(...layers: Array<ConfigOverrides | null | undefined>): CellinkConfig {
    let merged: CellinkConfig = { ...DEFAULT_CONFIG };

    for (const layer of layers) {
        if (!layer) continue;
        const { searchKey, fusion, lookup, kg, cache, ...flat } = layer;
        merged = {
            ...merged,
            ...defined(flat),
            searchKey: { ...merged.searchKey, ...defined(searchKey) },
            fusion: { ...merged.fusion, ...defined(fusion) },
            lookup: { ...merged.lookup, ...defined(lookup) },
            kg: { ...merged.kg, ...defined(kg) },
            cache: { ...merged.cache, ...defined(cache) },
        };
    }

    return merged;
}

export async function resolveConfig(cliFlags: ConfigOverrides): Promise<CellinkConfig> {
    const fileConfig = await loadConfigFile();
    const envConfig = loadEnvVars();
    return mergeConfig(fileConfig, envConfig, cliFlags);
}
