import { availableParallelism } from 'node:os';

/**
 * Log level options.
 */
export type LogLevel = 'error' | 'warn' | 'info' | 'debug';

/**
 * Built-in candidate generators.
 */
export type GeneratorName = 'lookup' | 'sparql-label';

/**
 * What a dataset run does when a table fails.
 * - `fail-fast`: stop dispatching tables, let in-flight ones finish, then throw
 * - `collect`: attempt every table and report failures alongside results
 */
export type FailurePolicy = 'fail-fast' | 'collect';

export type CacheBackend = 'file' | 'sqlite';

/**
 * Embedding re-ranking of generator candidates.
 */
export interface FusionConfig {
    enabled: boolean;
    /** Weight of the original rank; 1 - alpha weighs the embedding distance */
    alpha: number;
    /** Score given to candidates without embeddings; unset pushes them last */
    defaultScore?: number;
    /** Truncate candidate abstracts to this many tokens before embedding */
    abstractMaxTokens?: number;
}

export interface CacheConfig {
    backend: CacheBackend;
    dir: string;
}

export interface LookupConfig {
    endpoint: string;
    maxResults: number;
}

export interface KnowledgeGraphConfig {
    sparqlEndpoint: string;
    defaultGraph?: string;
    /** Namespace label search is restricted to */
    resourcePrefix?: string;
    /** Entity-vector service (e.g. RDF2Vec) */
    embeddingEndpoint: string;
    /** Text-embedding service used for contexts and abstracts */
    textEmbedderEndpoint: string;
}

export interface SearchKeyConfig {
    simplify: boolean;
}

/**
 * Full configuration merged from CLI flags, env vars, and config file.
 */
export interface CellinkConfig {
    // Input
    datasetsDir: string;
    dataset?: string;

    // Annotation
    generator: GeneratorName;
    maxWorkers: number;
    failurePolicy: FailurePolicy;
    searchKey: SearchKeyConfig;
    fusion: FusionConfig;

    // Backends
    lookup: LookupConfig;
    kg: KnowledgeGraphConfig;

    // Cache
    cache: CacheConfig;

    // Logging
    logLevel: LogLevel;
    jsonLogs: boolean;
}

/**
 * Default configuration values.
 */
export const DEFAULT_CONFIG: CellinkConfig = {
    datasetsDir: './datasets',
    generator: 'lookup',
    maxWorkers: availableParallelism(),
    failurePolicy: 'fail-fast',
    searchKey: {
        simplify: false,
    },
    fusion: {
        enabled: false,
        alpha: 0.5,
    },
    lookup: {
        endpoint: 'https://lookup.dbpedia.org/api/search',
        maxResults: 10,
    },
    kg: {
        sparqlEndpoint: 'https://dbpedia.org/sparql',
        defaultGraph: 'http://dbpedia.org',
        resourcePrefix: 'http://dbpedia.org/resource/',
        embeddingEndpoint: 'http://localhost:5999/r2v/uniform',
        textEmbedderEndpoint: 'http://localhost:5997/embed',
    },
    cache: {
        backend: 'file',
        dir: '.cellink-cache',
    },
    logLevel: 'info',
    jsonLogs: false,
};
