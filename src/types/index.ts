/**
 * Barrel export for all shared types.
 */
export type {
    Candidate,
    SearchKeyCandidates,
    CandidateEmbeddings,
    ScoredCandidate,
} from './candidate.js';
export type { CandidateGenerator, GeneratorFactory } from './generator.js';
export type { Dataset } from './dataset.js';
export { DEFAULT_CONFIG } from './config.js';
export type {
    CellinkConfig,
    LogLevel,
    GeneratorName,
    FailurePolicy,
    CacheBackend,
    FusionConfig,
    CacheConfig,
    LookupConfig,
    KnowledgeGraphConfig,
    SearchKeyConfig,
} from './config.js';
