/**
 * cellink: cell-entity annotation of tables against a knowledge graph.
 */
export { Entity, normalizeEntityUri, uniqueEntities } from './model/entity.js';
export { normalizeSearchKey, simplifyLabel } from './model/search-key.js';
export type { SearchKey, SearchKeyOptions } from './model/search-key.js';
export { Table, cellKey } from './model/table.js';
export type { CellRef, CellAnnotation, ColumnRelation, TableInit } from './model/table.js';

export { fuseRanking, FusionContractError, DEFAULT_ALPHA } from './ranking/fusion.js';
export type { FusionOptions } from './ranking/fusion.js';
export { cosineDistance, cosineSimilarity } from './ranking/vectors.js';

export { annotationNamespace, TableAnnotator } from './annotator/table-annotator.js';
export { DatasetAnnotator, annotateDataset } from './annotator/dataset-annotator.js';
export type {
    AnnotationProgress,
    DatasetAnnotatorOptions,
    DatasetAnnotationResult,
} from './annotator/dataset-annotator.js';
export { GeneratorFailure, DatasetAnnotationError } from './annotator/errors.js';
export type { TableFailure } from './annotator/errors.js';

export { AnnotationStoreError, cacheKeyPath } from './cache/annotation-store.js';
export type { AnnotationCacheKey, AnnotationStore, AnnotationStoreStats } from './cache/annotation-store.js';
export { FileAnnotationStore } from './cache/file-store.js';
export { SqliteAnnotationStore } from './storage/sqlite-store.js';
export { createAnnotationStore } from './cache/index.js';
export { serializeTable, deserializeTable } from './cache/table-codec.js';

export {
    createGeneratorFactory,
    LookupGenerator,
    SparqlLabelGenerator,
    EmbeddingFusionGenerator,
} from './generators/index.js';

export {
    KnowledgeGraphClient,
    SparqlClient,
    EntityEmbeddingClient,
    HttpTextEmbedder,
    PROPERTIES_BLACKLIST,
    TYPES_BLACKLIST,
} from './kg/index.js';
export type { TextEmbedder, RelationMatch } from './kg/index.js';

export { CsvDataset, DatasetError, listDatasets } from './datasets/csv-dataset.js';
export { parseCsv, CsvParseError } from './datasets/csv.js';
export { scoreAnnotations } from './evaluation/scorer.js';
export type { CeaScores } from './evaluation/scorer.js';

export { resolveConfig, mergeConfig } from './utils/config.js';
export { HttpClient, HttpError } from './utils/http-client.js';
export { initLogger, getLogger } from './utils/logger.js';
export * from './types/index.js';
