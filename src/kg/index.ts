import type { KnowledgeGraphConfig } from '../types/index.js';
import type { HttpClient } from '../utils/http-client.js';
import { EntityEmbeddingClient, HttpTextEmbedder } from './embedding-client.js';
import { KnowledgeGraphClient } from './kg-client.js';
import { SparqlClient } from './sparql-client.js';

export function createKnowledgeGraphClient(config: KnowledgeGraphConfig, httpClient: HttpClient): KnowledgeGraphClient {
    const sparql = new SparqlClient({
        endpoint: config.sparqlEndpoint,
        defaultGraph: config.defaultGraph,
        httpClient,
    });
    return new KnowledgeGraphClient({ sparql, resourcePrefix: config.resourcePrefix });
}

export function createEntityEmbeddingClient(config: KnowledgeGraphConfig, httpClient: HttpClient): EntityEmbeddingClient {
    return new EntityEmbeddingClient({ endpoint: config.embeddingEndpoint, httpClient });
}

export function createTextEmbedder(config: KnowledgeGraphConfig, httpClient: HttpClient): HttpTextEmbedder {
    return new HttpTextEmbedder({ endpoint: config.textEmbedderEndpoint, httpClient });
}

export { KnowledgeGraphClient, PROPERTIES_BLACKLIST, TYPES_BLACKLIST, caseVariants } from './kg-client.js';
export type { RelationMatch } from './kg-client.js';
export { SparqlClient, sparqlIri, sparqlLiteral } from './sparql-client.js';
export type { SparqlBinding, SparqlTerm } from './sparql-client.js';
export { EntityEmbeddingClient, HttpTextEmbedder, EmbeddingResponseError } from './embedding-client.js';
export type { TextEmbedder, Vector } from './embedding-client.js';
