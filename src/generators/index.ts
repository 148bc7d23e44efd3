import { createKnowledgeGraphClient, createTextEmbedder } from '../kg/index.js';
import type { CandidateGenerator, CellinkConfig, GeneratorFactory } from '../types/index.js';
import { HttpClient } from '../utils/http-client.js';
import { VERSION } from '../version.js';
import { EmbeddingFusionGenerator } from './embedding-fusion.js';
import { LookupGenerator } from './lookup.js';
import { SparqlLabelGenerator } from './sparql-label.js';

export type GeneratorConfig = Pick<CellinkConfig, 'generator' | 'fusion' | 'lookup' | 'kg'>;

function createBaseGenerator(config: GeneratorConfig, httpClient: HttpClient): CandidateGenerator {
    switch (config.generator) {
        case 'lookup':
            return new LookupGenerator({
                endpoint: config.lookup.endpoint,
                maxResults: config.lookup.maxResults,
                httpClient,
            });
        case 'sparql-label':
            return new SparqlLabelGenerator({
                kg: createKnowledgeGraphClient(config.kg, httpClient),
                maxResults: config.lookup.maxResults,
            });
    }
}

/**
 * Factory for the configured generator. Every call builds a generator with
 * its own HTTP client (and so its own rate-limit budget).
 */
export function createGeneratorFactory(config: GeneratorConfig): GeneratorFactory {
    return () => {
        const httpClient = new HttpClient({ version: VERSION });

        const generator = createBaseGenerator(config, httpClient);

        if (!config.fusion.enabled) return generator;

        return new EmbeddingFusionGenerator({
            base: generator,
            kg: createKnowledgeGraphClient(config.kg, httpClient),
            embedder: createTextEmbedder(config.kg, httpClient),
            alpha: config.fusion.alpha,
            defaultScore: config.fusion.defaultScore,
            abstractMaxTokens: config.fusion.abstractMaxTokens,
        });
    };
}

export { LookupGenerator } from './lookup.js';
export { SparqlLabelGenerator } from './sparql-label.js';
export { EmbeddingFusionGenerator, fusionGeneratorId, cutAbstract } from './embedding-fusion.js';
