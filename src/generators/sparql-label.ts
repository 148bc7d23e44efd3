import { Entity, uniqueEntities } from '../model/entity.js';
import type { Table } from '../model/table.js';
import type { KnowledgeGraphClient } from '../kg/kg-client.js';
import type { CandidateGenerator, SearchKeyCandidates } from '../types/index.js';
import { getLogger } from '../utils/logger.js';

export interface SparqlLabelGeneratorOptions {
    kg: KnowledgeGraphClient;
    maxResults?: number;
}

/**
 * Candidates whose `rdfs:label` equals the search key up to letter case.
 * Shorter URIs rank first, which tends to put the main resource ahead of
 * disambiguated ones ("Paris" before "Paris,_Texas").
 */
export class SparqlLabelGenerator implements CandidateGenerator {
    /** `maxResults` changes the candidate lists, so it is part of the id */
    readonly id: string;
    private readonly kg: KnowledgeGraphClient;
    private readonly maxResults: number;

    constructor(options: SparqlLabelGeneratorOptions) {
        this.kg = options.kg;
        this.maxResults = options.maxResults ?? 10;
        this.id = `sparql-label-k${this.maxResults}`;
    }

    async getCandidates(table: Table): Promise<SearchKeyCandidates[]> {
        const results: SearchKeyCandidates[] = [];

        for (const searchKey of table.getSearchKeys()) {
            const uris = await this.kg.findByLabel(searchKey, this.maxResults);
            const entities = uniqueEntities(uris.map((uri) => new Entity(uri)));
            results.push({
                searchKey,
                candidates: entities.map((entity, rank) => ({ entity, rank })),
            });
        }

        getLogger().debug({ tableId: table.id, keys: results.length }, 'SPARQL label candidates fetched');
        return results;
    }
}
