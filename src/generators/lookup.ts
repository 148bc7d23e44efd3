import { Entity, uniqueEntities } from '../model/entity.js';
import type { Table } from '../model/table.js';
import type { CandidateGenerator, SearchKeyCandidates } from '../types/index.js';
import { HttpClient } from '../utils/http-client.js';
import { getLogger } from '../utils/logger.js';

/**
 * DBpedia Lookup response (subset of relevant fields).
 * Every field of a doc is an array, even single values.
 */
interface LookupDoc {
    resource?: string[];
    label?: string[];
    score?: string[];
}

interface LookupResponse {
    docs?: LookupDoc[];
}

export interface LookupGeneratorOptions {
    endpoint: string;
    maxResults?: number;
    httpClient?: HttpClient;
}

/**
 * Candidates from a DBpedia Lookup search index, in the service's order.
 *
 * @see https://github.com/dbpedia/dbpedia-lookup
 */
export class LookupGenerator implements CandidateGenerator {
    /** `maxResults` changes the candidate lists, so it is part of the id */
    readonly id: string;
    private readonly endpoint: string;
    private readonly maxResults: number;
    private httpClient: HttpClient;

    constructor(options: LookupGeneratorOptions) {
        this.endpoint = options.endpoint;
        this.maxResults = options.maxResults ?? 10;
        this.id = `lookup-k${this.maxResults}`;
        this.httpClient = options.httpClient ?? new HttpClient();
    }

    /**
     * For dependency injection in tests.
     */
    setHttpClient(client: HttpClient): void {
        this.httpClient = client;
    }

    async search(searchKey: string): Promise<Entity[]> {
        const response = await this.httpClient.get<LookupResponse>(this.endpoint, {
            source: 'lookup',
            query: { query: searchKey, maxResults: this.maxResults, format: 'JSON' },
        });

        const docs = Array.isArray(response.data.docs) ? response.data.docs : [];
        const entities = docs.flatMap((doc) => doc.resource ?? []).map((uri) => new Entity(uri));
        return uniqueEntities(entities);
    }

    async getCandidates(table: Table): Promise<SearchKeyCandidates[]> {
        const results: SearchKeyCandidates[] = [];

        for (const searchKey of table.getSearchKeys()) {
            const entities = await this.search(searchKey);
            results.push({
                searchKey,
                candidates: entities.map((entity, rank) => ({ entity, rank })),
            });
        }

        getLogger().debug({ tableId: table.id, keys: results.length }, 'Lookup candidates fetched');
        return results;
    }
}
