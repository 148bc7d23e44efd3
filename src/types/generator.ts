import type { Table } from '../model/table.js';
import type { SearchKeyCandidates } from './candidate.js';

/**
 * A candidate generation backend (search index, SPARQL endpoint, embedding
 * re-ranker, ...). Each backend normalizes its results into ordered
 * candidate lists.
 */
export interface CandidateGenerator {
    /**
     * Stable identifier. Used as the cache namespace and as a path segment,
     * so two generators that can return different candidates need different ids.
     */
    readonly id: string;

    /**
     * Candidates for every search key of the table, best first.
     * A key may map to an empty list; keys must come from `table.getSearchKeys()`.
     */
    getCandidates(table: Table): Promise<SearchKeyCandidates[]>;
}

/**
 * Builds a fresh generator, with its own network clients, for one worker.
 */
export type GeneratorFactory = () => CandidateGenerator;
