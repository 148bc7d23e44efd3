import type { Entity } from '../model/entity.js';
import type { SearchKey } from '../model/search-key.js';

/**
 * An entity proposed for a search key.
 */
export interface Candidate {
    entity: Entity;

    /** 0-based position in the generator's list for the key (0 = best) */
    rank: number;
}

/**
 * The ordered candidate list a generator returns for one search key.
 */
export interface SearchKeyCandidates {
    searchKey: SearchKey;
    candidates: Candidate[];
}

/**
 * A candidate with the two vectors compared by rank fusion.
 * Either vector may be missing.
 */
export interface CandidateEmbeddings {
    candidate: Candidate;
    contextEmbedding?: readonly number[] | null;
    abstractEmbedding?: readonly number[] | null;
}

/**
 * Fusion output. `distance` and `score` are null when the candidate
 * could not be scored.
 */
export interface ScoredCandidate {
    candidate: Candidate;
    originalRank: number;
    distance: number | null;
    score: number | null;
}
