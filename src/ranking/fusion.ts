import type { CandidateEmbeddings, ScoredCandidate } from '../types/index.js';
import { cosineDistance, minMaxScale } from './vectors.js';

/**
 * Invalid fusion parameters. Raised before any scoring happens.
 */
export class FusionContractError extends Error {
    constructor(message: string) {
        super(message);
        this.name = 'FusionContractError';
    }
}

export interface FusionOptions {
    /**
     * Weight of the original rank, in [0, 1]; `1 - alpha` weighs the
     * embedding distance. 1 keeps the generator order, 0 ranks by distance only.
     */
    alpha?: number;

    /**
     * Score (>= 0) for candidates missing an embedding. When unset they are
     * not scored and follow the ranked candidates in original order.
     */
    defaultScore?: number | null;
}

export const DEFAULT_ALPHA = 0.5;

function validateOptions(alpha: number, defaultScore: number | null): void {
    if (!Number.isFinite(alpha) || alpha < 0 || alpha > 1) {
        throw new FusionContractError(`alpha must be in [0, 1], got ${alpha}`);
    }
    if (defaultScore !== null && (!Number.isFinite(defaultScore) || defaultScore < 0)) {
        throw new FusionContractError(`defaultScore must be a number >= 0, got ${defaultScore}`);
    }
}

function usableVector(vec: readonly number[] | null | undefined): vec is readonly number[] {
    return vec !== null && vec !== undefined && vec.length > 0;
}

/**
 * Re-rank candidates by combining their original rank with the cosine
 * distance between their context and abstract embeddings.
 *
 * score = alpha × rank' + (1 − alpha) × distance'
 *
 * rank' is the original rank scaled over [0, n − 1] (n = all candidates);
 * distance' is scaled over the distances actually computed. Lower is better.
 * The sort is stable, so ties keep their original order.
 *
 * A candidate is scorable when both vectors are present and have a non-zero
 * norm. Unscorable candidates get `defaultScore` if one is given and compete
 * at that score; otherwise they are appended unscored in original order.
 * With no scorable candidate and no default, the input order is returned as is.
 *
 * @throws FusionContractError on invalid alpha/defaultScore or mismatched vector lengths
 */
export function fuseRanking(
    candidates: readonly CandidateEmbeddings[],
    options: FusionOptions = {}
): ScoredCandidate[] {
    const alpha = options.alpha ?? DEFAULT_ALPHA;
    const defaultScore = options.defaultScore ?? null;
    validateOptions(alpha, defaultScore);

    for (const { candidate, contextEmbedding, abstractEmbedding } of candidates) {
        if (
            usableVector(contextEmbedding) &&
            usableVector(abstractEmbedding) &&
            contextEmbedding.length !== abstractEmbedding.length
        ) {
            throw new FusionContractError(
                `Embedding length mismatch for ${candidate.entity.uri}: ` +
                `${contextEmbedding.length} vs ${abstractEmbedding.length}`
            );
        }
    }

    // Input order is kept throughout so the final sort breaks ties by original rank
    const ranked: ScoredCandidate[] = [];
    const unscored: ScoredCandidate[] = [];
    const distances: number[] = [];

    candidates.forEach(({ candidate, contextEmbedding, abstractEmbedding }, originalRank) => {
        const distance = usableVector(contextEmbedding) && usableVector(abstractEmbedding)
            ? cosineDistance(contextEmbedding, abstractEmbedding)
            : null;

        if (distance !== null) {
            distances.push(distance);
            ranked.push({ candidate, originalRank, distance, score: null });
        } else if (defaultScore !== null) {
            ranked.push({ candidate, originalRank, distance: null, score: defaultScore });
        } else {
            unscored.push({ candidate, originalRank, distance: null, score: null });
        }
    });

    if (distances.length === 0 && defaultScore === null) {
        return unscored;
    }

    const maxRank = candidates.length - 1;
    const minDistance = Math.min(...distances);
    const maxDistance = Math.max(...distances);

    const scored = ranked.map((entry) => {
        if (entry.distance === null) return entry;

        const score =
            alpha * minMaxScale(entry.originalRank, 0, maxRank) +
            (1 - alpha) * minMaxScale(entry.distance, minDistance, maxDistance);
        return { ...entry, score };
    });

    scored.sort((a, b) => (a.score ?? 0) - (b.score ?? 0));
    return [...scored, ...unscored];
}
