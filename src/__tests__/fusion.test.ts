import { describe, it, expect } from 'vitest';
import { Entity } from '../model/entity.js';
import { fuseRanking, FusionContractError } from '../ranking/fusion.js';
import { cosineDistance, cosineSimilarity, minMaxScale } from '../ranking/vectors.js';
import type { CandidateEmbeddings } from '../types/index.js';

function candidate(name: string, rank: number) {
    return { entity: new Entity(`http://kg.test/${name}`), rank };
}

function names(result: ReturnType<typeof fuseRanking>): string[] {
    return result.map((s) => s.candidate.entity.uri.replace('http://kg.test/', ''));
}

const CONTEXT = [1, 0];

/** distances to CONTEXT: c0 = 1, c1 = 0, c2 = 1 - 1/√2 */
const THREE: CandidateEmbeddings[] = [
    { candidate: candidate('c0', 0), contextEmbedding: CONTEXT, abstractEmbedding: [0, 1] },
    { candidate: candidate('c1', 1), contextEmbedding: CONTEXT, abstractEmbedding: [1, 0] },
    { candidate: candidate('c2', 2), contextEmbedding: CONTEXT, abstractEmbedding: [1, 1] },
];

describe('vectors', () => {
    it('should compute cosine similarity and distance', () => {
        expect(cosineSimilarity([1, 0], [1, 0])).toBe(1);
        expect(cosineSimilarity([1, 0], [0, 1])).toBe(0);
        expect(cosineDistance([1, 0], [-1, 0])).toBe(2);
        expect(cosineDistance([1, 1], [1, 0])).toBeCloseTo(1 - Math.SQRT1_2, 10);
    });

    it('should return null for zero-norm vectors', () => {
        expect(cosineSimilarity([0, 0], [1, 0])).toBeNull();
        expect(cosineDistance([1, 0], [0, 0])).toBeNull();
    });

    it('should throw on length mismatch', () => {
        expect(() => cosineSimilarity([1, 0], [1, 0, 0])).toThrow(RangeError);
    });

    it('should map a zero-width range to 0', () => {
        expect(minMaxScale(3, 3, 3)).toBe(0);
        expect(minMaxScale(2, 0, 4)).toBe(0.5);
    });
});

describe('fuseRanking', () => {
    it('should combine rank and distance with equal weights', () => {
        const result = fuseRanking(THREE, { alpha: 0.5 });

        expect(names(result)).toEqual(['c1', 'c0', 'c2']);
        expect(result[0]?.score).toBeCloseTo(0.25, 10);
        expect(result[1]?.score).toBeCloseTo(0.5, 10);
        expect(result[2]?.score).toBeCloseTo(0.5 + 0.5 * (1 - Math.SQRT1_2), 10);
        expect(result.map((s) => s.originalRank)).toEqual([1, 0, 2]);
    });

    it('should rank by distance only when alpha is 0', () => {
        expect(names(fuseRanking(THREE, { alpha: 0 }))).toEqual(['c1', 'c2', 'c0']);
    });

    it('should keep the original order when alpha is 1', () => {
        expect(names(fuseRanking(THREE, { alpha: 1 }))).toEqual(['c0', 'c1', 'c2']);
    });

    it('should default alpha to 0.5', () => {
        expect(names(fuseRanking(THREE))).toEqual(['c1', 'c0', 'c2']);
    });

    it('should interleave candidates scored with defaultScore', () => {
        const input: CandidateEmbeddings[] = [
            { candidate: candidate('c0', 0), contextEmbedding: CONTEXT, abstractEmbedding: null },
            { candidate: candidate('c1', 1), contextEmbedding: CONTEXT, abstractEmbedding: [1, 0] },
            { candidate: candidate('c2', 2), contextEmbedding: CONTEXT, abstractEmbedding: [0, 1] },
            { candidate: candidate('c3', 3), contextEmbedding: CONTEXT, abstractEmbedding: [1, 1] },
        ];

        const result = fuseRanking(input, { alpha: 0.2, defaultScore: 0.9 });

        expect(names(result)).toEqual(['c1', 'c3', 'c0', 'c2']);
        expect(result[0]?.score).toBeCloseTo(0.2 / 3, 10);
        expect(result[1]?.score).toBeCloseTo(0.2 + 0.8 * (1 - Math.SQRT1_2), 10);
        expect(result[2]?.score).toBe(0.9);
        expect(result[2]?.distance).toBeNull();
        expect(result[3]?.score).toBeCloseTo(0.2 * (2 / 3) + 0.8, 10);
    });

    it('should push candidates without embeddings last when there is no default', () => {
        const input: CandidateEmbeddings[] = [
            { candidate: candidate('c0', 0) },
            { candidate: candidate('c1', 1), contextEmbedding: CONTEXT, abstractEmbedding: [1, 0] },
            { candidate: candidate('c2', 2), contextEmbedding: CONTEXT, abstractEmbedding: [0, 1] },
            { candidate: candidate('c3', 3), contextEmbedding: CONTEXT, abstractEmbedding: [1, 1] },
        ];

        const result = fuseRanking(input, { alpha: 0.2 });

        expect(names(result)).toEqual(['c1', 'c3', 'c2', 'c0']);
        expect(result[3]?.score).toBeNull();
        expect(result[3]?.originalRank).toBe(0);
    });

    it('should accept a defaultScore of 0', () => {
        const input: CandidateEmbeddings[] = [
            { candidate: candidate('c0', 0), contextEmbedding: CONTEXT, abstractEmbedding: [0, 1] },
            { candidate: candidate('c1', 1) },
        ];

        const result = fuseRanking(input, { alpha: 0.5, defaultScore: 0 });

        // c0: 0.5 × 0 + 0.5 × 0 (single distance) = 0, ties keep input order
        expect(names(result)).toEqual(['c0', 'c1']);
        expect(result[1]?.score).toBe(0);
    });

    it('should return the input order unscored when nothing can be scored', () => {
        const input: CandidateEmbeddings[] = [
            { candidate: candidate('a', 0), contextEmbedding: null, abstractEmbedding: [1, 0] },
            { candidate: candidate('b', 1), contextEmbedding: [1, 0] },
            { candidate: candidate('c', 2) },
        ];

        const result = fuseRanking(input, { alpha: 0.3 });

        expect(names(result)).toEqual(['a', 'b', 'c']);
        expect(result.every((s) => s.score === null && s.distance === null)).toBe(true);
    });

    it('should treat zero-norm vectors as missing', () => {
        const input: CandidateEmbeddings[] = [
            { candidate: candidate('zero', 0), contextEmbedding: [0, 0], abstractEmbedding: [1, 0] },
            { candidate: candidate('ok', 1), contextEmbedding: [1, 0], abstractEmbedding: [1, 0] },
        ];

        const result = fuseRanking(input);

        expect(names(result)).toEqual(['ok', 'zero']);
        expect(result[1]?.score).toBeNull();
    });

    it('should return an empty list for no candidates', () => {
        expect(fuseRanking([])).toEqual([]);
    });

    it('should reject invalid parameters', () => {
        expect(() => fuseRanking(THREE, { alpha: 1.5 })).toThrow(FusionContractError);
        expect(() => fuseRanking(THREE, { alpha: Number.NaN })).toThrow(FusionContractError);
        expect(() => fuseRanking(THREE, { defaultScore: -1 })).toThrow(FusionContractError);
    });

    it('should reject vectors of different lengths', () => {
        const input: CandidateEmbeddings[] = [
            { candidate: candidate('c0', 0), contextEmbedding: [1, 0], abstractEmbedding: [1, 0, 0] },
        ];
        expect(() => fuseRanking(input)).toThrow(FusionContractError);
    });
});
