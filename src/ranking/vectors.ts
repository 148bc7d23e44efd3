/**
 * Compute cosine similarity between two dense vectors of equal length.
 * Returns null when either vector has zero norm (no direction to compare).
 */
export function cosineSimilarity(vecA: readonly number[], vecB: readonly number[]): number | null {
    if (vecA.length !== vecB.length) {
        throw new RangeError(`Vector length mismatch: ${vecA.length} vs ${vecB.length}`);
    }

    let dotProduct = 0;
    let normA = 0;
    let normB = 0;

    vecA.forEach((a, i) => {
        const b = vecB[i] ?? 0;
        dotProduct += a * b;
        normA += a * a;
        normB += b * b;
    });

    const denominator = Math.sqrt(normA) * Math.sqrt(normB);
    if (denominator === 0) return null;

    // Clamp rounding drift so identical vectors give exactly 1
    return Math.max(-1, Math.min(1, dotProduct / denominator));
}

/**
 * Cosine distance = 1 - cosine similarity, in [0, 2].
 */
export function cosineDistance(vecA: readonly number[], vecB: readonly number[]): number | null {
    const similarity = cosineSimilarity(vecA, vecB);
    return similarity === null ? null : 1 - similarity;
}

/**
 * Min-max scale `value` into [0, 1] over `[min, max]`.
 * A zero-width range maps every value to 0.
 */
export function minMaxScale(value: number, min: number, max: number): number {
    const range = max - min;
    if (range <= 0) return 0;
    return (value - min) / range;
}
