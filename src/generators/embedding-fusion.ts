import type { Table } from '../model/table.js';
import type { KnowledgeGraphClient } from '../kg/kg-client.js';
import type { TextEmbedder, Vector } from '../kg/embedding-client.js';
import { DEFAULT_ALPHA, fuseRanking } from '../ranking/fusion.js';
import type { CandidateEmbeddings, CandidateGenerator, SearchKeyCandidates } from '../types/index.js';
import { getLogger } from '../utils/logger.js';

export interface EmbeddingFusionOptions {
    base: CandidateGenerator;
    kg: KnowledgeGraphClient;
    embedder: TextEmbedder;
    alpha?: number;
    defaultScore?: number;
    /** Keep only the first N whitespace-separated tokens of each abstract */
    abstractMaxTokens?: number;
}

/**
 * `<base>+fusion-a<alpha>`, then `-d<defaultScore>` and `-t<maxTokens>` when set.
 */
export function fusionGeneratorId(
    baseId: string,
    alpha: number,
    defaultScore?: number,
    abstractMaxTokens?: number
): string {
    let id = `${baseId}+fusion-a${alpha}`;
    if (defaultScore !== undefined) id += `-d${defaultScore}`;
    if (abstractMaxTokens !== undefined) id += `-t${abstractMaxTokens}`;
    return id;
}

export function cutAbstract(abstract: string, maxTokens?: number): string {
    if (maxTokens === undefined) return abstract.trim();
    return abstract.split(/\s+/).filter(Boolean).slice(0, maxTokens).join(' ');
}

/**
 * Re-ranks a base generator's candidates by how close each candidate's
 * abstract is to the cell's context, with `fuseRanking`.
 *
 * The context of a key is the key itself followed by the other labels of the
 * row of its first cell. Candidates without an abstract get no abstract
 * embedding and fall back to `defaultScore` (or the tail of the list).
 */
export class EmbeddingFusionGenerator implements CandidateGenerator {
    readonly id: string;
    private readonly base: CandidateGenerator;
    private readonly kg: KnowledgeGraphClient;
    private readonly embedder: TextEmbedder;
    private readonly alpha: number;
    private readonly defaultScore?: number;
    private readonly abstractMaxTokens?: number;

    constructor(options: EmbeddingFusionOptions) {
        this.base = options.base;
        this.kg = options.kg;
        this.embedder = options.embedder;
        this.alpha = options.alpha ?? DEFAULT_ALPHA;
        this.defaultScore = options.defaultScore;
        this.abstractMaxTokens = options.abstractMaxTokens;
        this.id = fusionGeneratorId(this.base.id, this.alpha, this.defaultScore, this.abstractMaxTokens);
    }

    async getCandidates(table: Table): Promise<SearchKeyCandidates[]> {
        const results = await this.base.getCandidates(table);
        const keyCells = table.getSearchKeyCells();

        const uris = results.flatMap((result) => result.candidates.map((c) => c.entity.uri));
        const abstracts = uris.length > 0 ? await this.kg.fetchAbstracts(uris) : new Map<string, string>();

        const fused: SearchKeyCandidates[] = [];
        for (const result of results) {
            if (result.candidates.length < 2) {
                fused.push(result);
                continue;
            }

            const firstCell = keyCells.get(result.searchKey)?.[0];
            const context = [result.searchKey, ...(firstCell ? table.getRowContext(firstCell) : [])].join(' ');

            const candidateAbstracts = result.candidates.map((c) => {
                const abstract = abstracts.get(c.entity.uri);
                return abstract === undefined ? null : cutAbstract(abstract, this.abstractMaxTokens) || null;
            });
            const texts = [context, ...candidateAbstracts.filter((a): a is string => a !== null)];
            const vectors = await this.embedder.embed(texts);
            const [contextEmbedding, ...abstractVectors] = vectors;

            let next = 0;
            const embeddings: CandidateEmbeddings[] = result.candidates.map((candidate, i) => {
                let abstractEmbedding: Vector | null = null;
                if (candidateAbstracts[i]) {
                    abstractEmbedding = abstractVectors[next] ?? null;
                    next++;
                }
                return { candidate, contextEmbedding: contextEmbedding ?? null, abstractEmbedding };
            });

            const ranked = fuseRanking(embeddings, { alpha: this.alpha, defaultScore: this.defaultScore });
            fused.push({
                searchKey: result.searchKey,
                candidates: ranked.map((scored, rank) => ({ entity: scored.candidate.entity, rank })),
            });
        }

        getLogger().debug(
            { tableId: table.id, generator: this.id, keys: fused.length, abstracts: abstracts.size },
            'Candidates re-ranked'
        );
        return fused;
    }
}
