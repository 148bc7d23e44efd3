import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import {
    createGeneratorFactory,
    cutAbstract,
    EmbeddingFusionGenerator,
    fusionGeneratorId,
    LookupGenerator,
    SparqlLabelGenerator,
    type GeneratorConfig,
} from '../generators/index.js';
import type { TextEmbedder, Vector } from '../kg/embedding-client.js';
import { KnowledgeGraphClient } from '../kg/kg-client.js';
import { SparqlClient } from '../kg/sparql-client.js';
import { Entity } from '../model/entity.js';
import type { CandidateGenerator, SearchKeyCandidates } from '../types/index.js';
import { DEFAULT_CONFIG } from '../types/index.js';
import { HttpClient, HttpError } from '../utils/http-client.js';
import { calledUrl, jsonResponse, makeTable } from './helpers.js';

const LOOKUP_ENDPOINT = 'http://lookup.test/api/search';

function summarize(results: SearchKeyCandidates[]): Array<[string, string[], number[]]> {
    return results.map(({ searchKey, candidates }) => [
        searchKey,
        candidates.map((c) => c.entity.uri),
        candidates.map((c) => c.rank),
    ]);
}

function cityTable() {
    return makeTable(
        [
            ['Paris', 'France'],
            ['paris', 'Texas'],
            ['London', 'UK'],
        ],
        { targets: [{ row: 0, col: 0 }, { row: 1, col: 0 }, { row: 2, col: 0 }] }
    );
}

function newKg(): KnowledgeGraphClient {
    return new KnowledgeGraphClient({ sparql: new SparqlClient({ endpoint: 'http://sparql.test/sparql' }) });
}

describe('LookupGenerator', () => {
    const fetchMock = vi.fn<typeof fetch>();

    beforeEach(() => {
        fetchMock.mockReset();
        vi.stubGlobal('fetch', fetchMock);
    });

    afterEach(() => {
        vi.unstubAllGlobals();
    });

    it('should query the lookup service and drop duplicate resources', async () => {
        fetchMock.mockResolvedValueOnce(
            jsonResponse({
                docs: [
                    { resource: ['http://kg.test/Paris'], label: ['Paris'] },
                    { resource: ['http://kg.test/PARIS', 'http://kg.test/Paris,_Texas'] },
                    { label: ['no resource'] },
                ],
            })
        );
        const generator = new LookupGenerator({ endpoint: LOOKUP_ENDPOINT, maxResults: 5, httpClient: new HttpClient() });

        const entities = await generator.search('paris');

        expect(entities.map((e) => e.uri)).toEqual(['http://kg.test/Paris', 'http://kg.test/Paris,_Texas']);
        const url = calledUrl(fetchMock);
        expect(url.origin + url.pathname).toBe(LOOKUP_ENDPOINT);
        expect(url.searchParams.get('query')).toBe('paris');
        expect(url.searchParams.get('maxResults')).toBe('5');
        expect(url.searchParams.get('format')).toBe('JSON');
    });

    it('should query once per search key and rank in service order', async () => {
        fetchMock.mockImplementation(async (input) => {
            const query = new URL(String(input)).searchParams.get('query');
            return jsonResponse({
                docs: query === 'paris' ? [{ resource: ['http://kg.test/Paris'] }, { resource: ['http://kg.test/Paris,_Texas'] }] : [],
            });
        });
        const generator = new LookupGenerator({ endpoint: LOOKUP_ENDPOINT });

        const results = await generator.getCandidates(cityTable());

        expect(fetchMock).toHaveBeenCalledTimes(2);
        expect(summarize(results)).toEqual([
            ['paris', ['http://kg.test/Paris', 'http://kg.test/Paris,_Texas'], [0, 1]],
            ['london', [], []],
        ]);
    });

    it('should name itself after its result limit', () => {
        expect(new LookupGenerator({ endpoint: LOOKUP_ENDPOINT, maxResults: 5 }).id).toBe('lookup-k5');
        expect(new LookupGenerator({ endpoint: LOOKUP_ENDPOINT }).id).toBe('lookup-k10');
    });

    it('should treat a response without docs as no candidates', async () => {
        fetchMock.mockResolvedValueOnce(jsonResponse({}));
        expect(await new LookupGenerator({ endpoint: LOOKUP_ENDPOINT }).search('nothing')).toEqual([]);
    });

    it('should propagate HTTP errors', async () => {
        fetchMock.mockResolvedValueOnce(jsonResponse({ error: 'bad' }, 400));
        await expect(new LookupGenerator({ endpoint: LOOKUP_ENDPOINT }).search('x')).rejects.toThrow(HttpError);
    });
});

describe('SparqlLabelGenerator', () => {
    it('should rank label matches and drop duplicates', async () => {
        const kg = newKg();
        const findByLabel = vi.spyOn(kg, 'findByLabel').mockImplementation(async (label) =>
            label === 'paris' ? ['http://kg.test/Paris', 'http://kg.test/PARIS', 'http://kg.test/Paris,_Texas'] : []
        );
        const generator = new SparqlLabelGenerator({ kg, maxResults: 3 });

        const results = await generator.getCandidates(cityTable());

        expect(generator.id).toBe('sparql-label-k3');
        expect(findByLabel).toHaveBeenCalledWith('paris', 3);
        expect(summarize(results)).toEqual([
            ['paris', ['http://kg.test/Paris', 'http://kg.test/Paris,_Texas'], [0, 1]],
            ['london', [], []],
        ]);
    });
});

describe('EmbeddingFusionGenerator', () => {
    const A = 'http://kg.test/A';
    const B = 'http://kg.test/B';
    const C = 'http://kg.test/C';
    const L = 'http://kg.test/L';

    const base: CandidateGenerator = {
        id: 'base',
        getCandidates: async () => [
            {
                searchKey: 'paris',
                candidates: [A, B, C].map((uri, rank) => ({ entity: new Entity(uri), rank })),
            },
            { searchKey: 'london', candidates: [{ entity: new Entity(L), rank: 0 }] },
        ],
    };

    const VECTORS: Record<string, Vector> = {
        'paris France': [1, 0],
        'abstract of a': [0, 1],
        'abstract of b': [1, 0],
    };

    function fakeEmbedder() {
        const embed = vi.fn<TextEmbedder['embed']>(async (texts) => texts.map((text) => VECTORS[text] ?? [0, 0]));
        return { id: 'fake', embed };
    }

    it('should re-rank by abstract similarity and pass single candidates through', async () => {
        const kg = newKg();
        const fetchAbstracts = vi.spyOn(kg, 'fetchAbstracts').mockResolvedValue(
            new Map([
                [A, 'abstract of a'],
                [B, 'abstract of b'],
            ])
        );
        const embedder = fakeEmbedder();
        const generator = new EmbeddingFusionGenerator({ base, kg, embedder, alpha: 0.5 });

        const results = await generator.getCandidates(cityTable());

        // A: 0.5 × 0 + 0.5 × 1 = 0.5; B: 0.5 × 0.5 + 0.5 × 0 = 0.25; C has no abstract
        expect(summarize(results)).toEqual([
            ['paris', [B, A, C], [0, 1, 2]],
            ['london', [L], [0]],
        ]);
        expect(fetchAbstracts).toHaveBeenCalledWith([A, B, C, L]);
        expect(embedder.embed).toHaveBeenCalledTimes(1);
        expect(embedder.embed).toHaveBeenCalledWith(['paris France', 'abstract of a', 'abstract of b']);
    });

    it('should skip the abstract query when the base finds nothing', async () => {
        const kg = newKg();
        const fetchAbstracts = vi.spyOn(kg, 'fetchAbstracts');
        const empty: CandidateGenerator = { id: 'empty', getCandidates: async () => [] };

        const results = await new EmbeddingFusionGenerator({ base: empty, kg, embedder: fakeEmbedder() })
            .getCandidates(cityTable());

        expect(results).toEqual([]);
        expect(fetchAbstracts).not.toHaveBeenCalled();
    });

    it('should name itself after the base generator and its parameters', () => {
        const generator = new EmbeddingFusionGenerator({
            base,
            kg: newKg(),
            embedder: fakeEmbedder(),
            alpha: 0.3,
            defaultScore: 0.9,
            abstractMaxTokens: 50,
        });
        expect(generator.id).toBe('base+fusion-a0.3-d0.9-t50');
    });
});

describe('fusion helpers', () => {
    it('should build generator ids', () => {
        expect(fusionGeneratorId('lookup', 0.5)).toBe('lookup+fusion-a0.5');
        expect(fusionGeneratorId('lookup', 0, 0)).toBe('lookup+fusion-a0-d0');
        expect(fusionGeneratorId('lookup', 1, undefined, 20)).toBe('lookup+fusion-a1-t20');
    });

    it('should cut abstracts to a token budget', () => {
        expect(cutAbstract('  one two  three ', 2)).toBe('one two');
        expect(cutAbstract('  one two  three ')).toBe('one two  three');
    });
});

describe('createGeneratorFactory', () => {
    function config(overrides: Partial<GeneratorConfig> = {}): GeneratorConfig {
        return {
            generator: 'lookup',
            fusion: { enabled: false, alpha: 0.5 },
            lookup: DEFAULT_CONFIG.lookup,
            kg: DEFAULT_CONFIG.kg,
            ...overrides,
        };
    }

    it('should build a new generator per call', () => {
        const factory = createGeneratorFactory(config());
        const first = factory();
        const second = factory();

        expect(first).toBeInstanceOf(LookupGenerator);
        expect(first).not.toBe(second);
        expect(first.id).toBe('lookup-k10');
    });

    it('should build the SPARQL label generator', () => {
        expect(createGeneratorFactory(config({ generator: 'sparql-label' }))().id).toBe('sparql-label-k10');
    });

    it('should wrap the base generator when fusion is enabled', () => {
        const generator = createGeneratorFactory(
            config({ fusion: { enabled: true, alpha: 0.7, defaultScore: 0.1 } })
        )();

        expect(generator).toBeInstanceOf(EmbeddingFusionGenerator);
        expect(generator.id).toBe('lookup-k10+fusion-a0.7-d0.1');
    });
});
