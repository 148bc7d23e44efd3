import { z } from 'zod';
import { HttpClient } from '../utils/http-client.js';
import { getLogger } from '../utils/logger.js';
import { chunk } from './sparql-client.js';

export type Vector = readonly number[];

const VectorsResponseSchema = z.record(z.array(z.number()).nullable());

const TextEmbeddingsResponseSchema = z.object({
    embeddings: z.array(z.array(z.number())),
});

/** URIs per GET request */
const URIS_PER_REQUEST = 25;

export class EmbeddingResponseError extends Error {
    constructor(message: string, options?: { cause?: unknown }) {
        super(message, options);
        this.name = 'EmbeddingResponseError';
    }
}

export interface EmbeddingClientOptions {
    endpoint: string;
    timeout?: number;
    httpClient?: HttpClient;
}

/**
 * Client of a KG-embedding REST service: `GET <endpoint>?uri=a&uri=b`
 * answers `{ "<uri>": [..] | null }`.
 */
export class EntityEmbeddingClient {
    readonly endpoint: string;
    private readonly timeout?: number;
    private httpClient: HttpClient;

    constructor(options: EmbeddingClientOptions) {
        this.endpoint = options.endpoint;
        this.timeout = options.timeout;
        this.httpClient = options.httpClient ?? new HttpClient();
    }

    /**
     * Vector per URI; `null` where the service has none.
     */
    async getVectors(uris: readonly string[]): Promise<Map<string, Vector | null>> {
        const vectors = new Map<string, Vector | null>();
        const unique = [...new Set(uris)];

        for (const batch of chunk(unique, URIS_PER_REQUEST)) {
            const response = await this.httpClient.get<unknown>(this.endpoint, {
                source: 'embeddings',
                timeout: this.timeout,
                query: { uri: batch },
            });

            const parsed = VectorsResponseSchema.safeParse(response.data);
            if (!parsed.success) {
                throw new EmbeddingResponseError(`Malformed vector response from ${this.endpoint}`, { cause: parsed.error });
            }

            for (const uri of batch) {
                vectors.set(uri, parsed.data[uri] ?? null);
            }
        }

        getLogger().debug(
            { requested: unique.length, found: [...vectors.values()].filter((v) => v !== null).length },
            'Fetched entity vectors'
        );
        return vectors;
    }
}

/**
 * Sentence/paragraph embedding backend.
 */
export interface TextEmbedder {
    readonly id: string;

    /** One vector per text, same order */
    embed(texts: readonly string[]): Promise<Vector[]>;
}

/**
 * Text embedder behind an HTTP service: `POST { texts }` answers `{ embeddings }`.
 */
export class HttpTextEmbedder implements TextEmbedder {
    readonly id: string;
    private readonly endpoint: string;
    private readonly timeout?: number;
    private httpClient: HttpClient;

    constructor(options: EmbeddingClientOptions & { id?: string }) {
        this.endpoint = options.endpoint;
        this.id = options.id ?? 'http';
        this.timeout = options.timeout;
        this.httpClient = options.httpClient ?? new HttpClient();
    }

    async embed(texts: readonly string[]): Promise<Vector[]> {
        if (texts.length === 0) return [];

        const response = await this.httpClient.post<unknown>(
            this.endpoint,
            { texts },
            { source: 'embeddings', timeout: this.timeout }
        );

        const parsed = TextEmbeddingsResponseSchema.safeParse(response.data);
        if (!parsed.success) {
            throw new EmbeddingResponseError(`Malformed embedding response from ${this.endpoint}`, { cause: parsed.error });
        }
        if (parsed.data.embeddings.length !== texts.length) {
            throw new EmbeddingResponseError(
                `Expected ${texts.length} embeddings from ${this.endpoint}, got ${parsed.data.embeddings.length}`
            );
        }
        return parsed.data.embeddings;
    }
}
