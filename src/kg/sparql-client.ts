import { HttpClient } from '../utils/http-client.js';
import { getLogger } from '../utils/logger.js';

/**
 * One term of a SPARQL JSON result row.
 */
export interface SparqlTerm {
    type: 'uri' | 'literal' | 'typed-literal' | 'bnode';
    value: string;
    'xml:lang'?: string;
    datatype?: string;
}

export type SparqlBinding = Record<string, SparqlTerm | undefined>;

interface SparqlResultsJson {
    head?: { vars?: string[] };
    results?: { bindings?: SparqlBinding[] };
}

export interface SparqlClientOptions {
    endpoint: string;
    defaultGraph?: string;
    timeout?: number;
    httpClient?: HttpClient;
}

/**
 * Quote a string as a SPARQL literal, optionally language-tagged.
 */
export function sparqlLiteral(value: string, lang?: string): string {
    const escaped = value
        .replace(/\\/g, '\\\\')
        .replace(/"/g, '\\"')
        .replace(/\n/g, '\\n')
        .replace(/\r/g, '\\r');
    return lang ? `"${escaped}"@${lang}` : `"${escaped}"`;
}

/**
 * Wrap a URI as an IRI reference; characters IRIs cannot hold are escaped.
 */
export function sparqlIri(uri: string): string {
    const safe = uri.replace(/[<>"{}|^`\\\s]/g, (ch) => encodeURIComponent(ch));
    return `<${safe}>`;
}

/**
 * Split a list into chunks of at most `size` items.
 */
export function chunk<T>(items: readonly T[], size: number): T[][] {
    const chunks: T[][] = [];
    for (let i = 0; i < items.length; i += size) {
        chunks.push(items.slice(i, i + size));
    }
    return chunks;
}

/**
 * SELECT queries over the SPARQL 1.1 protocol (GET, JSON results).
 */
export class SparqlClient {
    readonly endpoint: string;
    private readonly defaultGraph?: string;
    private readonly timeout?: number;
    private httpClient: HttpClient;

    constructor(options: SparqlClientOptions) {
        this.endpoint = options.endpoint;
        this.defaultGraph = options.defaultGraph;
        this.timeout = options.timeout;
        this.httpClient = options.httpClient ?? new HttpClient();
    }

    /**
     * For dependency injection in tests.
     */
    setHttpClient(client: HttpClient): void {
        this.httpClient = client;
    }

    async select(query: string): Promise<SparqlBinding[]> {
        getLogger().debug({ endpoint: this.endpoint, query }, 'SPARQL select');

        const response = await this.httpClient.get<SparqlResultsJson>(this.endpoint, {
            source: 'sparql',
            timeout: this.timeout,
            headers: { Accept: 'application/sparql-results+json' },
            query: {
                query,
                format: 'application/sparql-results+json',
                'default-graph-uri': this.defaultGraph,
            },
        });

        const bindings = response.data.results?.bindings;
        return Array.isArray(bindings) ? bindings : [];
    }
}
