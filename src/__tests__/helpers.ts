import fs from 'node:fs';
import os from 'node:os';
import path from 'node:path';
import { Entity } from '../model/entity.js';
import { Table, type TableInit } from '../model/table.js';
import type { CandidateGenerator, Dataset, SearchKeyCandidates } from '../types/index.js';

export function makeTempDir(prefix = 'cellink-test-'): string {
    return fs.mkdtempSync(path.join(os.tmpdir(), prefix));
}

export function removeDir(dir: string): void {
    fs.rmSync(dir, { recursive: true, force: true });
}

export function makeTable(cells: string[][], overrides: Partial<TableInit> = {}): Table {
    return new Table({ id: 't1', datasetId: 'ds', cells, ...overrides });
}

/**
 * Generator answering every key with `http://kg.test/<Key_with_underscores>`,
 * counting calls. Optional delay and per-table failure.
 */
export class StubGenerator implements CandidateGenerator {
    calls = 0;
    active = 0;
    maxActive = 0;

    constructor(
        readonly id = 'stub',
        private readonly options: { delayMs?: number; failOn?: ReadonlySet<string> } = {}
    ) {}

    async getCandidates(table: Table): Promise<SearchKeyCandidates[]> {
        this.calls++;
        this.active++;
        this.maxActive = Math.max(this.maxActive, this.active);
        try {
            if (this.options.delayMs) {
                await new Promise((resolve) => setTimeout(resolve, this.options.delayMs));
            }
            if (this.options.failOn?.has(table.id)) {
                throw new Error(`boom on ${table.id}`);
            }
            return table.getSearchKeys().map((searchKey) => ({
                searchKey,
                candidates: [{ entity: new Entity(`http://kg.test/${searchKey.replace(/ /g, '_')}`), rank: 0 }],
            }));
        } finally {
            this.active--;
        }
    }
}

export class ArrayDataset implements Dataset {
    constructor(readonly id: string, private readonly tables: Table[]) {}

    getTables(): Iterable<Table> {
        return this.tables;
    }

    totalTables(): number {
        return this.tables.length;
    }
}

export function jsonResponse(body: unknown, status = 200): Response {
    return new Response(JSON.stringify(body), {
        status,
        headers: { 'content-type': 'application/json' },
    });
}

/**
 * Bindings in SPARQL JSON results format.
 */
export function sparqlResponse(rows: Array<Record<string, string>>): Response {
    return new Response(
        JSON.stringify({
            head: { vars: Object.keys(rows[0] ?? {}) },
            results: {
                bindings: rows.map((row) =>
                    Object.fromEntries(
                        Object.entries(row).map(([name, value]) => [
                            name,
                            { type: value.startsWith('http') ? 'uri' : 'literal', value },
                        ])
                    )
                ),
            },
        }),
        { status: 200, headers: { 'content-type': 'application/sparql-results+json' } }
    );
}

/**
 * URL of the n-th call to a mocked fetch.
 */
export function calledUrl(fetchMock: { mock: { calls: unknown[][] } }, n = 0): URL {
    const arg = fetchMock.mock.calls[n]?.[0];
    if (typeof arg !== 'string') throw new Error(`fetch call ${n} has no URL`);
    return new URL(arg);
}
