import type { Table } from '../model/table.js';

/**
 * A named source of tables. Each call to `getTables()` re-reads storage and
 * yields fresh Table objects, one per iteration step.
 */
export interface Dataset {
    /** Identifier used in cache keys */
    readonly id: string;

    getTables(): Iterable<Table> | AsyncIterable<Table>;

    /** Number of tables `getTables()` yields; used for progress only */
    totalTables(): number;
}
