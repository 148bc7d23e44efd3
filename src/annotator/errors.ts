import type { Table } from '../model/table.js';

/**
 * The candidate generator failed while processing a table.
 * Nothing is cached for the table.
 */
export class GeneratorFailure extends Error {
    constructor(
        message: string,
        public readonly tableId: string,
        public readonly generatorId: string,
        options?: { cause?: unknown }
    ) {
        super(message, options);
        this.name = 'GeneratorFailure';
    }
}

export interface TableFailure {
    tableId: string;
    error: Error;
}

/**
 * A fail-fast dataset run stopped because of one or more table failures.
 * `completed` holds the tables annotated before (or while) the run stopped.
 */
export class DatasetAnnotationError extends Error {
    constructor(
        message: string,
        public readonly datasetId: string,
        public readonly failures: TableFailure[],
        public readonly completed: Table[]
    ) {
        super(message, { cause: failures[0]?.error });
        this.name = 'DatasetAnnotationError';
    }
}

/**
 * Normalize anything thrown into an Error.
 */
export function toError(value: unknown): Error {
    return value instanceof Error ? value : new Error(String(value));
}
