import type { SearchKeyOptions } from '../model/search-key.js';
import type { Table } from '../model/table.js';
import type { CandidateGenerator, SearchKeyCandidates } from '../types/index.js';
import {
    AnnotationStoreError,
    type AnnotationCacheKey,
    type AnnotationStore,
} from '../cache/annotation-store.js';
import { deserializeTable, serializeTable } from '../cache/table-codec.js';
import { getLogger } from '../utils/logger.js';
import { GeneratorFailure } from './errors.js';

/**
 * Cache namespace of a generator's annotations. Simplified search keys
 * yield different candidates, so they get their own namespace.
 */
export function annotationNamespace(generatorId: string, options: SearchKeyOptions): string {
    return options.simplify ? `${generatorId}+simplify` : generatorId;
}

/**
 * Annotates one table with one generator, memoized in an annotation store.
 *
 * 1. Cache hit for (dataset, generator namespace, table) → stored table, no generator call
 * 2. One generator call for the whole table; cells sharing a search key share its candidates
 * 3. Each key's first candidate annotates all of the key's cells
 * 4. The annotated table is stored once, and what the store holds is returned
 */
export class TableAnnotator {
    constructor(
        private readonly generator: CandidateGenerator,
        private readonly store: AnnotationStore
    ) {}

    get generatorId(): string {
        return this.generator.id;
    }

    cacheKeyFor(table: Table): AnnotationCacheKey {
        return {
            datasetId: table.datasetId,
            generatorId: annotationNamespace(this.generator.id, table.searchKeyOptions),
            tableId: table.id,
        };
    }

    /**
     * Annotate `table` in place, persist it, and return the stored copy.
     *
     * @throws GeneratorFailure if the generator throws or returns a key the table does not have;
     *         nothing is stored in that case
     */
    async annotate(table: Table): Promise<Table> {
        const key = this.cacheKeyFor(table);

        const cached = this.store.get(key);
        if (cached !== null) {
            getLogger().debug({ tableId: table.id, generator: this.generator.id }, 'Using cached annotations');
            return deserializeTable(cached);
        }

        const searchKeyCells = table.getSearchKeyCells();
        const results = await this.generateCandidates(table);

        let annotatedCells = 0;
        for (const { searchKey, candidates } of results) {
            const cells = searchKeyCells.get(searchKey);
            if (!cells) {
                throw new GeneratorFailure(
                    `Generator ${this.generator.id} returned unknown search key "${searchKey}" for table ${table.id}`,
                    table.id,
                    this.generator.id
                );
            }

            const best = candidates[0];
            if (!best) continue;

            for (const cell of cells) {
                table.annotateCell(cell, best.entity);
                annotatedCells += 1;
            }
        }

        getLogger().debug(
            {
                tableId: table.id,
                generator: this.generator.id,
                searchKeys: searchKeyCells.size,
                annotatedCells,
            },
            'Table annotated'
        );

        this.store.putIfAbsent(key, serializeTable(table));

        const stored = this.store.get(key);
        if (stored === null) {
            throw new AnnotationStoreError(`Annotations for table ${table.id} missing right after storing them`);
        }
        return deserializeTable(stored);
    }

    private async generateCandidates(table: Table): Promise<SearchKeyCandidates[]> {
        try {
            return await this.generator.getCandidates(table);
        } catch (error) {
            const reason = error instanceof Error ? error.message : String(error);
            throw new GeneratorFailure(
                `Generator ${this.generator.id} failed on table ${table.id}: ${reason}`,
                table.id,
                this.generator.id,
                { cause: error }
            );
        }
    }
}
