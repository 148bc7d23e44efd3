import type { Table } from '../model/table.js';
import type { AnnotationStore } from '../cache/annotation-store.js';
import type {
    CandidateGenerator,
    Dataset,
    FailurePolicy,
    GeneratorFactory,
} from '../types/index.js';
import { getLogger } from '../utils/logger.js';
import { DatasetAnnotationError, type TableFailure } from './errors.js';
import { TableAnnotator } from './table-annotator.js';
import { runPool } from './worker-pool.js';

export interface AnnotationProgress {
    datasetId: string;
    tableId: string;
    ok: boolean;
    completed: number;
    failed: number;
    total: number;
}

export interface DatasetAnnotatorOptions {
    /** Builds one generator per worker; all must share one id */
    createGenerator: GeneratorFactory;
    store: AnnotationStore;
    /** 1 = serial, in dataset order; more = that many concurrent tables */
    maxWorkers?: number;
    failurePolicy?: FailurePolicy;
    onProgress?: (progress: AnnotationProgress) => void;
}

export interface DatasetAnnotationResult {
    datasetId: string;
    generatorId: string;
    /** Dataset order when serial, completion order otherwise */
    tables: Table[];
    /** Always empty under `fail-fast` (failures throw instead) */
    failures: TableFailure[];
    elapsedMs: number;
}

/**
 * Annotates every table of a dataset, one table per worker task.
 *
 * Each worker owns its generator (and so its network clients) and a
 * TableAnnotator; workers share only the annotation store, where every
 * table has its own write-once entry.
 */
export class DatasetAnnotator {
    private readonly primary: CandidateGenerator;
    /** Built up front to check the factory's id; serves worker 1 */
    private readonly second?: CandidateGenerator;
    private readonly createGenerator: GeneratorFactory;
    private readonly store: AnnotationStore;
    private readonly maxWorkers: number;
    private readonly failurePolicy: FailurePolicy;
    private readonly onProgress?: (progress: AnnotationProgress) => void;

    constructor(options: DatasetAnnotatorOptions) {
        const maxWorkers = options.maxWorkers ?? 1;
        if (!Number.isInteger(maxWorkers) || maxWorkers < 1) {
            throw new RangeError(`maxWorkers must be a positive integer, got ${maxWorkers}`);
        }

        this.createGenerator = options.createGenerator;
        this.primary = options.createGenerator();
        if (maxWorkers > 1) {
            this.second = this.checkedGenerator(1);
        }
        this.store = options.store;
        this.maxWorkers = maxWorkers;
        this.failurePolicy = options.failurePolicy ?? 'fail-fast';
        this.onProgress = options.onProgress;
    }

    get generatorId(): string {
        return this.primary.id;
    }

    /**
     * @throws DatasetAnnotationError under `fail-fast` when any table fails
     */
    async annotateDataset(dataset: Dataset): Promise<DatasetAnnotationResult> {
        const logger = getLogger();
        const total = dataset.totalTables();
        const startTime = Date.now();

        logger.info(
            {
                dataset: dataset.id,
                generator: this.generatorId,
                tables: total,
                workers: this.maxWorkers,
                failurePolicy: this.failurePolicy,
            },
            this.maxWorkers === 1 ? 'Annotating dataset serially' : 'Annotating dataset in parallel'
        );

        let completed = 0;
        let failed = 0;

        const { outcomes, maxConcurrent, stopped } = await runPool(
            dataset.getTables(),
            (index) => new TableAnnotator(this.workerGenerator(index), this.store),
            (annotator, table: Table) => annotator.annotate(table),
            {
                concurrency: this.maxWorkers,
                stopOnError: this.failurePolicy === 'fail-fast',
                onSettled: (outcome) => {
                    if (outcome.ok) completed++;
                    else failed++;

                    this.onProgress?.({
                        datasetId: dataset.id,
                        tableId: outcome.item.id,
                        ok: outcome.ok,
                        completed,
                        failed,
                        total,
                    });
                },
            }
        );

        const tables: Table[] = [];
        const failures: TableFailure[] = [];
        for (const outcome of outcomes) {
            if (outcome.ok) {
                tables.push(outcome.value);
            } else {
                failures.push({ tableId: outcome.item.id, error: outcome.error });
            }
        }

        const elapsedMs = Date.now() - startTime;

        if (failures.length > 0 && this.failurePolicy === 'fail-fast') {
            logger.error(
                { dataset: dataset.id, failures: failures.length, completed: tables.length, stopped },
                'Dataset annotation aborted'
            );
            throw new DatasetAnnotationError(
                `Annotation of dataset ${dataset.id} stopped: table ${failures[0]?.tableId} failed`,
                dataset.id,
                failures,
                tables
            );
        }

        for (const failure of failures) {
            logger.warn({ dataset: dataset.id, tableId: failure.tableId, error: failure.error }, 'Table annotation failed');
        }

        logger.info(
            {
                dataset: dataset.id,
                generator: this.generatorId,
                tables: tables.length,
                failures: failures.length,
                maxConcurrent,
                elapsed: `${(elapsedMs / 1000).toFixed(1)}s`,
            },
            'Dataset annotation complete'
        );

        return {
            datasetId: dataset.id,
            generatorId: this.generatorId,
            tables,
            failures,
            elapsedMs,
        };
    }

    private workerGenerator(index: number): CandidateGenerator {
        if (index === 0) return this.primary;
        if (index === 1 && this.second) return this.second;
        return this.checkedGenerator(index);
    }

    private checkedGenerator(index: number): CandidateGenerator {
        const generator = this.createGenerator();
        if (generator.id !== this.primary.id) {
            throw new Error(
                `Generator factory produced "${generator.id}" for worker ${index}, expected "${this.primary.id}"`
            );
        }
        return generator;
    }
}

/**
 * One-shot helper around DatasetAnnotator.
 */
export function annotateDataset(
    dataset: Dataset,
    options: DatasetAnnotatorOptions
): Promise<DatasetAnnotationResult> {
    return new DatasetAnnotator(options).annotateDataset(dataset);
}
