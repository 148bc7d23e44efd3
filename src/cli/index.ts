#!/usr/bin/env node
import { Command, InvalidArgumentError } from 'commander';
import { DatasetAnnotationError } from '../annotator/errors.js';
import { DatasetAnnotator, type DatasetAnnotationResult } from '../annotator/dataset-annotator.js';
import { createAnnotationStore } from '../cache/index.js';
import { CsvDataset, listDatasets } from '../datasets/csv-dataset.js';
import { scoreAnnotations } from '../evaluation/scorer.js';
import { createGeneratorFactory } from '../generators/index.js';
import { createEntityEmbeddingClient, createKnowledgeGraphClient } from '../kg/index.js';
import type { CacheBackend, CellinkConfig, FailurePolicy, GeneratorName, LogLevel } from '../types/index.js';
import { resolveConfig, type ConfigOverrides } from '../utils/config.js';
import { HttpClient } from '../utils/http-client.js';
import { getLogger, initLogger } from '../utils/logger.js';
import { VERSION } from '../version.js';

interface GlobalOptions {
    datasetsDir?: string;
    cacheBackend?: CacheBackend;
    cacheDir?: string;
    logLevel?: LogLevel;
    jsonLogs?: boolean;
}

interface RunOptions extends GlobalOptions {
    dataset: string;
    generator?: GeneratorName;
    workers?: number;
    fusion?: boolean;
    alpha?: number;
    defaultScore?: number;
    abstractTokens?: number;
    simplify?: boolean;
    failurePolicy?: FailurePolicy;
}

function choice<T extends string>(choices: readonly T[]): (value: string) => T {
    return (value) => {
        const match = choices.find((c) => c === value);
        if (match === undefined) {
            throw new InvalidArgumentError(`Allowed: ${choices.join(', ')}`);
        }
        return match;
    };
}

function positiveInt(value: string): number {
    const n = Number(value);
    if (!Number.isInteger(n) || n < 1) throw new InvalidArgumentError('Must be a positive integer.');
    return n;
}

function nonNegativeNumber(value: string): number {
    const n = Number(value);
    if (value.trim() === '' || !Number.isFinite(n) || n < 0) throw new InvalidArgumentError('Must be a number >= 0.');
    return n;
}

function unitInterval(value: string): number {
    const n = nonNegativeNumber(value);
    if (n > 1) throw new InvalidArgumentError('Must be in [0, 1].');
    return n;
}

function toOverrides(opts: GlobalOptions & Partial<RunOptions>): ConfigOverrides {
    return {
        datasetsDir: opts.datasetsDir,
        dataset: opts.dataset,
        generator: opts.generator,
        maxWorkers: opts.workers,
        failurePolicy: opts.failurePolicy,
        searchKey: { simplify: opts.simplify },
        fusion: {
            // An explicit weight or default implies fusion
            enabled: opts.fusion ?? (opts.alpha !== undefined || opts.defaultScore !== undefined ? true : undefined),
            alpha: opts.alpha,
            defaultScore: opts.defaultScore,
            abstractMaxTokens: opts.abstractTokens,
        },
        cache: { backend: opts.cacheBackend, dir: opts.cacheDir },
        logLevel: opts.logLevel,
        jsonLogs: opts.jsonLogs,
    };
}

async function setup(opts: GlobalOptions & Partial<RunOptions>): Promise<CellinkConfig> {
    const config = await resolveConfig(toOverrides(opts));
    initLogger({ level: config.logLevel, jsonLogs: config.jsonLogs });
    return config;
}

async function runAnnotation(config: CellinkConfig, datasetId: string): Promise<DatasetAnnotationResult> {
    const logger = getLogger();
    const store = createAnnotationStore(config.cache);

    try {
        const dataset = new CsvDataset({ root: config.datasetsDir, id: datasetId, searchKey: config.searchKey });
        const annotator = new DatasetAnnotator({
            createGenerator: createGeneratorFactory(config),
            store,
            maxWorkers: config.maxWorkers,
            failurePolicy: config.failurePolicy,
            onProgress: (progress) => {
                logger.info(
                    { tableId: progress.tableId, ok: progress.ok, done: progress.completed + progress.failed, total: progress.total },
                    'Table processed'
                );
            },
        });
        return await annotator.annotateDataset(dataset);
    } finally {
        store.close();
    }
}

function fail(action: string, error: unknown): never {
    const logger = getLogger();
    if (error instanceof DatasetAnnotationError) {
        for (const failure of error.failures) {
            logger.error({ tableId: failure.tableId, error: failure.error }, 'Table failed');
        }
        logger.error(
            { dataset: error.datasetId, failures: error.failures.length, completed: error.completed.length },
            `${action} failed`
        );
    } else {
        logger.error({ error }, `${action} failed`);
    }
    process.exit(1);
}

function withGlobalOptions(command: Command): Command {
    return command
        .option('--datasets-dir <dir>', 'Directory holding the datasets')
        .option('--cache-backend <backend>', 'Annotation store: file | sqlite', choice<CacheBackend>(['file', 'sqlite']))
        .option('--cache-dir <dir>', 'Annotation store directory')
        .option('--log-level <level>', 'Log level: debug | info | warn | error', choice<LogLevel>(['debug', 'info', 'warn', 'error']))
        .option('--json-logs', 'Output JSON logs');
}

function withRunOptions(command: Command): Command {
    return withGlobalOptions(command)
        .requiredOption('-d, --dataset <id>', 'Dataset id (a directory under the datasets dir)')
        .option('-g, --generator <name>', 'Candidate generator: lookup | sparql-label', choice<GeneratorName>(['lookup', 'sparql-label']))
        .option('-w, --workers <n>', 'Tables annotated concurrently', positiveInt)
        .option('--fusion', 'Re-rank candidates with abstract embeddings')
        .option('--alpha <weight>', 'Fusion weight of the original rank, in [0, 1]', unitInterval)
        .option('--default-score <score>', 'Fusion score for candidates without embeddings', nonNegativeNumber)
        .option('--abstract-tokens <n>', 'Truncate abstracts to N tokens before embedding', positiveInt)
        .option('--simplify', 'Simplify labels before building search keys')
        .option('--failure-policy <policy>', 'On table failure: fail-fast | collect', choice<FailurePolicy>(['fail-fast', 'collect']));
}

const program = new Command();

program
    .name('cellink')
    .description('Link table cells to knowledge-graph entities, with cached, parallel annotation.')
    .version(VERSION);

// ─── ANNOTATE command ─────────────────────────────────────

withRunOptions(program.command('annotate'))
    .description('Annotate every table of a dataset')
    .action(async (opts: RunOptions) => {
        const config = await setup(opts);

        try {
            const result = await runAnnotation(config, opts.dataset);
            const cells = result.tables.reduce((sum, table) => sum + table.annotationCount, 0);

            console.log(`\nDataset:    ${result.datasetId}`);
            console.log(`Generator:  ${result.generatorId}`);
            console.log(`Tables:     ${result.tables.length}`);
            console.log(`Failures:   ${result.failures.length}`);
            console.log(`Cells:      ${cells}`);
            console.log(`Elapsed:    ${(result.elapsedMs / 1000).toFixed(1)}s\n`);
        } catch (error) {
            fail('Annotation', error);
        }
    });

// ─── EVALUATE command ─────────────────────────────────────

withRunOptions(program.command('evaluate'))
    .description('Annotate a dataset and score it against its ground truth')
    .action(async (opts: RunOptions) => {
        const config = await setup(opts);

        try {
            const result = await runAnnotation(config, opts.dataset);
            const scores = scoreAnnotations(result.tables);

            console.log(`\nDataset:    ${result.datasetId}`);
            console.log(`Generator:  ${result.generatorId}`);
            console.log(`Targets:    ${scores.targets} (${scores.annotated} annotated, ${scores.correct} correct)`);
            console.log(`Precision:  ${scores.precision.toFixed(4)}`);
            console.log(`Recall:     ${scores.recall.toFixed(4)}`);
            console.log(`F1:         ${scores.f1.toFixed(4)}\n`);
            if (result.failures.length > 0) {
                console.log(`${result.failures.length} table(s) failed and were not scored.\n`);
            }
        } catch (error) {
            fail('Evaluation', error);
        }
    });

// ─── DATASETS command ─────────────────────────────────────

withGlobalOptions(program.command('datasets'))
    .description('List datasets under the datasets dir')
    .action(async (opts: GlobalOptions) => {
        const config = await setup(opts);
        const ids = listDatasets(config.datasetsDir);

        if (ids.length === 0) {
            console.log(`No datasets found in ${config.datasetsDir}`);
            return;
        }
        try {
            for (const id of ids) {
                const dataset = new CsvDataset({ root: config.datasetsDir, id });
                console.log(`${id}\t${dataset.totalTables()} tables`);
            }
        } catch (error) {
            fail('Listing datasets', error);
        }
    });

// ─── ENTITY command ───────────────────────────────────────

withGlobalOptions(program.command('entity'))
    .description('Show what the knowledge graph knows about an entity')
    .argument('<uri>', 'Entity URI')
    .action(async (uri: string, opts: GlobalOptions) => {
        const config = await setup(opts);
        const httpClient = new HttpClient({ version: VERSION });
        const kg = createKnowledgeGraphClient(config.kg, httpClient);

        try {
            const [labels, types, descriptions, abstracts] = await Promise.all([
                kg.getLabels(uri),
                kg.getTypes(uri),
                kg.getDescriptions(uri),
                kg.fetchAbstracts([uri]),
            ]);

            console.log(`\n${uri}\n`);
            console.log(`  Labels:  ${labels.join(' | ') || '-'}`);
            console.log(`  Types:   ${types.length}`);
            for (const type of types) console.log(`    ${type}`);
            console.log(`  Comment: ${descriptions[0] ?? '-'}`);
            console.log(`  Abstract: ${abstracts.get(uri)?.slice(0, 200) ?? '-'}`);
        } catch (error) {
            fail('Entity lookup', error);
        }

        try {
            const vectors = await createEntityEmbeddingClient(config.kg, httpClient).getVectors([uri]);
            const vector = vectors.get(uri);
            console.log(`  Vector:  ${vector ? `${vector.length} dimensions` : 'none'}\n`);
        } catch (error) {
            getLogger().warn({ error, endpoint: config.kg.embeddingEndpoint }, 'Entity vectors unavailable');
            console.log('  Vector:  unavailable\n');
        }
    });

// ─── CACHE command ────────────────────────────────────────

withGlobalOptions(program.command('cache'))
    .description('Manage the annotation store')
    .argument('<action>', 'Action: clear | stats')
    .action(async (action: string, opts: GlobalOptions) => {
        const config = await setup(opts);

        if (action !== 'clear' && action !== 'stats') {
            console.error(`Unknown action: ${action}. Valid: clear, stats`);
            process.exit(1);
        }

        const store = createAnnotationStore(config.cache);
        try {
            if (action === 'clear') {
                store.clear();
                console.log('Annotation store cleared.');
            } else {
                const stats = store.stats();
                console.log(`Store (${stats.backend}): ${stats.location}`);
                console.log(`Entries: ${stats.entries}, ${(stats.bytes / 1024).toFixed(1)} KB`);
            }
        } finally {
            store.close();
        }
    });

await program.parseAsync();
