import { existsSync, readdirSync, readFileSync, statSync } from 'node:fs';
import { basename, extname, join } from 'node:path';
import type { SearchKeyOptions } from '../model/search-key.js';
import { Table, type CellRef } from '../model/table.js';
import type { Dataset } from '../types/index.js';
import { getLogger } from '../utils/logger.js';
import { CsvParseError, parseCsv } from './csv.js';

export class DatasetError extends Error {
    constructor(message: string, options?: { cause?: unknown }) {
        super(message, options);
        this.name = 'DatasetError';
    }
}

export interface CsvDatasetOptions {
    /** Directory holding one sub-directory per dataset */
    root: string;
    id: string;
    searchKey?: SearchKeyOptions;
}

type CellTruth = [row: number, col: number, uris: string[]];
type ColumnTruth = [col: number, types: string[]];
type RelationTruth = [sourceCol: number, targetCol: number, properties: string[]];

interface GroundTruth {
    cells: Map<string, CellTruth[]>;
    columns: Map<string, ColumnTruth[]>;
    relations: Map<string, RelationTruth[]>;
}

function readCsvFile(path: string): string[][] {
    try {
        return parseCsv(readFileSync(path, 'utf-8'));
    } catch (error) {
        if (error instanceof CsvParseError) {
            throw new DatasetError(`${path}: ${error.message}`, { cause: error });
        }
        throw new DatasetError(`Cannot read ${path}`, { cause: error });
    }
}

function parseIndex(value: string | undefined): number | null {
    if (value === undefined || !/^\d+$/.test(value.trim())) return null;
    return parseInt(value, 10);
}

function splitValues(value: string | undefined): string[] {
    return (value ?? '').split(/\s+/).filter(Boolean);
}

function pushGrouped<T>(groups: Map<string, T[]>, key: string, value: T): void {
    const group = groups.get(key);
    if (group) {
        group.push(value);
    } else {
        groups.set(key, [value]);
    }
}

/**
 * Read a headerless ground-truth file whose records start with a table id
 * followed by `indexCount` integer columns and one space-separated list.
 * A first record whose indexes are not integers is taken as a header.
 */
function readGroundTruth(path: string, indexCount: number): Map<string, Array<{ indexes: number[]; values: string[] }>> {
    const groups = new Map<string, Array<{ indexes: number[]; values: string[] }>>();
    if (!existsSync(path)) return groups;

    readCsvFile(path).forEach((record, i) => {
        const [tableId, ...rest] = record;
        if (tableId === undefined || tableId.trim() === '') return;

        const indexes = rest.slice(0, indexCount).map(parseIndex);
        const valid = indexes.filter((index): index is number => index !== null);
        if (valid.length !== indexCount) {
            if (i === 0) return;
            throw new DatasetError(`${path}: invalid record on line ${i + 1}`);
        }

        pushGrouped(groups, tableId, { indexes: valid, values: splitValues(rest[indexCount]) });
    });

    return groups;
}

/**
 * A tabular-annotation benchmark stored as CSV:
 *
 * ```
 * <root>/<id>/tables/<tableId>.csv        grid, row 0 = header
 * <root>/<id>/gt/CEA_<id>_gt.csv          tab_id,col_id,row_id,entities
 * <root>/<id>/gt/CTA_<id>_gt.csv          tab_id,col_id,types           (optional)
 * <root>/<id>/gt/CPA_<id>_gt.csv          tab_id,source_id,target_id,properties (optional)
 * ```
 *
 * With a CEA file, its tables (sorted by id) are the dataset and its cells
 * the targets. Without one, every table file is loaded and every non-empty
 * cell below the header is a target. Ground truth is read up front; table
 * grids are read one at a time as `getTables()` is iterated.
 */
export class CsvDataset implements Dataset {
    readonly id: string;
    private readonly dir: string;
    private readonly searchKey: SearchKeyOptions;
    private readonly truth: GroundTruth;
    private readonly hasCellTruth: boolean;
    private readonly tableIds: string[];

    constructor(options: CsvDatasetOptions) {
        this.id = options.id;
        this.dir = join(options.root, options.id);
        this.searchKey = { ...options.searchKey };

        if (!existsSync(this.tablesDir())) {
            throw new DatasetError(`Dataset ${this.id} not found: ${this.tablesDir()} does not exist`);
        }

        const cea = readGroundTruth(this.gtPath('CEA'), 2);
        const cta = readGroundTruth(this.gtPath('CTA'), 1);
        const cpa = readGroundTruth(this.gtPath('CPA'), 2);

        this.truth = {
            // CEA records are (col_id, row_id)
            cells: mapGroups(cea, ({ indexes: [col = 0, row = 0], values }): CellTruth => [row, col, values]),
            columns: mapGroups(cta, ({ indexes: [col = 0], values }): ColumnTruth => [col, values]),
            relations: mapGroups(cpa, ({ indexes: [source = 0, target = 0], values }): RelationTruth => [source, target, values]),
        };
        this.hasCellTruth = existsSync(this.gtPath('CEA'));

        this.tableIds = this.hasCellTruth
            ? [...this.truth.cells.keys()].sort()
            : readdirSync(this.tablesDir())
                .filter((name) => extname(name) === '.csv')
                .map((name) => basename(name, '.csv'))
                .sort();

        getLogger().debug(
            { dataset: this.id, tables: this.tableIds.length, groundTruth: this.hasCellTruth },
            'CSV dataset opened'
        );
    }

    totalTables(): number {
        return this.tableIds.length;
    }

    *getTables(): Generator<Table> {
        for (const tableId of this.tableIds) {
            yield this.loadTable(tableId);
        }
    }

    loadTable(tableId: string): Table {
        const path = join(this.tablesDir(), `${tableId}.csv`);
        if (!existsSync(path)) {
            throw new DatasetError(`Table ${tableId} of dataset ${this.id} not found at ${path}`);
        }

        const cells = readCsvFile(path);
        const table = new Table({
            id: tableId,
            datasetId: this.id,
            cells,
            targets: this.hasCellTruth ? undefined : cellsBelowHeader(cells),
            searchKey: this.searchKey,
        });

        table.setGtCellAnnotations(this.truth.cells.get(tableId) ?? []);
        table.setGtColumnAnnotations(this.truth.columns.get(tableId) ?? []);
        table.setGtRelationAnnotations(this.truth.relations.get(tableId) ?? []);
        return table;
    }

    private tablesDir(): string {
        return join(this.dir, 'tables');
    }

    private gtPath(task: 'CEA' | 'CTA' | 'CPA'): string {
        return join(this.dir, 'gt', `${task}_${this.id}_gt.csv`);
    }
}

function mapGroups<T, U>(groups: Map<string, T[]>, fn: (value: T) => U): Map<string, U[]> {
    return new Map([...groups].map(([key, values]) => [key, values.map(fn)]));
}

function cellsBelowHeader(cells: string[][]): CellRef[] {
    const targets: CellRef[] = [];
    cells.forEach((row, rowIndex) => {
        if (rowIndex === 0) return;
        row.forEach((value, colIndex) => {
            if (value.trim()) targets.push({ row: rowIndex, col: colIndex });
        });
    });
    return targets;
}

/**
 * Dataset ids under a root: sub-directories that have a `tables/` directory.
 */
export function listDatasets(root: string): string[] {
    if (!existsSync(root)) return [];
    return readdirSync(root)
        .filter((name) => {
            const tables = join(root, name, 'tables');
            return existsSync(tables) && statSync(tables).isDirectory();
        })
        .sort();
}
