import { z } from 'zod';
import { Entity } from '../model/entity.js';
import { Table } from '../model/table.js';
import { AnnotationStoreError } from './annotation-store.js';

export const TABLE_FORMAT_VERSION = 1;

const CellSchema = z.object({
    row: z.number().int().nonnegative(),
    col: z.number().int().nonnegative(),
});

const TableRecordSchema = z.object({
    version: z.literal(TABLE_FORMAT_VERSION),
    id: z.string().min(1),
    datasetId: z.string().min(1),
    searchKey: z.object({ simplify: z.boolean().optional() }),
    cells: z.array(z.array(z.string())),
    targets: z.array(CellSchema).nullable(),
    annotations: z.array(CellSchema.extend({ uri: z.string() })),
    groundTruth: z.object({
        cells: z.array(CellSchema.extend({ entities: z.array(z.string()) })),
        columns: z.array(z.object({ col: z.number().int().nonnegative(), types: z.array(z.string()) })),
        relations: z.array(
            z.object({
                sourceCol: z.number().int().nonnegative(),
                targetCol: z.number().int().nonnegative(),
                properties: z.array(z.string()),
            })
        ),
    }),
});

export type TableRecord = z.infer<typeof TableRecordSchema>;

/**
 * Plain, deterministic record of a table: equal tables give byte-equal JSON.
 */
export function toTableRecord(table: Table): TableRecord {
    return {
        version: TABLE_FORMAT_VERSION,
        id: table.id,
        datasetId: table.datasetId,
        searchKey: table.searchKeyOptions.simplify === undefined
            ? {}
            : { simplify: table.searchKeyOptions.simplify },
        cells: table.getCells(),
        targets: table.hasExplicitTargets() ? table.getTargetCells() : null,
        annotations: table.getAnnotations().map(({ cell, entity }) => ({
            row: cell.row,
            col: cell.col,
            uri: entity.uri,
        })),
        groundTruth: {
            cells: table.getGtCellAnnotations().map(({ cell, entities }) => ({
                row: cell.row,
                col: cell.col,
                entities: entities.map((e) => e.uri),
            })),
            columns: table.getGtColumnAnnotations(),
            relations: table.getGtRelationAnnotations(),
        },
    };
}

export function fromTableRecord(record: TableRecord): Table {
    const table = new Table({
        id: record.id,
        datasetId: record.datasetId,
        cells: record.cells,
        targets: record.targets ?? undefined,
        searchKey: record.searchKey,
    });

    table.setGtCellAnnotations(record.groundTruth.cells.map((c) => [c.row, c.col, c.entities]));
    table.setGtColumnAnnotations(record.groundTruth.columns.map((c) => [c.col, c.types]));
    table.setGtRelationAnnotations(
        record.groundTruth.relations.map((r) => [r.sourceCol, r.targetCol, r.properties])
    );

    for (const { row, col, uri } of record.annotations) {
        table.annotateCell({ row, col }, new Entity(uri));
    }

    return table;
}

export function serializeTable(table: Table): string {
    return JSON.stringify(toTableRecord(table));
}

/**
 * Parse and validate a stored artifact.
 * @throws AnnotationStoreError when the blob is not a valid table record
 */
export function deserializeTable(blob: string): Table {
    let raw: unknown;
    try {
        raw = JSON.parse(blob);
    } catch (error) {
        throw new AnnotationStoreError('Stored table is not valid JSON', { cause: error });
    }

    const parsed = TableRecordSchema.safeParse(raw);
    if (!parsed.success) {
        throw new AnnotationStoreError(`Stored table is malformed: ${parsed.error.message}`, {
            cause: parsed.error,
        });
    }

    try {
        return fromTableRecord(parsed.data);
    } catch (error) {
        throw new AnnotationStoreError(`Stored table ${parsed.data.id} is inconsistent`, { cause: error });
    }
}
