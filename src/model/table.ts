import { Entity } from './entity.js';
import { normalizeSearchKey, type SearchKey, type SearchKeyOptions } from './search-key.js';

/**
 * A cell position. Row 0 is the first row of the grid (the header row
 * for tables loaded from CSV).
 */
export interface CellRef {
    row: number;
    col: number;
}

export interface CellAnnotation {
    cell: CellRef;
    entity: Entity;
}

/** Ground-truth relation between two columns */
export interface ColumnRelation {
    sourceCol: number;
    targetCol: number;
    properties: string[];
}

export interface TableInit {
    id: string;
    datasetId: string;
    cells: string[][];
    /** Cells to annotate; defaults to every non-empty cell */
    targets?: CellRef[];
    searchKey?: SearchKeyOptions;
}

export function cellKey(cell: CellRef): string {
    return `${cell.row}:${cell.col}`;
}

function compareCells(a: CellRef, b: CellRef): number {
    return a.row - b.row || a.col - b.col;
}

/**
 * A table to annotate: a grid of cell labels, the annotation layer written by
 * the annotator, and optional ground truth supplied by the dataset loader.
 */
export class Table {
    readonly id: string;
    readonly datasetId: string;
    readonly searchKeyOptions: Readonly<SearchKeyOptions>;

    private readonly cells: string[][];
    private readonly targets: CellRef[] | null;
    private readonly annotations = new Map<string, CellAnnotation>();

    private readonly gtCells = new Map<string, { cell: CellRef; entities: Entity[] }>();
    private readonly gtColumns = new Map<number, string[]>();
    private readonly gtRelations: ColumnRelation[] = [];

    constructor(init: TableInit) {
        this.id = init.id;
        this.datasetId = init.datasetId;
        this.cells = init.cells.map((row) => [...row]);
        this.targets = init.targets ? [...init.targets].sort(compareCells) : null;
        this.searchKeyOptions = { ...init.searchKey };
    }

    get rowCount(): number {
        return this.cells.length;
    }

    get columnCount(): number {
        return this.cells.reduce((max, row) => Math.max(max, row.length), 0);
    }

    /** Raw grid copy */
    getCells(): string[][] {
        return this.cells.map((row) => [...row]);
    }

    getCell(cell: CellRef): string | undefined {
        return this.cells[cell.row]?.[cell.col];
    }

    hasExplicitTargets(): boolean {
        return this.targets !== null;
    }

    /**
     * Cells to annotate, in row-major order. Explicit targets win; otherwise
     * the ground-truth cells; otherwise every non-empty cell.
     */
    getTargetCells(): CellRef[] {
        if (this.targets) return this.targets.map((cell) => ({ ...cell }));

        if (this.gtCells.size > 0) {
            return [...this.gtCells.values()].map(({ cell }) => ({ ...cell })).sort(compareCells);
        }

        const all: CellRef[] = [];
        this.cells.forEach((row, rowIndex) => {
            row.forEach((value, colIndex) => {
                if (value.trim()) all.push({ row: rowIndex, col: colIndex });
            });
        });
        return all;
    }

    getSearchKey(cell: CellRef): SearchKey {
        return normalizeSearchKey(this.getCell(cell) ?? '', this.searchKeyOptions);
    }

    /**
     * Group target cells by search key. Cells with an empty key are skipped.
     * Keys appear in the order their first cell is met.
     */
    getSearchKeyCells(): Map<SearchKey, CellRef[]> {
        const groups = new Map<SearchKey, CellRef[]>();
        for (const cell of this.getTargetCells()) {
            const key = this.getSearchKey(cell);
            if (!key) continue;

            const group = groups.get(key);
            if (group) {
                group.push(cell);
            } else {
                groups.set(key, [cell]);
            }
        }
        return groups;
    }

    getSearchKeys(): SearchKey[] {
        return [...this.getSearchKeyCells().keys()];
    }

    /**
     * The other non-empty labels of a cell's row.
     */
    getRowContext(cell: CellRef): string[] {
        const row = this.cells[cell.row] ?? [];
        return row.filter((value, col) => col !== cell.col && value.trim() !== '');
    }

    // ─── Annotations ─────────────────────────────────────────

    annotateCell(cell: CellRef, entity: Entity): void {
        if (this.getCell(cell) === undefined) {
            throw new RangeError(`Cell (${cell.row}, ${cell.col}) is outside table ${this.id}`);
        }
        this.annotations.set(cellKey(cell), { cell: { ...cell }, entity });
    }

    getAnnotation(cell: CellRef): Entity | undefined {
        return this.annotations.get(cellKey(cell))?.entity;
    }

    /** Annotations in row-major order */
    getAnnotations(): CellAnnotation[] {
        return [...this.annotations.values()]
            .map(({ cell, entity }) => ({ cell: { ...cell }, entity }))
            .sort((a, b) => compareCells(a.cell, b.cell));
    }

    get annotationCount(): number {
        return this.annotations.size;
    }

    // ─── Ground truth ────────────────────────────────────────

    setGtCellAnnotations(rows: Iterable<[row: number, col: number, uris: string[]]>): void {
        for (const [row, col, uris] of rows) {
            const cell = { row, col };
            this.gtCells.set(cellKey(cell), { cell, entities: uris.map((uri) => new Entity(uri)) });
        }
    }

    setGtColumnAnnotations(rows: Iterable<[col: number, types: string[]]>): void {
        for (const [col, types] of rows) {
            this.gtColumns.set(col, [...types]);
        }
    }

    setGtRelationAnnotations(rows: Iterable<[sourceCol: number, targetCol: number, properties: string[]]>): void {
        for (const [sourceCol, targetCol, properties] of rows) {
            this.gtRelations.push({ sourceCol, targetCol, properties: [...properties] });
        }
    }

    /** Acceptable entities for a cell, or undefined when the cell has no ground truth */
    getGtEntities(cell: CellRef): Entity[] | undefined {
        return this.gtCells.get(cellKey(cell))?.entities;
    }

    getGtCellAnnotations(): Array<{ cell: CellRef; entities: Entity[] }> {
        return [...this.gtCells.values()]
            .map(({ cell, entities }) => ({ cell: { ...cell }, entities: [...entities] }))
            .sort((a, b) => compareCells(a.cell, b.cell));
    }

    getGtColumnAnnotations(): Array<{ col: number; types: string[] }> {
        return [...this.gtColumns.entries()]
            .map(([col, types]) => ({ col, types: [...types] }))
            .sort((a, b) => a.col - b.col);
    }

    getGtRelationAnnotations(): ColumnRelation[] {
        return this.gtRelations.map((relation) => ({ ...relation, properties: [...relation.properties] }));
    }

    toString(): string {
        return `Table(${this.datasetId}/${this.id}, ${this.rowCount}x${this.columnCount})`;
    }
}
