import type { Table } from '../model/table.js';

export interface CeaScores {
    /** Target cells with ground truth */
    targets: number;
    /** Of those, cells that received an annotation */
    annotated: number;
    /** Of those, annotations equal to an acceptable entity */
    correct: number;
    precision: number;
    recall: number;
    f1: number;
}

function ratio(numerator: number, denominator: number): number {
    return denominator === 0 ? 0 : numerator / denominator;
}

/**
 * CEA precision, recall and F1 of annotated tables against their
 * ground-truth cells. Cells without ground truth are not scored.
 */
export function scoreAnnotations(tables: Iterable<Table>): CeaScores {
    let targets = 0;
    let annotated = 0;
    let correct = 0;

    for (const table of tables) {
        for (const { cell, entities } of table.getGtCellAnnotations()) {
            targets++;
            const entity = table.getAnnotation(cell);
            if (!entity) continue;

            annotated++;
            if (entities.some((accepted) => accepted.equals(entity))) correct++;
        }
    }

    const precision = ratio(correct, annotated);
    const recall = ratio(correct, targets);
    const f1 = ratio(2 * precision * recall, precision + recall);

    return { targets, annotated, correct, precision, recall, f1 };
}
