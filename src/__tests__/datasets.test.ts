import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import fs from 'node:fs';
import path from 'node:path';
import { CsvParseError, parseCsv } from '../datasets/csv.js';
import { CsvDataset, DatasetError, listDatasets } from '../datasets/csv-dataset.js';
import { makeTempDir, removeDir } from './helpers.js';

function writeFile(root: string, relative: string, content: string): void {
    const target = path.join(root, relative);
    fs.mkdirSync(path.dirname(target), { recursive: true });
    fs.writeFileSync(target, content, 'utf-8');
}

describe('parseCsv', () => {
    it('should split records and fields', () => {
        expect(parseCsv('a,b\n1,2\n')).toEqual([
            ['a', 'b'],
            ['1', '2'],
        ]);
    });

    it('should handle quoted fields and CRLF', () => {
        expect(parseCsv('"x, y","he said ""hi"""\r\nz,')).toEqual([
            ['x, y', 'he said "hi"'],
            ['z', ''],
        ]);
    });

    it('should keep line breaks inside quotes', () => {
        expect(parseCsv('"l1\nl2",b')).toEqual([['l1\nl2', 'b']]);
    });

    it('should strip a BOM and keep blank lines as empty records', () => {
        expect(parseCsv('\uFEFFa\n\nb')).toEqual([['a'], [''], ['b']]);
    });

    it('should keep a trailing empty quoted field', () => {
        expect(parseCsv('a,""')).toEqual([['a', '']]);
    });

    it('should return no records for empty input', () => {
        expect(parseCsv('')).toEqual([]);
    });

    it('should reject unterminated quotes with their line', () => {
        const error = (() => {
            try {
                parseCsv('x\n"abc');
            } catch (e) {
                return e;
            }
            return null;
        })();

        expect(error).toBeInstanceOf(CsvParseError);
        expect(error).toMatchObject({ line: 2 });
    });

    it('should reject text after a closing quote', () => {
        expect(() => parseCsv('"a"b')).toThrow(CsvParseError);
    });
});

describe('CsvDataset', () => {
    let root: string;

    beforeEach(() => {
        root = makeTempDir();
    });

    afterEach(() => {
        removeDir(root);
    });

    function writeRound(): void {
        writeFile(root, 'Round1/tables/T2.csv', 'name,country\nParis,France\nRome,Italy\n');
        writeFile(root, 'Round1/tables/T1.csv', 'city\n"London, UK"\n');
        writeFile(root, 'Round1/tables/T3.csv', 'unused\nx\n');
        writeFile(
            root,
            'Round1/gt/CEA_Round1_gt.csv',
            [
                'tab_id,col_id,row_id,entities',
                'T2,0,1,http://kg.test/Paris http://kg.test/Paris_(city)',
                'T2,0,2,http://kg.test/Rome',
                'T1,0,1,http://kg.test/London',
                '',
            ].join('\n')
        );
        writeFile(root, 'Round1/gt/CTA_Round1_gt.csv', 'T2,0,http://kg.test/City\n');
        writeFile(root, 'Round1/gt/CPA_Round1_gt.csv', 'T2,0,1,http://kg.test/country\n');
    }

    it('should take its tables from the CEA ground truth, sorted by id', () => {
        writeRound();
        const dataset = new CsvDataset({ root, id: 'Round1' });

        expect(dataset.totalTables()).toBe(2);
        expect([...dataset.getTables()].map((t) => t.id)).toEqual(['T1', 'T2']);
    });

    it('should load grids and ground truth', () => {
        writeRound();
        const dataset = new CsvDataset({ root, id: 'Round1' });
        const [t1, t2] = [...dataset.getTables()];

        expect(t1?.getCells()).toEqual([['city'], ['London, UK']]);
        expect(t2?.datasetId).toBe('Round1');
        expect(t2?.hasExplicitTargets()).toBe(false);
        expect(t2?.getTargetCells()).toEqual([
            { row: 1, col: 0 },
            { row: 2, col: 0 },
        ]);
        expect(t2?.getGtEntities({ row: 1, col: 0 })?.map((e) => e.uri)).toEqual([
            'http://kg.test/Paris',
            'http://kg.test/Paris_(city)',
        ]);
        expect(t2?.getGtColumnAnnotations()).toEqual([{ col: 0, types: ['http://kg.test/City'] }]);
        expect(t2?.getGtRelationAnnotations()).toEqual([
            { sourceCol: 0, targetCol: 1, properties: ['http://kg.test/country'] },
        ]);
        expect(t1?.getGtColumnAnnotations()).toEqual([]);
    });

    it('should pass search key options to its tables', () => {
        writeRound();
        const table = new CsvDataset({ root, id: 'Round1', searchKey: { simplify: true } }).loadTable('T2');
        expect(table.searchKeyOptions).toEqual({ simplify: true });
    });

    it('should target every non-empty cell below the header without ground truth', () => {
        writeFile(root, 'Plain/tables/b.csv', 'h1,h2\nx,\n,y\n');
        writeFile(root, 'Plain/tables/a.csv', 'h\nz\n');
        writeFile(root, 'Plain/tables/notes.txt', 'not a table');

        const dataset = new CsvDataset({ root, id: 'Plain' });
        const tables = [...dataset.getTables()];

        expect(tables.map((t) => t.id)).toEqual(['a', 'b']);
        expect(tables[1]?.hasExplicitTargets()).toBe(true);
        expect(tables[1]?.getTargetCells()).toEqual([
            { row: 1, col: 0 },
            { row: 2, col: 1 },
        ]);
    });

    it('should fail on a missing dataset', () => {
        expect(() => new CsvDataset({ root, id: 'Nope' })).toThrow(DatasetError);
    });

    it('should fail on a malformed ground-truth record', () => {
        writeFile(root, 'Bad/tables/T1.csv', 'a\nb\n');
        writeFile(root, 'Bad/gt/CEA_Bad_gt.csv', 'T1,0,1,http://kg.test/B\nT1,x,1,http://kg.test/C\n');

        expect(() => new CsvDataset({ root, id: 'Bad' })).toThrow('invalid record on line 2');
    });

    it('should fail when a ground-truth table has no file', () => {
        writeFile(root, 'Gap/tables/T1.csv', 'a\nb\n');
        writeFile(root, 'Gap/gt/CEA_Gap_gt.csv', 'T1,0,1,http://kg.test/B\nT9,0,1,http://kg.test/C\n');

        const tables = new CsvDataset({ root, id: 'Gap' }).getTables();

        expect(tables.next().value?.id).toBe('T1');
        expect(() => tables.next()).toThrow(DatasetError);
    });
});

describe('listDatasets', () => {
    let root: string;

    beforeEach(() => {
        root = makeTempDir();
    });

    afterEach(() => {
        removeDir(root);
    });

    it('should list directories that hold a tables directory', () => {
        fs.mkdirSync(path.join(root, 'Round1', 'tables'), { recursive: true });
        fs.mkdirSync(path.join(root, 'Plain', 'tables'), { recursive: true });
        fs.mkdirSync(path.join(root, 'junk'));
        fs.writeFileSync(path.join(root, 'README'), 'x');

        expect(listDatasets(root)).toEqual(['Plain', 'Round1']);
    });

    it('should return nothing for a missing root', () => {
        expect(listDatasets(path.join(root, 'missing'))).toEqual([]);
    });
});
