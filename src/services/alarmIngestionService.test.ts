import { describe, it, expect } from 'vitest';
import * as XLSX from 'xlsx';
import { csvFile } from '../testing/fakes';
import { AlarmIngestionService } from './alarmIngestionService';
import { MalformedTableError } from './pipelineErrors';

function xlsxFile(name: string, rows: unknown[][]) {
    const wb = XLSX.utils.book_new();
    XLSX.utils.book_append_sheet(wb, XLSX.utils.aoa_to_sheet(rows), 'Sheet1');
    const out: ArrayBuffer = XLSX.write(wb, { type: 'array', bookType: 'xlsx' });
    return { name, content: new Uint8Array(out) };
}

describe('AlarmIngestionService.ingestFile', () => {
    it('normalizes a semicolon export and reports skipped rows', () => {
        const { table, report } = AlarmIngestionService.ingestFile(
            csvFile('north.csv', ['Site Name;Alarm;Alarm', 'A;Link Down;dup', 'B;Power;x;extra'])
        );

        expect(table.columns).toEqual(['site_name', 'alarm', 'source_file']);
        expect(table.rows).toEqual([['A', 'Link Down', 'north.csv']]);
        expect(report).toEqual({
            file: 'north.csv',
            status: 'ACCEPTED',
            rowsRead: 2,
            rowsSkipped: 1,
            columnsDropped: ['alarm']
        });
    });

    it('decodes byte content as UTF-8', () => {
        const content = new TextEncoder().encode('Site,Note\nA,Überlast\n');
        const { table } = AlarmIngestionService.ingestFile({ name: 'utf8.CSV', content });
        expect(table.rows).toEqual([['A', 'Überlast', 'utf8.CSV']]);
    });

    it('reads spreadsheets', () => {
        const { table } = AlarmIngestionService.ingestFile(xlsxFile('south.xlsx', [['Site', ' Alarm  Text'], ['C', 'Fan']]));
        expect(table.columns).toEqual(['site', 'alarm_text', 'source_file']);
        expect(table.rows).toEqual([['C', 'Fan', 'south.xlsx']]);
    });

    it('reports spreadsheet rows skipped for spilling past the header', () => {
        const { table, report } = AlarmIngestionService.ingestFile(xlsxFile('east.xlsx', [
            ['Site', 'Alarm'],
            ['D', 'Fan', 'stray'],
            ['E', 'Door']
        ]));

        expect(table.rows).toEqual([['E', 'Door', 'east.xlsx']]);
        expect(report).toMatchObject({ status: 'ACCEPTED', rowsRead: 2, rowsSkipped: 1 });
    });

    it('rejects unsupported and empty files', () => {
        expect(() => AlarmIngestionService.ingestFile({ name: 'notes.pdf', content: 'x' })).toThrow(MalformedTableError);
        expect(() => AlarmIngestionService.ingestFile({ name: 'empty.csv', content: '' })).toThrow('empty.csv: table has no columns');
    });
});

describe('AlarmIngestionService.ingestBatch', () => {
    it('contains per-file failures and keeps the rest of the batch', () => {
        const { tables, reports } = AlarmIngestionService.ingestBatch([
            csvFile('good.csv', ['Site,Alarm', 'A,Link Down']),
            { name: 'bad.docx', content: 'nope' }
        ]);

        expect(tables).toHaveLength(1);
        expect(tables[0].sourceFile).toBe('good.csv');
        expect(reports.map(r => r.status)).toEqual(['ACCEPTED', 'REJECTED']);
        expect(reports[1].error).toBe('bad.docx: unsupported file type ".docx"');
    });
});
