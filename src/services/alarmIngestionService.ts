import { DELIMITED_EXTENSIONS, SPREADSHEET_EXTENSIONS } from '../constants';
import type { IngestionFileReport, NormalizedTable, RawTable, UploadedFile } from '../types';
import { ColumnNormalizer } from './alarmIngestion/columnNormalizer';
import { parseDelimited } from './alarmIngestion/delimitedReader';
import { parseSpreadsheet } from './alarmIngestion/spreadsheetReader';
import { describeError, MalformedTableError } from './pipelineErrors';

export interface FileIngestion {
    table: NormalizedTable;
    report: IngestionFileReport;
}

export interface BatchIngestion {
    tables: NormalizedTable[];
    reports: IngestionFileReport[];
}

function extensionOf(fileName: string): string {
    const dot = fileName.lastIndexOf('.');
    return dot === -1 ? '' : fileName.slice(dot).toLowerCase();
}

function decodeText(content: Uint8Array | string): string {
    if (typeof content === 'string') return content;
    return new TextDecoder('utf-8').decode(content);
}

function readRawTable(file: UploadedFile): { raw: RawTable; rowsRead: number; rowsSkipped: number } {
    const ext = extensionOf(file.name);

    if (DELIMITED_EXTENSIONS.includes(ext)) {
        const parsed = parseDelimited(decodeText(file.content));
        return {
            raw: { sourceFile: file.name, columns: parsed.header, rows: parsed.rows },
            rowsRead: parsed.rowsRead,
            rowsSkipped: parsed.rowsSkipped
        };
    }

    if (SPREADSHEET_EXTENSIONS.includes(ext)) {
        if (typeof file.content === 'string') {
            throw new MalformedTableError(file.name, 'spreadsheet content must be binary');
        }
        const parsed = parseSpreadsheet(file.content);
        return {
            raw: { sourceFile: file.name, columns: parsed.header, rows: parsed.rows },
            rowsRead: parsed.rowsRead,
            rowsSkipped: parsed.rowsSkipped
        };
    }

    throw new MalformedTableError(file.name, `unsupported file type "${ext || '(none)'}"`);
}

export const AlarmIngestionService = {

    ingestFile(file: UploadedFile): FileIngestion {
        let read: ReturnType<typeof readRawTable>;
        try {
            read = readRawTable(file);
        } catch (e) {
            if (e instanceof MalformedTableError) throw e;
            throw new MalformedTableError(file.name, `unreadable: ${describeError(e)}`);
        }

        const { table, columnsDropped } = ColumnNormalizer.normalize(read.raw);
        if (read.rowsSkipped > 0) {
            console.warn(`[Ingestion] ${file.name}: skipped ${read.rowsSkipped} malformed row(s)`);
        }

        return {
            table,
            report: {
                file: file.name,
                status: 'ACCEPTED',
                rowsRead: read.rowsRead,
                rowsSkipped: read.rowsSkipped,
                columnsDropped
            }
        };
    },

    /**
     * A file that fails to parse is reported and left out; the rest of the batch proceeds.
     */
    ingestBatch(files: UploadedFile[]): BatchIngestion {
        const tables: NormalizedTable[] = [];
        const reports: IngestionFileReport[] = [];

        for (const file of files) {
            try {
                const { table, report } = this.ingestFile(file);
                tables.push(table);
                reports.push(report);
                console.log(`[Ingestion] ${file.name}: ${table.rows.length} rows, ${table.columns.length} columns`);
            } catch (e) {
                if (!(e instanceof MalformedTableError)) throw e;
                console.error(`[Ingestion] ${e.message}`);
                reports.push({
                    file: file.name,
                    status: 'REJECTED',
                    rowsRead: 0,
                    rowsSkipped: 0,
                    columnsDropped: [],
                    error: e.message
                });
            }
        }

        return { tables, reports };
    }
};
