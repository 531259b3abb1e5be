import * as XLSX from 'xlsx';
import type { CellValue } from '../../types';

export interface SheetParseResult {
    sheetName: string;
    header: string[];
    rows: CellValue[][];
    rowsRead: number;
    rowsSkipped: number;
}

export function toCellValue(value: unknown): CellValue {
    if (value === null || value === undefined) return null;
    if (typeof value === 'string' || typeof value === 'number' || typeof value === 'boolean') return value;
    if (value instanceof Date) return value.toISOString();
    return String(value);
}

/**
 * Reads the first sheet of a workbook. The first non-blank row is the header.
 * A row with values past the header width is skipped, as in delimited files.
 */
export function parseSpreadsheet(content: Uint8Array): SheetParseResult {
    const workbook = XLSX.read(content, { type: 'array', cellDates: true });
    const sheetName = workbook.SheetNames[0];
    const sheet = sheetName !== undefined ? workbook.Sheets[sheetName] : undefined;
    if (!sheet) {
        return { sheetName: '', header: [], rows: [], rowsRead: 0, rowsSkipped: 0 };
    }

    const matrix = XLSX.utils.sheet_to_json<unknown[]>(sheet, {
        header: 1,
        defval: null,
        blankrows: false,
        raw: true
    });
    if (matrix.length === 0) {
        return { sheetName, header: [], rows: [], rowsRead: 0, rowsSkipped: 0 };
    }

    // defval pads every row to the sheet range, so the header ends at its last named cell.
    const named = matrix[0].map(h => (h === null || h === undefined ? '' : String(h)));
    let width = named.length;
    while (width > 0 && named[width - 1].trim() === '') width--;
    const header = named.slice(0, width);
    const body = matrix.slice(1);
    const rows: CellValue[][] = [];
    let rowsSkipped = 0;

    for (const raw of body) {
        if (raw.slice(header.length).some(v => v !== null && v !== undefined && v !== '')) {
            rowsSkipped++;
            continue;
        }
        const row: CellValue[] = [];
        for (let i = 0; i < header.length; i++) row.push(toCellValue(raw[i]));
        rows.push(row);
    }

    return { sheetName, header, rows, rowsRead: body.length, rowsSkipped };
}
