import { CANDIDATE_DELIMITERS } from '../../constants';
import type { CellValue } from '../../types';

export interface DelimitedParseResult {
    delimiter: string;
    header: string[];
    rows: CellValue[][];
    rowsRead: number;
    rowsSkipped: number;
}

interface TokenizedRecord {
    fields: string[];
    terminated: boolean; // false when EOF hits inside an open quote
}

/**
 * Splits text into records, honouring quoted fields that hold delimiters,
 * doubled quotes and line breaks.
 */
export function tokenize(text: string, delimiter: string): TokenizedRecord[] {
    const records: TokenizedRecord[] = [];
    let fields: string[] = [];
    let current = '';
    let inQuotes = false;
    let fieldStarted = false;

    const endRecord = (terminated: boolean) => {
        fields.push(current);
        records.push({ fields, terminated });
        fields = [];
        current = '';
        fieldStarted = false;
    };

    for (let i = 0; i < text.length; i++) {
        const char = text[i];

        if (inQuotes) {
            if (char === '"') {
                if (text[i + 1] === '"') {
                    current += '"';
                    i++;
                } else {
                    inQuotes = false;
                }
            } else {
                current += char;
            }
            continue;
        }

        if (char === '"' && current.trim().length === 0) {
            current = '';
            inQuotes = true;
            fieldStarted = true;
        } else if (char === delimiter) {
            fields.push(current);
            current = '';
            fieldStarted = true;
        } else if (char === '\r' || char === '\n') {
            if (char === '\r' && text[i + 1] === '\n') i++;
            endRecord(true);
        } else {
            current += char;
            fieldStarted = true;
        }
    }

    if (inQuotes) {
        endRecord(false);
    } else if (fieldStarted || current.length > 0 || fields.length > 0) {
        endRecord(true);
    }

    return records;
}

function countOutsideQuotes(line: string, delimiter: string): number {
    let count = 0;
    let inQuotes = false;
    for (const char of line) {
        if (char === '"') inQuotes = !inQuotes;
        else if (char === delimiter && !inQuotes) count++;
    }
    return count;
}

/**
 * Picks the candidate delimiter seen most often in the header line.
 * Comma wins ties and single-column files.
 */
export function detectDelimiter(text: string): string {
    const headerLine = text.split(/\r?\n/).find(l => l.trim().length > 0) ?? '';
    let best = ',';
    let bestCount = countOutsideQuotes(headerLine, ',');

    for (const candidate of CANDIDATE_DELIMITERS) {
        const count = countOutsideQuotes(headerLine, candidate);
        if (count > bestCount) {
            best = candidate;
            bestCount = count;
        }
    }
    return best;
}

const isBlankRecord = (fields: string[]) => fields.every(f => f.trim().length === 0);

export function parseDelimited(content: string, delimiter?: string): DelimitedParseResult {
    const text = content.replace(/^\uFEFF/, '');
    const sep = delimiter ?? detectDelimiter(text);
    const records = tokenize(text, sep).filter(r => !isBlankRecord(r.fields));

    if (records.length === 0 || !records[0].terminated) {
        return { delimiter: sep, header: [], rows: [], rowsRead: 0, rowsSkipped: 0 };
    }

    const header = records[0].fields;
    const rows: CellValue[][] = [];
    let skipped = 0;

    for (const record of records.slice(1)) {
        if (!record.terminated || record.fields.length > header.length) {
            skipped++;
            continue;
        }
        const row: CellValue[] = [...record.fields];
        while (row.length < header.length) row.push(null);
        rows.push(row);
    }

    return { delimiter: sep, header, rows, rowsRead: records.length - 1, rowsSkipped: skipped };
}
