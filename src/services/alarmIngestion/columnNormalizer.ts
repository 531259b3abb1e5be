import { COLUMN_SEPARATOR, SOURCE_FILE_COLUMN } from '../../constants';
import type { CellValue, NormalizedTable, RawTable } from '../../types';
import { MalformedTableError } from '../pipelineErrors';

export interface CollapsedColumns {
    columns: string[];
    rows: CellValue[][];
    dropped: string[];
}

export interface NormalizationResult {
    table: NormalizedTable;
    columnsDropped: string[];
}

export const ColumnNormalizer = {

    /**
     * "  Alarm   Name " -> "alarm_name". Blank names become "unnamed_<index>".
     */
    normalizeName(raw: unknown, index: number): string {
        const text = raw === null || raw === undefined ? '' : String(raw);
        const id = text.trim().toLowerCase().replace(/\s+/g, COLUMN_SEPARATOR);
        return id.length > 0 ? id : `unnamed${COLUMN_SEPARATOR}${index}`;
    },

    /**
     * Keeps the first column of every identifier group, by position.
     * Later duplicates are dropped along with their cells.
     */
    collapseDuplicates(columns: string[], rows: CellValue[][]): CollapsedColumns {
        const keep: number[] = [];
        const seen = new Set<string>();
        const dropped: string[] = [];

        columns.forEach((col, i) => {
            if (seen.has(col)) {
                dropped.push(col);
                return;
            }
            seen.add(col);
            keep.push(i);
        });

        if (dropped.length === 0) return { columns: [...columns], rows, dropped };

        return {
            columns: keep.map(i => columns[i]),
            rows: rows.map(row => keep.map(i => row[i] ?? null)),
            dropped
        };
    },

    normalize(raw: RawTable): NormalizationResult {
        if (raw.columns.length === 0) {
            throw new MalformedTableError(raw.sourceFile, 'table has no columns');
        }

        const names = raw.columns.map((c, i) => this.normalizeName(c, i));
        const collapsed = this.collapseDuplicates(names, raw.rows);

        // Provenance is stamped by ingestion; an incoming column of the same name loses.
        const provenanceIdx = collapsed.columns.indexOf(SOURCE_FILE_COLUMN);
        const keepIdx = collapsed.columns.map((_, i) => i).filter(i => i !== provenanceIdx);
        const dropped = provenanceIdx === -1 ? collapsed.dropped : [...collapsed.dropped, SOURCE_FILE_COLUMN];

        if (collapsed.dropped.length > 0) {
            console.warn(`[Normalize] ${raw.sourceFile}: dropped duplicate columns ${collapsed.dropped.join(', ')}`);
        }
        if (provenanceIdx !== -1) {
            console.warn(`[Normalize] ${raw.sourceFile}: uploaded ${SOURCE_FILE_COLUMN} column replaced by provenance`);
        }

        return {
            table: {
                sourceFile: raw.sourceFile,
                columns: [...keepIdx.map(i => collapsed.columns[i]), SOURCE_FILE_COLUMN],
                rows: collapsed.rows.map(row => [...keepIdx.map(i => row[i] ?? null), raw.sourceFile])
            },
            columnsDropped: dropped
        };
    }
};
