import type { CellValue, MergedTable, NormalizedTable } from '../../types';
import { EmptyBatchError } from '../pipelineErrors';
import { ColumnNormalizer } from './columnNormalizer';

export const TableMerger = {

    /**
     * Row-wise concatenation over the union of columns (first-seen order).
     * Cells for columns a table lacks are `null`, never '' or 0.
     */
    merge(tables: NormalizedTable[]): MergedTable {
        if (tables.length === 0) throw new EmptyBatchError();

        const columns: string[] = [];
        const position = new Map<string, number>();
        for (const table of tables) {
            for (const col of table.columns) {
                if (!position.has(col)) {
                    position.set(col, columns.length);
                    columns.push(col);
                }
            }
        }

        const rows: CellValue[][] = [];
        for (const table of tables) {
            // Within a normalized table columns are unique, so each maps to one slot.
            const slots = table.columns.map(col => position.get(col) ?? -1);
            for (const source of table.rows) {
                const row: CellValue[] = new Array<CellValue>(columns.length).fill(null);
                slots.forEach((slot, i) => {
                    if (slot >= 0) row[slot] = source[i] ?? null;
                });
                rows.push(row);
            }
        }

        const collapsed = ColumnNormalizer.collapseDuplicates(columns, rows);
        if (collapsed.dropped.length > 0) {
            console.warn(`[Merge] collapsed duplicate columns after union: ${collapsed.dropped.join(', ')}`);
        }

        console.log(`[Merge] ${tables.length} table(s) -> ${collapsed.rows.length} rows x ${collapsed.columns.length} columns`);

        return {
            columns: collapsed.columns,
            rows: collapsed.rows,
            sourceFiles: tables.map(t => t.sourceFile)
        };
    },

    /**
     * Column-keyed view of the rows, the shape handed to remote oracles.
     */
    toRecords(table: MergedTable): Record<string, CellValue>[] {
        // fromEntries defines own properties, so a column named "__proto__" survives.
        return table.rows.map(row => Object.fromEntries(table.columns.map((col, i): [string, CellValue] => [col, row[i] ?? null])));
    }
};
