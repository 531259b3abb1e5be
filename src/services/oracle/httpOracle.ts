import axios from 'axios';
import type { FaultOracle, MergedTable } from '../../types';
import { TableMerger } from '../alarmIngestion/tableMerger';

export interface HttpOracleOptions {
    url: string;
    timeoutMs: number;
}

/**
 * Remote model behind a JSON endpoint. Accepts either a bare array or
 * `{ predictions: [...] }` in reply.
 */
export function createHttpOracle(opts: HttpOracleOptions): FaultOracle {
    return {
        name: `http:${opts.url}`,
        async predict(table: MergedTable): Promise<unknown[]> {
            const response = await axios.post<unknown>(
                opts.url,
                { columns: table.columns, rows: TableMerger.toRecords(table) },
                { timeout: opts.timeoutMs, headers: { 'Content-Type': 'application/json' } }
            );
            const data = response.data;
            if (Array.isArray(data)) return data;
            if (typeof data === 'object' && data !== null && 'predictions' in data && Array.isArray(data.predictions)) {
                return data.predictions;
            }
            throw new Error(`unexpected response shape from ${opts.url}`);
        }
    };
}
