import { GoogleGenAI } from '@google/genai';
import { ORACLE_KEYS } from '../../constants';
import type { FaultOracle, MergedTable } from '../../types';
import { TableMerger } from '../alarmIngestion/tableMerger';

export interface GeminiOracleOptions {
    apiKey: string;
    model: string;
    maxRows?: number;
}

function cleanJson(input: string): string {
    return input.replace(/```json/gi, '').replace(/```/g, '').trim();
}

function buildPrompt(table: MergedTable, maxRows: number): string {
    const sample = TableMerger.toRecords(table).slice(-maxRows);
    const keys = Object.values(ORACLE_KEYS).map(k => `"${k}"`).join(', ');
    return [
        'You are a telecom network fault forecaster.',
        'Given the alarm log rows below, predict faults likely to recur at each site.',
        `Return a JSON array only. Each element must have exactly the keys ${keys}.`,
        '"Probability (%)" is a number from 0 to 100. "Risk Level" is one of "LOW", "MEDIUM", "HIGH".',
        'Return [] when no significant future fault risk exists.',
        '',
        `Columns: ${table.columns.join(', ')}`,
        `Rows (${sample.length} most recent of ${table.rows.length}):`,
        JSON.stringify(sample)
    ].join('\n');
}

export function createGeminiOracle(opts: GeminiOracleOptions): FaultOracle {
    const ai = new GoogleGenAI({ apiKey: opts.apiKey });
    const maxRows = opts.maxRows ?? 500;

    return {
        name: `gemini:${opts.model}`,
        async predict(table: MergedTable): Promise<unknown[]> {
            const resp = await ai.models.generateContent({
                model: opts.model,
                contents: buildPrompt(table, maxRows),
                config: { responseMimeType: 'application/json' }
            });
            // A blocked or truncated reply has no text; only an explicit [] means no risk.
            const text = cleanJson(resp.text ?? '');
            if (text.length === 0) throw new Error('model returned an empty reply');
            const parsed: unknown = JSON.parse(text);
            if (!Array.isArray(parsed)) throw new Error('model did not return a JSON array');
            return parsed;
        }
    };
}
