import { PREDICTION_FIELDS } from '../constants';
import type { PredictionRecord } from '../types';

const NEEDS_QUOTING = /[",\r\n]/;

export function escapeCsvField(value: string | number): string {
    const text = String(value);
    return NEEDS_QUOTING.test(text) ? `"${text.replace(/"/g, '""')}"` : text;
}

export const ExportEncoder = {

    toCsv(records: PredictionRecord[]): string {
        const lines = [PREDICTION_FIELDS.join(',')];
        for (const r of records) {
            lines.push(PREDICTION_FIELDS.map(f => escapeCsvField(r[f])).join(','));
        }
        return lines.join('\n') + '\n';
    },

    // UTF-8 bytes of toCsv; pure, so repeated calls are byte-identical.
    encode(records: PredictionRecord[]): Buffer {
        return Buffer.from(this.toCsv(records), 'utf-8');
    }
};
