import { ORACLE_KEYS, PREDICTION_FIELDS, RISK_LEVELS } from '../constants';
import type { FaultOracle, MergedTable, PredictionRecord, RiskLevel } from '../types';
import { PredictionFailure } from './pipelineErrors';

export interface RejectedPrediction {
    index: number;
    reason: string;
}

export interface PredictionBatch {
    records: PredictionRecord[];
    rejected: RejectedPrediction[];
}

type Validation = { ok: true; record: PredictionRecord } | { ok: false; reason: string };

const isMapping = (v: unknown): v is Record<string, unknown> =>
    typeof v === 'object' && v !== null && !Array.isArray(v);

export function parseProbability(value: unknown): number | null {
    let num: number;
    if (typeof value === 'number') {
        num = value;
    } else if (typeof value === 'string') {
        const cleaned = value.trim().replace(/%$/, '').trim();
        if (cleaned.length === 0) return null;
        num = Number(cleaned);
    } else {
        return null;
    }
    return Number.isFinite(num) && num >= 0 && num <= 100 ? num : null;
}

export function parseRiskLevel(value: unknown): RiskLevel | null {
    if (typeof value !== 'string') return null;
    const upper = value.trim().toUpperCase();
    return RISK_LEVELS.find(level => level === upper) ?? null;
}

function textField(value: unknown): string | null {
    if (typeof value === 'string') return value.trim();
    if (typeof value === 'number' || typeof value === 'boolean') return String(value);
    return null;
}

export function validatePrediction(raw: unknown): Validation {
    if (!isMapping(raw)) return { ok: false, reason: 'not a mapping' };

    const missing = PREDICTION_FIELDS.filter(f => !(ORACLE_KEYS[f] in raw)).map(f => ORACLE_KEYS[f]);
    if (missing.length > 0) return { ok: false, reason: `missing ${missing.join(', ')}` };

    const probability = parseProbability(raw[ORACLE_KEYS.probability_percent]);
    if (probability === null) return { ok: false, reason: 'probability outside [0, 100] or not numeric' };

    const risk = parseRiskLevel(raw[ORACLE_KEYS.risk_level]);
    if (risk === null) return { ok: false, reason: `unknown risk level ${String(raw[ORACLE_KEYS.risk_level])}` };

    const site = textField(raw[ORACLE_KEYS.site]);
    const fault = textField(raw[ORACLE_KEYS.fault]);
    if (!site) return { ok: false, reason: 'blank site' };
    if (!fault) return { ok: false, reason: 'blank fault' };

    return {
        ok: true,
        record: {
            site,
            location: textField(raw[ORACLE_KEYS.location]) ?? '',
            fault,
            probability_percent: probability,
            risk_level: risk,
            possible_cause: textField(raw[ORACLE_KEYS.possible_cause]) ?? '',
            recommendation: textField(raw[ORACLE_KEYS.recommendation]) ?? '',
            team: textField(raw[ORACLE_KEYS.team]) ?? ''
        }
    };
}

export const PredictionAdapter = {

    /**
     * One oracle call, no retry. A thrown or non-array result is a PredictionFailure;
     * individual records that fail validation are dropped and reported.
     */
    async predict(oracle: FaultOracle, table: MergedTable): Promise<PredictionBatch> {
        let output: unknown;
        try {
            output = await oracle.predict(table);
        } catch (e) {
            throw new PredictionFailure(oracle.name, e);
        }
        if (!Array.isArray(output)) {
            throw new PredictionFailure(oracle.name, `expected an array, got ${output === null ? 'null' : typeof output}`);
        }

        const records: PredictionRecord[] = [];
        const rejected: RejectedPrediction[] = [];

        output.forEach((raw: unknown, index) => {
            const result = validatePrediction(raw);
            if (result.ok) {
                records.push(result.record);
            } else {
                rejected.push({ index, reason: result.reason });
            }
        });

        if (rejected.length > 0) {
            console.warn(`[Oracle] ${oracle.name}: dropped ${rejected.length} of ${output.length} record(s)`, rejected.slice(0, 5));
        }
        console.log(`[Oracle] ${oracle.name}: ${records.length} valid prediction(s)`);

        return { records, rejected };
    }
};
