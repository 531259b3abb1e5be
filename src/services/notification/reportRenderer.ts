import { ORACLE_KEYS, PREDICTION_FIELDS, REPORT_TITLE } from '../../constants';
import type { PredictionRecord } from '../../types';

export interface RenderedReport {
    subject: string;
    text: string;
    html: string;
}

const RULE = '----------------------------------------';

const HTML_ESCAPES: Record<string, string> = {
    '&': '&amp;',
    '<': '&lt;',
    '>': '&gt;',
    '"': '&quot;',
    "'": '&#39;'
};

export function escapeHtml(value: string | number): string {
    return String(value).replace(/[&<>"']/g, ch => HTML_ESCAPES[ch] ?? ch);
}

function renderText(records: PredictionRecord[]): string {
    const blocks = records.map(r => [
        `Site          : ${r.site}`,
        `Location      : ${r.location}`,
        `Fault         : ${r.fault}`,
        `Probability   : ${r.probability_percent}%`,
        `Risk Level    : ${r.risk_level}`,
        `Cause         : ${r.possible_cause}`,
        `Recommendation: ${r.recommendation}`,
        `Team          : ${r.team}`,
        RULE
    ].join('\n'));
    return `${REPORT_TITLE}\n\n${blocks.join('\n')}\n`;
}

function renderHtml(records: PredictionRecord[]): string {
    const head = PREDICTION_FIELDS.map(f => `<th>${escapeHtml(ORACLE_KEYS[f])}</th>`).join('');
    const body = records.map(r => {
        return `<tr>${PREDICTION_FIELDS.map(f => `<td>${escapeHtml(r[f])}</td>`).join('')}</tr>`;
    }).join('');
    return `<h2>${escapeHtml(REPORT_TITLE)}</h2><table border="1" cellpadding="4"><thead><tr>${head}</tr></thead><tbody>${body}</tbody></table>`;
}

export function renderReport(records: PredictionRecord[]): RenderedReport {
    return { subject: REPORT_TITLE, text: renderText(records), html: renderHtml(records) };
}
