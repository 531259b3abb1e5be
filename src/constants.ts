import type { PredictionRecord, RiskLevel } from './types';

// Presentation order, lowest first. Also the colour-scale domain.
export const RISK_LEVELS: readonly RiskLevel[] = ['LOW', 'MEDIUM', 'HIGH'];

export const RISK_COLORS: Record<RiskLevel, string> = {
    LOW: '#2ecc71',
    MEDIUM: '#f1c40f',
    HIGH: '#e74c3c'
};

export const COLUMN_SEPARATOR = '_';
export const SOURCE_FILE_COLUMN = 'source_file';

// Case-sensitive keys the oracle emits, mapped onto PredictionRecord fields.
export const ORACLE_KEYS = {
    site: 'Site',
    location: 'Location',
    fault: 'Fault',
    probability_percent: 'Probability (%)',
    risk_level: 'Risk Level',
    possible_cause: 'Possible Cause',
    recommendation: 'Recommendation',
    team: 'Team'
} as const satisfies Record<keyof PredictionRecord, string>;

export const PREDICTION_FIELDS: readonly (keyof PredictionRecord)[] = [
    'site',
    'location',
    'fault',
    'probability_percent',
    'risk_level',
    'possible_cause',
    'recommendation',
    'team'
];

export const REPORT_TITLE = 'Future Fault Prediction Report';
export const EXPORT_FILENAME = 'future_fault_report.csv';
export const EXPORT_MIME_TYPE = 'text/csv';

export const DELIMITED_EXTENSIONS = ['.csv', '.txt'];
export const SPREADSHEET_EXTENSIONS = ['.xlsx', '.xls'];
export const CANDIDATE_DELIMITERS = [',', ';', '\t', '|'];
