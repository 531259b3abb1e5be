export type RiskLevel = 'LOW' | 'MEDIUM' | 'HIGH';

// Cell payloads as read from delimited text or a spreadsheet sheet.
// `null` is the absent marker: the column does not exist for that row.
export type CellValue = string | number | boolean | null;

export interface RawTable {
    sourceFile: string;
    columns: string[]; // may repeat, arbitrary casing/spacing
    rows: CellValue[][];
}

export interface NormalizedTable {
    sourceFile: string;
    columns: string[]; // unique, includes SOURCE_FILE_COLUMN
    rows: CellValue[][];
}

export interface MergedTable {
    columns: string[];
    rows: CellValue[][];
    sourceFiles: string[];
}

export interface PredictionRecord {
    site: string;
    location: string;
    fault: string;
    probability_percent: number;
    risk_level: RiskLevel;
    possible_cause: string;
    recommendation: string;
    team: string;
}

export interface FilterCriteria {
    sites: ReadonlySet<string>; // empty = every site passes
    riskLevels: ReadonlySet<RiskLevel>; // empty = nothing passes
}

export interface FaultProbabilityPoint {
    site: string;
    location: string;
    probability_percent: number;
    risk_level: RiskLevel;
}

export interface FaultProbabilityGroup {
    fault: string;
    peakProbability: number;
    points: FaultProbabilityPoint[];
}

export interface RiskDistributionEntry {
    risk_level: RiskLevel;
    count: number;
}

export interface SiteCountEntry {
    site: string;
    count: number;
}

export interface AggregationViews {
    faultProbability: FaultProbabilityGroup[];
    riskDistribution: RiskDistributionEntry[];
    siteCounts: SiteCountEntry[];
}

/**
 * Contract with the external fault-prediction capability.
 * Returns mapping-like records keyed by ORACLE_KEYS; the adapter validates them.
 */
export interface FaultOracle {
    readonly name: string;
    predict(table: MergedTable): Promise<unknown[]> | unknown[];
}

// A ready oracle, or a factory that may throw when its settings are missing.
export type OracleSource = FaultOracle | (() => FaultOracle);

export interface UploadedFile {
    name: string;
    content: Uint8Array | string;
}

export interface IngestionFileReport {
    file: string;
    status: 'ACCEPTED' | 'REJECTED';
    rowsRead: number;
    rowsSkipped: number;
    columnsDropped: string[];
    error?: string;
}
