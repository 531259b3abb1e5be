export class MalformedTableError extends Error {
    readonly code = 'MALFORMED_TABLE';

    constructor(readonly fileName: string, detail: string) {
        super(`${fileName}: ${detail}`);
        this.name = 'MalformedTableError';
    }
}

export class EmptyBatchError extends Error {
    readonly code = 'EMPTY_BATCH';

    constructor(message = 'No valid files uploaded.') {
        super(message);
        this.name = 'EmptyBatchError';
    }
}

export class PredictionFailure extends Error {
    readonly code = 'PREDICTION_FAILURE';

    constructor(readonly oracleName: string, readonly oracleError: unknown) {
        super(`Oracle "${oracleName}" failed: ${describeError(oracleError)}`);
        this.name = 'PredictionFailure';
    }
}

export type PipelineErrorKind =
    | { kind: 'MALFORMED_TABLE'; fileName: string; message: string }
    | { kind: 'EMPTY_BATCH'; message: string }
    | { kind: 'PREDICTION_FAILURE'; oracle: string; message: string }
    | { kind: 'UNKNOWN'; message: string };

export function describeError(e: unknown): string {
    if (e instanceof Error) return e.message;
    if (typeof e === 'string') return e;
    try {
        return JSON.stringify(e) ?? String(e);
    } catch {
        return String(e);
    }
}

export function classifyPipelineError(e: unknown): PipelineErrorKind {
    if (e instanceof MalformedTableError) {
        return { kind: 'MALFORMED_TABLE', fileName: e.fileName, message: e.message };
    }
    if (e instanceof EmptyBatchError) {
        return { kind: 'EMPTY_BATCH', message: e.message };
    }
    if (e instanceof PredictionFailure) {
        return { kind: 'PREDICTION_FAILURE', oracle: e.oracleName, message: e.message };
    }
    return { kind: 'UNKNOWN', message: describeError(e) };
}
