import type { NotificationConfig } from '../config/reportConfig';
import { EXPORT_FILENAME } from '../constants';
import type {
    AggregationViews,
    FaultOracle,
    FilterCriteria,
    IngestionFileReport,
    MergedTable,
    OracleSource,
    PredictionRecord,
    UploadedFile
} from '../types';
import { TableMerger } from './alarmIngestion/tableMerger';
import { Aggregator } from './aggregator';
import { AlarmIngestionService } from './alarmIngestionService';
import { ExportEncoder } from './exportEncoder';
import { FilterEngine } from './filterEngine';
import { SessionNotificationState } from './notification/sessionNotificationState';
import { type MailerFactory, NotificationDispatcher, type NotificationOutcome } from './notificationDispatcher';
import { EmptyBatchError, PredictionFailure } from './pipelineErrors';
import { PredictionAdapter, type RejectedPrediction } from './predictionAdapter';

export interface PipelineRunOptions {
    files: UploadedFile[];
    oracle: OracleSource;
    session: SessionNotificationState;
    criteria?: FilterCriteria;
    // Omitted: the report is built but no email is attempted.
    notification?: {
        config: NotificationConfig;
        mailerFactory?: MailerFactory;
    };
}

export type HaltReason = 'EMPTY_BATCH' | 'PREDICTION_FAILURE' | 'NO_RISK_DETECTED' | 'NO_FILTER_MATCH';

export interface ExportArtifact {
    fileName: string;
    content: Buffer;
}

export interface FaultReport {
    predictions: PredictionRecord[];
    filtered: PredictionRecord[];
    siteOptions: string[];
    views: AggregationViews;
    exportFile: ExportArtifact;
    notification: NotificationOutcome;
}

interface RunMeta {
    runId: string;
    files: IngestionFileReport[];
    rejectedPredictions: RejectedPrediction[];
    warnings: string[];
    timingsMs: Record<string, number>;
}

export type PipelineOutcome =
    | (RunMeta & { status: 'REPORT'; report: FaultReport })
    | (RunMeta & { status: 'HALTED'; reason: HaltReason; message: string; siteOptions: string[] });

export const HALT_MESSAGES: Record<HaltReason, string> = {
    EMPTY_BATCH: 'No valid files uploaded.',
    PREDICTION_FAILURE: 'Fault prediction failed.',
    NO_RISK_DETECTED: 'No significant future fault risk detected.',
    NO_FILTER_MATCH: 'No results match the selected filters.'
};

let runCounter = 0;

function resolveOracle(source: OracleSource): FaultOracle {
    if ('predict' in source) return source;
    try {
        return source();
    } catch (e) {
        throw new PredictionFailure('unconfigured', e);
    }
}

export const FaultReportPipeline = {

    /**
     * One pass from uploaded files to report. Halting conditions come back as a
     * HALTED outcome; only unexpected errors are thrown.
     */
    async run(opts: PipelineRunOptions): Promise<PipelineOutcome> {
        runCounter++;
        const runId = `RUN_${Date.now()}_${runCounter}`;
        const meta: RunMeta = { runId, files: [], rejectedPredictions: [], warnings: [], timingsMs: {} };

        const timed = async <T>(stage: string, fn: () => T | Promise<T>): Promise<T> => {
            const start = Date.now();
            try {
                return await fn();
            } finally {
                meta.timingsMs[stage] = Date.now() - start;
            }
        };

        const halt = (reason: HaltReason, message: string, siteOptions: string[] = []): PipelineOutcome => {
            console.warn(`[Pipeline] ${runId} halted: ${reason} - ${message}`);
            return { ...meta, status: 'HALTED', reason, message, siteOptions };
        };

        console.log(`[Pipeline] ${runId} starting with ${opts.files.length} file(s)`);

        // 1. Ingest + normalize, per-file failures contained
        const ingestion = await timed('ingest', () => AlarmIngestionService.ingestBatch(opts.files));
        meta.files = ingestion.reports;
        for (const r of ingestion.reports) {
            if (r.status === 'REJECTED') meta.warnings.push(r.error ?? `${r.file}: rejected`);
        }

        // 2. Merge
        let merged: MergedTable;
        try {
            merged = await timed('merge', () => TableMerger.merge(ingestion.tables));
        } catch (e) {
            if (!(e instanceof EmptyBatchError)) throw e;
            const rejected = ingestion.reports.filter(r => r.status === 'REJECTED').map(r => r.file);
            const detail = rejected.length > 0 ? ` Rejected: ${rejected.join(', ')}.` : '';
            return halt('EMPTY_BATCH', `${HALT_MESSAGES.EMPTY_BATCH}${detail}`);
        }

        // 3. Predict
        let predictions: PredictionRecord[];
        try {
            const table = merged;
            const oracle = resolveOracle(opts.oracle);
            const batch = await timed('predict', () => PredictionAdapter.predict(oracle, table));
            predictions = batch.records;
            meta.rejectedPredictions = batch.rejected;
        } catch (e) {
            if (!(e instanceof PredictionFailure)) throw e;
            return halt('PREDICTION_FAILURE', `${HALT_MESSAGES.PREDICTION_FAILURE} ${e.message}`);
        }
        if (predictions.length === 0) {
            return halt('NO_RISK_DETECTED', HALT_MESSAGES.NO_RISK_DETECTED);
        }

        // 4. Filter
        const siteOptions = FilterEngine.siteOptions(predictions);
        const criteria = opts.criteria ?? FilterEngine.defaultCriteria();
        const filtered = FilterEngine.apply(predictions, criteria);
        if (filtered.length === 0) {
            return halt('NO_FILTER_MATCH', HALT_MESSAGES.NO_FILTER_MATCH, siteOptions);
        }
        console.log(`[Filter] ${filtered.length} of ${predictions.length} prediction(s) kept`);

        // 5. Views + export
        const views = Aggregator.aggregate(filtered);
        const exportFile: ExportArtifact = { fileName: EXPORT_FILENAME, content: ExportEncoder.encode(filtered) };

        // 6. Notify, once per session
        const channel = opts.notification;
        const notification: NotificationOutcome = channel
            ? await timed('notify', () => NotificationDispatcher.dispatch({
                records: filtered,
                config: channel.config,
                state: opts.session,
                mailerFactory: channel.mailerFactory
            }))
            : { status: 'SKIPPED', ok: false, reason: 'Email not configured' };

        if (notification.status === 'SKIPPED') meta.warnings.push(notification.reason);
        if (notification.status === 'FAILED') meta.warnings.push(`Email failed: ${notification.error}`);

        console.log(`[Pipeline] ${runId} complete: ${filtered.length} record(s), notification ${notification.status}`);

        return {
            ...meta,
            status: 'REPORT',
            report: { predictions, filtered, siteOptions, views, exportFile, notification }
        };
    }
};
