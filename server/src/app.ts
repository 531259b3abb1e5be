import express, { type Request, type Response } from 'express';
import cors from 'cors';
import type { NotificationConfig } from '../../src/config/reportConfig';
import { toReportUiModel } from '../../src/console/reportUiModel';
import { EXPORT_MIME_TYPE } from '../../src/constants';
import { FaultReportPipeline, type PipelineOutcome } from '../../src/services/faultReportPipeline';
import { FilterEngine } from '../../src/services/filterEngine';
import { type MailerFactory, parseRecipients } from '../../src/services/notificationDispatcher';
import { classifyPipelineError } from '../../src/services/pipelineErrors';
import { parseRiskLevel } from '../../src/services/predictionAdapter';
import { ReportSessionStore } from '../../src/services/reportSessionStore';
import type { FaultOracle, FilterCriteria, RiskLevel, UploadedFile } from '../../src/types';

export interface AppDeps {
    oracle: () => FaultOracle;
    notification: NotificationConfig;
    mailerFactory?: MailerFactory;
    sessions?: ReportSessionStore;
    uploadLimit?: string;
}

class BadRequest extends Error {}

const SESSION_HEADER = 'X-Session-Id';

function parseFiles(body: unknown): UploadedFile[] {
    const files = typeof body === 'object' && body !== null && 'files' in body ? body.files : undefined;
    if (!Array.isArray(files) || files.length === 0) throw new BadRequest('files must be a non-empty array');

    return files.map((f: unknown, i) => {
        if (typeof f !== 'object' || f === null) throw new BadRequest(`files[${i}] must be an object`);
        const name = 'name' in f ? f.name : undefined;
        const content = 'contentBase64' in f ? f.contentBase64 : undefined;
        if (typeof name !== 'string' || name.length === 0) throw new BadRequest(`files[${i}].name is required`);
        if (typeof content !== 'string') throw new BadRequest(`files[${i}].contentBase64 is required`);
        return { name, content: new Uint8Array(Buffer.from(content, 'base64')) };
    });
}

function stringList(value: unknown, field: string): string[] | undefined {
    if (value === undefined) return undefined;
    if (!Array.isArray(value) || !value.every((v): v is string => typeof v === 'string')) {
        throw new BadRequest(`${field} must be an array of strings`);
    }
    return value;
}

function parseCriteria(body: unknown): FilterCriteria {
    const filters = typeof body === 'object' && body !== null && 'filters' in body ? body.filters : undefined;
    const defaults = FilterEngine.defaultCriteria();
    if (filters === undefined || filters === null) return defaults;
    if (typeof filters !== 'object') throw new BadRequest('filters must be an object');

    const sites = stringList('sites' in filters ? filters.sites : undefined, 'filters.sites');
    const rawLevels = stringList('riskLevels' in filters ? filters.riskLevels : undefined, 'filters.riskLevels');

    let riskLevels: RiskLevel[] | undefined;
    if (rawLevels) {
        riskLevels = rawLevels.map(raw => {
            const level = parseRiskLevel(raw);
            if (!level) throw new BadRequest(`unknown risk level "${raw}"`);
            return level;
        });
    }

    return FilterEngine.criteria(sites ?? defaults.sites, riskLevels ?? defaults.riskLevels);
}

function summarize(outcome: PipelineOutcome) {
    const base = {
        runId: outcome.runId,
        files: outcome.files,
        rejectedPredictions: outcome.rejectedPredictions,
        warnings: outcome.warnings,
        timingsMs: outcome.timingsMs
    };
    if (outcome.status === 'HALTED') {
        return { ...base, status: outcome.status, reason: outcome.reason, message: outcome.message, siteOptions: outcome.siteOptions };
    }
    const { report } = outcome;
    return {
        ...base,
        status: outcome.status,
        siteOptions: report.siteOptions,
        totalPredictions: report.predictions.length,
        records: report.filtered,
        views: report.views,
        charts: toReportUiModel(report.views),
        notification: report.notification
    };
}

export function createApp(deps: AppDeps) {
    const app = express();
    const sessions = deps.sessions ?? new ReportSessionStore();

    app.use(cors({
        origin: true,
        methods: ['GET', 'POST', 'OPTIONS'],
        allowedHeaders: ['Content-Type', SESSION_HEADER],
        exposedHeaders: [SESSION_HEADER, 'Content-Disposition']
    }));
    app.use(express.json({ limit: deps.uploadLimit ?? '50mb' }));

    app.get('/healthz', (req, res) => {
        res.json({
            ok: true,
            ts: new Date().toISOString(),
            sessions: sessions.size,
            env: {
                hasSender: !!(deps.notification.senderAddress && deps.notification.senderCredential),
                recipientCount: parseRecipients(deps.notification.recipients).length
            }
        });
    });

    const runPipeline = async (req: Request, res: Response): Promise<PipelineOutcome> => {
        const files = parseFiles(req.body);
        const criteria = parseCriteria(req.body);
        const session = sessions.resolve(req.header(SESSION_HEADER));
        res.setHeader(SESSION_HEADER, session.id);

        return FaultReportPipeline.run({
            files,
            criteria,
            oracle: deps.oracle,
            session: session.notification,
            notification: { config: deps.notification, mailerFactory: deps.mailerFactory }
        });
    };

    const fail = (res: Response, e: unknown) => {
        if (e instanceof BadRequest) {
            res.status(400).json({ error: e.message });
            return;
        }
        const classified = classifyPipelineError(e);
        console.error(`[Server] request failed: ${classified.kind} - ${classified.message}`);
        res.status(500).json({ error: classified.message, kind: classified.kind });
    };

    app.post('/reports/run', async (req, res) => {
        try {
            const outcome = await runPipeline(req, res);
            res.json(summarize(outcome));
        } catch (e) {
            fail(res, e);
        }
    });

    app.post('/reports/export', async (req, res) => {
        try {
            const outcome = await runPipeline(req, res);
            if (outcome.status === 'HALTED') {
                res.status(422).json({ reason: outcome.reason, message: outcome.message, warnings: outcome.warnings });
                return;
            }
            const { exportFile } = outcome.report;
            res.setHeader('Content-Type', `${EXPORT_MIME_TYPE}; charset=utf-8`);
            res.setHeader('Content-Disposition', `attachment; filename="${exportFile.fileName}"`);
            res.send(exportFile.content);
        } catch (e) {
            fail(res, e);
        }
    });

    return app;
}
