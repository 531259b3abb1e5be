import { describe, it, expect } from 'vitest';
import { csvFile, fakeMailer, fixedOracle, notificationConfig, rowOracle } from '../testing/fakes';
import { FaultReportPipeline, type PipelineOutcome } from './faultReportPipeline';
import { FilterEngine } from './filterEngine';
import { SessionNotificationState } from './notification/sessionNotificationState';

const siteAFile = csvFile('site_a.csv', [
    'Site,Alarm,Severity',
    'A,Link Down,major',
    'A,Power Fail,major',
    'A,Fan,major',
    'A,Link Down,major',
    'A,Door Open,major'
]);

const siteBFile = csvFile('site_b.csv', [
    'site;ALARM;severity',
    'B;Fan;minor',
    'B;Door Open;minor',
    'B;Link Down;minor'
]);

function expectReport(outcome: PipelineOutcome) {
    if (outcome.status !== 'REPORT') throw new Error(`expected a report, got ${outcome.reason}`);
    return outcome;
}

describe('FaultReportPipeline.run', () => {
    it('filters two merged files down to the HIGH-risk site', async () => {
        const mailer = fakeMailer();
        const outcome = expectReport(await FaultReportPipeline.run({
            files: [siteAFile, siteBFile],
            oracle: rowOracle(),
            criteria: FilterEngine.criteria([], ['HIGH']),
            session: new SessionNotificationState(),
            notification: { config: notificationConfig(), mailerFactory: mailer.factory }
        }));

        const { report } = outcome;
        expect(report.predictions).toHaveLength(8);
        expect(report.filtered).toHaveLength(5);
        expect(report.filtered.every(r => r.site === 'A')).toBe(true);
        expect(report.views.siteCounts).toEqual([{ site: 'A', count: 5 }]);
        expect(report.views.riskDistribution).toEqual([
            { risk_level: 'LOW', count: 0 },
            { risk_level: 'MEDIUM', count: 0 },
            { risk_level: 'HIGH', count: 5 }
        ]);
        expect(report.siteOptions).toEqual(['A', 'B']);
        expect(report.exportFile.fileName).toBe('future_fault_report.csv');
        expect(report.exportFile.content.toString('utf-8').split('\n')).toHaveLength(7);
        expect(report.notification.status).toBe('SENT');
        expect(outcome.files.map(f => f.status)).toEqual(['ACCEPTED', 'ACCEPTED']);
    });

    it('hands the oracle one merged table with provenance per row', async () => {
        const oracle = rowOracle();
        await FaultReportPipeline.run({ files: [siteAFile, siteBFile], oracle, session: new SessionNotificationState() });

        const table = expect.objectContaining({
            columns: ['site', 'alarm', 'severity', 'source_file'],
            sourceFiles: ['site_a.csv', 'site_b.csv']
        });
        expect(oracle.predict).toHaveBeenCalledWith(table);
    });

    it('halts with NO_RISK_DETECTED when the oracle returns nothing', async () => {
        const mailer = fakeMailer();
        const outcome = await FaultReportPipeline.run({
            files: [siteAFile],
            oracle: fixedOracle([]),
            session: new SessionNotificationState(),
            notification: { config: notificationConfig(), mailerFactory: mailer.factory }
        });

        expect(outcome.status).toBe('HALTED');
        expect(outcome.status === 'HALTED' && outcome.reason).toBe('NO_RISK_DETECTED');
        expect(mailer.factory).not.toHaveBeenCalled();
    });

    it('halts with NO_FILTER_MATCH when no risk level is selected', async () => {
        const outcome = await FaultReportPipeline.run({
            files: [siteAFile, siteBFile],
            oracle: rowOracle(),
            criteria: FilterEngine.criteria([], []),
            session: new SessionNotificationState()
        });

        expect(outcome).toMatchObject({
            status: 'HALTED',
            reason: 'NO_FILTER_MATCH',
            message: 'No results match the selected filters.',
            siteOptions: ['A', 'B']
        });
    });

    it('halts with EMPTY_BATCH when every file is rejected', async () => {
        const oracle = rowOracle();
        const outcome = await FaultReportPipeline.run({
            files: [{ name: 'log.pdf', content: 'x' }, { name: 'blank.csv', content: '' }],
            oracle,
            session: new SessionNotificationState()
        });

        expect(outcome).toMatchObject({
            status: 'HALTED',
            reason: 'EMPTY_BATCH',
            message: 'No valid files uploaded. Rejected: log.pdf, blank.csv.'
        });
        expect(outcome.warnings).toEqual([
            'log.pdf: unsupported file type ".pdf"',
            'blank.csv: table has no columns'
        ]);
        expect(oracle.predict).not.toHaveBeenCalled();
    });

    it('halts with PREDICTION_FAILURE when the oracle throws', async () => {
        const outcome = await FaultReportPipeline.run({
            files: [siteAFile],
            oracle: { name: 'down', predict: async () => { throw new Error('timeout'); } },
            session: new SessionNotificationState()
        });

        expect(outcome).toMatchObject({
            status: 'HALTED',
            reason: 'PREDICTION_FAILURE',
            message: 'Fault prediction failed. Oracle "down" failed: timeout'
        });
    });

    it('halts with PREDICTION_FAILURE when the oracle cannot be built', async () => {
        const outcome = await FaultReportPipeline.run({
            files: [siteAFile],
            oracle: () => { throw new Error('Oracle endpoint missing. Please set ORACLE_URL.'); },
            session: new SessionNotificationState()
        });

        expect(outcome).toMatchObject({
            status: 'HALTED',
            reason: 'PREDICTION_FAILURE',
            message: 'Fault prediction failed. Oracle "unconfigured" failed: Oracle endpoint missing. Please set ORACLE_URL.'
        });
    });

    it('continues past a bad file and reports it', async () => {
        const outcome = expectReport(await FaultReportPipeline.run({
            files: [{ name: 'scan.png', content: 'x' }, siteBFile],
            oracle: rowOracle(),
            session: new SessionNotificationState()
        }));

        expect(outcome.files.map(f => `${f.file}:${f.status}`)).toEqual(['scan.png:REJECTED', 'site_b.csv:ACCEPTED']);
        expect(outcome.report.filtered).toHaveLength(3);
        expect(outcome.warnings).toEqual(['scan.png: unsupported file type ".png"', 'Email not configured']);
    });

    it('emails once across repeated runs of one session', async () => {
        const mailer = fakeMailer();
        const session = new SessionNotificationState();
        const run = (riskLevels: ('HIGH' | 'LOW')[]) => FaultReportPipeline.run({
            files: [siteAFile, siteBFile],
            oracle: rowOracle(),
            criteria: FilterEngine.criteria([], riskLevels),
            session,
            notification: { config: notificationConfig(), mailerFactory: mailer.factory }
        });

        const statuses: string[] = [];
        for (const levels of [['HIGH', 'LOW'], ['HIGH'], ['LOW']] as const) {
            statuses.push(expectReport(await run([...levels])).report.notification.status);
        }

        expect(statuses).toEqual(['SENT', 'ALREADY_SENT', 'ALREADY_SENT']);
        expect(mailer.send).toHaveBeenCalledTimes(1);
    });
});
