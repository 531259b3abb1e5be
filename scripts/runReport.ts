import * as fs from 'fs';
import * as path from 'path';

import { loadNotificationConfig, loadOracleConfig } from '../src/config/reportConfig';
import { EXPORT_FILENAME, RISK_LEVELS } from '../src/constants';
import { FaultReportPipeline } from '../src/services/faultReportPipeline';
import { FilterEngine } from '../src/services/filterEngine';
import { SessionNotificationState } from '../src/services/notification/sessionNotificationState';
import { createOracle } from '../src/services/oracle/oracleFactory';
import { classifyPipelineError } from '../src/services/pipelineErrors';
import { parseRiskLevel } from '../src/services/predictionAdapter';
import type { RiskLevel } from '../src/types';

interface ReportArgs {
    files: string[];
    sites: string[];
    riskLevels: RiskLevel[];
    out: string;
}

// Usage: runReport <files...> [--site S]... [--risk LEVEL]... [--out path]
function parseReportArgs(argv: string[]): ReportArgs {
    const args: ReportArgs = { files: [], sites: [], riskLevels: [], out: path.join(process.cwd(), EXPORT_FILENAME) };

    for (let i = 0; i < argv.length; i++) {
        const arg = argv[i];
        const next = () => {
            const value = argv[++i];
            if (value === undefined) throw new Error(`${arg} needs a value`);
            return value;
        };

        if (arg === '--site') {
            args.sites.push(next());
        } else if (arg === '--risk') {
            const raw = next();
            const level = parseRiskLevel(raw);
            if (!level) throw new Error(`unknown risk level "${raw}"`);
            args.riskLevels.push(level);
        } else if (arg === '--out') {
            args.out = next();
        } else {
            args.files.push(arg);
        }
    }

    if (args.riskLevels.length === 0) args.riskLevels = [...RISK_LEVELS];
    return args;
}

async function main() {
    const args = parseReportArgs(process.argv.slice(2));
    if (args.files.length === 0) {
        console.error('Usage: runReport <files...> [--site S]... [--risk LEVEL]... [--out path]');
        process.exitCode = 2;
        return;
    }

    const files = args.files.map(f => ({ name: path.basename(f), content: new Uint8Array(fs.readFileSync(f)) }));
    const outcome = await FaultReportPipeline.run({
        files,
        oracle: () => createOracle(loadOracleConfig()),
        criteria: FilterEngine.criteria(args.sites, args.riskLevels),
        session: new SessionNotificationState(),
        notification: { config: loadNotificationConfig() }
    });

    for (const f of outcome.files) {
        console.log(`${f.status.padEnd(8)} ${f.file}${f.error ? ` (${f.error})` : ''}`);
    }

    if (outcome.status === 'HALTED') {
        console.log(outcome.message);
        process.exitCode = outcome.reason === 'EMPTY_BATCH' || outcome.reason === 'PREDICTION_FAILURE' ? 1 : 0;
        return;
    }

    const { views, exportFile, notification } = outcome.report;
    console.log('\nFault probability');
    for (const g of views.faultProbability) console.log(`  ${g.fault}: ${g.points.map(p => `${p.probability_percent}%`).join(', ')}`);
    console.log('Risk distribution');
    for (const e of views.riskDistribution) console.log(`  ${e.risk_level}: ${e.count}`);
    console.log('Site counts');
    for (const e of views.siteCounts) console.log(`  ${e.site}: ${e.count}`);

    fs.writeFileSync(args.out, exportFile.content);
    console.log(`\nWrote ${args.out}`);
    console.log(`Email: ${notification.status}`);
}

main().catch(e => {
    const err = classifyPipelineError(e);
    console.error(`[Report] ${err.kind}: ${err.message}`);
    process.exitCode = 1;
});
