import { RISK_COLORS, RISK_LEVELS } from '../constants';
import type { AggregationViews, RiskLevel } from '../types';

/**
 * Chart-ready series for any presentation layer. Pure projection of the views.
 */
export interface FaultBar {
    fault: string;
    probability_percent: number;
    risk_level: RiskLevel;
    color: string;
    tooltip: { site: string; location: string; fault: string; probability_percent: number; risk_level: RiskLevel };
}

export interface RiskSlice {
    risk_level: RiskLevel;
    count: number;
    color: string;
}

export interface SiteBar {
    site: string;
    count: number;
}

export interface ReportUiModel {
    colorScale: { domain: RiskLevel[]; range: string[] };
    faultOrder: string[];
    faultBars: FaultBar[];
    riskPie: RiskSlice[];
    siteBars: SiteBar[];
}

export function toReportUiModel(views: AggregationViews): ReportUiModel {
    const faultBars: FaultBar[] = [];
    for (const group of views.faultProbability) {
        for (const p of group.points) {
            faultBars.push({
                fault: group.fault,
                probability_percent: p.probability_percent,
                risk_level: p.risk_level,
                color: RISK_COLORS[p.risk_level],
                tooltip: {
                    site: p.site,
                    location: p.location,
                    fault: group.fault,
                    probability_percent: p.probability_percent,
                    risk_level: p.risk_level
                }
            });
        }
    }

    return {
        colorScale: { domain: [...RISK_LEVELS], range: RISK_LEVELS.map(l => RISK_COLORS[l]) },
        faultOrder: views.faultProbability.map(g => g.fault),
        faultBars,
        riskPie: views.riskDistribution.map(e => ({ ...e, color: RISK_COLORS[e.risk_level] })),
        siteBars: views.siteCounts.map(e => ({ site: e.site, count: e.count }))
    };
}
