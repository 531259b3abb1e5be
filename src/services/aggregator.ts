import { RISK_LEVELS } from '../constants';
import type {
    AggregationViews,
    FaultProbabilityGroup,
    PredictionRecord,
    RiskDistributionEntry,
    RiskLevel,
    SiteCountEntry
} from '../types';

export const Aggregator = {

    /**
     * Groups by fault without collapsing probabilities. Groups are ordered by
     * their highest probability, descending; ties keep first-seen order.
     */
    faultProbability(records: PredictionRecord[]): FaultProbabilityGroup[] {
        const groups = new Map<string, FaultProbabilityGroup>();
        for (const r of records) {
            let group = groups.get(r.fault);
            if (!group) {
                group = { fault: r.fault, peakProbability: r.probability_percent, points: [] };
                groups.set(r.fault, group);
            }
            group.peakProbability = Math.max(group.peakProbability, r.probability_percent);
            group.points.push({
                site: r.site,
                location: r.location,
                probability_percent: r.probability_percent,
                risk_level: r.risk_level
            });
        }
        // Array.prototype.sort is stable, which gives the first-seen tie-break.
        return Array.from(groups.values()).sort((a, b) => b.peakProbability - a.peakProbability);
    },

    // Always all three levels, LOW -> HIGH, zero-filled.
    riskDistribution(records: PredictionRecord[]): RiskDistributionEntry[] {
        const counts: Record<RiskLevel, number> = { LOW: 0, MEDIUM: 0, HIGH: 0 };
        for (const r of records) counts[r.risk_level]++;
        return RISK_LEVELS.map(level => ({ risk_level: level, count: counts[level] }));
    },

    siteCounts(records: PredictionRecord[]): SiteCountEntry[] {
        const counts = new Map<string, number>();
        for (const r of records) counts.set(r.site, (counts.get(r.site) ?? 0) + 1);
        return Array.from(counts.entries())
            .map(([site, count]) => ({ site, count }))
            .sort((a, b) => b.count - a.count || (a.site < b.site ? -1 : a.site > b.site ? 1 : 0));
    },

    aggregate(records: PredictionRecord[]): AggregationViews {
        return {
            faultProbability: this.faultProbability(records),
            riskDistribution: this.riskDistribution(records),
            siteCounts: this.siteCounts(records)
        };
    }
};
