import { RISK_LEVELS } from '../constants';
import type { FilterCriteria, PredictionRecord, RiskLevel } from '../types';

export const FilterEngine = {

    defaultCriteria(): FilterCriteria {
        return { sites: new Set<string>(), riskLevels: new Set<RiskLevel>(RISK_LEVELS) };
    },

    criteria(sites: Iterable<string>, riskLevels: Iterable<RiskLevel>): FilterCriteria {
        return { sites: new Set(sites), riskLevels: new Set(riskLevels) };
    },

    matches(record: PredictionRecord, criteria: FilterCriteria): boolean {
        const siteOk = criteria.sites.size === 0 || criteria.sites.has(record.site);
        return siteOk && criteria.riskLevels.has(record.risk_level);
    },

    // Order-preserving subset.
    apply(records: PredictionRecord[], criteria: FilterCriteria): PredictionRecord[] {
        return records.filter(r => this.matches(r, criteria));
    },

    /**
     * Distinct sites of the unfiltered set, sorted, for the site selector.
     */
    siteOptions(records: PredictionRecord[]): string[] {
        return Array.from(new Set(records.map(r => r.site))).sort();
    }
};
