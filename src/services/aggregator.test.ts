import { describe, it, expect } from 'vitest';
import { prediction } from '../testing/fakes';
import { Aggregator } from './aggregator';

const records = [
    prediction({ fault: 'Link Down', probability_percent: 40, site: 'B', location: 'Hill', risk_level: 'MEDIUM' }),
    prediction({ fault: 'Power Fail', probability_percent: 90, site: 'A' }),
    prediction({ fault: 'Link Down', probability_percent: 95, site: 'A' }),
    prediction({ fault: 'Fan', probability_percent: 90, site: 'C', risk_level: 'MEDIUM' })
];

describe('Aggregator.faultProbability', () => {
    it('orders faults by peak probability with first-seen tie-break and keeps each probability', () => {
        const view = Aggregator.faultProbability(records);

        expect(view.map(g => g.fault)).toEqual(['Link Down', 'Power Fail', 'Fan']);
        expect(view[0]).toEqual({
            fault: 'Link Down',
            peakProbability: 95,
            points: [
                { site: 'B', location: 'Hill', probability_percent: 40, risk_level: 'MEDIUM' },
                { site: 'A', location: 'North Yard', probability_percent: 95, risk_level: 'HIGH' }
            ]
        });
    });
});

describe('Aggregator.riskDistribution', () => {
    it('always lists the three levels, zero-filled', () => {
        expect(Aggregator.riskDistribution(records)).toEqual([
            { risk_level: 'LOW', count: 0 },
            { risk_level: 'MEDIUM', count: 2 },
            { risk_level: 'HIGH', count: 2 }
        ]);
        expect(Aggregator.riskDistribution([])).toEqual([
            { risk_level: 'LOW', count: 0 },
            { risk_level: 'MEDIUM', count: 0 },
            { risk_level: 'HIGH', count: 0 }
        ]);
    });
});

describe('Aggregator.siteCounts', () => {
    it('sorts by count, then site name', () => {
        expect(Aggregator.siteCounts(records)).toEqual([
            { site: 'A', count: 2 },
            { site: 'B', count: 1 },
            { site: 'C', count: 1 }
        ]);
    });
});

describe('Aggregator.aggregate', () => {
    it('is deterministic for identical input', () => {
        expect(Aggregator.aggregate([...records])).toEqual(Aggregator.aggregate([...records]));
    });
});
