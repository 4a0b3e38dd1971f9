import { expect } from 'chai';
import { describe, it } from 'mocha';
import { formatPercentage, renderPlanMarkdown } from '../../src/planning/planRenderer';
import { BusinessPlan } from '../../src/planning/types';

function plan(overrides: Partial<BusinessPlan> = {}): BusinessPlan {
    return {
        id: 'plan-1',
        title: 'Q3 Growth',
        summary: 'Grow revenue in Q3.',
        actions: [
            {
                id: 'a1',
                description: 'Launch promotion',
                priority: 'HIGH',
                impact: { revenue: '+5%', cost: 2000 },
                dependencies: [],
                timeline: '2 weeks',
                status: 'pending',
            },
        ],
        metrics: { revenue_growth: '5%', orders: 120 },
        timeline: '2024-06-01T00:00:00.000Z',
        whatIfScenarios: [],
        status: 'draft',
        ...overrides,
    };
}

describe('formatPercentage', () => {
    it('should keep one decimal for whole percentages', () => {
        expect(formatPercentage(0.5)).to.equal('50.0');
        expect(formatPercentage(1)).to.equal('100.0');
        expect(formatPercentage(0)).to.equal('0.0');
    });

    it('should print fractional percentages as they are', () => {
        expect(formatPercentage(0.125)).to.equal('12.5');
    });
});

describe('renderPlanMarkdown', () => {
    it('should render header, actions and metrics without a what-if section when there are no scenarios', () => {
        const expected =
            '# Q3 Growth\n' +
            '## Executive Summary\n' +
            'Grow revenue in Q3.\n' +
            '## Action Plan\n' +
            '### Launch promotion\n' +
            '- **Priority:** HIGH\n' +
            '- **Timeline:** 2 weeks\n' +
            '- **Status:** pending\n' +
            '- **Impact:**\n' +
            '  - revenue: +5%\n' +
            '  - cost: 2000\n' +
            '\n' +
            '## Key Metrics\n' +
            '- **revenue_growth:** 5%\n' +
            '- **orders:** 120\n';

        expect(renderPlanMarkdown(plan())).to.equal(expected);
    });

    it('should append the what-if analysis when scenarios exist', () => {
        const md = renderPlanMarkdown(plan({
            whatIfScenarios: [
                {
                    id: 's1',
                    description: 'Supplier delay',
                    assumptions: { delay_weeks: 3, region: 'EU' },
                    impactAreas: ['logistics', 'sales'],
                    probability: 0.5,
                    timestamp: '2024-06-01T00:00:00.000Z',
                },
            ],
        }));

        const whatIf =
            '- **orders:** 120\n' +
            '\n' +
            '## What-If Analysis\n' +
            '### Scenario: Supplier delay\n' +
            '- **Probability:** 50.0%\n' +
            '- **Impact Areas:** logistics, sales\n' +
            '- **Assumptions:**\n' +
            '  - delay_weeks: 3\n' +
            '  - region: EU\n' +
            '\n';
        expect(md.endsWith(whatIf)).to.be.true;
    });

    it('should render non-string values as JSON', () => {
        const md = renderPlanMarkdown(plan({ metrics: { targets: { q3: 10 }, flags: [true] } }));
        expect(md).to.contain('- **targets:** {"q3":10}\n');
        expect(md).to.contain('- **flags:** [true]\n');
    });

    it('should render a plan with no actions and no metrics', () => {
        const md = renderPlanMarkdown(plan({ actions: [], metrics: {} }));
        expect(md).to.equal('# Q3 Growth\n## Executive Summary\nGrow revenue in Q3.\n## Action Plan\n## Key Metrics\n');
    });
});
