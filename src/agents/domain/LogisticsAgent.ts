import { createDomainPlan, createInsight, DomainAgent, DomainAnalysis } from './DomainAgent';

/**
 * Placeholder logistics analysis: always recommends route optimization.
 */
export class LogisticsAgent extends DomainAgent {
    constructor() {
        super('LogisticsAgent');
    }

    protected produce(): DomainAnalysis {
        return {
            insights: [
                createInsight({
                    category: 'delivery_optimization',
                    observation: 'Optimize delivery routes to reduce costs.',
                    confidence: 0.85,
                    impact: { cost_savings: 10000 },
                    recommendations: [{ action: 'optimize_routes', priority: 'HIGH' }],
                }),
            ],
            plans: [
                createDomainPlan({
                    action: 'optimize_routes',
                    details: { current_routes: ['Route_A', 'Route_B'], proposed_routes: ['Route_C'] },
                }),
            ],
        };
    }
}
