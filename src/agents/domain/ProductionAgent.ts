import { createDomainPlan, createInsight, DomainAgent, DomainAnalysis } from './DomainAgent';

// Placeholder production analysis
export class ProductionAgent extends DomainAgent {
    constructor() {
        super('ProductionAgent');
    }

    protected produce(): DomainAnalysis {
        return {
            insights: [
                createInsight({
                    category: 'capacity_planning',
                    observation: 'Increase production capacity to meet demand.',
                    confidence: 0.9,
                    impact: { output_increase: 2000 },
                    recommendations: [{ action: 'increase_capacity', priority: 'HIGH' }],
                }),
            ],
            plans: [
                createDomainPlan({
                    action: 'increase_capacity',
                    details: { current_capacity: 5000, proposed_capacity: 7000 },
                }),
            ],
        };
    }
}
