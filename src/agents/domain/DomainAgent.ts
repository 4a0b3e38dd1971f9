import { dbg, newId, nowIso } from '../../utils';

export interface Insight {
    readonly id: string;
    readonly timestamp: string;
    readonly category: string;
    readonly observation: string;
    /** In [0, 1]. */
    readonly confidence: number;
    readonly impact: Record<string, unknown>;
    readonly recommendations: Array<Record<string, unknown>>;
}

export interface DomainPlan {
    readonly id: string;
    readonly timestamp: string;
    readonly action: string;
    readonly details: Record<string, unknown>;
}

export interface DomainAnalysis {
    insights: Insight[];
    plans: DomainPlan[];
}

export type InsightFields = Omit<Insight, 'id' | 'timestamp'>;
export type DomainPlanFields = Omit<DomainPlan, 'id' | 'timestamp'>;

export function createInsight(fields: InsightFields): Insight {
    return Object.freeze({ id: newId(), timestamp: nowIso(), ...fields });
}

export function createDomainPlan(fields: DomainPlanFields): DomainPlan {
    return Object.freeze({ id: newId(), timestamp: nowIso(), ...fields });
}

/**
 * Base for the domain agents. Subclasses supply the analysis; the base keeps
 * every insight and plan produced so far and answers history queries over them.
 */
export abstract class DomainAgent {
    private readonly insights: Insight[] = [];
    private readonly plans: DomainPlan[] = [];

    constructor(readonly name: string) {}

    protected abstract produce(query: string, data?: Array<Record<string, unknown>>): DomainAnalysis;

    analyze(query: string, data?: Array<Record<string, unknown>>): DomainAnalysis {
        dbg(`${this.name}: Analyzing "${query}"`);
        const analysis = this.produce(query, data);
        this.insights.push(...analysis.insights);
        this.plans.push(...analysis.plans);
        return analysis;
    }

    /**
     * Insights recorded so far, optionally limited to one category and a confidence floor.
     */
    getHistoricalInsights(category?: string, minConfidence: number = 0): Insight[] {
        return this.insights
            .filter(i => !category || i.category === category)
            .filter(i => i.confidence >= minConfidence);
    }

    getPlans(): DomainPlan[] {
        return [...this.plans];
    }
}
