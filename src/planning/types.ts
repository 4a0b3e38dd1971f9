/**
 * Priority assigned to an action item by the planning model.
 */
export type Priority = 'HIGH' | 'MEDIUM' | 'LOW';

/**
 * One observation/thought/action/result tuple of a ReAct reasoning trace.
 */
export interface ReasoningStep {
    readonly id: string;
    readonly observation: string;
    readonly thought: string;
    readonly action: string | null;
    readonly result: string | null;
    readonly timestamp: string;
}

export interface ActionItem {
    readonly id: string;
    readonly description: string;
    readonly priority: Priority;
    /** Impacted area mapped to the expected effect. */
    readonly impact: Readonly<Record<string, unknown>>;
    readonly dependencies: readonly string[];
    readonly timeline: string;
    readonly status: string;
}

export interface WhatIfScenario {
    readonly id: string;
    readonly description: string;
    readonly assumptions: Readonly<Record<string, unknown>>;
    readonly impactAreas: readonly string[];
    /** Likelihood in [0, 1]. */
    readonly probability: number;
    readonly timestamp: string;
}

/**
 * The agent's current recommendation for a conversation.
 * The id survives re-creation of the plan on later turns of the same conversation.
 */
export interface BusinessPlan {
    readonly id: string;
    readonly title: string;
    readonly summary: string;
    readonly actions: readonly ActionItem[];
    readonly metrics: Readonly<Record<string, unknown>>;
    readonly timeline: string;
    readonly whatIfScenarios: readonly WhatIfScenario[];
    readonly status: string;
}

export interface ReActChainSnapshot {
    startTime: string;
    steps: ReasoningStep[];
    context: Record<string, unknown>;
}
