import { newId, nowIso } from '../utils';
import { ActionItem, BusinessPlan, Priority, ReasoningStep, WhatIfScenario } from './types';

export const DEFAULT_ACTION_STATUS = 'pending';
export const DEFAULT_PLAN_STATUS = 'draft';

export function createReasoningStep(
    observation: string,
    thought: string,
    action: string | null = null,
    result: string | null = null
): ReasoningStep {
    return Object.freeze({
        id: newId(),
        observation,
        thought,
        action,
        result,
        timestamp: nowIso(),
    });
}

export interface ActionItemFields {
    description: string;
    priority: Priority;
    impact: Record<string, unknown>;
    dependencies: string[];
    timeline: string;
}

export function createActionItem(fields: ActionItemFields): ActionItem {
    return Object.freeze({
        id: newId(),
        description: fields.description,
        priority: fields.priority,
        impact: Object.freeze({ ...fields.impact }),
        dependencies: Object.freeze([...fields.dependencies]),
        timeline: fields.timeline,
        status: DEFAULT_ACTION_STATUS,
    });
}

export interface WhatIfScenarioFields {
    description: string;
    assumptions: Record<string, unknown>;
    impactAreas: string[];
    probability: number;
}

export function createWhatIfScenario(fields: WhatIfScenarioFields): WhatIfScenario {
    return Object.freeze({
        id: newId(),
        description: fields.description,
        assumptions: Object.freeze({ ...fields.assumptions }),
        impactAreas: Object.freeze([...fields.impactAreas]),
        probability: fields.probability,
        timestamp: nowIso(),
    });
}

export interface BusinessPlanFields {
    title: string;
    summary: string;
    actions: ActionItemFields[];
    metrics: Record<string, unknown>;
    whatIfScenarios: WhatIfScenarioFields[];
}

/**
 * Builds a fresh plan from model output. Passing the previous plan keeps its id;
 * every other field, including the scenarios, comes from `fields`.
 * `timeline` is always stamped with the build time.
 */
export function buildBusinessPlan(fields: BusinessPlanFields, previous?: BusinessPlan | null): BusinessPlan {
    return {
        id: previous?.id ?? newId(),
        title: fields.title,
        summary: fields.summary,
        actions: fields.actions.map(createActionItem),
        metrics: { ...fields.metrics },
        timeline: nowIso(),
        whatIfScenarios: fields.whatIfScenarios.map(createWhatIfScenario),
        status: DEFAULT_PLAN_STATUS,
    };
}

/**
 * Returns a copy of `plan` with `scenarios` appended. Nothing else changes.
 */
export function appendScenarios(plan: BusinessPlan, scenarios: WhatIfScenarioFields[]): BusinessPlan {
    return {
        ...plan,
        whatIfScenarios: [...plan.whatIfScenarios, ...scenarios.map(createWhatIfScenario)],
    };
}
