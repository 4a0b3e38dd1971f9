/**
 * Planning Model Contract
 *
 * Shape of the JSON object the planning model must return, validated with Zod.
 * Anything that does not match is reported as an upstream contract violation.
 */

import { z } from 'zod';
import { AgentResult, failure, success } from './agentResult';
import { BusinessPlanFields, WhatIfScenarioFields } from '../planning/records';

// ==================== SHARED TYPES ====================

const PrioritySchema = z.preprocess(
    (value) => (typeof value === 'string' ? value.trim().toUpperCase() : value),
    z.enum(['HIGH', 'MEDIUM', 'LOW'])
);

const OptionalTextSchema = z.string().nullable().optional();

// ==================== REASONING ====================

const ReasoningStepSchema = z.object({
    observation: z.string(),
    thought: z.string(),
    action: OptionalTextSchema,
    result: OptionalTextSchema,
});

// ==================== PLAN ====================

const ActionSchema = z.object({
    description: z.string(),
    priority: PrioritySchema,
    impact: z.record(z.unknown()),
    dependencies: z.array(z.string()).default([]),
    timeline: z.string(),
});

const WhatIfScenarioSchema = z.object({
    description: z.string(),
    assumptions: z.record(z.unknown()),
    impact_areas: z.array(z.string()),
    probability: z.number().min(0).max(1),
});

const BusinessPlanSchema = z.object({
    title: z.string(),
    summary: z.string(),
    actions: z.array(ActionSchema),
    metrics: z.record(z.unknown()),
    what_if_scenarios: z.array(WhatIfScenarioSchema).default([]),
});

export const ModelResponseSchema = z.object({
    reasoning_chain: z.array(ReasoningStepSchema),
    business_plan: BusinessPlanSchema,
});

export type ModelResponse = z.infer<typeof ModelResponseSchema>;
export type ModelReasoningStep = z.infer<typeof ReasoningStepSchema>;
export type ModelWhatIfScenario = z.infer<typeof WhatIfScenarioSchema>;

const FENCED_BLOCK = /```(?:json)?\s*([\s\S]*?)```/;

/**
 * Strips a surrounding markdown code fence, which some models add despite instructions.
 */
export function extractJsonText(raw: string): string {
    const fenced = raw.match(FENCED_BLOCK);
    return (fenced ? fenced[1] : raw).trim();
}

function formatIssue(issue: z.ZodIssue): string {
    const location = issue.path.length > 0 ? issue.path.join('.') : '(root)';
    return `${location}: ${issue.message}`;
}

/**
 * Parses and validates a raw model reply against the planning contract.
 */
export function parseModelResponse(raw: string): AgentResult<ModelResponse> {
    let parsed: unknown;
    try {
        parsed = JSON.parse(extractJsonText(raw));
    } catch (error) {
        const reason = error instanceof Error ? error.message : 'Unknown error';
        return failure({
            kind: 'upstream_contract_violation',
            message: `Model response is not valid JSON: ${reason}`,
            issues: [reason],
        });
    }

    const validated = ModelResponseSchema.safeParse(parsed);
    if (!validated.success) {
        const issues = validated.error.issues.map(formatIssue);
        return failure({
            kind: 'upstream_contract_violation',
            message: `Model response does not match the planning contract: ${issues.join('; ')}`,
            issues,
        });
    }
    return success(validated.data);
}

export function toScenarioFields(scenario: ModelWhatIfScenario): WhatIfScenarioFields {
    return {
        description: scenario.description,
        assumptions: scenario.assumptions,
        impactAreas: scenario.impact_areas,
        probability: scenario.probability,
    };
}

/**
 * Maps the validated `business_plan` object onto the fields plans are built from.
 */
export function toPlanFields(plan: ModelResponse['business_plan']): BusinessPlanFields {
    return {
        title: plan.title,
        summary: plan.summary,
        actions: plan.actions.map((action) => ({
            description: action.description,
            priority: action.priority,
            impact: action.impact,
            dependencies: action.dependencies,
            timeline: action.timeline,
        })),
        metrics: plan.metrics,
        whatIfScenarios: plan.what_if_scenarios.map(toScenarioFields),
    };
}
