import { z } from 'zod';
import { ReActChain } from '../planning/ReActChain';
import { BusinessPlan } from '../planning/types';
import { ConversationMemory } from './ConversationMemory';

/**
 * Everything the assistant keeps about one conversation.
 */
export interface ConversationRecord {
    readonly conversationId: string;
    readonly chain: ReActChain;
    plan: BusinessPlan | null;
    readonly memory: ConversationMemory;
    readonly createdAt: number;
    lastAccessedAt: number;
}

// ==================== PERSISTED FORM ====================

const JsonMapSchema = z.record(z.unknown());

const ReasoningStepStateSchema = z.object({
    id: z.string(),
    observation: z.string(),
    thought: z.string(),
    action: z.string().nullable(),
    result: z.string().nullable(),
    timestamp: z.string(),
});

const ActionItemStateSchema = z.object({
    id: z.string(),
    description: z.string(),
    priority: z.enum(['HIGH', 'MEDIUM', 'LOW']),
    impact: JsonMapSchema,
    dependencies: z.array(z.string()),
    timeline: z.string(),
    status: z.string(),
});

const WhatIfScenarioStateSchema = z.object({
    id: z.string(),
    description: z.string(),
    assumptions: JsonMapSchema,
    impactAreas: z.array(z.string()),
    probability: z.number(),
    timestamp: z.string(),
});

const BusinessPlanStateSchema = z.object({
    id: z.string(),
    title: z.string(),
    summary: z.string(),
    actions: z.array(ActionItemStateSchema),
    metrics: JsonMapSchema,
    timeline: z.string(),
    whatIfScenarios: z.array(WhatIfScenarioStateSchema),
    status: z.string(),
});

const ConversationStateSchema = z.object({
    conversationId: z.string(),
    chain: z.object({
        startTime: z.string(),
        steps: z.array(ReasoningStepStateSchema),
        context: JsonMapSchema,
    }),
    plan: BusinessPlanStateSchema.nullable(),
    memory: z.array(z.object({
        role: z.enum(['user', 'agent']),
        content: z.string(),
    })),
    createdAt: z.number(),
    lastAccessedAt: z.number(),
});

export const StoreStateSchema = z.object({
    conversations: z.array(ConversationStateSchema),
});

export type ConversationState = z.infer<typeof ConversationStateSchema>;
export type StoreState = z.infer<typeof StoreStateSchema>;

export const DEFAULT_STORE_STATE: StoreState = {
    conversations: [],
};
