import { ConversationStore } from "../memory/ConversationStore";
import { ConversationRecord } from "../memory/store_types";
import { PromptService } from "../services/PromptService";
import { ReActChain } from "../planning/ReActChain";
import { appendScenarios, buildBusinessPlan } from "../planning/records";
import { renderPlanMarkdown } from "../planning/planRenderer";
import { buildReasoningGraph, ReasoningGraph } from "../planning/reasoningGraph";
import { BusinessPlan, ReActChainSnapshot } from "../planning/types";
import { dbg, errorMessage, newId, say } from "../utils";
import { ILLMClient } from "./ILLMClient";
import { AgentFailure, AgentFailureKind, AgentResult, failure, noActivePlan, success } from "./agentResult";
import { ModelResponse, toPlanFields, toScenarioFields } from "./contract";
import { createInitialTurnState, planningApp, PlanningApp, PlanningGraphConfigurable, PlanningTurnState } from "./planningGraph";

/**
 * Successful outcome of a query or what-if call.
 */
export interface PlanPayload {
    conversation_id: string;
    reasoning_chain: ReActChainSnapshot;
    plan_markdown: string;
    raw_plan: BusinessPlan;
}

export interface QueryErrorPayload {
    conversation_id: string;
    error: string;
    error_kind: AgentFailureKind;
    /** Whatever reasoning the conversation had accumulated when the call failed. */
    reasoning_chain: ReActChainSnapshot;
}

export interface WhatIfErrorPayload {
    conversation_id: string;
    error: string;
    error_kind: AgentFailureKind;
}

export type QueryResponse = PlanPayload | QueryErrorPayload;
export type WhatIfResponse = PlanPayload | WhatIfErrorPayload;

export function isErrorPayload(response: QueryResponse | WhatIfResponse): response is QueryErrorPayload | WhatIfErrorPayload {
    return 'error' in response;
}

export interface MainAgentOptions {
    store?: ConversationStore;
    promptService?: PromptService;
    /** Model client; the configured OpenAI client is used when omitted. */
    llmClient?: ILLMClient;
    modelName?: string;
    /** Compiled planning graph, replaceable in tests. */
    app?: PlanningApp;
}

/**
 * The planning agent. Each call runs one planning-graph round-trip under the
 * conversation's lock and folds the validated model output into the store:
 * reasoning steps are appended to the chain, queries replace the plan
 * (keeping its id) and what-if calls append scenarios to it.
 */
export class MainAgent {
    readonly store: ConversationStore;
    private readonly promptService: PromptService;
    private readonly llmClient?: ILLMClient;
    private readonly modelName?: string;
    private readonly app: PlanningApp;

    constructor(options: MainAgentOptions = {}) {
        this.store = options.store ?? new ConversationStore();
        this.promptService = options.promptService ?? new PromptService();
        this.llmClient = options.llmClient;
        this.modelName = options.modelName;
        this.app = options.app ?? planningApp;
    }

    /**
     * Runs a planning query and returns the boundary payload. Never throws.
     */
    async processQuery(query: string, conversationId?: string, continueReasoning: boolean = false): Promise<QueryResponse> {
        const id = conversationId || newId();
        const result = await this.runQuery(query, id, continueReasoning);
        if (result.ok) {
            return result.value;
        }
        const record = this.store.get(id);
        return {
            conversation_id: id,
            error: result.failure.message,
            error_kind: result.failure.kind,
            reasoning_chain: (record ? record.chain : new ReActChain()).toSnapshot(),
        };
    }

    /**
     * Runs a what-if analysis against the conversation's current plan. Never throws.
     */
    async whatIfAnalysis(conversationId: string, scenarioDescription: string, assumptions: Record<string, unknown>): Promise<WhatIfResponse> {
        const result = await this.runWhatIf(conversationId, scenarioDescription, assumptions);
        if (result.ok) {
            return result.value;
        }
        return {
            conversation_id: conversationId,
            error: result.failure.message,
            error_kind: result.failure.kind,
        };
    }

    async runQuery(query: string, conversationId: string, continueReasoning: boolean = false): Promise<AgentResult<PlanPayload>> {
        return this.guarded("Error processing query", () =>
            this.store.runExclusive(conversationId, async () => {
                const record = this.store.getOrCreate(conversationId);

                // The window replayed to the model already holds the query; the prompt repeats it last
                record.memory.addUserMessage(query);
                const history = record.memory.getMessages();

                const turn = await this.runTurn({
                    mode: 'query',
                    conversationId,
                    query,
                    continueReasoning,
                    priorChain: continueReasoning ? record.chain.toSnapshot() : null,
                    history,
                });
                if (!turn.ok) {
                    return failure<PlanPayload>(turn.failure);
                }

                this.appendReasoning(record, turn.value);
                const plan = buildBusinessPlan(toPlanFields(turn.value.business_plan), record.plan);
                this.store.upsertPlan(conversationId, plan);
                record.memory.addAgentMessage(JSON.stringify(turn.value));

                return success(this.toPayload(record, plan));
            })
        );
    }

    async runWhatIf(conversationId: string, scenarioDescription: string, assumptions: Record<string, unknown>): Promise<AgentResult<PlanPayload>> {
        return this.guarded("Error in what-if analysis", () =>
            this.store.runExclusive(conversationId, async () => {
                const record = this.store.get(conversationId);
                if (!record || !record.plan) {
                    return failure<PlanPayload>(noActivePlan(conversationId));
                }
                const currentPlan = record.plan;

                const turn = await this.runTurn({
                    mode: 'whatIf',
                    conversationId,
                    scenario: scenarioDescription,
                    assumptions,
                    currentPlanMarkdown: renderPlanMarkdown(currentPlan),
                }, (prompt) => record.memory.addUserMessage(prompt));
                if (!turn.ok) {
                    return failure<PlanPayload>(turn.failure);
                }

                const scenarios = turn.value.business_plan.what_if_scenarios.map(toScenarioFields);
                const plan = appendScenarios(currentPlan, scenarios);
                this.store.upsertPlan(conversationId, plan);
                this.appendReasoning(record, turn.value);
                record.memory.addAgentMessage(JSON.stringify(turn.value));

                return success(this.toPayload(record, plan));
            })
        );
    }

    /**
     * Current state of a conversation in the success payload shape, or null when it
     * is unknown or has no plan yet.
     */
    getConversation(conversationId: string): PlanPayload | null {
        const record = this.store.get(conversationId);
        if (!record || !record.plan) {
            return null;
        }
        return this.toPayload(record, record.plan);
    }

    getReasoningGraph(conversationId: string): ReasoningGraph | null {
        const record = this.store.get(conversationId);
        return record ? buildReasoningGraph(record.chain.toSnapshot()) : null;
    }

    private async runTurn(
        input: Partial<PlanningTurnState>,
        onPrompt?: (prompt: string) => void
    ): Promise<AgentResult<ModelResponse>> {
        const configurable: PlanningGraphConfigurable = {
            thread_id: input.conversationId ?? newId(),
            promptService: this.promptService,
            llmClient: this.llmClient,
            modelName: this.modelName,
        };
        const finalState = await this.app.invoke(createInitialTurnState(input), { configurable });

        onPrompt?.(finalState.prompt);
        if (finalState.failure) {
            return failure(finalState.failure);
        }
        if (!finalState.modelResponse) {
            return failure({ kind: 'internal', message: "Planning graph finished without a model response." });
        }
        return success(finalState.modelResponse);
    }

    private appendReasoning(record: ConversationRecord, response: ModelResponse): void {
        for (const step of response.reasoning_chain) {
            record.chain.addStep(step.observation, step.thought, step.action ?? null, step.result ?? null);
        }
        dbg(`MainAgent: Chain for ${record.conversationId} now holds ${record.chain.length} step(s).`);
    }

    private toPayload(record: ConversationRecord, plan: BusinessPlan): PlanPayload {
        return {
            conversation_id: record.conversationId,
            reasoning_chain: record.chain.toSnapshot(),
            plan_markdown: renderPlanMarkdown(plan),
            raw_plan: plan,
        };
    }

    /**
     * Converts anything thrown into an `internal` failure so callers only see results.
     */
    private async guarded<T>(context: string, task: () => Promise<AgentResult<T>>): Promise<AgentResult<T>> {
        try {
            const result = await task();
            if (!result.ok) {
                this.logFailure(context, result.failure);
            }
            return result;
        } catch (error) {
            console.error(`${context}:`, error);
            return failure({ kind: 'internal', message: errorMessage(error) });
        }
    }

    private logFailure(context: string, reason: AgentFailure): void {
        if (reason.kind === 'no_active_plan') {
            say(`${context}: ${reason.message}`);
        } else {
            console.error(`${context} [${reason.kind}]: ${reason.message}`);
        }
    }
}
