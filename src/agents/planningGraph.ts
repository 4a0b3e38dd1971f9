import { StateGraph, END, START } from "@langchain/langgraph";
import { RunnableConfig } from "@langchain/core/runnables";
import { dbg, errorMessage } from "../utils";
import { PromptService } from "../services/PromptService";
import { ReActChainSnapshot } from "../planning/types";
import { ILLMClient, isLLMClient } from "./ILLMClient";
import { callTheLLM, getLLMClient, HistoryMessage } from "./LLMUtils";
import { MODEL_TEMPERATURE } from "./llmConstants";
import { AgentFailure } from "./agentResult";
import { ModelResponse, parseModelResponse } from "./contract";

// Node names
export const COMPOSE_QUERY_PROMPT = "composeQueryPrompt";
export const COMPOSE_WHAT_IF_PROMPT = "composeWhatIfPrompt";
export const CALL_MODEL = "callModel";
export const VALIDATE_RESPONSE = "validateResponse";

// Prompt templates live under prompts/MainAgent
export const PLANNER_PROMPT_AGENT = "MainAgent";
const PROMPT_SYSTEM = "system";
const PROMPT_CONTINUE = "continue";
const PROMPT_WHAT_IF = "whatIf";

export type PlanningMode = 'query' | 'whatIf';

/**
 * State of one model round-trip: prompt composition, the call and contract validation.
 * Conversation state itself lives in the ConversationStore, never in the graph.
 */
export interface PlanningTurnState {
    mode: PlanningMode;
    conversationId: string;
    query: string;
    continueReasoning: boolean;
    /** Chain snapshot embedded in the prompt when continuing the reasoning. */
    priorChain: ReActChainSnapshot | null;
    /** Memory window replayed ahead of the prompt. */
    history: HistoryMessage[];
    scenario: string;
    assumptions: Record<string, unknown>;
    currentPlanMarkdown: string;
    systemPrompt: string;
    prompt: string;
    rawResponse: string;
    modelResponse: ModelResponse | null;
    failure: AgentFailure | null;
}

export type PlanningNode = (state: PlanningTurnState, config?: RunnableConfig) => Promise<Partial<PlanningTurnState>>;

export interface PlanningNodes {
    [COMPOSE_QUERY_PROMPT]: PlanningNode;
    [COMPOSE_WHAT_IF_PROMPT]: PlanningNode;
    [CALL_MODEL]: PlanningNode;
    [VALIDATE_RESPONSE]: PlanningNode;
}

/**
 * Values the graph reads from `config.configurable`.
 */
export type PlanningGraphConfigurable = {
    thread_id: string;
    promptService: PromptService;
    /** Falls back to the configured singleton client when absent. */
    llmClient?: ILLMClient;
    modelName?: string;
};

export function createInitialTurnState(overrides: Partial<PlanningTurnState> = {}): PlanningTurnState {
    return {
        mode: 'query',
        conversationId: "",
        query: "",
        continueReasoning: false,
        priorChain: null,
        history: [],
        scenario: "",
        assumptions: {},
        currentPlanMarkdown: "",
        systemPrompt: "",
        prompt: "",
        rawResponse: "",
        modelResponse: null,
        failure: null,
        ...overrides,
    };
}

function requirePromptService(config?: RunnableConfig): PromptService {
    const promptService: unknown = config?.configurable?.promptService;
    if (!(promptService instanceof PromptService)) {
        throw new Error("Critical Error: PromptService not found in config. Planning cannot proceed.");
    }
    return promptService;
}

function configuredClient(config?: RunnableConfig): ILLMClient | undefined {
    const client: unknown = config?.configurable?.llmClient;
    if (client === undefined) {
        return undefined;
    }
    if (!isLLMClient(client)) {
        throw new Error("Critical Error: llmClient in config does not implement chatCompletion.");
    }
    return client;
}

function configuredModelName(config?: RunnableConfig): string | undefined {
    const modelName: unknown = config?.configurable?.modelName;
    return typeof modelName === 'string' ? modelName : undefined;
}

async function loadSystemPrompt(promptService: PromptService): Promise<string> {
    return (await promptService.getFormattedPrompt(PLANNER_PROMPT_AGENT, PROMPT_SYSTEM, {})).trim();
}

/**
 * Builds the prompt for a planning query: the query itself, or the `continue`
 * template wrapping it together with the serialized reasoning so far.
 */
export async function composeQueryPromptNode(state: PlanningTurnState, config?: RunnableConfig): Promise<Partial<PlanningTurnState>> {
    const promptService = requirePromptService(config);
    dbg(`--- Compose Query Prompt (conversation ${state.conversationId}) ---`);

    const systemPrompt = await loadSystemPrompt(promptService);
    let prompt = state.query;
    if (state.continueReasoning && state.priorChain) {
        prompt = (await promptService.getFormattedPrompt(PLANNER_PROMPT_AGENT, PROMPT_CONTINUE, {
            previousSteps: JSON.stringify(state.priorChain),
            query: state.query,
        })).trim();
    }
    return { systemPrompt, prompt };
}

/**
 * Builds the what-if prompt from the scenario, its assumptions and the current plan.
 * What-if calls carry no replayed history.
 */
export async function composeWhatIfPromptNode(state: PlanningTurnState, config?: RunnableConfig): Promise<Partial<PlanningTurnState>> {
    const promptService = requirePromptService(config);
    dbg(`--- Compose What-If Prompt (conversation ${state.conversationId}) ---`);

    const systemPrompt = await loadSystemPrompt(promptService);
    const prompt = (await promptService.getFormattedPrompt(PLANNER_PROMPT_AGENT, PROMPT_WHAT_IF, {
        scenario: state.scenario,
        assumptions: JSON.stringify(state.assumptions),
        currentPlan: state.currentPlanMarkdown,
    })).trim();
    return { systemPrompt, prompt, history: [] };
}

export async function callModelNode(state: PlanningTurnState, config?: RunnableConfig): Promise<Partial<PlanningTurnState>> {
    dbg("Planner: Thinking...");
    try {
        const client = configuredClient(config) ?? getLLMClient();
        const rawResponse = await callTheLLM(state.history, state.prompt, {
            systemPrompt: state.systemPrompt,
            modelName: configuredModelName(config),
            temperature: MODEL_TEMPERATURE,
            jsonResponse: true,
            client,
        });
        return { rawResponse };
    } catch (error) {
        return { failure: { kind: 'upstream_unavailable', message: errorMessage(error) } };
    }
}

export async function validateResponseNode(state: PlanningTurnState): Promise<Partial<PlanningTurnState>> {
    const parsed = parseModelResponse(state.rawResponse);
    if (!parsed.ok) {
        console.warn(`Planner: ${parsed.failure.message}`);
        return { failure: parsed.failure };
    }
    dbg(`Planner: Model returned ${parsed.value.reasoning_chain.length} reasoning step(s).`);
    return { modelResponse: parsed.value };
}

const DEFAULT_NODES: PlanningNodes = {
    [COMPOSE_QUERY_PROMPT]: composeQueryPromptNode,
    [COMPOSE_WHAT_IF_PROMPT]: composeWhatIfPromptNode,
    [CALL_MODEL]: callModelNode,
    [VALIDATE_RESPONSE]: validateResponseNode,
};

/**
 * Wires the planning round-trip. Nodes are injectable so routing can be tested in isolation.
 */
export function createPlanningWorkflow(nodes: PlanningNodes = DEFAULT_NODES) {
    return new StateGraph<PlanningTurnState>({
        channels: {
            mode: { value: (x, y) => y ?? x, default: () => 'query' },
            conversationId: { value: (x, y) => y ?? x, default: () => "" },
            query: { value: (x, y) => y ?? x, default: () => "" },
            continueReasoning: { value: (x, y) => y ?? x, default: () => false },
            priorChain: { value: (x, y) => y, default: () => null },
            history: { value: (x, y) => y ?? x, default: () => [] },
            scenario: { value: (x, y) => y ?? x, default: () => "" },
            assumptions: { value: (x, y) => y ?? x, default: () => ({}) },
            currentPlanMarkdown: { value: (x, y) => y ?? x, default: () => "" },
            systemPrompt: { value: (x, y) => y ?? x, default: () => "" },
            prompt: { value: (x, y) => y ?? x, default: () => "" },
            rawResponse: { value: (x, y) => y ?? x, default: () => "" },
            modelResponse: { value: (x, y) => y, default: () => null },
            failure: { value: (x, y) => y, default: () => null },
        },
    })
        .addNode(COMPOSE_QUERY_PROMPT, nodes[COMPOSE_QUERY_PROMPT])
        .addNode(COMPOSE_WHAT_IF_PROMPT, nodes[COMPOSE_WHAT_IF_PROMPT])
        .addNode(CALL_MODEL, nodes[CALL_MODEL])
        .addNode(VALIDATE_RESPONSE, nodes[VALIDATE_RESPONSE])
        .addConditionalEdges(START,
            (state: PlanningTurnState) => {
                const next = state.mode === 'whatIf' ? COMPOSE_WHAT_IF_PROMPT : COMPOSE_QUERY_PROMPT;
                dbg(`Planner routing: ${state.mode} -> ${next}`);
                return next;
            },
            {
                [COMPOSE_QUERY_PROMPT]: COMPOSE_QUERY_PROMPT,
                [COMPOSE_WHAT_IF_PROMPT]: COMPOSE_WHAT_IF_PROMPT,
            }
        )
        .addEdge(COMPOSE_QUERY_PROMPT, CALL_MODEL)
        .addEdge(COMPOSE_WHAT_IF_PROMPT, CALL_MODEL)
        .addConditionalEdges(CALL_MODEL,
            (state: PlanningTurnState) => (state.failure ? END : VALIDATE_RESPONSE),
            {
                [VALIDATE_RESPONSE]: VALIDATE_RESPONSE,
                [END]: END,
            }
        )
        .addEdge(VALIDATE_RESPONSE, END);
}

export type PlanningApp = ReturnType<ReturnType<typeof createPlanningWorkflow>['compile']>;

export const planningApp: PlanningApp = createPlanningWorkflow().compile();
