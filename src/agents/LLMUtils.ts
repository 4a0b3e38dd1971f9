import * as dotenv from 'dotenv';
import { dbg, errorMessage } from "../utils";
import { OpenAIClient } from './OpenAIClient';
import { ILLMClient, ChatMessage, Role, AGENT_ROLE } from './ILLMClient';
import { MODEL_NAME_ENV_VAR, MODEL_TEMPERATURE } from './llmConstants';

// Load environment variables
dotenv.config();

export type HistoryMessage = { role: Role; content: string };

// Singleton instance for the LLM client
let clientInstance: ILLMClient | null = null;

/**
 * Factory function to get the configured LLM client instance.
 * Creates the instance on first call based on environment variables.
 * @returns The singleton instance of the configured ILLMClient.
 * @throws Error if the API key is missing.
 */
export function getLLMClient(): ILLMClient {
    if (clientInstance) {
        return clientInstance;
    }

    try {
        clientInstance = new OpenAIClient();
    } catch (error) {
        console.error(`Failed to initialize OpenAIClient: ${error}`);
        throw error;
    }

    return clientInstance;
}

/**
 * Drops the cached client so the next `getLLMClient` call re-reads the environment.
 */
export function resetLLMClient(): void {
    clientInstance = null;
}

/**
 * Resolves the model to use: an explicit name wins, then MODEL_NAME from the environment.
 * Returns undefined to let the client apply its own default.
 */
export function resolveModelName(modelName?: string): string | undefined {
    if (modelName && modelName.trim() !== '') {
        return modelName;
    }
    const fromEnv = process.env[MODEL_NAME_ENV_VAR];
    return fromEnv && fromEnv.trim() !== '' ? fromEnv : undefined;
}

export interface CallLLMOptions {
    systemPrompt?: string;
    modelName?: string;
    temperature?: number;
    jsonResponse?: boolean;
    /** Client to call; defaults to the configured singleton. */
    client?: ILLMClient;
}

/**
 * Assembles the message sequence for one model round-trip:
 * optional system prompt, then the history, then the prompt as the final user message.
 */
export function buildMessages(history: HistoryMessage[], prompt: string, systemPrompt?: string): ChatMessage[] {
    const messages: ChatMessage[] = [];
    if (systemPrompt) {
        messages.push({ role: 'system', content: systemPrompt });
    }
    for (const msg of history) {
        messages.push({ role: msg.role === AGENT_ROLE ? 'assistant' : 'user', content: msg.content });
    }
    messages.push({ role: 'user', content: prompt });
    return messages;
}

/**
 * Calls the configured LLM provider's Chat Completions API.
 * 
 * @param history The conversation history, using internal roles ('user', 'agent').
 * @param prompt The specific user prompt/instruction for this turn.
 * @param options System prompt, model, temperature and client overrides.
 * @returns The content of the LLM's response.
 * @throws Error if API key is missing, API call fails, or response is empty.
 */
export async function callTheLLM(
    history: HistoryMessage[],
    prompt: string,
    options: CallLLMOptions = {}
): Promise<string> {
    const client = options.client ?? getLLMClient();
    const messages = buildMessages(history, prompt, options.systemPrompt);
    const effectiveModel = resolveModelName(options.modelName);

    try {
        dbg(`Model requested: ${effectiveModel || 'Provider Default'}`);

        const responseContent = await client.chatCompletion(messages, {
            modelName: effectiveModel,
            temperature: options.temperature ?? MODEL_TEMPERATURE,
            jsonResponse: options.jsonResponse,
        });

        dbg('--- LLM Call Complete ---');

        if (!responseContent) {
            console.warn("LLM call returned empty content.");
            throw new Error("LLM call returned empty content.");
        }

        return responseContent;
    } catch (error) {
        console.error("Error during LLM call:", error);
        throw new Error(`LLM API call failed: ${errorMessage(error)}`);
    }
}
