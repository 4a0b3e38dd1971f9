/**
 * Roles used inside the application's conversation history.
 */
export type Role = 'user' | 'agent';

export const USER_ROLE: Role = 'user';
export const AGENT_ROLE: Role = 'agent';

// Provider-facing roles; the conversation history's 'agent' maps to 'assistant'.
type ProviderRole = 'system' | 'user' | 'assistant';

export type ChatMessage = {
    role: ProviderRole;
    content: string;
};

export interface ChatCompletionOptions {
    modelName?: string;
    temperature?: number;
    /** Ask the provider to constrain the reply to a single JSON object. */
    jsonResponse?: boolean;
}

export interface ILLMClient {
    /**
     * Calls the underlying LLM provider's chat completions API.
     *
     * @param messages The full message sequence, system prompt first and the current prompt last.
     * @param options Optional parameters like model name and temperature.
     * @returns The content of the LLM's response.
     * @throws Error on API errors or missing configuration.
     */
    chatCompletion(
        messages: Array<ChatMessage>,
        options?: ChatCompletionOptions
    ): Promise<string>;
}

export function isLLMClient(value: unknown): value is ILLMClient {
    return typeof value === 'object' && value !== null
        && 'chatCompletion' in value && typeof value.chatCompletion === 'function';
}
