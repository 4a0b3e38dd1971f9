import OpenAI from "openai";
import * as dotenv from 'dotenv';
import { ILLMClient, ChatMessage, ChatCompletionOptions } from "./ILLMClient";
import {
    OPENAI_API_KEY_ENV_VAR,
    BASE_URL_ENV_VAR,
    DEFAULT_MODEL_NAME,
    MODEL_TEMPERATURE,
    MAX_COMPLETION_TOKENS
} from "./llmConstants";
import { dbg, errorMessage } from "../utils";

// Load environment variables
dotenv.config();

type CompletionResponse = {
    choices: Array<{ message?: { content?: string | null } }>;
};

export type CreateCompletionFn = (
    params: OpenAI.Chat.ChatCompletionCreateParamsNonStreaming
) => Promise<CompletionResponse>;

export interface OpenAIClientOptions {
    apiKey?: string;
    baseURL?: string;
    /** Replaces the call to the completions endpoint, e.g. in tests. */
    createCompletionFn?: CreateCompletionFn;
}

/**
 * OpenAIClient implements the ILLMClient interface to provide chat completion functionality
 * using OpenAI's API, or any OpenAI-compatible endpoint configured through BASE_URL.
 */
export class OpenAIClient implements ILLMClient {
    /** OpenAI client instance for making API calls */
    private openai: OpenAI;
    private readonly createCompletion: CreateCompletionFn;

    /**
     * Sets up the OpenAI client with API key and optional base URL, falling back to environment variables.
     * @throws Error if no API key is given or set in the environment
     */
    constructor(options: OpenAIClientOptions = {}) {
        const apiKey = options.apiKey || process.env[OPENAI_API_KEY_ENV_VAR] || '';

        if (!apiKey) {
            const message = `OpenAI API key (${OPENAI_API_KEY_ENV_VAR}) is not set in environment variables.`;
            console.warn(message);
            throw new Error(message);
        }

        const baseURL = options.baseURL || process.env[BASE_URL_ENV_VAR] || '';
        if (!baseURL) {
            dbg(`${BASE_URL_ENV_VAR} is not set. Using default OpenAI URL.`);
            this.openai = new OpenAI({ apiKey });
        }
        else {
            console.log(`Using base URL: ${baseURL}`);
            this.openai = new OpenAI({ apiKey, baseURL });
        }

        this.createCompletion = options.createCompletionFn
            ?? ((params) => this.openai.chat.completions.create(params));
    }

    /**
     * Makes a chat completion request.
     * @param messages - System prompt, replayed history and the current prompt, in order
     * @param options - Optional model override, temperature and JSON response mode
     * @returns Promise resolving to the AI's response text
     * @throws Error if API call fails or returns empty content
     */
    async chatCompletion(
        messages: ChatMessage[],
        options?: ChatCompletionOptions
    ): Promise<string> {
        const effectiveModel = options?.modelName && options.modelName.trim() !== ''
            ? options.modelName
            : DEFAULT_MODEL_NAME;

        const params: OpenAI.Chat.ChatCompletionCreateParamsNonStreaming = {
            model: effectiveModel,
            messages: messages.map((msg): OpenAI.Chat.ChatCompletionMessageParam => {
                switch (msg.role) {
                    case 'system':
                        return { role: 'system', content: msg.content };
                    case 'user':
                        return { role: 'user', content: msg.content };
                    default:
                        return { role: 'assistant', content: msg.content };
                }
            }),
            temperature: options?.temperature ?? MODEL_TEMPERATURE,
            max_tokens: MAX_COMPLETION_TOKENS,
        };
        if (options?.jsonResponse) {
            params.response_format = { type: 'json_object' };
        }

        try {
            dbg('\n--- Calling OpenAI API --- (via OpenAIClient)');
            dbg(`Using model for API call: ${effectiveModel}`);

            const completion = await this.createCompletion(params);
            dbg('--- OpenAI API Call Complete --- (via OpenAIClient)');

            const responseContent = completion.choices[0]?.message?.content;

            if (!responseContent) {
                console.warn("OpenAI API call returned successfully but contained no content.");
                throw new Error("OpenAI API call returned successfully but contained no content.");
            }

            return responseContent;
        } catch (error) {
            console.error("Error calling OpenAI API via OpenAIClient:", error);
            throw new Error(`Failed to communicate with OpenAI: ${errorMessage(error)}`);
        }
    }
}
