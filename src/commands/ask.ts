import { isErrorPayload, MainAgent, QueryResponse, WhatIfResponse } from '../agents/MainAgent';
import { dbg, persistOutput, say } from '../utils';

export interface AskOptions {
    conversationId?: string;
    continueReasoning?: boolean;
    /** Directory to write the rendered plan to. */
    outputDir?: string;
}

export function planFileName(conversationId: string): string {
    return `business_plan_${conversationId}.md`;
}

/**
 * Prints a planner response. Error payloads are reported and rethrown so the
 * CLI exits with a failure code.
 */
export async function reportResponse(response: QueryResponse | WhatIfResponse, outputDir?: string): Promise<void> {
    if (isErrorPayload(response)) {
        say(`Planner error (${response.error_kind}) in conversation ${response.conversation_id}: ${response.error}`);
        throw new Error(response.error);
    }
    say(`Conversation: ${response.conversation_id}`);
    say(response.plan_markdown);
    if (outputDir) {
        await persistOutput(response.plan_markdown, outputDir, planFileName(response.conversation_id));
    }
}

/**
 * Handles the 'ask' command: sends one query to the planner and prints the plan.
 * Saving the store is left to main.ts.
 *
 * @throws Error if no input is given or the planner reports a failure
 */
export async function runAsk(inputText: string, agent: MainAgent, options: AskOptions = {}): Promise<QueryResponse> {
    if (!inputText.trim()) {
        throw new Error("No input provided for the 'ask' command.");
    }
    dbg(`Running ask command${options.conversationId ? ` in conversation ${options.conversationId}` : ''}`);

    const response = await agent.processQuery(inputText, options.conversationId, options.continueReasoning ?? false);
    await reportResponse(response, options.outputDir);

    dbg("runAsk completed.");
    return response;
}
