import { MainAgent, WhatIfResponse } from '../agents/MainAgent';
import { dbg } from '../utils';
import { reportResponse } from './ask';

/**
 * Turns `key=value` arguments into an assumptions map. Values that parse as JSON
 * (numbers, booleans, arrays...) keep their type; anything else stays a string.
 * @throws Error for an argument without '=' or with an empty key
 */
export function parseAssumptions(args: string[]): Record<string, unknown> {
    const assumptions: Record<string, unknown> = {};
    for (const arg of args) {
        const separator = arg.indexOf('=');
        if (separator <= 0) {
            throw new Error(`Invalid assumption "${arg}", expected key=value.`);
        }
        const key = arg.slice(0, separator).trim();
        const rawValue = arg.slice(separator + 1);
        try {
            assumptions[key] = JSON.parse(rawValue);
        } catch {
            assumptions[key] = rawValue;
        }
    }
    return assumptions;
}

/**
 * Handles the 'what-if' command against an existing conversation's plan.
 */
export async function runWhatIf(
    agent: MainAgent,
    conversationId: string,
    scenario: string,
    assumptions: Record<string, unknown>,
    outputDir?: string
): Promise<WhatIfResponse> {
    dbg(`Running what-if for conversation ${conversationId}: "${scenario}"`);
    const response = await agent.whatIfAnalysis(conversationId, scenario, assumptions);
    await reportResponse(response, outputDir);
    return response;
}
