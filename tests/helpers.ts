import sinon from 'sinon';
import { ILLMClient } from '../src/agents/ILLMClient';

/**
 * Awaits `promise` and returns the Error it rejected with. Fails if it resolves.
 */
export async function captureError(promise: Promise<unknown>): Promise<Error> {
    try {
        await promise;
    } catch (error) {
        if (error instanceof Error) {
            return error;
        }
        throw new Error(`Expected an Error rejection, got: ${String(error)}`);
    }
    throw new Error('Expected the promise to reject, but it resolved.');
}

/**
 * A model client whose chatCompletion is a sinon stub.
 */
export function stubLLMClient(): { client: ILLMClient; chatCompletion: sinon.SinonStub } {
    const chatCompletion = sinon.stub();
    return { client: { chatCompletion }, chatCompletion };
}

/**
 * A well-formed planning reply, with overridable plan title and scenarios.
 */
export function modelReply(options: {
    title?: string;
    steps?: Array<{ observation: string; thought: string; action?: string | null; result?: string | null }>;
    scenarios?: Array<{ description: string; assumptions: Record<string, unknown>; impact_areas: string[]; probability: number }>;
} = {}): string {
    return JSON.stringify({
        reasoning_chain: options.steps ?? [
            { observation: 'Sales are flat', thought: 'Demand is seasonal', action: 'Run a promotion', result: 'Higher Q3 sales' },
        ],
        business_plan: {
            title: options.title ?? 'Growth Plan',
            summary: 'Grow revenue',
            actions: [
                { description: 'Launch promotion', priority: 'high', impact: { revenue: '+5%' }, dependencies: [], timeline: 'Q3' },
            ],
            metrics: { revenue: 'up' },
            what_if_scenarios: options.scenarios ?? [],
        },
    });
}
