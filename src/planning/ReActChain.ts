import { nowIso } from '../utils';
import { createReasoningStep } from './records';
import { ReActChainSnapshot, ReasoningStep } from './types';

/**
 * Append-only log of reasoning steps for one conversation.
 * Steps are frozen on creation and are never removed or reordered.
 */
export class ReActChain {
    readonly startTime: string;
    /** Free-form data attached to the conversation's reasoning. */
    readonly context: Record<string, unknown>;
    private readonly steps: ReasoningStep[] = [];

    constructor(startTime: string = nowIso(), context: Record<string, unknown> = {}) {
        this.startTime = startTime;
        this.context = context;
    }

    /**
     * Rebuilds a chain, steps and all, from a snapshot taken by `toSnapshot`.
     */
    static fromSnapshot(snapshot: ReActChainSnapshot): ReActChain {
        const chain = new ReActChain(snapshot.startTime, { ...snapshot.context });
        for (const step of snapshot.steps) {
            chain.steps.push(Object.freeze({ ...step }));
        }
        return chain;
    }

    /**
     * Appends a new step and returns its id.
     */
    addStep(observation: string, thought: string, action: string | null = null, result: string | null = null): string {
        const step = createReasoningStep(observation, thought, action, result);
        this.steps.push(step);
        return step.id;
    }

    get length(): number {
        return this.steps.length;
    }

    getSteps(): readonly ReasoningStep[] {
        return this.steps;
    }

    toSnapshot(): ReActChainSnapshot {
        return {
            startTime: this.startTime,
            steps: [...this.steps],
            context: { ...this.context },
        };
    }
}
