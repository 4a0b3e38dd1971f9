import { ConversationRecord } from './store_types';

/**
 * Decides which conversations the store drops.
 */
export interface EvictionPolicy {
    /**
     * @param records - All stored conversations, least recently used first.
     * @param now - Current time in epoch milliseconds.
     * @returns Ids of the conversations to drop.
     */
    selectEvictions(records: readonly ConversationRecord[], now: number): string[];
}

/**
 * Keeps at most `maxConversations`, dropping the least recently used beyond that.
 */
export class LruEvictionPolicy implements EvictionPolicy {
    constructor(private readonly maxConversations: number) {
        if (!Number.isInteger(maxConversations) || maxConversations < 1) {
            throw new Error(`LruEvictionPolicy: maxConversations must be a positive integer, got ${maxConversations}.`);
        }
    }

    selectEvictions(records: readonly ConversationRecord[]): string[] {
        const excess = records.length - this.maxConversations;
        return excess > 0 ? records.slice(0, excess).map(r => r.conversationId) : [];
    }
}

/**
 * Drops conversations untouched for longer than `maxIdleMs`.
 */
export class IdleTimeoutEvictionPolicy implements EvictionPolicy {
    constructor(private readonly maxIdleMs: number) {
        if (maxIdleMs <= 0) {
            throw new Error(`IdleTimeoutEvictionPolicy: maxIdleMs must be positive, got ${maxIdleMs}.`);
        }
    }

    selectEvictions(records: readonly ConversationRecord[], now: number): string[] {
        return records
            .filter(r => now - r.lastAccessedAt > this.maxIdleMs)
            .map(r => r.conversationId);
    }
}

/**
 * Drops a conversation when any of the wrapped policies selects it.
 */
export class CompositeEvictionPolicy implements EvictionPolicy {
    private readonly policies: EvictionPolicy[];

    constructor(...policies: EvictionPolicy[]) {
        this.policies = policies;
    }

    selectEvictions(records: readonly ConversationRecord[], now: number): string[] {
        const selected = new Set<string>();
        for (const policy of this.policies) {
            policy.selectEvictions(records, now).forEach(id => selected.add(id));
        }
        return Array.from(selected);
    }
}
