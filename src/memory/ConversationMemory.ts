import { AGENT_ROLE, USER_ROLE } from '../agents/ILLMClient';
import { HistoryMessage } from '../agents/LLMUtils';
import { DEFAULT_MEMORY_WINDOW } from '../config';

/**
 * Sliding window over the most recent chat exchanges of one conversation.
 * Holds at most `windowSize` exchanges (one user and one agent message each);
 * older messages are dropped as new ones arrive.
 */
export class ConversationMemory {
    private messages: HistoryMessage[];

    constructor(readonly windowSize: number = DEFAULT_MEMORY_WINDOW, messages: HistoryMessage[] = []) {
        if (!Number.isInteger(windowSize) || windowSize < 1) {
            throw new Error(`ConversationMemory: window size must be a positive integer, got ${windowSize}.`);
        }
        this.messages = [];
        messages.forEach(m => this.add(m));
    }

    private get capacity(): number {
        return this.windowSize * 2;
    }

    private add(message: HistoryMessage): void {
        this.messages.push({ ...message });
        if (this.messages.length > this.capacity) {
            this.messages = this.messages.slice(this.messages.length - this.capacity);
        }
    }

    addUserMessage(content: string): void {
        this.add({ role: USER_ROLE, content });
    }

    addAgentMessage(content: string): void {
        this.add({ role: AGENT_ROLE, content });
    }

    /**
     * Returns the retained messages, oldest first.
     */
    getMessages(): HistoryMessage[] {
        return this.messages.map(m => ({ ...m }));
    }

    get length(): number {
        return this.messages.length;
    }
}
