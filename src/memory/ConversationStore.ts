import * as fs from 'fs/promises';
import * as path from 'path';
import { ReActChain } from '../planning/ReActChain';
import { BusinessPlan } from '../planning/types';
import { DEFAULT_MAX_CONVERSATIONS, DEFAULT_MEMORY_WINDOW } from '../config';
import { dbg, say } from '../utils';
import { ConversationMemory } from './ConversationMemory';
import { EvictionPolicy, LruEvictionPolicy } from './EvictionPolicy';
import {
    ConversationRecord,
    ConversationState,
    DEFAULT_STORE_STATE,
    StoreState,
    StoreStateSchema
} from './store_types';

type ReadFileFn = (path: string) => Promise<string>;
type WriteFileFn = (path: string, data: string) => Promise<void>;

function hasErrorCode(error: unknown, code: string): boolean {
    return typeof error === 'object' && error !== null && 'code' in error && error.code === code;
}

export interface ConversationStoreOptions {
    /** Exchanges kept in each conversation's memory window. */
    memoryWindow?: number;
    evictionPolicy?: EvictionPolicy;
    /** Clock in epoch milliseconds, injectable for tests. */
    clock?: () => number;
    readFile?: ReadFileFn;
    writeFile?: WriteFileFn;
}

/**
 * Owns every conversation's reasoning chain, current plan and memory window.
 *
 * Work on one conversation is serialized through `runExclusive`; different
 * conversations proceed independently. The store is bounded by its eviction
 * policy (least-recently-used by default), and a conversation with work in
 * flight is never evicted. State can be loaded from and saved to a JSON file.
 */
export class ConversationStore {
    /** Insertion order doubles as recency order: least recently used first. */
    private readonly records = new Map<string, ConversationRecord>();
    private readonly locks = new Map<string, Promise<void>>();
    private storeFilePath: string | null = null;

    private readonly memoryWindow: number;
    private readonly evictionPolicy: EvictionPolicy;
    private readonly clock: () => number;
    private readonly readFile: ReadFileFn;
    private readonly writeFile: WriteFileFn;

    constructor(options: ConversationStoreOptions = {}) {
        this.memoryWindow = options.memoryWindow ?? DEFAULT_MEMORY_WINDOW;
        this.evictionPolicy = options.evictionPolicy ?? new LruEvictionPolicy(DEFAULT_MAX_CONVERSATIONS);
        this.clock = options.clock ?? Date.now;
        this.readFile = options.readFile ?? ((p: string) => fs.readFile(p, 'utf-8'));
        this.writeFile = options.writeFile ?? ((p: string, data: string) => fs.writeFile(p, data, 'utf-8'));
    }

    /**
     * Runs `task` once every earlier task for the same conversation has settled.
     * The task's result or error is passed through unchanged.
     */
    async runExclusive<T>(conversationId: string, task: () => Promise<T>): Promise<T> {
        const previous = this.locks.get(conversationId) ?? Promise.resolve();
        const run = previous.then(task);
        // The queue only tracks completion; the outcome reaches the caller through `run`.
        const settled = run.then(() => undefined, () => undefined);
        this.locks.set(conversationId, settled);
        try {
            return await run;
        } finally {
            if (this.locks.get(conversationId) === settled) {
                this.locks.delete(conversationId);
            }
        }
    }

    isBusy(conversationId: string): boolean {
        return this.locks.has(conversationId);
    }

    has(conversationId: string): boolean {
        return this.records.has(conversationId);
    }

    get size(): number {
        return this.records.size;
    }

    /**
     * Returns the conversation and marks it as most recently used.
     */
    get(conversationId: string): ConversationRecord | undefined {
        const record = this.records.get(conversationId);
        if (record) {
            this.touch(record);
        }
        return record;
    }

    /**
     * Returns the conversation, creating an empty one (new chain, no plan, empty memory) when absent.
     */
    getOrCreate(conversationId: string): ConversationRecord {
        const existing = this.get(conversationId);
        if (existing) {
            return existing;
        }
        const now = this.clock();
        const record: ConversationRecord = {
            conversationId,
            chain: new ReActChain(),
            plan: null,
            memory: new ConversationMemory(this.memoryWindow),
            createdAt: now,
            lastAccessedAt: now,
        };
        this.records.set(conversationId, record);
        dbg(`ConversationStore: Created conversation ${conversationId}.`);
        this.evict();
        return record;
    }

    /**
     * Replaces the conversation's current plan.
     * @throws Error if the conversation does not exist.
     */
    upsertPlan(conversationId: string, plan: BusinessPlan): void {
        const record = this.records.get(conversationId);
        if (!record) {
            throw new Error(`ConversationStore: Cannot store plan, conversation ${conversationId} does not exist.`);
        }
        record.plan = plan;
        this.touch(record);
    }

    /**
     * Applies the eviction policy, skipping conversations with work in flight.
     * @returns The ids that were dropped.
     */
    evict(): string[] {
        const candidates = this.evictionPolicy.selectEvictions(Array.from(this.records.values()), this.clock());
        const evicted: string[] = [];
        for (const conversationId of candidates) {
            if (this.isBusy(conversationId)) {
                continue;
            }
            if (this.records.delete(conversationId)) {
                evicted.push(conversationId);
            }
        }
        if (evicted.length > 0) {
            dbg(`ConversationStore: Evicted ${evicted.length} conversation(s): ${evicted.join(', ')}.`);
        }
        return evicted;
    }

    private touch(record: ConversationRecord): void {
        record.lastAccessedAt = this.clock();
        this.records.delete(record.conversationId);
        this.records.set(record.conversationId, record);
    }

    // --- Persistence ---

    /**
     * Loads conversations from the specified JSON file, replacing the current contents.
     * A missing file leaves the store empty; any other I/O, parse or shape error is thrown.
     */
    async loadStore(filePath: string): Promise<void> {
        this.storeFilePath = path.resolve(filePath);
        say(`ConversationStore: Attempting to load conversations from ${this.storeFilePath}`);
        let state: StoreState;
        try {
            const data = await this.readFile(this.storeFilePath);
            state = StoreStateSchema.parse(JSON.parse(data));
        } catch (error) {
            if (hasErrorCode(error, 'ENOENT')) {
                dbg(`ConversationStore: Store file not found at ${this.storeFilePath}. Starting empty.`);
                state = DEFAULT_STORE_STATE;
            } else {
                console.error(`ConversationStore: Error loading store file ${this.storeFilePath}:`, error);
                throw error;
            }
        }
        this.restoreState(state);
        dbg(`ConversationStore: Loaded ${this.records.size} conversation(s).`);
    }

    /**
     * Saves all conversations to the file given to `loadStore`.
     * @throws Error if `loadStore` was never called or the write fails.
     */
    async saveStore(): Promise<void> {
        if (!this.storeFilePath) {
            throw new Error("ConversationStore: Cannot save, file path not set (loadStore was likely not called).");
        }
        say(`ConversationStore: Saving conversations to ${this.storeFilePath}`);
        try {
            await this.writeFile(this.storeFilePath, JSON.stringify(this.toState(), null, 2));
            dbg(`ConversationStore: Successfully saved ${this.records.size} conversation(s).`);
        } catch (error) {
            console.error(`ConversationStore: Error saving store file ${this.storeFilePath}:`, error);
            throw error;
        }
    }

    toState(): StoreState {
        return {
            conversations: Array.from(this.records.values()).map((record): ConversationState => ({
                conversationId: record.conversationId,
                chain: record.chain.toSnapshot(),
                plan: record.plan === null ? null : {
                    ...record.plan,
                    actions: record.plan.actions.map(a => ({ ...a, impact: { ...a.impact }, dependencies: [...a.dependencies] })),
                    metrics: { ...record.plan.metrics },
                    whatIfScenarios: record.plan.whatIfScenarios.map(s => ({ ...s, assumptions: { ...s.assumptions }, impactAreas: [...s.impactAreas] })),
                },
                memory: record.memory.getMessages(),
                createdAt: record.createdAt,
                lastAccessedAt: record.lastAccessedAt,
            })),
        };
    }

    private restoreState(state: StoreState): void {
        this.records.clear();
        const ordered = [...state.conversations].sort((a, b) => a.lastAccessedAt - b.lastAccessedAt);
        for (const conversation of ordered) {
            this.records.set(conversation.conversationId, {
                conversationId: conversation.conversationId,
                chain: ReActChain.fromSnapshot(conversation.chain),
                plan: conversation.plan,
                memory: new ConversationMemory(this.memoryWindow, conversation.memory),
                createdAt: conversation.createdAt,
                lastAccessedAt: conversation.lastAccessedAt,
            });
        }
        this.evict();
    }
}
