import { Artifact } from '../tools/types';

export const CONVERSATION_COUNTER = Symbol('CONVERSATION_COUNTER');
export const HISTORY_STORE = Symbol('HISTORY_STORE');

export type HistoryRole = 'user' | 'assistant';

export interface HistoryEntry {
    role: HistoryRole;
    content: string;
}

/** Prompt count of a conversation. It only ever grows. */
export interface ConversationCounter {
    perConversationCount(conversationId: string): Promise<number>;
    /** Resolves to the count after the increment. */
    incrementConversationCount(conversationId: string): Promise<number>;
}

export type TurnOutcome = 'complete' | 'limit_reached';

export interface TurnSummary {
    turnId: string;
    fullText: string;
    toolsUsed: string[];
    durationMs: number;
    artifacts: Artifact[];
    tokenEstimate: number;
    iterations: number;
    outcome: TurnOutcome;
}

export interface HistoryStore {
    ensureConversation(userId: string, conversationId?: string): Promise<string>;
    recentHistory(conversationId: string, turns: number): Promise<HistoryEntry[]>;
    saveUserMessage(conversationId: string, turnId: string, content: string): Promise<void>;
    saveTurn(conversationId: string, summary: TurnSummary): Promise<void>;
}
