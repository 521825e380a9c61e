import { HistoryEntry } from '../conversations/types';
import { Artifact } from '../tools/types';

export interface ConversationTurn {
    userId: string;
    conversationId: string;
    userText: string;
    history: HistoryEntry[];
}

export interface TurnMetadata {
    tokensUsed: number;
    iterations: number;
    toolsUsed: string[];
    artifacts: Artifact[];
}

export type EngineEvent =
    | { type: 'text_chunk'; content: string }
    | { type: 'tool_dispatched'; id: string; name: string }
    | { type: 'tool_done'; id: string; name: string; success: boolean; error?: string }
    | { type: 'turn_complete'; content: string; metadata: TurnMetadata }
    | { type: 'turn_limit_reached'; content: string; metadata: TurnMetadata }
    | { type: 'turn_failed'; error: string };

export type TerminalEngineEvent = Extract<EngineEvent, { type: 'turn_complete' | 'turn_limit_reached' | 'turn_failed' }>;

export function isTerminal(event: EngineEvent): event is TerminalEngineEvent {
    return event.type === 'turn_complete' || event.type === 'turn_limit_reached' || event.type === 'turn_failed';
}
