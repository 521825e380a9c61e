import { LimitKind, WindowLimits, WindowUsage } from '../rate-limit/types';
import { Artifact } from '../tools/types';

/** Name of the socket.io event every outbound payload travels on. */
export const CHAT_EVENT = 'chat.event';
/** Name of the socket.io event clients send their messages on. */
export const CHAT_MESSAGE = 'chat.message';

export interface CompletedTurnMetadata {
    tokensUsed: number;
    iterations: number;
    toolsUsed: string[];
    artifacts: Artifact[];
    processingTimeMs: number;
}

export type ChatEvent =
    | { type: 'connected'; userId: string; connectionId: string; conversationId?: string; timestamp: Date }
    | { type: 'admission_info'; usage: WindowUsage; limits: WindowLimits; turnId?: string }
    | { type: 'admission_denied'; turnId: string; kind: LimitKind; limit: number; used: number; resetAt?: Date }
    | { type: 'typing'; turnId: string; isTyping: boolean }
    | { type: 'text_chunk'; turnId: string; content: string }
    | { type: 'tool_dispatched'; turnId: string; id: string; name: string }
    | { type: 'tool_done'; turnId: string; id: string; name: string; success: boolean; error?: string }
    | { type: 'turn_complete'; turnId: string; conversationId: string; metadata: CompletedTurnMetadata }
    | { type: 'turn_limit_reached'; turnId: string; conversationId: string; iterations: number }
    | { type: 'turn_failed'; turnId: string; error: string }
    | { type: 'pong'; timestamp: Date }
    | { type: 'error'; message: string };

export type ChatEventType = ChatEvent['type'];

function windowsToWire(values: WindowLimits): Record<string, number> {
    return {
        burst: values.burst,
        per_conversation: values.perConversation,
        hourly: values.hourly,
        daily: values.daily,
    };
}

/** JSON body sent to the client. Keys are snake_case on the wire. */
export function toWire(event: ChatEvent): Record<string, unknown> {
    switch (event.type) {
        case 'connected':
            return {
                type: event.type,
                user_id: event.userId,
                connection_id: event.connectionId,
                conversation_id: event.conversationId ?? null,
                timestamp: event.timestamp.toISOString(),
            };
        case 'admission_info':
            return {
                type: event.type,
                turn_id: event.turnId ?? null,
                usage: windowsToWire(event.usage),
                limits: windowsToWire(event.limits),
            };
        case 'admission_denied':
            return {
                type: event.type,
                turn_id: event.turnId,
                kind: event.kind,
                limit: event.limit,
                used: event.used,
                reset_at: event.resetAt ? event.resetAt.toISOString() : null,
            };
        case 'typing':
            return { type: event.type, turn_id: event.turnId, is_typing: event.isTyping };
        case 'text_chunk':
            return { type: event.type, turn_id: event.turnId, content: event.content };
        case 'tool_dispatched':
            return { type: event.type, turn_id: event.turnId, id: event.id, name: event.name };
        case 'tool_done':
            return {
                type: event.type,
                turn_id: event.turnId,
                id: event.id,
                name: event.name,
                success: event.success,
                ...(event.error !== undefined ? { error: event.error } : {}),
            };
        case 'turn_complete':
            return {
                type: event.type,
                turn_id: event.turnId,
                conversation_id: event.conversationId,
                metadata: {
                    tokens_used: event.metadata.tokensUsed,
                    iterations: event.metadata.iterations,
                    tools_used: event.metadata.toolsUsed,
                    artifacts: event.metadata.artifacts.map((a) => ({ kind: a.kind, ref: a.ref })),
                    processing_time_ms: event.metadata.processingTimeMs,
                },
            };
        case 'turn_limit_reached':
            return {
                type: event.type,
                turn_id: event.turnId,
                conversation_id: event.conversationId,
                iterations: event.iterations,
            };
        case 'turn_failed':
            return { type: event.type, turn_id: event.turnId, error: event.error };
        case 'pong':
            return { type: event.type, timestamp: event.timestamp.toISOString() };
        case 'error':
            return { type: event.type, message: event.message };
        default: {
            const unreachable: never = event;
            throw new Error(`unknown chat event ${JSON.stringify(unreachable)}`);
        }
    }
}
