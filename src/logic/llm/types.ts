import { ToolDefinition } from '../tools/types';

export const LLM_PROVIDER = Symbol('LLM_PROVIDER');

/** A tool call as the model issued it; `arguments` is the raw JSON text. */
export interface RawToolCall {
    id: string;
    name: string;
    arguments: string;
}

export type LlmMessage =
    | { role: 'system'; content: string }
    | { role: 'user'; content: string }
    | { role: 'assistant'; content: string; toolCalls?: RawToolCall[] }
    | { role: 'tool'; toolCallId: string; name: string; content: string };

/**
 * One increment of a streamed completion. Tool-call fragments carry the call id
 * when a new call begins; later fragments of the same call may omit it.
 */
export type CompletionDelta =
    | { type: 'text'; text: string }
    | { type: 'tool_call'; id?: string; index?: number; name?: string; argumentsFragment: string }
    | { type: 'end' };

export interface LlmProvider {
    streamCompletion(messages: LlmMessage[], tools: ToolDefinition[]): AsyncIterable<CompletionDelta>;
}
