import { Inject, Injectable, Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { Environment } from '../../config/configuration';
import { HistoryEntry } from '../conversations/types';
import { errorMessage, OrchestrationFault } from '../../utils/errors';
import { LLM_PROVIDER, LlmMessage, LlmProvider, RawToolCall } from '../llm/types';
import { isRecord, formatForModel } from '../tools/tool-result';
import { ToolGatewayService } from '../tools/tool-gateway.service';
import { Artifact, ToolCall, ToolResult } from '../tools/types';
import { estimateTokens, SYSTEM_PROMPT } from './prompt';
import { ToolCallAccumulator } from './tool-call-accumulator';
import { ConversationTurn, EngineEvent, TurnMetadata } from './types';

interface OrchestrationState {
    messages: LlmMessage[];
    iteration: number;
    draftingPasses: number;
    accumulatedText: string;
    tokensUsed: number;
    toolsInvoked: string[];
    artifacts: Map<string, Artifact>;
}

function toHistoryMessage(entry: HistoryEntry): LlmMessage {
    return entry.role === 'user'
        ? { role: 'user', content: entry.content }
        : { role: 'assistant', content: entry.content };
}

type ParsedCall = { call: ToolCall } | { failure: ToolResult };

function parseCall(raw: RawToolCall): ParsedCall {
    let args: unknown;
    try {
        args = JSON.parse(raw.arguments.trim() === '' ? '{}' : raw.arguments);
    } catch {
        return {
            failure: { id: raw.id, name: raw.name, success: false, reason: 'invalid_arguments', error: 'invalid arguments' },
        };
    }
    if (!isRecord(args)) {
        return {
            failure: { id: raw.id, name: raw.name, success: false, reason: 'invalid_arguments', error: 'invalid arguments' },
        };
    }
    return { call: { id: raw.id, name: raw.name, arguments: args } };
}

/**
 * Drives one turn: draft with the model, run the tool calls it asks for in
 * parallel, feed the results back and draft again, until the model answers
 * without tool calls or the iteration budget is spent.
 */
@Injectable()
export class OrchestratorService {
    private readonly logger = new Logger(OrchestratorService.name);
    private readonly maxIterations: number;

    constructor(
        @Inject(LLM_PROVIDER) private readonly llm: LlmProvider,
        private readonly toolGateway: ToolGatewayService,
        configService: ConfigService<Environment, true>,
    ) {
        this.maxIterations = configService.get('MAX_ITERATIONS', { infer: true });
    }

    async *run(turn: ConversationTurn): AsyncGenerator<EngineEvent> {
        const state: OrchestrationState = {
            messages: [
                { role: 'system', content: SYSTEM_PROMPT },
                ...turn.history.map(toHistoryMessage),
                { role: 'user', content: turn.userText },
            ],
            iteration: 0,
            draftingPasses: 0,
            accumulatedText: '',
            tokensUsed: 0,
            toolsInvoked: [],
            artifacts: new Map(),
        };
        const tools = await this.toolGateway.catalogue();

        for (;;) {
            const accumulator = new ToolCallAccumulator();
            let draft = '';
            state.draftingPasses += 1;
            try {
                for await (const delta of this.llm.streamCompletion(state.messages, tools)) {
                    if (delta.type === 'end') break;
                    if (delta.type === 'tool_call') {
                        accumulator.push(delta);
                        continue;
                    }
                    if (delta.text.length === 0) continue;
                    draft += delta.text;
                    state.accumulatedText += delta.text;
                    yield { type: 'text_chunk', content: delta.text };
                }
            } catch (error) {
                const fault = new OrchestrationFault(`language model failed: ${errorMessage(error)}`, error);
                this.logger.error(`turn for conversation ${turn.conversationId} failed: ${fault.message}`);
                yield { type: 'turn_failed', error: fault.message };
                return;
            }
            state.tokensUsed += estimateTokens(draft);

            const rawCalls = accumulator.flush();
            if (rawCalls.length === 0) {
                yield { type: 'turn_complete', content: state.accumulatedText, metadata: this.metadata(state) };
                return;
            }

            yield* this.dispatch(rawCalls, draft, state);

            state.iteration += 1;
            if (state.iteration >= this.maxIterations) {
                this.logger.warn(`conversation ${turn.conversationId} hit the limit of ${this.maxIterations} iterations`);
                yield { type: 'turn_limit_reached', content: state.accumulatedText, metadata: this.metadata(state) };
                return;
            }
        }
    }

    private async *dispatch(rawCalls: RawToolCall[], draft: string, state: OrchestrationState): AsyncGenerator<EngineEvent> {
        const parsed = rawCalls.map(parseCall);
        for (const raw of rawCalls) {
            yield { type: 'tool_dispatched', id: raw.id, name: raw.name };
        }

        const runnable = parsed.flatMap((entry) => ('call' in entry ? [entry.call] : []));
        const settled = await this.toolGateway.invokeBatch(runnable);
        let next = 0;
        const results = parsed.map((entry) => ('failure' in entry ? entry.failure : settled[next++]));

        state.messages.push({ role: 'assistant', content: draft, toolCalls: rawCalls });
        for (const result of results) {
            if (result.success) {
                if (!state.toolsInvoked.includes(result.name)) state.toolsInvoked.push(result.name);
                if (result.artifact) state.artifacts.set(result.artifact.kind, result.artifact);
                yield { type: 'tool_done', id: result.id, name: result.name, success: true };
            } else {
                yield { type: 'tool_done', id: result.id, name: result.name, success: false, error: result.error };
            }
            state.messages.push({ role: 'tool', toolCallId: result.id, name: result.name, content: formatForModel(result) });
        }
    }

    private metadata(state: OrchestrationState): TurnMetadata {
        return {
            tokensUsed: state.tokensUsed,
            iterations: state.draftingPasses,
            toolsUsed: [...state.toolsInvoked],
            artifacts: [...state.artifacts.values()],
        };
    }
}
