import { Injectable, Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { Content, FunctionDeclaration, GoogleGenAI, Part } from '@google/genai';
import { v4 as uuidv4 } from 'uuid';
import { Environment } from '../../config/configuration';
import { isRecord } from '../tools/tool-result';
import { ToolDefinition } from '../tools/types';
import { CompletionDelta, LlmMessage, LlmProvider, RawToolCall } from './types';

function parseArguments(raw: string): Record<string, unknown> {
    try {
        const parsed: unknown = JSON.parse(raw || '{}');
        return isRecord(parsed) ? parsed : {};
    } catch {
        return {};
    }
}

function toFunctionCallPart(call: RawToolCall): Part {
    return { functionCall: { id: call.id, name: call.name, args: parseArguments(call.arguments) } };
}

/**
 * Maps the provider-neutral message list onto Gemini contents. Gemini has no
 * system or tool role: system text goes to `systemInstruction`, assistant turns
 * become `model`, and consecutive tool results are folded into one `user` turn
 * of function responses.
 */
export function toGeminiContents(messages: LlmMessage[]): { systemInstruction?: string; contents: Content[] } {
    const system: string[] = [];
    const contents: Content[] = [];

    for (const message of messages) {
        switch (message.role) {
            case 'system':
                system.push(message.content);
                break;
            case 'user':
                contents.push({ role: 'user', parts: [{ text: message.content }] });
                break;
            case 'assistant': {
                const parts: Part[] = message.content ? [{ text: message.content }] : [];
                parts.push(...(message.toolCalls ?? []).map(toFunctionCallPart));
                if (parts.length > 0) {
                    contents.push({ role: 'model', parts });
                }
                break;
            }
            case 'tool': {
                const part: Part = {
                    functionResponse: { id: message.toolCallId, name: message.name, response: { output: message.content } },
                };
                const last = contents[contents.length - 1];
                if (last && last.role === 'user' && last.parts?.every((p) => p.functionResponse !== undefined)) {
                    last.parts.push(part);
                } else {
                    contents.push({ role: 'user', parts: [part] });
                }
                break;
            }
        }
    }

    return { systemInstruction: system.length > 0 ? system.join('\n\n') : undefined, contents };
}

export function toFunctionDeclarations(tools: ToolDefinition[]): FunctionDeclaration[] {
    return tools.map((tool) => ({
        name: tool.name,
        description: tool.description,
        parametersJsonSchema: tool.parameters,
    }));
}

@Injectable()
export class GeminiService implements LlmProvider {
    private readonly logger = new Logger(GeminiService.name);
    private readonly genAI: GoogleGenAI;
    private readonly chatModel: string;
    private readonly temperature: number;
    private readonly maxOutputTokens: number;

    constructor(private readonly configService: ConfigService<Environment, true>) {
        this.genAI = new GoogleGenAI({ apiKey: this.configService.get('GEMINI_API_KEY', { infer: true }) });
        this.chatModel = this.configService.get('GEMINI_CHAT_MODEL', { infer: true });
        this.temperature = this.configService.get('LLM_TEMPERATURE', { infer: true });
        this.maxOutputTokens = this.configService.get('LLM_MAX_OUTPUT_TOKENS', { infer: true });
    }

    /**
     * Streams one completion. Gemini delivers each function call whole, so every
     * call becomes a single `tool_call` delta; calls without an id get one here.
     */
    async *streamCompletion(messages: LlmMessage[], tools: ToolDefinition[]): AsyncGenerator<CompletionDelta> {
        const { systemInstruction, contents } = toGeminiContents(messages);
        const stream = await this.genAI.models.generateContentStream({
            model: this.chatModel,
            contents,
            config: {
                temperature: this.temperature,
                maxOutputTokens: this.maxOutputTokens,
                ...(systemInstruction ? { systemInstruction } : {}),
                ...(tools.length > 0 ? { tools: [{ functionDeclarations: toFunctionDeclarations(tools) }] } : {}),
            },
        });

        for await (const chunk of stream) {
            const parts = chunk.candidates?.[0]?.content?.parts ?? [];
            for (const part of parts) {
                if (part.functionCall) {
                    const call = part.functionCall;
                    yield {
                        type: 'tool_call',
                        id: call.id || `call_${uuidv4()}`,
                        name: call.name ?? '',
                        argumentsFragment: JSON.stringify(call.args ?? {}),
                    };
                } else if (part.text && !part.thought) {
                    yield { type: 'text', text: part.text };
                }
            }
        }
        this.logger.debug(`completion stream from ${this.chatModel} finished`);
        yield { type: 'end' };
    }
}
