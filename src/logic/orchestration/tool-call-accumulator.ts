import { CompletionDelta, RawToolCall } from '../llm/types';

type ToolCallDelta = Extract<CompletionDelta, { type: 'tool_call' }>;

/**
 * Reassembles streamed tool-call fragments. A fragment is attached to the call
 * named by its id, else by its index, else to the call that is currently open.
 * Calls come out in the order they were first seen, once the stream has ended.
 */
export class ToolCallAccumulator {
    private readonly calls = new Map<string, RawToolCall>();
    private readonly idsByIndex = new Map<number, string>();
    private openId: string | null = null;

    push(delta: ToolCallDelta): void {
        const id = this.resolveId(delta);
        const existing = this.calls.get(id);
        if (existing) {
            if (delta.name && !existing.name) existing.name = delta.name;
            existing.arguments += delta.argumentsFragment;
        } else {
            this.calls.set(id, { id, name: delta.name ?? '', arguments: delta.argumentsFragment });
        }
        if (delta.index !== undefined) {
            this.idsByIndex.set(delta.index, id);
        }
        this.openId = id;
    }

    get size(): number {
        return this.calls.size;
    }

    flush(): RawToolCall[] {
        const calls = [...this.calls.values()];
        this.calls.clear();
        this.idsByIndex.clear();
        this.openId = null;
        return calls;
    }

    private resolveId(delta: ToolCallDelta): string {
        if (delta.id) return delta.id;
        if (delta.index !== undefined) {
            const known = this.idsByIndex.get(delta.index);
            if (known) return known;
            if (delta.name) return `call_${delta.index}`;
        }
        return this.openId ?? `call_${this.calls.size}`;
    }
}
