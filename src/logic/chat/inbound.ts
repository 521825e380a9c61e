import { z } from 'zod';

export const MAX_MESSAGE_LENGTH = 4000;

export const inboundMessageSchema = z.discriminatedUnion('type', [
    z.object({
        type: z.literal('message'),
        content: z.string().trim().min(1, 'message is empty').max(MAX_MESSAGE_LENGTH),
        conversationId: z.string().min(1).optional(),
    }),
    z.object({ type: z.literal('ping') }),
    z.object({ type: z.literal('typing'), isTyping: z.boolean() }),
]);

export type InboundMessage = z.infer<typeof inboundMessageSchema>;

export type InboundParseResult = { ok: true; message: InboundMessage } | { ok: false; error: string };

/** Accepts an already-decoded object or a JSON string. */
export function parseInbound(raw: unknown): InboundParseResult {
    let candidate: unknown = raw;
    if (typeof raw === 'string') {
        try {
            candidate = JSON.parse(raw);
        } catch {
            return { ok: false, error: 'invalid JSON' };
        }
    }
    const parsed = inboundMessageSchema.safeParse(candidate);
    if (!parsed.success) {
        const issue = parsed.error.issues[0];
        const path = issue && issue.path.length > 0 ? `${issue.path.join('.')}: ` : '';
        return { ok: false, error: `invalid message: ${path}${issue?.message ?? 'unrecognised'}` };
    }
    return { ok: true, message: parsed.data };
}
