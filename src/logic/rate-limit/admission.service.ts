import { Inject, Injectable, Logger } from '@nestjs/common';
import { KeyedMutex } from '../../utils/keyed-mutex';
import { errorMessage } from '../../utils/errors';
import { CONVERSATION_COUNTER, ConversationCounter } from '../conversations/types';
import { RateLimitPolicyService } from './rate-limit-policy.service';
import { AdmissionDecision, AdmissionRequest, DeniedDecision, UsageSnapshot } from './types';
import { ViolationsService } from './violations.service';
import { WINDOW_COUNTER_STORE, WindowCounterStore } from './window-counter.store';
import { currentCount, findBreach, resolveLimits } from './windows';

/**
 * Fail-fast admission gate: burst, per-conversation, hourly, daily, first breach
 * wins. A denied request consumes nothing; an admitted one is counted in every
 * window before the decision is returned.
 */
@Injectable()
export class AdmissionService {
    private readonly logger = new Logger(AdmissionService.name);
    private readonly userLocks = new KeyedMutex();

    constructor(
        @Inject(WINDOW_COUNTER_STORE)
        private readonly counters: WindowCounterStore,
        @Inject(CONVERSATION_COUNTER)
        private readonly conversations: ConversationCounter,
        private readonly policyService: RateLimitPolicyService,
        private readonly violationsService: ViolationsService,
    ) { }

    async admit(request: AdmissionRequest, now = new Date()): Promise<AdmissionDecision> {
        const policy = await this.policyService.snapshot();
        if (policy.whitelist.has(request.userId)) {
            return { allowed: true, whitelisted: true };
        }
        const limits = resolveLimits(policy, request.userId);

        // the store holds the user's row locked from the check through the increment;
        // the mutex only spares this process from queueing on that lock
        return this.userLocks.runExclusive(request.userId, async () => {
            let conversationCount = 0;
            const outcome = await this.counters.incrementIfAllowed(request.userId, now, {
                check: async (windows) => {
                    const perConversation = await this.conversations.perConversationCount(request.conversationId);
                    return findBreach(windows, perConversation, limits, now);
                },
                onAdmitted: async () => {
                    conversationCount = await this.conversations.incrementConversationCount(request.conversationId);
                },
            });

            if (!outcome.admitted) {
                await this.recordViolation(request, outcome.breach, now);
                return outcome.breach;
            }

            return {
                allowed: true,
                whitelisted: false,
                usage: {
                    burst: outcome.windows.burst.count,
                    perConversation: conversationCount,
                    hourly: outcome.windows.hourly.count,
                    daily: outcome.windows.daily.count,
                },
                limits,
            };
        });
    }

    /** Read-only view of where the user stands; counts nothing. */
    async usage(userId: string, conversationId?: string, now = new Date()): Promise<UsageSnapshot> {
        const policy = await this.policyService.snapshot();
        const limits = resolveLimits(policy, userId);
        const windows = await this.counters.getOrCreate(userId, now);
        const perConversation = conversationId ? await this.conversations.perConversationCount(conversationId) : 0;
        return {
            whitelisted: policy.whitelist.has(userId),
            usage: {
                burst: currentCount(windows.burst, 'burst', now),
                perConversation,
                hourly: currentCount(windows.hourly, 'hourly', now),
                daily: currentCount(windows.daily, 'daily', now),
            },
            limits,
        };
    }

    private async recordViolation(request: AdmissionRequest, breach: DeniedDecision, now: Date): Promise<void> {
        this.logger.warn(`${breach.kind} limit reached for user ${request.userId}: ${breach.used}/${breach.limit}`);
        try {
            await this.violationsService.record({
                userId: request.userId,
                conversationId: request.conversationId,
                kind: breach.kind,
                limit: breach.limit,
                used: breach.used,
                timestamp: now,
                userMessage: request.userMessage,
                clientAddress: request.clientAddress,
                userAgent: request.userAgent,
            });
        } catch (error) {
            // the denial stands even when the audit row cannot be written
            this.logger.error(`failed to record ${breach.kind} violation for user ${request.userId}: ${errorMessage(error)}`);
        }
    }
}
