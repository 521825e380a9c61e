import { Logger } from '@nestjs/common';
import { v4 as uuidv4 } from 'uuid';
import { errorMessage, TransportError } from '../../utils/errors';
import { HistoryEntry, HistoryStore, TurnOutcome } from '../conversations/types';
import { OrchestratorService } from '../orchestration/orchestrator.service';
import { EngineEvent } from '../orchestration/types';
import { AdmissionService } from '../rate-limit/admission.service';
import { ChatEvent } from './events';
import { EventSink } from './event-sink';

export interface ChatSessionDependencies {
    admission: AdmissionService;
    history: HistoryStore;
    orchestrator: OrchestratorService;
}

export interface ChatSessionOptions {
    userId: string;
    connectionId: string;
    conversationId?: string;
    historyTurns: number;
    clientAddress?: string;
    userAgent?: string;
}

/** `dropped`: the turn was still queued when the session closed and never ran. */
export type TurnReportOutcome = 'denied' | TurnOutcome | 'failed' | 'dropped';

export interface TurnReport {
    turnId: string;
    conversationId?: string;
    outcome: TurnReportOutcome;
}

/**
 * One client connection. Turns run strictly one after another; a turn submitted
 * while another is running waits behind it. Once the transport fails the session
 * is closed and stops emitting, but a turn already under way still finishes and
 * is persisted. Turns still waiting in the queue at that point are dropped
 * before admission.
 */
export class ChatSession {
    private readonly logger = new Logger(ChatSession.name);
    private closed = false;
    private queue: Promise<unknown> = Promise.resolve();
    private conversationId: string | undefined;
    private lastActivity = Date.now();

    constructor(
        private readonly sink: EventSink,
        private readonly deps: ChatSessionDependencies,
        private readonly options: ChatSessionOptions,
    ) {
        this.conversationId = options.conversationId;
    }

    get userId(): string {
        return this.options.userId;
    }

    get connectionId(): string {
        return this.options.connectionId;
    }

    get currentConversationId(): string | undefined {
        return this.conversationId;
    }

    get isClosed(): boolean {
        return this.closed;
    }

    get lastActivityAt(): number {
        return this.lastActivity;
    }

    touch(now = Date.now()): void {
        this.lastActivity = now;
    }

    /** Greets the client and tells it where it stands against its limits. */
    async open(): Promise<void> {
        this.emit({
            type: 'connected',
            userId: this.userId,
            connectionId: this.connectionId,
            conversationId: this.conversationId,
            timestamp: new Date(),
        });
        try {
            const snapshot = await this.deps.admission.usage(this.userId, this.conversationId);
            if (!snapshot.whitelisted) {
                this.emit({ type: 'admission_info', usage: snapshot.usage, limits: snapshot.limits });
            }
        } catch (error) {
            this.logger.error(`could not read usage for user ${this.userId}: ${errorMessage(error)}`);
        }
    }

    submit(text: string, conversationId?: string): Promise<TurnReport> {
        this.touch();
        const run = this.queue.then(() => this.runTurn(text, conversationId));
        this.queue = run.catch(() => undefined);
        return run;
    }

    /** Forwards a client-protocol event. Returns false when it could not be delivered. */
    notify(event: ChatEvent): boolean {
        return this.emit(event);
    }

    close(): void {
        if (this.closed) {
            return;
        }
        this.closed = true;
        this.sink.close();
        this.logger.log(`session ${this.connectionId} for user ${this.userId} closed`);
    }

    private async runTurn(text: string, requestedConversationId?: string): Promise<TurnReport> {
        const turnId = uuidv4();
        if (this.closed) {
            this.logger.debug(`dropping queued turn ${turnId} on closed session ${this.connectionId}`);
            return { turnId, conversationId: this.conversationId, outcome: 'dropped' };
        }
        let conversationId: string | undefined;
        try {
            conversationId = await this.deps.history.ensureConversation(
                this.userId,
                requestedConversationId ?? this.conversationId,
            );
            this.conversationId = conversationId;

            const decision = await this.deps.admission.admit({
                userId: this.userId,
                conversationId,
                userMessage: text,
                clientAddress: this.options.clientAddress,
                userAgent: this.options.userAgent,
            });
            if (!decision.allowed) {
                this.emit({
                    type: 'admission_denied',
                    turnId,
                    kind: decision.kind,
                    limit: decision.limit,
                    used: decision.used,
                    resetAt: decision.resetAt,
                });
                return { turnId, conversationId, outcome: 'denied' };
            }
            if (!decision.whitelisted) {
                this.emit({ type: 'admission_info', turnId, usage: decision.usage, limits: decision.limits });
            }

            const history = await this.deps.history.recentHistory(conversationId, this.options.historyTurns);
            await this.deps.history.saveUserMessage(conversationId, turnId, text);
            this.emit({ type: 'typing', turnId, isTyping: true });

            return await this.streamTurn(turnId, conversationId, text, history);
        } catch (error) {
            this.logger.error(`turn ${turnId} for user ${this.userId} failed: ${errorMessage(error)}`);
            this.emit({ type: 'turn_failed', turnId, error: 'internal error' });
            return { turnId, conversationId, outcome: 'failed' };
        }
    }

    private async streamTurn(
        turnId: string,
        conversationId: string,
        userText: string,
        history: HistoryEntry[],
    ): Promise<TurnReport> {
        const startedAt = Date.now();
        const events = this.deps.orchestrator.run({ userId: this.userId, conversationId, userText, history });

        for await (const event of events) {
            switch (event.type) {
                case 'turn_complete':
                case 'turn_limit_reached': {
                    const outcome: TurnOutcome = event.type === 'turn_complete' ? 'complete' : 'limit_reached';
                    const durationMs = Date.now() - startedAt;
                    await this.persist(conversationId, turnId, outcome, durationMs, event);
                    if (event.type === 'turn_complete') {
                        this.emit({
                            type: 'turn_complete',
                            turnId,
                            conversationId,
                            metadata: { ...event.metadata, processingTimeMs: durationMs },
                        });
                    } else {
                        this.emit({
                            type: 'turn_limit_reached',
                            turnId,
                            conversationId,
                            iterations: event.metadata.iterations,
                        });
                    }
                    return { turnId, conversationId, outcome };
                }
                case 'turn_failed':
                    this.emit({ type: 'turn_failed', turnId, error: event.error });
                    return { turnId, conversationId, outcome: 'failed' };
                default:
                    this.emit({ ...event, turnId });
            }
        }
        // the engine always ends on a terminal event
        this.emit({ type: 'turn_failed', turnId, error: 'turn ended unexpectedly' });
        return { turnId, conversationId, outcome: 'failed' };
    }

    private async persist(
        conversationId: string,
        turnId: string,
        outcome: TurnOutcome,
        durationMs: number,
        event: Extract<EngineEvent, { type: 'turn_complete' | 'turn_limit_reached' }>,
    ): Promise<void> {
        try {
            await this.deps.history.saveTurn(conversationId, {
                turnId,
                fullText: event.content,
                toolsUsed: event.metadata.toolsUsed,
                durationMs,
                artifacts: event.metadata.artifacts,
                tokenEstimate: event.metadata.tokensUsed,
                iterations: event.metadata.iterations,
                outcome,
            });
        } catch (error) {
            this.logger.error(`failed to persist turn ${turnId}: ${errorMessage(error)}`);
        }
    }

    private emit(event: ChatEvent): boolean {
        if (this.closed) {
            return false;
        }
        try {
            this.sink.send(event);
            return true;
        } catch (error) {
            if (!(error instanceof TransportError)) {
                throw error;
            }
            this.logger.warn(`connection ${this.connectionId} lost, dropping further events`);
            this.closed = true;
            return false;
        }
    }
}
