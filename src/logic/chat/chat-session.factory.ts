import { Inject, Injectable } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { Environment } from '../../config/configuration';
import { HISTORY_STORE, HistoryStore } from '../conversations/types';
import { OrchestratorService } from '../orchestration/orchestrator.service';
import { AdmissionService } from '../rate-limit/admission.service';
import { ChatSession, ChatSessionOptions } from './chat-session';
import { EventSink } from './event-sink';

@Injectable()
export class ChatSessionFactory {
    private readonly historyTurns: number;

    constructor(
        private readonly admission: AdmissionService,
        @Inject(HISTORY_STORE) private readonly history: HistoryStore,
        private readonly orchestrator: OrchestratorService,
        configService: ConfigService<Environment, true>,
    ) {
        this.historyTurns = configService.get('HISTORY_TURNS', { infer: true });
    }

    create(sink: EventSink, options: Omit<ChatSessionOptions, 'historyTurns'>): ChatSession {
        return new ChatSession(
            sink,
            { admission: this.admission, history: this.history, orchestrator: this.orchestrator },
            { ...options, historyTurns: this.historyTurns },
        );
    }
}
