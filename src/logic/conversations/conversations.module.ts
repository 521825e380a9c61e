import { Module } from '@nestjs/common';
import { TypeOrmModule } from '@nestjs/typeorm';
import { Conversation, Message } from '../../entities';
import { ConversationsService } from './conversations.service';
import { CONVERSATION_COUNTER, HISTORY_STORE } from './types';

@Module({
    imports: [TypeOrmModule.forFeature([Conversation, Message])],
    providers: [
        ConversationsService,
        { provide: CONVERSATION_COUNTER, useExisting: ConversationsService },
        { provide: HISTORY_STORE, useExisting: ConversationsService },
    ],
    exports: [ConversationsService, CONVERSATION_COUNTER, HISTORY_STORE],
})
export class ConversationsModule {}
