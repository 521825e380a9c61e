import { Injectable, Logger } from '@nestjs/common';
import { InjectRepository } from '@nestjs/typeorm';
import { Repository } from 'typeorm';
import { Conversation, Message } from '../../entities';
import { ConversationCounter, HistoryEntry, HistoryStore, TurnSummary } from './types';

const TITLE_LENGTH = 80;

@Injectable()
export class ConversationsService implements ConversationCounter, HistoryStore {
  private readonly logger = new Logger(ConversationsService.name);

  constructor(
    @InjectRepository(Conversation)
    private readonly conversationRepository: Repository<Conversation>,
    @InjectRepository(Message)
    private readonly messageRepository: Repository<Message>,
  ) { }

  async ensureConversation(userId: string, conversationId?: string): Promise<string> {
    if (conversationId) {
      const c = await this.conversationRepository.findOne({ where: { id: conversationId, userId } });
      if (c) return c.id;
    }
    const created = await this.conversationRepository.save({ userId, title: null, promptCount: 0 });
    this.logger.log(`conversation ${created.id} started for user ${userId}`);
    return created.id;
  }

  async perConversationCount(conversationId: string): Promise<number> {
    const c = await this.conversationRepository.findOne({
      where: { id: conversationId },
      select: { id: true, promptCount: true },
    });
    return c?.promptCount ?? 0;
  }

  async incrementConversationCount(conversationId: string): Promise<number> {
    await this.conversationRepository.increment({ id: conversationId }, 'promptCount', 1);
    return this.perConversationCount(conversationId);
  }

  /** Last `turns` user/assistant pairs, oldest first. */
  async recentHistory(conversationId: string, turns: number): Promise<HistoryEntry[]> {
    if (turns <= 0) {
      return [];
    }
    const newestFirst = await this.messageRepository.find({
      where: { conversationId },
      order: { ts: 'DESC' },
      take: turns * 2,
    });
    return newestFirst.reverse().map((m) => ({ role: m.role, content: m.content }));
  }

  async saveUserMessage(conversationId: string, turnId: string, content: string): Promise<void> {
    await this.messageRepository.insert({ conversationId, role: 'user', content, turnId });
    const conversation = await this.conversationRepository.findOne({ where: { id: conversationId } });
    if (conversation && !conversation.title) {
      await this.conversationRepository.update(conversationId, { title: content.slice(0, TITLE_LENGTH) });
    }
  }

  async saveTurn(conversationId: string, summary: TurnSummary): Promise<void> {
    await this.messageRepository.insert({
      conversationId,
      role: 'assistant',
      content: summary.fullText,
      turnId: summary.turnId,
      tokensUsed: summary.tokenEstimate,
      processingTimeMs: summary.durationMs,
      iterations: summary.iterations,
      outcome: summary.outcome,
      toolsUsed: summary.toolsUsed,
      artifacts: summary.artifacts,
    });
  }
}
