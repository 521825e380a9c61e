import { Test, TestingModule } from '@nestjs/testing';
import { getRepositoryToken } from '@nestjs/typeorm';
import { Conversation, Message } from '../../entities';
import { ConversationsService } from './conversations.service';

describe('ConversationsService', () => {
  let service: ConversationsService;
  let conversationRepository: {
    findOne: jest.Mock;
    save: jest.Mock;
    increment: jest.Mock;
    update: jest.Mock;
  };
  let messageRepository: { find: jest.Mock; insert: jest.Mock };

  beforeEach(async () => {
    conversationRepository = {
      findOne: jest.fn(),
      save: jest.fn(async (data: Partial<Conversation>) => ({ ...data, id: 'conv-new' })),
      increment: jest.fn(async () => undefined),
      update: jest.fn(async () => undefined),
    };
    messageRepository = { find: jest.fn(), insert: jest.fn(async () => undefined) };

    const module: TestingModule = await Test.createTestingModule({
      providers: [
        ConversationsService,
        { provide: getRepositoryToken(Conversation), useValue: conversationRepository },
        { provide: getRepositoryToken(Message), useValue: messageRepository },
      ],
    }).compile();

    service = module.get<ConversationsService>(ConversationsService);
  });

  it('reuses a conversation the user owns', async () => {
    conversationRepository.findOne.mockResolvedValue({ id: 'conv-1', userId: 'user-1' });
    expect(await service.ensureConversation('user-1', 'conv-1')).toBe('conv-1');
    expect(conversationRepository.save).not.toHaveBeenCalled();
  });

  it('starts a new conversation when the id is unknown or missing', async () => {
    conversationRepository.findOne.mockResolvedValue(null);
    expect(await service.ensureConversation('user-1', 'conv-404')).toBe('conv-new');
    expect(await service.ensureConversation('user-1')).toBe('conv-new');
    expect(conversationRepository.save).toHaveBeenCalledWith({ userId: 'user-1', title: null, promptCount: 0 });
  });

  it('returns the prompt count after incrementing it', async () => {
    conversationRepository.findOne.mockResolvedValue({ id: 'conv-1', promptCount: 4 });
    expect(await service.incrementConversationCount('conv-1')).toBe(4);
    expect(conversationRepository.increment).toHaveBeenCalledWith({ id: 'conv-1' }, 'promptCount', 1);
  });

  it('returns recent history oldest first', async () => {
    messageRepository.find.mockResolvedValue([
      { role: 'assistant', content: 'Up 1%.' },
      { role: 'user', content: 'And Infosys?' },
      { role: 'assistant', content: 'Flat.' },
      { role: 'user', content: 'How is TCS?' },
    ]);

    expect(await service.recentHistory('conv-1', 2)).toEqual([
      { role: 'user', content: 'How is TCS?' },
      { role: 'assistant', content: 'Flat.' },
      { role: 'user', content: 'And Infosys?' },
      { role: 'assistant', content: 'Up 1%.' },
    ]);
    expect(messageRepository.find).toHaveBeenCalledWith({ where: { conversationId: 'conv-1' }, order: { ts: 'DESC' }, take: 4 });
    expect(await service.recentHistory('conv-1', 0)).toEqual([]);
  });

  it('titles an untitled conversation after its first message', async () => {
    conversationRepository.findOne.mockResolvedValue({ id: 'conv-1', title: null });
    await service.saveUserMessage('conv-1', 'turn-1', 'Compare the banking stocks in the Nifty 50 by price to book');

    expect(conversationRepository.update).toHaveBeenCalledWith('conv-1', {
      title: 'Compare the banking stocks in the Nifty 50 by price to book',
    });
  });

  it('stores the assistant turn with its metadata', async () => {
    await service.saveTurn('conv-1', {
      turnId: 'turn-1',
      fullText: 'Done.',
      toolsUsed: ['get_quote'],
      durationMs: 120,
      artifacts: [],
      tokenEstimate: 2,
      iterations: 2,
      outcome: 'complete',
    });

    expect(messageRepository.insert).toHaveBeenCalledWith({
      conversationId: 'conv-1',
      role: 'assistant',
      content: 'Done.',
      turnId: 'turn-1',
      tokensUsed: 2,
      processingTimeMs: 120,
      iterations: 2,
      outcome: 'complete',
      toolsUsed: ['get_quote'],
      artifacts: [],
    });
  });
});
