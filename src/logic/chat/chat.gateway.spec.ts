import { Test } from '@nestjs/testing';
import { ConfigService } from '@nestjs/config';
import { testConfig } from '../../../test/fakes';
import { ChatGateway, GatewayClient } from './chat.gateway';
import { ChatSessionFactory } from './chat-session.factory';
import { ConnectionRegistry } from './connection-registry.service';
import { CHAT_EVENT, toWire } from './events';
import { WsAuthService } from './ws-auth.service';

function fakeClient(): GatewayClient {
  return {
    id: 'socket-1',
    connected: true,
    handshake: {
      headers: { 'user-agent': 'jest' },
      time: '2026-03-02T09:00:00.000Z',
      address: '127.0.0.1',
      xdomain: false,
      secure: false,
      issued: 0,
      url: '/socket.io/',
      query: {},
      auth: { token: 'test-token' },
    },
    emit: jest.fn(() => true),
    disconnect: jest.fn(),
  };
}

describe('ChatGateway', () => {
  let gateway: ChatGateway;
  let registry: ConnectionRegistry;
  let authenticate: jest.Mock<Promise<string | null>, []>;
  let create: jest.Mock;
  let session: { userId: string; connectionId: string; lastActivityAt: number; open: jest.Mock; close: jest.Mock };

  beforeEach(async () => {
    authenticate = jest.fn(async (): Promise<string | null> => 'user-1');
    session = {
      userId: 'user-1',
      connectionId: 'socket-1',
      lastActivityAt: 0,
      open: jest.fn(async () => undefined),
      close: jest.fn(),
    };
    create = jest.fn(() => session);

    const module = await Test.createTestingModule({
      providers: [
        ChatGateway,
        ConnectionRegistry,
        { provide: WsAuthService, useValue: { authenticate } },
        { provide: ChatSessionFactory, useValue: { create } },
        { provide: ConfigService, useValue: testConfig() },
      ],
    }).compile();

    gateway = module.get<ChatGateway>(ChatGateway);
    registry = module.get<ConnectionRegistry>(ConnectionRegistry);
  });

  it('registers and opens a session for an authenticated client', async () => {
    const client = fakeClient();

    await gateway.handleConnection(client);

    expect(create).toHaveBeenCalledWith(expect.anything(), {
      userId: 'user-1',
      connectionId: 'socket-1',
      conversationId: undefined,
      clientAddress: '127.0.0.1',
      userAgent: 'jest',
    });
    expect(registry.find('socket-1')).toBe(session);
    expect(session.open).toHaveBeenCalledTimes(1);
  });

  it('leaves no session behind when the client disconnects during authentication', async () => {
    const client = fakeClient();
    authenticate.mockImplementation(async () => {
      client.connected = false;
      return 'user-1';
    });

    await gateway.handleConnection(client);

    expect(create).not.toHaveBeenCalled();
    expect(registry.find('socket-1')).toBeUndefined();
    expect(registry.statistics().totalConnections).toBe(0);
  });

  it('turns away a client without a valid token', async () => {
    const client = fakeClient();
    authenticate.mockResolvedValue(null);

    await gateway.handleConnection(client);

    expect(client.emit).toHaveBeenCalledWith(CHAT_EVENT, toWire({ type: 'error', message: 'authentication required' }));
    expect(client.disconnect).toHaveBeenCalledWith(true);
    expect(create).not.toHaveBeenCalled();
  });
});
