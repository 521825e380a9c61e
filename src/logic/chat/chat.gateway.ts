import {
  ConnectedSocket,
  MessageBody,
  OnGatewayConnection,
  OnGatewayDisconnect,
  SubscribeMessage,
  WebSocketGateway,
  WebSocketServer,
} from '@nestjs/websockets';
import { Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { Interval } from '@nestjs/schedule';
import { Server, Socket } from 'socket.io';
import { Environment } from '../../config/configuration';
import { CHAT_EVENT, CHAT_MESSAGE, toWire } from './events';
import { SocketEventSink } from './event-sink';
import { parseInbound } from './inbound';
import { ChatSessionFactory } from './chat-session.factory';
import { ConnectionRegistry } from './connection-registry.service';
import { parseString, WsAuthService } from './ws-auth.service';

const IDLE_SWEEP_INTERVAL_MS = 60_000;

/** The part of a socket.io socket the gateway touches. */
export type GatewayClient = Pick<Socket, 'id' | 'connected' | 'handshake' | 'emit' | 'disconnect'>;

/** Allowed origins are applied by CorsIoAdapter from the loaded configuration. */
@WebSocketGateway()
export class ChatGateway implements OnGatewayConnection, OnGatewayDisconnect {
  private readonly logger = new Logger(ChatGateway.name);
  private readonly idleTimeoutMs: number;

  @WebSocketServer()
  public server!: Server;

  constructor(
    private readonly auth: WsAuthService,
    private readonly sessionFactory: ChatSessionFactory,
    private readonly registry: ConnectionRegistry,
    configService: ConfigService<Environment, true>,
  ) {
    this.idleTimeoutMs = configService.get('WS_IDLE_TIMEOUT_MS', { infer: true });
  }

  async handleConnection(client: GatewayClient) {
    const handshake = client.handshake;
    const userId = await this.auth.authenticate({ auth: handshake.auth, query: handshake.query });
    if (!userId) {
      client.emit(CHAT_EVENT, toWire({ type: 'error', message: 'authentication required' }));
      client.disconnect(true);
      return;
    }
    if (!client.connected) {
      // gone while the token was being verified; handleDisconnect has already run
      this.logger.debug(`connection ${client.id} of user ${userId} closed during authentication`);
      return;
    }

    const userAgent = handshake.headers['user-agent'];
    const session = this.sessionFactory.create(new SocketEventSink(client), {
      userId,
      connectionId: client.id,
      conversationId: parseString(handshake.auth?.conversationId ?? handshake.query?.conversationId),
      clientAddress: handshake.address,
      userAgent: typeof userAgent === 'string' ? userAgent : undefined,
    });
    this.registry.register(session);
    await session.open();
  }

  handleDisconnect(client: GatewayClient) {
    this.registry.unregister(client.id)?.close();
  }

  @SubscribeMessage(CHAT_MESSAGE)
  async handleMessage(@ConnectedSocket() client: GatewayClient, @MessageBody() body: unknown): Promise<void> {
    const session = this.registry.find(client.id);
    if (!session) {
      client.emit(CHAT_EVENT, toWire({ type: 'error', message: 'session not found' }));
      return;
    }
    session.touch();

    const parsed = parseInbound(body);
    if (!parsed.ok) {
      session.notify({ type: 'error', message: parsed.error });
      return;
    }

    const message = parsed.message;
    switch (message.type) {
      case 'ping':
        session.notify({ type: 'pong', timestamp: new Date() });
        return;
      case 'typing':
        // client typing state only counts as activity
        return;
      case 'message':
        await session.submit(message.content, message.conversationId);
        return;
    }
  }

  @Interval(IDLE_SWEEP_INTERVAL_MS)
  sweepIdleConnections(now = Date.now()): number {
    const idle = this.registry.idleSessions(now, this.idleTimeoutMs);
    for (const session of idle) {
      this.logger.log(`closing idle connection ${session.connectionId} of user ${session.userId}`);
      this.registry.unregister(session.connectionId);
      session.close();
    }
    return idle.length;
  }
}
