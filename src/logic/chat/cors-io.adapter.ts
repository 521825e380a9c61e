import { INestApplicationContext } from '@nestjs/common';
import { IoAdapter } from '@nestjs/platform-socket.io';
import { Server, ServerOptions } from 'socket.io';

export function withSocketCors(options: Partial<ServerOptions> | undefined, origins: string[]): Partial<ServerOptions> {
  return { ...options, cors: { origin: origins, credentials: false } };
}

/**
 * Socket.io adapter that takes its allowed origins from the loaded configuration.
 * Gateway decorators are evaluated before `.env` is read, so they cannot.
 */
export class CorsIoAdapter extends IoAdapter {
  constructor(
    app: INestApplicationContext,
    private readonly origins: string[],
  ) {
    super(app);
  }

  createIOServer(port: number, options?: Partial<ServerOptions>): Server {
    return super.createIOServer(port, withSocketCors(options, this.origins));
  }
}
