import { Test } from '@nestjs/testing';
import { IoAdapter } from '@nestjs/platform-socket.io';
import { CorsIoAdapter, withSocketCors } from './cors-io.adapter';

describe('withSocketCors', () => {
  it('keeps the gateway options and replaces cors with the configured origins', () => {
    const options = withSocketCors({ path: '/socket.io', cors: { origin: '*' } }, ['https://research.example.com']);

    expect(options).toEqual({
      path: '/socket.io',
      cors: { origin: ['https://research.example.com'], credentials: false },
    });
  });

  it('builds options when the gateway declares none', () => {
    expect(withSocketCors(undefined, [])).toEqual({ cors: { origin: [], credentials: false } });
  });
});

describe('CorsIoAdapter', () => {
  afterEach(() => {
    jest.restoreAllMocks();
  });

  it('creates the socket server with the configured origins', async () => {
    const create = jest.spyOn(IoAdapter.prototype, 'createIOServer').mockReturnValue(undefined);
    const app = await Test.createTestingModule({}).compile();
    const adapter = new CorsIoAdapter(app, ['http://localhost:4000']);

    adapter.createIOServer(0, { path: '/socket.io' });

    expect(create).toHaveBeenCalledWith(0, {
      path: '/socket.io',
      cors: { origin: ['http://localhost:4000'], credentials: false },
    });
  });
});
