import { testConfig } from '../../../test/fakes';
import { ToolInvocationError } from '../../utils/errors';
import { HttpToolProvider } from './http-tool.provider';

function jsonResponse(body: unknown, status = 200): Response {
  return new Response(JSON.stringify(body), { status, headers: { 'Content-Type': 'application/json' } });
}

describe('HttpToolProvider', () => {
  let provider: HttpToolProvider;
  let fetchSpy: jest.SpiedFunction<typeof fetch>;

  beforeEach(() => {
    provider = new HttpToolProvider(testConfig({ TOOL_SERVER_URL: 'http://tools.test/' }));
    fetchSpy = jest.spyOn(global, 'fetch');
  });

  afterEach(() => {
    fetchSpy.mockRestore();
  });

  it('reads the catalogue and fills in missing fields', async () => {
    fetchSpy.mockResolvedValue(
      jsonResponse({ tools: [{ name: 'get_quote', description: 'Latest price' }, { name: 'news' }] }),
    );

    const tools = await provider.listTools();

    expect(fetchSpy.mock.calls[0][0]).toBe('http://tools.test/tools');
    expect(tools).toEqual([
      { name: 'get_quote', description: 'Latest price', parameters: { type: 'object', properties: {} } },
      { name: 'news', description: '', parameters: { type: 'object', properties: {} } },
    ]);
  });

  it('posts the arguments and unwraps the result', async () => {
    fetchSpy.mockResolvedValue(jsonResponse({ result: { price: 101.25 } }));

    const result = await provider.call('get_quote', { symbol: 'HDFCBANK' });

    expect(result).toEqual({ price: 101.25 });
    const [url, init] = fetchSpy.mock.calls[0];
    expect(url).toBe('http://tools.test/tools/get_quote');
    expect(init?.method).toBe('POST');
    expect(init?.body).toBe('{"arguments":{"symbol":"HDFCBANK"}}');
  });

  it('maps a 404 to a not-found tool error', async () => {
    fetchSpy.mockResolvedValue(jsonResponse({ detail: 'unknown tool' }, 404));

    await expect(provider.call('missing', {})).rejects.toBeInstanceOf(ToolInvocationError);
  });

  it('raises other HTTP errors with the status and body', async () => {
    fetchSpy.mockResolvedValue(new Response('boom', { status: 500 }));

    await expect(provider.call('get_quote', {})).rejects.toThrow('Tool get_quote failed with 500: boom');
  });
});
