import { InMemoryToolProvider, ScriptedLlmProvider, Script, testConfig } from '../../../test/fakes';
import { ToolGatewayService } from '../tools/tool-gateway.service';
import { OrchestratorService } from './orchestrator.service';
import { SYSTEM_PROMPT } from './prompt';
import { ConversationTurn, EngineEvent } from './types';

const turn: ConversationTurn = {
  userId: 'user-1',
  conversationId: 'conv-1',
  userText: 'How is TCS doing?',
  history: [
    { role: 'user', content: 'Hi' },
    { role: 'assistant', content: 'Hello! Ask me about any NSE stock.' },
  ],
};

async function collect(events: AsyncIterable<EngineEvent>): Promise<EngineEvent[]> {
  const out: EngineEvent[] = [];
  for await (const event of events) out.push(event);
  return out;
}

describe('OrchestratorService', () => {
  let tools: InMemoryToolProvider;

  beforeEach(() => {
    tools = new InMemoryToolProvider({
      get_quote: async (args) => ({ symbol: args.symbol, price: 4012 }),
      price_chart: async (args) => ({ chart_url: args.url ?? '/charts/default.png', chart_type: 'price' }),
      flaky: async () => {
        throw new Error('upstream returned 502');
      },
    });
  });

  function engine(scripts: Script[], maxIterations = 5): { service: OrchestratorService; llm: ScriptedLlmProvider } {
    const llm = new ScriptedLlmProvider(scripts);
    const config = testConfig({ MAX_ITERATIONS: String(maxIterations) });
    const service = new OrchestratorService(llm, new ToolGatewayService(tools, config), config);
    return { service, llm };
  }

  it('streams a direct answer and completes after one drafting pass', async () => {
    const { service, llm } = engine([
      [
        { type: 'text', text: 'Hello ' },
        { type: 'text', text: 'there' },
      ],
    ]);

    const events = await collect(service.run(turn));

    expect(events).toEqual([
      { type: 'text_chunk', content: 'Hello ' },
      { type: 'text_chunk', content: 'there' },
      {
        type: 'turn_complete',
        content: 'Hello there',
        metadata: { tokensUsed: 3, iterations: 1, toolsUsed: [], artifacts: [] },
      },
    ]);
    expect(llm.requests[0]).toEqual([
      { role: 'system', content: SYSTEM_PROMPT },
      { role: 'user', content: 'Hi' },
      { role: 'assistant', content: 'Hello! Ask me about any NSE stock.' },
      { role: 'user', content: 'How is TCS doing?' },
    ]);
  });

  it('dispatches tool calls, feeds the results back and drafts again', async () => {
    const { service, llm } = engine([
      [
        { type: 'tool_call', id: 'c1', name: 'get_quote', argumentsFragment: '{"symbol":' },
        { type: 'tool_call', argumentsFragment: '"TCS"}' },
        { type: 'tool_call', id: 'c2', name: 'price_chart', argumentsFragment: '{}' },
      ],
      [{ type: 'text', text: 'TCS trades at 4012.' }],
    ]);

    const events = await collect(service.run(turn));

    expect(events.map((e) => e.type)).toEqual([
      'tool_dispatched',
      'tool_dispatched',
      'tool_done',
      'tool_done',
      'text_chunk',
      'turn_complete',
    ]);
    expect(events[2]).toEqual({ type: 'tool_done', id: 'c1', name: 'get_quote', success: true });
    expect(events[5]).toEqual({
      type: 'turn_complete',
      content: 'TCS trades at 4012.',
      metadata: {
        tokensUsed: 6,
        iterations: 2,
        toolsUsed: ['get_quote', 'price_chart'],
        artifacts: [{ kind: 'price', ref: '/charts/default.png' }],
      },
    });
    expect(tools.calls).toEqual([
      { name: 'get_quote', args: { symbol: 'TCS' } },
      { name: 'price_chart', args: {} },
    ]);

    const resumed = llm.requests[1];
    expect(resumed.slice(4)).toEqual([
      {
        role: 'assistant',
        content: '',
        toolCalls: [
          { id: 'c1', name: 'get_quote', arguments: '{"symbol":"TCS"}' },
          { id: 'c2', name: 'price_chart', arguments: '{}' },
        ],
      },
      { role: 'tool', toolCallId: 'c1', name: 'get_quote', content: '{\n  "symbol": "TCS",\n  "price": 4012\n}' },
      {
        role: 'tool',
        toolCallId: 'c2',
        name: 'price_chart',
        content: '{\n  "chart_url": "/charts/default.png",\n  "chart_type": "price"\n}',
      },
    ]);
  });

  it('fails only the call whose arguments are not valid JSON', async () => {
    const { service } = engine([
      [
        { type: 'tool_call', id: 'bad', name: 'get_quote', argumentsFragment: '{"symbol": TCS' },
        { type: 'tool_call', id: 'good', name: 'price_chart', argumentsFragment: '{"url":"/charts/tcs.png"}' },
      ],
      [{ type: 'text', text: 'Here is the chart.' }],
    ]);

    const events = await collect(service.run(turn));

    expect(events.filter((e) => e.type === 'tool_done')).toEqual([
      { type: 'tool_done', id: 'bad', name: 'get_quote', success: false, error: 'invalid arguments' },
      { type: 'tool_done', id: 'good', name: 'price_chart', success: true },
    ]);
    expect(tools.calls).toEqual([{ name: 'price_chart', args: { url: '/charts/tcs.png' } }]);
  });

  it('leaves failed tools out of the tools used and keeps the last artifact of each kind', async () => {
    const { service } = engine([
      [
        { type: 'tool_call', id: 'a', name: 'price_chart', argumentsFragment: '{"url":"/charts/one.png"}' },
        { type: 'tool_call', id: 'b', name: 'flaky', argumentsFragment: '{}' },
      ],
      [{ type: 'tool_call', id: 'c', name: 'price_chart', argumentsFragment: '{"url":"/charts/two.png"}' }],
      [{ type: 'text', text: 'Done.' }],
    ]);

    const events = await collect(service.run(turn));
    const last = events[events.length - 1];

    expect(last).toMatchObject({
      type: 'turn_complete',
      metadata: { iterations: 3, toolsUsed: ['price_chart'], artifacts: [{ kind: 'price', ref: '/charts/two.png' }] },
    });
    expect(events).toContainEqual({
      type: 'tool_done',
      id: 'b',
      name: 'flaky',
      success: false,
      error: 'upstream returned 502',
    });
  });

  it('stops with turn_limit_reached once every allowed pass asked for tools', async () => {
    const round: Script = [{ type: 'tool_call', id: 'q', name: 'get_quote', argumentsFragment: '{"symbol":"TCS"}' }];
    const { service, llm } = engine([round, round, round, [{ type: 'text', text: 'never sent' }]], 3);

    const events = await collect(service.run(turn));

    expect(llm.requests).toHaveLength(3);
    expect(events[events.length - 1]).toEqual({
      type: 'turn_limit_reached',
      content: '',
      metadata: { tokensUsed: 0, iterations: 3, toolsUsed: ['get_quote'], artifacts: [] },
    });
    expect(events.some((e) => e.type === 'turn_complete')).toBe(false);
  });

  it('ends the turn with turn_failed when the model provider errors', async () => {
    const { service } = engine([{ deltas: [{ type: 'text', text: 'Partial' }], failWith: new Error('quota exceeded') }]);

    const events = await collect(service.run(turn));

    expect(events).toEqual([
      { type: 'text_chunk', content: 'Partial' },
      { type: 'turn_failed', error: 'language model failed: quota exceeded' },
    ]);
  });
});
