import { ToolCallAccumulator } from './tool-call-accumulator';

describe('ToolCallAccumulator', () => {
  it('joins argument fragments of a call until the next call begins', () => {
    const accumulator = new ToolCallAccumulator();
    accumulator.push({ type: 'tool_call', id: 'c1', name: 'get_quote', argumentsFragment: '{"sym' });
    accumulator.push({ type: 'tool_call', argumentsFragment: 'bol": "TCS"}' });
    accumulator.push({ type: 'tool_call', id: 'c2', name: 'news', argumentsFragment: '{}' });

    expect(accumulator.flush()).toEqual([
      { id: 'c1', name: 'get_quote', arguments: '{"symbol": "TCS"}' },
      { id: 'c2', name: 'news', arguments: '{}' },
    ]);
  });

  it('routes fragments by index when ids are only sent once', () => {
    const accumulator = new ToolCallAccumulator();
    accumulator.push({ type: 'tool_call', index: 0, id: 'a', name: 'get_quote', argumentsFragment: '{"symbol":' });
    accumulator.push({ type: 'tool_call', index: 1, id: 'b', name: 'get_quote', argumentsFragment: '{"symbol":' });
    accumulator.push({ type: 'tool_call', index: 0, argumentsFragment: '"INFY"}' });
    accumulator.push({ type: 'tool_call', index: 1, argumentsFragment: '"WIPRO"}' });

    expect(accumulator.flush()).toEqual([
      { id: 'a', name: 'get_quote', arguments: '{"symbol":"INFY"}' },
      { id: 'b', name: 'get_quote', arguments: '{"symbol":"WIPRO"}' },
    ]);
  });

  it('is empty after a flush', () => {
    const accumulator = new ToolCallAccumulator();
    accumulator.push({ type: 'tool_call', id: 'c1', name: 'news', argumentsFragment: '' });
    expect(accumulator.size).toBe(1);
    accumulator.flush();
    expect(accumulator.size).toBe(0);
    expect(accumulator.flush()).toEqual([]);
  });
});
