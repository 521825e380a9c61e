import { toFunctionDeclarations, toGeminiContents } from './gemini.service';

describe('Gemini message mapping', () => {
  it('moves system text out and folds consecutive tool results into one turn', () => {
    const { systemInstruction, contents } = toGeminiContents([
      { role: 'system', content: 'You are helpful.' },
      { role: 'user', content: 'Compare TCS and INFY' },
      {
        role: 'assistant',
        content: 'Fetching quotes.',
        toolCalls: [
          { id: 'a', name: 'get_quote', arguments: '{"symbol":"TCS"}' },
          { id: 'b', name: 'get_quote', arguments: 'not json' },
        ],
      },
      { role: 'tool', toolCallId: 'a', name: 'get_quote', content: '{"price":1}' },
      { role: 'tool', toolCallId: 'b', name: 'get_quote', content: '{"price":2}' },
    ]);

    expect(systemInstruction).toBe('You are helpful.');
    expect(contents).toEqual([
      { role: 'user', parts: [{ text: 'Compare TCS and INFY' }] },
      {
        role: 'model',
        parts: [
          { text: 'Fetching quotes.' },
          { functionCall: { id: 'a', name: 'get_quote', args: { symbol: 'TCS' } } },
          { functionCall: { id: 'b', name: 'get_quote', args: {} } },
        ],
      },
      {
        role: 'user',
        parts: [
          { functionResponse: { id: 'a', name: 'get_quote', response: { output: '{"price":1}' } } },
          { functionResponse: { id: 'b', name: 'get_quote', response: { output: '{"price":2}' } } },
        ],
      },
    ]);
  });

  it('drops an empty assistant message', () => {
    expect(toGeminiContents([{ role: 'assistant', content: '' }]).contents).toEqual([]);
  });

  it('passes tool schemas through as JSON schema', () => {
    const parameters = { type: 'object', properties: { symbol: { type: 'string' } } };
    expect(toFunctionDeclarations([{ name: 'get_quote', description: 'Quote', parameters }])).toEqual([
      { name: 'get_quote', description: 'Quote', parametersJsonSchema: parameters },
    ]);
  });
});
