import { CONVERSATION_START, alternateRoles, splitSystemMessages } from '../../src/llm/providers/message-mapping';

describe('splitSystemMessages', () => {
  it('should join system messages and keep the turns in order', () => {
    const { system, turns } = splitSystemMessages([
      { role: 'system', content: 'You are a campus assistant.' },
      { role: 'user', content: 'Hi' },
      { role: 'system', content: 'Reply in JSON.' },
      { role: 'assistant', content: 'Hello!' },
    ]);

    expect(system).toBe('You are a campus assistant.\n\nReply in JSON.');
    expect(turns).toEqual([
      { role: 'user', content: 'Hi' },
      { role: 'assistant', content: 'Hello!' },
    ]);
  });

  it('should return an empty system prompt when there is none', () => {
    expect(splitSystemMessages([{ role: 'user', content: 'Hi' }]).system).toBe('');
  });
});

describe('alternateRoles', () => {
  it('should merge consecutive turns from the same role', () => {
    expect(
      alternateRoles([
        { role: 'user', content: 'first' },
        { role: 'user', content: 'second' },
        { role: 'assistant', content: 'reply' },
      ]),
    ).toEqual([
      { role: 'user', content: 'first\n\nsecond' },
      { role: 'assistant', content: 'reply' },
    ]);
  });

  it('should open with a user turn', () => {
    expect(alternateRoles([{ role: 'assistant', content: 'Welcome!' }])).toEqual([
      { role: 'user', content: CONVERSATION_START },
      { role: 'assistant', content: 'Welcome!' },
    ]);
  });

  it('should not modify its input', () => {
    const input = [
      { role: 'user' as const, content: 'a' },
      { role: 'user' as const, content: 'b' },
    ];
    alternateRoles(input);
    expect(input[0].content).toBe('a');
  });
});
