import { describe, it, expect, beforeEach } from '@jest/globals';
import { ChatCompletionRequest, ChatCompletionResult, ChatModel } from './llm-client';
import { AdvisorEvent, MortgageAdvisorAgent, loadSystemPrompt } from './mortgage-advisor';
import { InMemorySessionStore } from './session-store';
import { ToolRegistry } from './tools';

/** Replays queued completions and records every request it receives */
class ScriptedModel implements ChatModel {
  readonly name = 'scripted-model';
  readonly requests: ChatCompletionRequest[] = [];

  constructor(private script: ChatCompletionResult[]) {}

  async complete(request: ChatCompletionRequest): Promise<ChatCompletionResult> {
    this.requests.push({ ...request, messages: [...request.messages] });
    const next = this.script.shift();
    if (!next) {
      throw new Error('Script exhausted');
    }
    return next;
  }
}

function text(content: string): ChatCompletionResult {
  return { content, toolCalls: [] };
}

function callTool(id: string, name: string, args: object | string): ChatCompletionResult {
  return {
    content: '',
    toolCalls: [{ id, name, arguments: typeof args === 'string' ? args : JSON.stringify(args) }],
  };
}

async function collect(stream: AsyncGenerator<AdvisorEvent>): Promise<AdvisorEvent[]> {
  const events: AdvisorEvent[] = [];
  for await (const event of stream) {
    events.push(event);
  }
  return events;
}

describe('MortgageAdvisorAgent', () => {
  let sessions: InMemorySessionStore;
  const tools = new ToolRegistry();

  beforeEach(() => {
    sessions = new InMemorySessionStore();
  });

  it('answers directly when the model needs no tools', async () => {
    const model = new ScriptedModel([text('Hello! How can I help with your home search?')]);
    const agent = new MortgageAdvisorAgent(model, tools, sessions, { systemPrompt: 'test prompt' });

    const result = await agent.runTurn(undefined, 'user-1', 'Hi');

    expect(result.response).toBe('Hello! How can I help with your home search?');
    expect(result.toolCalls).toEqual([]);
    expect(model.requests).toHaveLength(1);
    expect(model.requests[0].systemPrompt).toBe('test prompt');
    expect(model.requests[0].tools).toHaveLength(5);
    expect(sessions.history(result.conversationId)).toEqual([
      { role: 'user', content: 'Hi' },
      { role: 'assistant', content: 'Hello! How can I help with your home search?' },
    ]);
  });

  it('feeds tool output back to the model before the final answer', async () => {
    const model = new ScriptedModel([
      callTool('call_1', 'calculate_mortgage', { property_price: 2_000_000 }),
      text('Your monthly payment would be about 8,893 AED.'),
    ]);
    const agent = new MortgageAdvisorAgent(model, tools, sessions, { systemPrompt: 'test prompt' });
    const conversation = sessions.getOrCreate('conv-1', 'user-1');

    const events = await collect(agent.streamTurn(conversation.id, 'What is the EMI on a 2M apartment?'));

    expect(events).toEqual([
      { type: 'tool_call', name: 'calculate_mortgage', arguments: '{"property_price":2000000}' },
      { type: 'tool_result', name: 'calculate_mortgage', ok: true },
      { type: 'text', content: 'Your monthly payment would be about 8,893 AED.' },
    ]);

    const secondRequest = model.requests[1].messages;
    expect(secondRequest).toHaveLength(3);
    const toolMessage = secondRequest[2];
    expect(toolMessage.role).toBe('tool');
    if (toolMessage.role === 'tool') {
      expect(toolMessage.toolCallId).toBe('call_1');
      expect(toolMessage.content).toContain('**Monthly Payment (EMI):** 8,893 AED');
    }

    expect(sessions.messages('conv-1')).toHaveLength(4);
    expect(sessions.history('conv-1')).toEqual([
      { role: 'user', content: 'What is the EMI on a 2M apartment?' },
      { role: 'assistant', content: 'Your monthly payment would be about 8,893 AED.' },
    ]);
  });

  it('passes tool errors to the model as text', async () => {
    const model = new ScriptedModel([
      callTool('call_1', 'calculate_mortgage', '{"property_price": -5}'),
      text('The property price needs to be a positive number. What price are you considering?'),
    ]);
    const agent = new MortgageAdvisorAgent(model, tools, sessions, { systemPrompt: 'test prompt' });

    const result = await agent.runTurn('conv-2', 'user-1', 'EMI for minus 5 dirhams?');

    expect(result.toolCalls).toEqual(['calculate_mortgage']);
    const toolMessage = model.requests[1].messages[2];
    expect(toolMessage).toEqual({
      role: 'tool',
      toolCallId: 'call_1',
      name: 'calculate_mortgage',
      content: 'Error: Invalid input for calculate_mortgage: propertyPrice must be greater than 0',
    });
  });

  it('forces a text answer once the tool round limit is spent', async () => {
    const model = new ScriptedModel([
      callTool('call_1', 'get_mortgage_rules', '{}'),
      callTool('call_2', 'get_mortgage_rules', '{}'),
      text('Here is a summary of the rules.'),
    ]);
    const agent = new MortgageAdvisorAgent(model, tools, sessions, { systemPrompt: 'test prompt', maxToolRounds: 2 });

    const result = await agent.runTurn(undefined, 'user-1', 'Rules?');

    expect(result.toolCalls).toEqual(['get_mortgage_rules', 'get_mortgage_rules']);
    expect(result.response).toBe('Here is a summary of the rules.');
    expect(model.requests.map((request) => request.tools.length)).toEqual([5, 5, 0]);
  });

  it('continues an existing conversation', async () => {
    const model = new ScriptedModel([text('First answer'), text('Second answer')]);
    const agent = new MortgageAdvisorAgent(model, tools, sessions, { systemPrompt: 'test prompt' });

    const first = await agent.runTurn(undefined, 'user-1', 'First question');
    const second = await agent.runTurn(first.conversationId, 'user-1', 'Second question');

    expect(second.conversationId).toBe(first.conversationId);
    expect(model.requests[1].messages).toEqual([
      { role: 'user', content: 'First question' },
      { role: 'assistant', content: 'First answer' },
      { role: 'user', content: 'Second question' },
    ]);
    expect(sessions.size()).toBe(1);
  });

  it('reports its model name', () => {
    const agent = new MortgageAdvisorAgent(new ScriptedModel([]), tools, sessions, { systemPrompt: 'test prompt' });
    expect(agent.modelName).toBe('scripted-model');
  });
});

describe('loadSystemPrompt', () => {
  it('falls back to the built-in prompt when no file exists', () => {
    const prompt = loadSystemPrompt(['/nonexistent/system.txt']);
    expect(prompt.startsWith('You are a friendly UAE mortgage advisor.')).toBe(true);
  });

  it('reads the bundled prompt file', () => {
    expect(loadSystemPrompt()).toContain('calculate_mortgage');
  });
});
