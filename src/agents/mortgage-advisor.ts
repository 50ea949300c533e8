/**
 * @file src/agents/mortgage-advisor.ts
 * @description Mortgage Advisor Agent - Runs one conversational turn
 *
 * FLOW:
 * 1. User message → appended to the conversation
 * 2. Model call with the tool definitions
 * 3. Requested tools → executed through the registry, results fed back
 * 4. Repeat until the model answers in text, or maxToolRounds is spent
 *    (then one last call without tools forces a text answer)
 */

import * as fs from 'fs';
import * as path from 'path';
import { ChatModel, ConversationMessage } from './llm-client';
import { InMemorySessionStore } from './session-store';
import { ToolRegistry } from './tools';

// ============================================
// TYPES
// ============================================

export type AdvisorEvent =
  | { type: 'tool_call'; name: string; arguments: string }
  | { type: 'tool_result'; name: string; ok: boolean }
  | { type: 'text'; content: string };

export interface AdvisorOptions {
  maxToolRounds?: number;
  systemPrompt?: string;
}

export interface TurnResult {
  conversationId: string;
  response: string;
  toolCalls: string[];
}

// ============================================
// SYSTEM PROMPT
// ============================================

const FALLBACK_SYSTEM_PROMPT = `You are a friendly UAE mortgage advisor.
Help users understand mortgages, calculate monthly payments and make buy vs rent decisions.
ALWAYS use the provided tools for calculations - never estimate numbers yourself.`;

const PROMPT_CANDIDATES = [
  path.join(__dirname, 'prompts', 'system.txt'),
  path.resolve(process.cwd(), 'src/agents/prompts/system.txt'),
];

export function loadSystemPrompt(candidates: readonly string[] = PROMPT_CANDIDATES): string {
  for (const candidate of candidates) {
    if (fs.existsSync(candidate)) {
      return fs.readFileSync(candidate, 'utf-8');
    }
  }
  console.warn('[Agent] System prompt file not found - using built-in prompt');
  return FALLBACK_SYSTEM_PROMPT;
}

// ============================================
// AGENT
// ============================================

export class MortgageAdvisorAgent {
  private readonly maxToolRounds: number;
  private readonly systemPrompt: string;

  constructor(
    private model: ChatModel,
    private tools: ToolRegistry,
    private sessions: InMemorySessionStore,
    options: AdvisorOptions = {}
  ) {
    this.maxToolRounds = options.maxToolRounds ?? 5;
    this.systemPrompt = options.systemPrompt ?? loadSystemPrompt();
  }

  get modelName(): string {
    return this.model.name;
  }

  /**
   * Process one user message, yielding tool activity and the final text.
   * The conversation must already exist in the session store.
   */
  async *streamTurn(conversationId: string, message: string): AsyncGenerator<AdvisorEvent> {
    this.sessions.append(conversationId, { role: 'user', content: message });

    for (let round = 0; ; round++) {
      const toolsOffered = round < this.maxToolRounds;
      const result = await this.model.complete({
        systemPrompt: this.systemPrompt,
        messages: this.sessions.messages(conversationId),
        tools: toolsOffered ? this.tools.definitions() : [],
      });

      if (!toolsOffered || result.toolCalls.length === 0) {
        this.sessions.append(conversationId, { role: 'assistant', content: result.content });
        if (result.content) {
          yield { type: 'text', content: result.content };
        }
        return;
      }

      this.sessions.append(conversationId, {
        role: 'assistant',
        content: result.content,
        toolCalls: result.toolCalls,
      });

      const toolMessages: ConversationMessage[] = [];
      for (const call of result.toolCalls) {
        console.log(`[Agent] Round ${round + 1}: ${call.name}`);
        yield { type: 'tool_call', name: call.name, arguments: call.arguments };

        const outcome = this.tools.execute(call.name, call.arguments);
        if (!outcome.ok) {
          console.warn(`[Agent] Tool ${call.name} rejected: ${outcome.error}`);
        }

        toolMessages.push({
          role: 'tool',
          toolCallId: call.id,
          name: call.name,
          content: outcome.ok ? outcome.output : `Error: ${outcome.error}`,
        });
        yield { type: 'tool_result', name: call.name, ok: outcome.ok };
      }
      this.sessions.append(conversationId, ...toolMessages);

      if (round + 1 === this.maxToolRounds) {
        console.warn(`[Agent] Tool round limit (${this.maxToolRounds}) reached - requesting final answer`);
      }
    }
  }

  /**
   * Run a full turn and collect the response text.
   */
  async runTurn(conversationId: string | undefined, userId: string, message: string): Promise<TurnResult> {
    const conversation = this.sessions.getOrCreate(conversationId, userId);
    const toolCalls: string[] = [];
    let response = '';

    for await (const event of this.streamTurn(conversation.id, message)) {
      if (event.type === 'tool_call') {
        toolCalls.push(event.name);
      } else if (event.type === 'text') {
        response += event.content;
      }
    }

    return { conversationId: conversation.id, response, toolCalls };
  }
}
