/**
 * @file src/agents/llm-client.ts
 * @description Chat model boundary
 *
 * The agent talks to a ChatModel; OpenAIChatModel is the production
 * implementation over any OpenAI-compatible endpoint (OpenAI, or Groq via
 * LLM_BASE_URL). Tests supply a scripted model instead.
 */

import OpenAI from 'openai';
import { ToolDefinition } from './tools';

// ============================================
// TYPES
// ============================================

export interface ToolCall {
  id: string;
  name: string;
  /** Raw JSON string as produced by the model */
  arguments: string;
}

export type ConversationMessage =
  | { role: 'user'; content: string }
  | { role: 'assistant'; content: string; toolCalls?: ToolCall[] }
  | { role: 'tool'; toolCallId: string; name: string; content: string };

export interface ChatCompletionRequest {
  systemPrompt: string;
  messages: readonly ConversationMessage[];
  /** Empty when the model must answer in text */
  tools: readonly ToolDefinition[];
}

export interface ChatCompletionResult {
  content: string;
  toolCalls: ToolCall[];
}

export interface ChatModel {
  readonly name: string;
  complete(request: ChatCompletionRequest): Promise<ChatCompletionResult>;
}

// ============================================
// OPENAI-COMPATIBLE MODEL
// ============================================

export interface OpenAIChatModelConfig {
  apiKey: string;
  model: string;
  baseURL?: string;
}

type MessageParam = OpenAI.Chat.Completions.ChatCompletionMessageParam;

function toMessageParam(message: ConversationMessage): MessageParam {
  switch (message.role) {
    case 'user':
      return { role: 'user', content: message.content };
    case 'assistant':
      if (message.toolCalls && message.toolCalls.length > 0) {
        return {
          role: 'assistant',
          content: message.content || null,
          tool_calls: message.toolCalls.map((call) => ({
            id: call.id,
            type: 'function' as const,
            function: { name: call.name, arguments: call.arguments },
          })),
        };
      }
      return { role: 'assistant', content: message.content };
    case 'tool':
      return { role: 'tool', tool_call_id: message.toolCallId, content: message.content };
  }
}

export class OpenAIChatModel implements ChatModel {
  private client: OpenAI;
  readonly name: string;

  constructor(config: OpenAIChatModelConfig) {
    this.client = new OpenAI({ apiKey: config.apiKey, baseURL: config.baseURL });
    this.name = config.model;
  }

  async complete(request: ChatCompletionRequest): Promise<ChatCompletionResult> {
    const completion = await this.client.chat.completions.create({
      model: this.name,
      temperature: 0,
      top_p: 1,
      messages: [
        { role: 'system', content: request.systemPrompt },
        ...request.messages.map(toMessageParam),
      ],
      ...(request.tools.length > 0
        ? {
            tools: request.tools.map((tool) => ({
              type: 'function' as const,
              function: {
                name: tool.name,
                description: tool.description,
                parameters: tool.parameters,
              },
            })),
          }
        : {}),
    });

    const message = completion.choices[0]?.message;
    if (!message) {
      throw new Error(`Model ${this.name} returned no choices`);
    }

    return {
      content: message.content ?? '',
      toolCalls: (message.tool_calls ?? []).map((call) => ({
        id: call.id,
        name: call.function.name,
        arguments: call.function.arguments,
      })),
    };
  }
}
