/**
 * UAE Mortgage Advisor - Agents Module
 */

export { ToolRegistry, ToolDefinition, ToolName, ToolResult } from './tools';
export {
  ChatModel,
  ChatCompletionRequest,
  ChatCompletionResult,
  ConversationMessage,
  OpenAIChatModel,
  OpenAIChatModelConfig,
  ToolCall,
} from './llm-client';
export { InMemorySessionStore, Conversation, TranscriptMessage } from './session-store';
export {
  MortgageAdvisorAgent,
  AdvisorEvent,
  AdvisorOptions,
  TurnResult,
  loadSystemPrompt,
} from './mortgage-advisor';
