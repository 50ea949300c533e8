/**
 * UAE Mortgage Advisor - Error Types
 */

/**
 * InvalidInputError - A calculation input outside its basic domain
 * (non-positive price or tenure, non-finite number, unknown enum value).
 * The calculation does not proceed.
 */
export class InvalidInputError extends Error {
  public readonly code = 'INVALID_INPUT';

  constructor(
    public readonly field: string,
    message: string
  ) {
    super(message);
    this.name = 'InvalidInputError';
  }
}

/**
 * ModelNotConfiguredError - Chat requested without model credentials
 */
export class ModelNotConfiguredError extends Error {
  public readonly code = 'MODEL_NOT_CONFIGURED';

  constructor() {
    super('API key (OPENAI_API_KEY or GROQ_API_KEY) not configured');
    this.name = 'ModelNotConfiguredError';
  }
}

export class ConversationNotFoundError extends Error {
  public readonly code = 'CONVERSATION_NOT_FOUND';

  constructor(public readonly conversationId: string) {
    super(`Conversation not found: ${conversationId}`);
    this.name = 'ConversationNotFoundError';
  }
}
