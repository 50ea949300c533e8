/**
 * UAE Mortgage Advisor - Chat API Routes
 * Conversational endpoints backed by the advisor agent
 */

import { Router, Request, Response, NextFunction } from 'express';
import { z } from 'zod';
import { InMemorySessionStore, MortgageAdvisorAgent } from '../../agents';
import { ModelNotConfiguredError } from '../../shared/errors';
import { parseInput } from '../../shared/validation';

const ChatRequestSchema = z.object({
  message: z
    .string({ required_error: 'message is required', invalid_type_error: 'message must be a string' })
    .trim()
    .min(1, 'message is required'),
  conversation_id: z.string().trim().min(1).optional(),
  user_id: z.string().trim().min(1).optional().default('default_user'),
});

export interface ChatRouteDependencies {
  /** null when no model credentials are configured */
  agent: MortgageAdvisorAgent | null;
  sessions: InMemorySessionStore;
}

export function createChatRoutes({ agent, sessions }: ChatRouteDependencies): Router {
  const router = Router();

  function requireAgent(): MortgageAdvisorAgent {
    if (!agent) {
      throw new ModelNotConfiguredError();
    }
    return agent;
  }

  /**
   * POST /api/chat
   * One full turn; returns the assistant's answer
   */
  router.post('/chat', async (req: Request, res: Response, next: NextFunction) => {
    try {
      const advisor = requireAgent();
      const body = parseInput(ChatRequestSchema, req.body);

      const result = await advisor.runTurn(body.conversation_id, body.user_id, body.message);
      if (result.toolCalls.length > 0) {
        console.log(`[API] Conversation ${result.conversationId} used tools: ${result.toolCalls.join(', ')}`);
      }

      res.json({ response: result.response, conversation_id: result.conversationId });
    } catch (error) {
      next(error);
    }
  });

  /**
   * POST /api/chat/stream
   * Server-Sent Events: start, tool, chunk, end (or error)
   */
  router.post('/chat/stream', async (req: Request, res: Response, next: NextFunction) => {
    let advisor: MortgageAdvisorAgent;
    let body: z.output<typeof ChatRequestSchema>;
    try {
      advisor = requireAgent();
      body = parseInput(ChatRequestSchema, req.body);
    } catch (error) {
      next(error);
      return;
    }

    const conversation = sessions.getOrCreate(body.conversation_id, body.user_id);

    res.status(200);
    res.setHeader('Content-Type', 'text/event-stream');
    res.setHeader('Cache-Control', 'no-cache');
    res.setHeader('Connection', 'keep-alive');
    res.flushHeaders();

    const send = (payload: Record<string, unknown>) => {
      res.write(`data: ${JSON.stringify(payload)}\n\n`);
    };

    send({ type: 'start', conversation_id: conversation.id });

    try {
      for await (const event of advisor.streamTurn(conversation.id, body.message)) {
        if (event.type === 'text') {
          send({ type: 'chunk', content: event.content });
        } else if (event.type === 'tool_call') {
          send({ type: 'tool', name: event.name });
        }
      }
      send({ type: 'end', conversation_id: conversation.id });
    } catch (error) {
      console.error('[API] Chat stream failed:', error);
      send({ type: 'error', message: 'The advisor could not complete this response. Please try again.' });
    }

    res.end();
  });

  /**
   * GET /api/conversation/:id
   * Transcript of user and assistant messages
   */
  router.get('/conversation/:id', (req: Request, res: Response) => {
    const conversation = sessions.get(req.params.id);
    if (!conversation) {
      res.status(404).json({ error: 'Conversation not found' });
      return;
    }

    res.json({ conversation_id: conversation.id, messages: sessions.history(conversation.id) });
  });

  return router;
}
