/**
 * UAE Mortgage Advisor - Lead Service
 * Validates and records requests for a specialist to follow up
 */

import { z } from 'zod';
import { parseInput } from '../../shared/validation';
import { LeadRepository } from './lead.repository';
import { Lead, LeadStorageMode } from './lead.types';

export const LeadCaptureSchema = z.object({
  conversation_id: z.string().trim().min(1, 'conversation_id is required'),
  email: z.string().trim().email('email must be a valid email address'),
  phone: z.string().trim().optional().default(''),
  name: z.string().trim().optional().default(''),
});

export type LeadCaptureRequest = z.input<typeof LeadCaptureSchema>;

export class LeadService {
  constructor(private repository: LeadRepository) {}

  get storageMode(): LeadStorageMode {
    return this.repository.mode;
  }

  async capture(request: unknown): Promise<Lead> {
    const parsed = parseInput(LeadCaptureSchema, request);

    const lead = await this.repository.insert({
      conversationId: parsed.conversation_id,
      email: parsed.email,
      phone: parsed.phone,
      name: parsed.name,
    });

    console.log(`[Leads] Captured lead ${lead.id} for conversation ${lead.conversationId}`);
    return lead;
  }

  async list(): Promise<Lead[]> {
    return this.repository.list();
  }
}
