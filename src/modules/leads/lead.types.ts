/**
 * UAE Mortgage Advisor - Lead Types
 */

export interface Lead {
  id: string;
  conversationId: string;
  email: string;
  phone: string;
  name: string;
  createdAt: Date;
}

export type NewLead = Omit<Lead, 'id' | 'createdAt'>;

export type LeadStorageMode = 'postgres' | 'memory';
