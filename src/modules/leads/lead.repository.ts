/**
 * UAE Mortgage Advisor - Lead Repository
 *
 * Append-only storage for follow-up requests. PostgreSQL when a pool is
 * available, otherwise process memory (mock mode).
 */

import { Pool } from 'pg';
import { v4 as uuidv4 } from 'uuid';
import { Lead, LeadStorageMode, NewLead } from './lead.types';

export interface LeadRepository {
  readonly mode: LeadStorageMode;
  insert(lead: NewLead): Promise<Lead>;
  list(): Promise<Lead[]>;
}

// ============================================================================
// IN-MEMORY
// ============================================================================

export class InMemoryLeadRepository implements LeadRepository {
  readonly mode = 'memory';
  private leads: Lead[] = [];

  async insert(lead: NewLead): Promise<Lead> {
    const stored: Lead = { ...lead, id: uuidv4(), createdAt: new Date() };
    this.leads.push(stored);
    return stored;
  }

  // Newest first, matching the SQL ordering
  async list(): Promise<Lead[]> {
    return [...this.leads].reverse();
  }
}

// ============================================================================
// POSTGRES
// ============================================================================

interface LeadRow {
  id: string;
  conversation_id: string;
  email: string;
  phone: string;
  name: string;
  created_at: Date;
}

export class PgLeadRepository implements LeadRepository {
  readonly mode = 'postgres';

  constructor(private pool: Pool) {}

  async insert(lead: NewLead): Promise<Lead> {
    const query = `
      INSERT INTO leads (id, conversation_id, email, phone, name, created_at)
      VALUES ($1, $2, $3, $4, $5, $6)
      RETURNING *
    `;

    const values = [uuidv4(), lead.conversationId, lead.email, lead.phone, lead.name, new Date()];

    const result = await this.pool.query<LeadRow>(query, values);
    return this.mapRow(result.rows[0]);
  }

  async list(): Promise<Lead[]> {
    const result = await this.pool.query<LeadRow>('SELECT * FROM leads ORDER BY created_at DESC');
    return result.rows.map((row) => this.mapRow(row));
  }

  private mapRow(row: LeadRow): Lead {
    return {
      id: row.id,
      conversationId: row.conversation_id,
      email: row.email,
      phone: row.phone,
      name: row.name,
      createdAt: row.created_at,
    };
  }
}

export function createLeadRepository(pool: Pool | null): LeadRepository {
  return pool ? new PgLeadRepository(pool) : new InMemoryLeadRepository();
}
