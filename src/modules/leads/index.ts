/**
 * UAE Mortgage Advisor - Leads Module
 */

export * from './lead.types';
export {
  LeadRepository,
  InMemoryLeadRepository,
  PgLeadRepository,
  createLeadRepository,
} from './lead.repository';
export { LeadService, LeadCaptureSchema, LeadCaptureRequest } from './lead.service';
