/**
 * UAE Mortgage Advisor - Database Module
 */

export { getPool, closePool, testConnection } from './connection';
