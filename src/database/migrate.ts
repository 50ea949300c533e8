/**
 * UAE Mortgage Advisor - Database Migration Runner
 * Executes schema.sql against PostgreSQL
 */

import { Pool } from 'pg';
import * as fs from 'fs';
import * as path from 'path';
import * as dotenv from 'dotenv';

dotenv.config();

// schema.sql is not copied by tsc, so the compiled runner falls back to the source tree
const SCHEMA_CANDIDATES = [
  path.join(__dirname, 'schema.sql'),
  path.resolve(process.cwd(), 'src/database/schema.sql'),
];

async function migrate(): Promise<void> {
  if (!process.env.DATABASE_URL) {
    console.error('[Migrate] DATABASE_URL not set - nothing to migrate');
    process.exit(1);
  }

  const schemaPath = SCHEMA_CANDIDATES.find((candidate) => fs.existsSync(candidate));
  if (!schemaPath) {
    console.error('[Migrate] schema.sql not found');
    process.exit(1);
  }

  const pool = new Pool({
    connectionString: process.env.DATABASE_URL,
  });

  console.log('[Migrate] Connecting to database...');

  try {
    const schema = fs.readFileSync(schemaPath, 'utf-8');

    console.log('[Migrate] Executing schema...');
    await pool.query(schema);
    console.log('[Migrate] leads table ready');
  } catch (error) {
    console.error('[Migrate] Migration failed:', error);
    process.exitCode = 1;
  } finally {
    await pool.end();
  }
}

migrate().catch((error) => {
  console.error('[Migrate] Fatal error:', error);
  process.exit(1);
});
