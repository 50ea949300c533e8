/**
 * UAE Mortgage Advisor - Main Entry Point
 * Conversational mortgage guidance over a deterministic calculation engine
 */

import * as dotenv from 'dotenv';

// Load environment variables
dotenv.config();

import { InMemorySessionStore, MortgageAdvisorAgent, OpenAIChatModel, ToolRegistry } from './agents';
import { createApp } from './api';
import { loadSettings, resolveModelEndpoint } from './config';
import { closePool, getPool, testConnection } from './database';
import { LeadService, createLeadRepository } from './modules/leads';
import { getMortgageEngine } from './modules/mortgage';

async function bootstrap(): Promise<void> {
  console.log('='.repeat(60));
  console.log('  UAE MORTGAGE ADVISOR');
  console.log('  Deterministic mortgage math, conversational guidance');
  console.log('='.repeat(60));

  const settings = loadSettings();

  // Test database connection
  console.log('\n[Boot] Testing database connection...');
  const dbConnected = await testConnection(settings.databaseUrl);
  if (!dbConnected) {
    console.error('[Boot] FATAL: Database connection failed');
    process.exit(1);
  }

  const pool = getPool(settings.databaseUrl);
  const leads = new LeadService(createLeadRepository(pool));
  console.log(`[Boot] Lead storage: ${leads.storageMode}`);

  // Engine and tools
  const engine = getMortgageEngine();
  console.log(`[Boot] Mortgage policy: ${engine.policy.name} (${engine.policy.version})`);
  const sessions = new InMemorySessionStore();
  const tools = new ToolRegistry(engine);

  // Chat model
  const endpoint = resolveModelEndpoint(settings);
  let agent: MortgageAdvisorAgent | null = null;
  if (endpoint) {
    const model = new OpenAIChatModel({ ...endpoint, model: settings.modelName });
    agent = new MortgageAdvisorAgent(model, tools, sessions, { maxToolRounds: settings.maxToolRounds });
    console.log(`[Boot] Model: ${settings.modelName}${endpoint.baseURL ? ` via ${endpoint.baseURL}` : ''}`);
  } else {
    console.warn('[Boot] No OPENAI_API_KEY or GROQ_API_KEY - chat endpoints will return 503');
  }

  console.log('[Boot] Configuring Express server...');
  const app = createApp({ settings, engine, sessions, agent, leads });

  const server = app.listen(settings.port, settings.host, () => {
    console.log(`\n[Boot] Server listening on ${settings.host}:${settings.port}`);
    console.log('[Boot] Endpoints:');
    console.log(`  - Health: http://localhost:${settings.port}/api/health`);
    console.log(`  - Chat: http://localhost:${settings.port}/api/chat`);
    console.log(`  - Calculators: http://localhost:${settings.port}/api/calculate/*`);
  });

  // Graceful shutdown
  const shutdown = async (signal: string) => {
    console.log(`\n[Shutdown] Received ${signal}, shutting down gracefully...`);

    server.close(() => {
      console.log('[Shutdown] HTTP server closed');
    });

    await closePool();

    console.log('[Shutdown] Complete');
    process.exit(0);
  };

  const onSignal = (signal: string) => {
    shutdown(signal).catch((error) => {
      console.error('[Shutdown] Error during shutdown:', error);
      process.exit(1);
    });
  };
  process.on('SIGTERM', () => onSignal('SIGTERM'));
  process.on('SIGINT', () => onSignal('SIGINT'));

  console.log('\n[Boot] UAE MORTGAGE ADVISOR ONLINE');
}

// Run
bootstrap().catch((error) => {
  console.error('[Boot] Fatal error during startup:', error);
  process.exit(1);
});
