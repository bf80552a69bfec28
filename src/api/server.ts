/**
 * API Server Entry Point
 *
 * Opens the database (applying migrations), builds the engine, starts the
 * background maintenance tasks and serves the Hono app on Node's HTTP
 * server.
 *
 * Usage:
 *   npm run server
 *
 * Environment Variables:
 *   PORT - Preferred port (default: 3000); the next free port is used if taken
 *   HOST - Interface to bind (default: 0.0.0.0)
 *   DATABASE_PATH - SQLite file (required in production)
 *   ANTHROPIC_API_KEY - Enables tutor prompts when set
 */

import { createServer } from 'node:net';
import { serve } from '@hono/node-server';
import { config, validateConfig } from '../config';
import { openDatabase } from '../storage/db';
import { createEngine } from '../engine';
import { AnthropicClient, AnthropicTutoringService } from '../llm';
import type { TutoringService } from '../core/ports';
import { createApp } from './app';

const MAX_PORT_ATTEMPTS = 100;

/**
 * Finds an available port starting from the preferred port by briefly
 * listening on each candidate.
 *
 * @throws Error if no port within MAX_PORT_ATTEMPTS of the preferred one is free
 */
export async function findAvailablePort(
  preferredPort: number,
  maxPort: number = preferredPort + MAX_PORT_ATTEMPTS
): Promise<number> {
  for (let port = preferredPort; port <= maxPort; port++) {
    const free = await new Promise<boolean>((resolve) => {
      const candidate = createServer();
      candidate.once('error', () => resolve(false));
      candidate.listen(port, () => {
        candidate.close(() => resolve(true));
      });
    });

    if (free) {
      return port;
    }
    console.log(`[Server] Port ${port} is in use, trying ${port + 1}...`);
  }

  throw new Error(`No available port found in range ${preferredPort}-${maxPort}`);
}

function createTutor(): TutoringService | undefined {
  if (!config.anthropic.apiKey) {
    console.log('[Server] ANTHROPIC_API_KEY not set; tutor prompts disabled');
    return undefined;
  }
  return new AnthropicTutoringService(
    new AnthropicClient({
      apiKey: config.anthropic.apiKey,
      model: config.anthropic.model,
      maxTokens: config.anthropic.maxTokens,
    })
  );
}

async function startServer(): Promise<void> {
  validateConfig();

  const { db, sqlite } = openDatabase(config.database.path, { migrate: true });
  const engine = createEngine({ db, config, tutor: createTutor() });
  const app = createApp(engine);

  const port = await findAvailablePort(config.server.port);
  const server = serve({ fetch: app.fetch, port, hostname: config.server.host }, (info) => {
    console.log(`[Server] Listening on http://${config.server.host}:${info.port}`);
    console.log(`[Server] Environment: ${config.server.nodeEnv}`);
    console.log(`[Server] Database: ${config.database.path}`);
  });

  engine.orchestrator.startBackgroundTasks();

  const shutdown = (signal: string): void => {
    console.log(`\n[Server] Received ${signal}, shutting down...`);
    server.close();
    engine.orchestrator
      .stop()
      .catch((error: unknown) => {
        console.error('[Server] Final flush failed:', error);
      })
      .finally(() => {
        sqlite.close();
        process.exit(0);
      });
  };

  process.on('SIGINT', () => shutdown('SIGINT'));
  process.on('SIGTERM', () => shutdown('SIGTERM'));
}

startServer().catch((error: unknown) => {
  console.error('[Server] Failed to start:', error);
  process.exit(1);
});
