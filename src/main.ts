import 'dotenv/config';
import Fastify from 'fastify';
import cors from '@fastify/cors';
import helmet from '@fastify/helmet';
import rateLimit from '@fastify/rate-limit';
import websocketPlugin from '@fastify/websocket';
import { registerErrorHandler } from '@/api/error-handler.js';
import { registerRoutes } from '@/api/routes/index.js';
import type { RouteDependencies } from '@/api/types.js';
import { loadSettingsFile, loadSettingsFromEnv } from '@/config/loader.js';
import type { Settings } from '@/config/schema.js';
import { unwrap } from '@/core/result.js';
import { createAgentEngine } from '@/engine/agent-engine.js';
import { createEngineRegistry } from '@/engine/engine-registry.js';
import type { Database } from '@/infrastructure/database.js';
import { createDatabase } from '@/infrastructure/database.js';
import type { CheckpointStore } from '@/infrastructure/repositories/checkpoint-repository.js';
import {
  createPostgresCheckpointStore,
  ensureCheckpointSchema,
} from '@/infrastructure/repositories/checkpoint-repository.js';
import { createInMemoryCheckpointStore } from '@/infrastructure/repositories/in-memory-checkpoint-repository.js';
import { createLogger } from '@/observability/logger.js';
import { createProvider } from '@/providers/factory.js';
import { createMaintenanceScheduler } from '@/scheduling/maintenance-scheduler.js';
import { maskApiKey, redactError } from '@/security/secret-redaction.js';
import { createStreamCoordinator } from '@/streaming/stream-coordinator.js';
import { validateTimeoutHierarchy } from '@/streaming/timeout-hierarchy.js';
import { createToolRegistry } from '@/tools/registry/tool-registry.js';
import { createHttpRequestTool, createWebSearchTool } from '@/tools/definitions/index.js';

const DEFAULT_AGENT = 'assistant';

const SYSTEM_PROMPT =
  'You are a helpful research assistant. Use the available tools when they help ' +
  'answer the question, and say so when you cannot find an answer.';

async function loadSettings(): Promise<Settings> {
  const settingsFile = process.env['CONDUIT_SETTINGS_FILE'];
  return unwrap(settingsFile ? await loadSettingsFile(settingsFile) : loadSettingsFromEnv());
}

async function start(): Promise<void> {
  const settings = await loadSettings();
  const logger = createLogger({ level: settings.logLevel });

  // A timeout configuration that breaks the nesting never serves traffic
  const timeouts = unwrap(validateTimeoutHierarchy(settings));

  // Checkpoint store: PostgreSQL when configured, in-memory otherwise
  let db: Database | null = null;
  let checkpoints: CheckpointStore;
  if (settings.databaseUrl) {
    db = createDatabase({ url: settings.databaseUrl, logger });
    await db.connect();
    await ensureCheckpointSchema(db.sql);
    checkpoints = createPostgresCheckpointStore(db.sql);
  } else {
    checkpoints = createInMemoryCheckpointStore();
    logger.warn('DATABASE_URL not set, checkpoints are kept in memory', { component: 'main' });
  }

  // Tools
  const toolRegistry = createToolRegistry({ timeouts });
  toolRegistry.register(createHttpRequestTool());
  if (settings.tavilyApiKey) {
    toolRegistry.register(createWebSearchTool({ apiKey: settings.tavilyApiKey }));
  } else {
    logger.info('TAVILY_API_KEY not set, web search disabled', { component: 'main' });
  }

  // Engines, built on first use
  const engines = createEngineRegistry({
    factories: {
      [DEFAULT_AGENT]: () =>
        Promise.resolve(
          createAgentEngine({
            name: DEFAULT_AGENT,
            provider: createProvider(settings),
            toolRegistry,
            checkpoints,
            systemPrompt: SYSTEM_PROMPT,
            hitlEnabled: settings.hitlEnabled,
            maxToolCallsPerTurn: settings.maxToolCallsPerTurn,
            maxTurnsPerRun: settings.maxTurnsPerRun,
            logger,
          }),
        ),
    },
    defaultName: DEFAULT_AGENT,
    logger,
  });

  const coordinator = createStreamCoordinator({
    engines,
    timeouts,
    graceWindowMs: settings.checkpointGraceWindowMs,
    logger,
  });

  const maintenance = createMaintenanceScheduler({
    store: checkpoints,
    logger,
    retentionDays: settings.checkpointRetentionDays,
    intervalMs: settings.checkpointCleanupIntervalMinutes * 60_000,
  });

  // Server
  const server = Fastify({ logger: false });
  await server.register(cors, { origin: settings.corsOrigins });
  await server.register(helmet);
  await server.register(rateLimit, { max: settings.rateLimitPerMinute, timeWindow: '1 minute' });
  await server.register(websocketPlugin);
  registerErrorHandler(server);

  const deps: RouteDependencies = {
    coordinator,
    engines,
    timeouts,
    maintenance,
    settings,
    logger,
  };
  await registerRoutes(server, deps);

  // Graceful shutdown
  let shuttingDown = false;
  const shutdown = async (): Promise<void> => {
    if (shuttingDown) return;
    shuttingDown = true;
    logger.info('Shutting down...', { component: 'main' });
    await maintenance.stop();
    await server.close();
    if (db) await db.disconnect();
  };

  process.on('SIGTERM', () => void shutdown());
  process.on('SIGINT', () => void shutdown());

  await server.listen({ port: settings.port, host: settings.host });
  maintenance.start();
  logger.info(`Server listening on ${settings.host}:${String(settings.port)}`, {
    component: 'main',
    agents: engines.names(),
    httpTransport: settings.httpTransportEnabled,
    hitlEnabled: settings.hitlEnabled,
    model: settings.openaiModel,
    openaiApiKey: settings.openaiApiKey ? maskApiKey(settings.openaiApiKey) : 'unset',
  });
}

start().catch((error: unknown) => {
  const { message, errorType } = redactError(error);
  createLogger().fatal('Failed to start server', { component: 'main', errorType, error: message });
  process.exit(1);
});
