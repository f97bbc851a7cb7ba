/**
 * Voice Command Server
 *
 * This server handles:
 * - Voice turns over WebSocket and HTTP (transcripts in, spoken text out)
 * - Keyword interpretation of each utterance into one tool call
 * - Tool execution (apps, weather, search, email, calendar, greeting)
 * - Local reminder notifications for scheduled tasks
 */

import http from 'http';

import { loadConfig } from './config';
import { createApp } from './app';
import { CommandInterpreter } from './core/commandInterpreter';
import { createCommandRules } from './core/commandRules';
import { DelayQueue } from './core/delayQueue';
import { ReminderStore } from './core/reminderStore';
import { createExecutorRegistry } from './executors';
import { attachVoiceStream, VoiceConnectionHub } from './routes/voice';
import { logger, describeError } from './services/logger';

const VERSION = process.env.npm_package_version ?? '1.0.0';

// =============================================================================
// STARTUP
// =============================================================================

function start(): void {
  const config = loadConfig();

  const jwtSecret = config.auth.jwtSecret;
  if (!jwtSecret) {
    throw new Error('Missing required environment variable: JWT_SECRET');
  }
  if (jwtSecret === 'change-this-to-a-long-random-string-at-least-32-chars') {
    logger.warn('WARNING: Using default JWT_SECRET - change this in production!');
  }

  const reminders = new ReminderStore();
  const queue = new DelayQueue();
  const hub = new VoiceConnectionHub();

  const registry = createExecutorRegistry(config, {
    reminders,
    queue,
    notify: (message) => {
      const delivered = hub.broadcast(message);
      logger.info('Reminder due', { message, delivered });
    },
  });

  const interpreter = new CommandInterpreter(
    registry,
    createCommandRules({ defaultCity: config.weather.defaultCity })
  );

  const app = createApp({
    config,
    jwtSecret,
    registry,
    interpreter,
    version: VERSION,
    queuedReminders: () => queue.size,
    connectedClients: () => hub.size,
  });

  const server = http.createServer(app);
  const wss = attachVoiceStream(server, { interpreter, jwtSecret, hub });

  server.listen(config.port, () => {
    logger.info(`Voice command server running on port ${config.port}`);
    logger.info(`   Environment: ${config.env}`);
    logger.info(`   Search mode: ${config.search.mode}`);
    logger.info(`   Email: ${config.email.user ? 'configured' : 'not configured'}`);
  });

  // Graceful shutdown
  const shutdown = (signal: string) => {
    logger.info(`${signal} received, shutting down gracefully`);
    queue.shutdown();
    for (const client of wss.clients) {
      client.close(1001, 'Server shutting down');
    }
    wss.close();
    server.close((error) => {
      if (error) {
        logger.error('Error while closing server', { error: error.message });
        process.exit(1);
      }
      process.exit(0);
    });
  };

  process.once('SIGTERM', () => shutdown('SIGTERM'));
  process.once('SIGINT', () => shutdown('SIGINT'));
}

// Handle uncaught errors
process.on('uncaughtException', (error) => {
  logger.error('Uncaught exception', { error: error.message, stack: error.stack });
  process.exit(1);
});

process.on('unhandledRejection', (reason) => {
  logger.error('Unhandled rejection', { reason: describeError(reason) });
  process.exit(1);
});

try {
  start();
} catch (error) {
  logger.error('Failed to start server', { error: describeError(error) });
  process.exit(1);
}
