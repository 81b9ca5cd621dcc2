import pino from 'pino';
import type { FastifyInstance } from 'fastify';

import { ReactionSequencer, RelayStatus } from './application/index.js';
import {
  ConnectionSupervisor,
  SlackWebApiClient,
  connectWebSocket,
  createShutdownHandler,
  loadRelayConfig,
} from './infrastructure/index.js';
import { buildHealthServer } from './interfaces/http/index.js';

/**
 * Slack Socket Mode relay.
 *
 * Listens for new replies in threads and posts each reply's permalink back
 * to its channel.
 *
 * Environment variables:
 *   SLACK_APP_TOKEN         app-level token for Socket Mode (required)
 *   SLACK_OAUTH_TOKEN       bot token for chat methods (required)
 *   SLACK_API_BASE_URL      Web API base (default: https://slack.com/api)
 *   SLACK_DEBUG_RECONNECTS  ask Slack to rotate connections often (default: true)
 *   LOG_LEVEL               pino level (default: info)
 *   HEALTH_PORT             serve GET /health on this port (default: off)
 *   HOST                    health server bind address (default: 0.0.0.0)
 */
const log = pino({ level: process.env['LOG_LEVEL'] ?? 'info' });

// Abort controller for graceful shutdown
const ac = new AbortController();

async function main(): Promise<void> {
  const config = loadRelayConfig();
  log.level = config.logLevel;

  const client = new SlackWebApiClient({
    appToken: config.appToken,
    botToken: config.botToken,
    baseUrl: config.apiBaseUrl,
  });

  const status = new RelayStatus();

  const supervisor = new ConnectionSupervisor({
    connections: client,
    connect: (url) => connectWebSocket(url, log),
    reactor: new ReactionSequencer(client),
    status,
    log,
    debugReconnects: config.debugReconnects,
  });

  let server: FastifyInstance | null = null;
  if (config.healthPort !== null) {
    server = await buildHealthServer(status, config.logLevel);
    await server.listen({ host: config.host, port: config.healthPort });
  }

  log.info(
    { apiBaseUrl: config.apiBaseUrl, debugReconnects: config.debugReconnects, healthPort: config.healthPort },
    'Relay starting',
  );

  try {
    await supervisor.run(ac.signal);
  } finally {
    if (server) {
      await server.close();
    }
  }
}

// Graceful shutdown on SIGINT / SIGTERM
const shutdown = createShutdownHandler({ controller: ac, log });

process.on('SIGINT', shutdown);
process.on('SIGTERM', shutdown);

main().catch((err: unknown) => {
  log.fatal({ err }, 'Relay crashed');
  process.exit(1);
});
