#!/usr/bin/env node
import type http from 'node:http';
import { config } from './config.js';
import { createLogger } from './utils/logger.js';
import { buildEngine } from './engine/index.js';
import { SessionManager } from './control/session-manager.js';
import { Notifier } from './control/notifier.js';
import { Dispatcher } from './control/dispatcher.js';
import { MonitorScheduler } from './monitor/scheduler.js';
import { buildChecks, DEFAULT_CHECKS } from './monitor/checks.js';
import { formatAlert } from './monitor/alerts.js';
import { activeServices, allowedToolsFor, detectServices } from './ops/services.js';
import { createHttpServer } from './runtime/http.js';
import { stopBackgroundWork } from './runtime/shutdown.js';
import { DiscordTransport } from './transports/discord/index.js';
import { SlackTransport } from './transports/slack/index.js';
import { WebhookTransport } from './transports/webhook/index.js';
import { WebSocketTransport } from './transports/web/index.js';
import type { ChannelTransport } from './transports/types.js';
import { formatStartupIssue, StartupValidationError, validateStartupConfig } from './utils/startup.js';

const logger = createLogger('steward', config.LOG_LEVEL);

const closeServer = (server: http.Server) =>
  new Promise<void>((resolve, reject) => {
    server.close((error) => {
      if (error) {
        reject(error);
        return;
      }
      resolve();
    });
  });

const run = async () => {
  const services = detectServices();
  const startupIssues = validateStartupConfig(config, services);
  for (const issue of startupIssues) {
    const rendered = formatStartupIssue(issue);
    if (issue.severity === 'error') {
      logger.error(`[startup/${issue.area}] ${rendered}`);
    } else {
      logger.warn(`[startup/${issue.area}] ${rendered}`);
    }
  }
  if (startupIssues.some((issue) => issue.severity === 'error')) {
    throw new StartupValidationError(startupIssues);
  }

  const enabledServices = activeServices(services);
  logger.info('services detected', { active: enabledServices });

  const engine = buildEngine(config, allowedToolsFor(enabledServices));
  const sessions = new SessionManager({
    engine,
    maxConcurrent: config.MAX_CONCURRENT_INVOCATIONS,
    maxWaiting: config.MAX_WAITING_INVOCATIONS,
    timeoutMs: config.AGENT_TIMEOUT_MS,
    logger: logger.child('control.sessions'),
  });
  const notifier = new Notifier(logger.child('control.notifier'));
  const dispatcher = new Dispatcher({
    sessions,
    engine,
    notifier,
    maxMessageBytes: config.MAX_MESSAGE_BYTES,
    streaming: config.AGENT_STREAMING,
    logger: logger.child('control.dispatcher'),
  });

  const deps = { dispatcher, notifier };
  const web = new WebSocketTransport(config.WEB_ENABLED, deps, logger.child('transports.web'));
  const webhook = new WebhookTransport(
    {
      enabled: config.WEBHOOK_ENABLED,
      token: config.WEBHOOK_TOKEN,
      outgoingUrl: config.WEBHOOK_OUTGOING_URL || undefined,
      logger: logger.child('transports.webhook'),
    },
    deps,
  );

  const transports: ChannelTransport[] = [web, webhook];
  if (config.SLACK_ENABLED) transports.push(new SlackTransport(config, deps));
  if (config.DISCORD_ENABLED) transports.push(new DiscordTransport(config, deps));
  for (const transport of transports) {
    await transport.start();
  }

  const monitor = config.MONITOR_ENABLED
    ? new MonitorScheduler({
        checks: buildChecks(DEFAULT_CHECKS, {
          intervalOverrides: config.MONITOR_CHECK_INTERVALS,
          disabled: config.MONITOR_DISABLED_CHECKS,
          services,
        }),
        submit: (sessionId, text, options) => sessions.submit(sessionId, text, options),
        forget: (sessionId) => engine.forget(sessionId),
        onAlert: async (alert) => {
          await notifier.fanout(formatAlert(alert));
        },
        tickMs: config.MONITOR_TICK_MS,
        initialDelayMs: config.MONITOR_INITIAL_DELAY_MS,
        silenceWindowMs: config.MONITOR_SILENCE_WINDOW_MS,
        allClearMarkers: config.MONITOR_ALL_CLEAR_MARKERS,
        freshSession: config.MONITOR_FRESH_SESSION,
        logger: logger.child('monitor.scheduler'),
      })
    : undefined;
  monitor?.start();

  const httpServer = await createHttpServer(
    { sessions, dispatcher, engine, notifier, monitor, webhook, web },
    {
      host: config.HTTP_HOST,
      port: config.HTTP_PORT,
      authToken: config.CONTROL_AUTH_TOKEN,
      logger: logger.child('runtime.http'),
    },
  );

  logger.info(`steward started with ${transports.length} transport(s), agent mode=${config.AGENT_MODE}`);

  let stopping = false;
  const shutdown = async (signal: string) => {
    if (stopping) return;
    stopping = true;
    logger.info(`shutdown signal received (${signal})`);

    await stopBackgroundWork({ sessions, monitor });
    for (const transport of transports) {
      await transport.stop().catch((error: unknown) => logger.error(`${transport.name} transport stop failed`, error));
    }
    await closeServer(httpServer).catch((error: unknown) => logger.error('http server close failed', error));
    process.exit(0);
  };

  process.once('SIGINT', () => void shutdown('SIGINT'));
  process.once('SIGTERM', () => void shutdown('SIGTERM'));
};

process.on('unhandledRejection', (reason) => {
  logger.error('unhandled rejection', reason);
});

run().catch((err: unknown) => {
  if (err instanceof StartupValidationError) {
    logger.error(`startup checks failed, aborting (${err.errorCount} error(s))`);
    process.exit(1);
    return;
  }
  logger.error('fatal', err);
  process.exit(1);
});
