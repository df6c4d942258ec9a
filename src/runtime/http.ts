import http from 'node:http';
import crypto from 'node:crypto';
import { z } from 'zod';
import { createLogger, type LoggerLike } from '../utils/logger.js';
import type { Dispatcher } from '../control/dispatcher.js';
import type { Notifier } from '../control/notifier.js';
import type { SessionManager } from '../control/session-manager.js';
import type { AgentEngine } from '../engine/types.js';
import type { MonitorScheduler } from '../monitor/scheduler.js';
import { MONITOR_SESSION_PREFIX, sessionIdFor, type DispatchStatus, type InboundMessage } from '../shared/protocol.js';
import type { WebSocketTransport } from '../transports/web/index.js';
import type { WebhookTransport } from '../transports/webhook/index.js';

export interface RuntimeServices {
  sessions: SessionManager;
  dispatcher: Dispatcher;
  engine: Pick<AgentEngine, 'ping'>;
  notifier: Notifier;
  monitor?: MonitorScheduler;
  webhook?: WebhookTransport;
  web?: WebSocketTransport;
}

export interface HttpServerOptions {
  host: string;
  port: number;
  authToken: string;
  /** How long a successful or failed agent ping is reused by /api/health. */
  pingCacheMs?: number;
  logger?: LoggerLike;
}

const MAX_BODY_BYTES = 1_000_000;

const chatBodySchema = z.object({
  message: z.string(),
  session_id: z.string().min(1).optional(),
});

const STATUS_CODES: Record<DispatchStatus, number> = {
  succeeded: 200,
  command: 200,
  invalid: 400,
  superseded: 409,
  rejected: 429,
  failed: 502,
  canceled: 503,
  timed_out: 504,
};

const setSecurityHeaders = (res: http.ServerResponse) => {
  res.setHeader('content-type', 'application/json');
  res.setHeader('cache-control', 'no-store, no-cache, must-revalidate');
  res.setHeader('pragma', 'no-cache');
  res.setHeader('x-content-type-options', 'nosniff');
};

const writeJson = (res: http.ServerResponse, statusCode: number, body: unknown) => {
  setSecurityHeaders(res);
  res.statusCode = statusCode;
  res.end(JSON.stringify(body));
};

class BodyError extends Error {
  constructor(
    message: string,
    public readonly statusCode: number,
  ) {
    super(message);
    this.name = 'BodyError';
  }
}

/** JSON or form-encoded bodies; an empty body reads as `{}`. */
const readBody = (req: http.IncomingMessage): Promise<unknown> => {
  return new Promise((resolve, reject) => {
    const contentType = req.headers['content-type'] ?? '';
    const isJson = contentType.includes('application/json');
    const isForm = contentType.includes('application/x-www-form-urlencoded');
    if (!isJson && !isForm) {
      req.resume();
      reject(new BodyError('invalid_content_type', 415));
      return;
    }

    let body = '';
    req.setEncoding('utf8');
    req.on('data', (chunk: string) => {
      body += chunk;
      if (body.length > MAX_BODY_BYTES) {
        reject(new BodyError('payload_too_large', 413));
        req.destroy();
      }
    });

    req.on('end', () => {
      if (!body) {
        resolve({});
        return;
      }
      if (isForm) {
        resolve(Object.fromEntries(new URLSearchParams(body)));
        return;
      }
      try {
        resolve(JSON.parse(body));
      } catch {
        reject(new BodyError('invalid_json', 400));
      }
    });

    req.on('error', reject);
  });
};

const headerValue = (value: string | string[] | undefined) => (Array.isArray(value) ? value[0] : value);

export const createHttpServer = (services: RuntimeServices, options: HttpServerOptions) => {
  const logger = options.logger ?? createLogger('runtime.http');
  const pingCacheMs = options.pingCacheMs ?? 30_000;
  let lastPing: { ready: boolean; at: number } | undefined;

  const agentReady = async () => {
    if (lastPing && Date.now() - lastPing.at < pingCacheMs) {
      return lastPing.ready;
    }
    const ready = await services.engine.ping().catch((error: unknown) => {
      logger.warn('agent ping failed', error);
      return false;
    });
    lastPing = { ready, at: Date.now() };
    return ready;
  };

  const authorized = (req: http.IncomingMessage, url: URL) => {
    if (!options.authToken) return true;
    const bearer = headerValue(req.headers['authorization']);
    return bearer === `Bearer ${options.authToken}` || url.searchParams.get('token') === options.authToken;
  };

  const requireAuth = (req: http.IncomingMessage, url: URL, res: http.ServerResponse) => {
    if (authorized(req, url)) return true;
    writeJson(res, 401, { error: 'unauthorized' });
    return false;
  };

  const handle = async (req: http.IncomingMessage, res: http.ServerResponse) => {
    if (req.method !== 'GET' && req.method !== 'POST') {
      writeJson(res, 405, { error: 'Method Not Allowed' });
      return;
    }

    const url = new URL(req.url || '/', 'http://127.0.0.1');
    const pathname = url.pathname;

    if (pathname === '/api/health' && req.method === 'GET') {
      const ready = await agentReady();
      const stats = services.sessions.stats();
      writeJson(res, 200, {
        status: ready ? 'ok' : 'degraded',
        uptime: process.uptime(),
        agent: { ready },
        sessions: stats.sessions,
        invocations: {
          running: stats.running,
          waiting: stats.waiting,
          maxConcurrent: stats.maxConcurrent,
          maxWaiting: stats.maxWaiting,
        },
        monitor: services.monitor ? { enabled: true, running: services.monitor.status().running } : { enabled: false },
      });
      return;
    }

    if (pathname === '/api/status' && req.method === 'GET') {
      if (!requireAuth(req, url, res)) return;
      writeJson(res, 200, {
        status: 'ok',
        uptime: process.uptime(),
        stats: services.sessions.stats(),
        sessions: services.sessions.listSessions(),
        monitor: services.monitor?.status() ?? null,
        channels: services.notifier.list(),
        webSockets: services.web?.connectionCount() ?? 0,
      });
      return;
    }

    if (pathname === '/api/chat' && req.method === 'POST') {
      if (!requireAuth(req, url, res)) return;
      const parsed = chatBodySchema.safeParse(await readBody(req));
      if (!parsed.success) {
        writeJson(res, 400, { error: 'invalid_body', issues: parsed.error.issues.map((issue) => issue.message) });
        return;
      }

      const sessionId = sessionIdFor('api', parsed.data.session_id);
      const inbound: InboundMessage = {
        id: `http-${Date.now()}-${crypto.randomBytes(4).toString('hex')}`,
        source: 'api',
        sessionId,
        senderId: 'api',
        text: parsed.data.message,
        metadata: {},
        receivedAt: new Date().toISOString(),
      };

      // The HTTP response carries the reply.
      const result = await services.dispatcher.inbound(inbound, { reply: async () => {} });
      writeJson(res, STATUS_CODES[result.status], {
        response: result.text,
        session_id: result.sessionId,
        status: result.status,
        ...(result.retryAfterMs !== undefined ? { retry_after_ms: result.retryAfterMs } : {}),
      });
      return;
    }

    const clearMatch = pathname.match(/^\/api\/sessions\/([^/]+)\/clear$/);
    if (clearMatch && req.method === 'POST') {
      if (!requireAuth(req, url, res)) return;
      const sessionId = decodeURIComponent(clearMatch[1]);
      if (sessionId.startsWith(MONITOR_SESSION_PREFIX)) {
        writeJson(res, 400, { error: 'reserved_session' });
        return;
      }
      services.dispatcher.clear(sessionId);
      writeJson(res, 200, { cleared: sessionId });
      return;
    }

    const monitorMatch = pathname.match(/^\/api\/monitor\/([^/]+)\/run$/);
    if (monitorMatch && req.method === 'POST') {
      if (!requireAuth(req, url, res)) return;
      if (!services.monitor) {
        writeJson(res, 501, { error: 'monitor_disabled' });
        return;
      }
      if (services.monitor.stopped) {
        writeJson(res, 503, { error: 'monitor_stopped' });
        return;
      }
      const result = await services.monitor.runNow(decodeURIComponent(monitorMatch[1]));
      if (result === undefined) {
        writeJson(res, 404, { error: 'unknown_check' });
        return;
      }
      if (result === false) {
        writeJson(res, 409, { error: 'check_running' });
        return;
      }
      writeJson(res, 200, { check: result });
      return;
    }

    if (pathname === '/api/webhooks/chat' && req.method === 'POST') {
      if (!services.webhook?.enabled) {
        writeJson(res, 404, { error: 'Not Found' });
        return;
      }
      const reply = await services.webhook.handle(await readBody(req), headerValue(req.headers['x-webhook-token']));
      writeJson(res, reply.status, reply.body);
      return;
    }

    writeJson(res, 404, { error: 'Not Found' });
  };

  const server = http.createServer((req, res) => {
    handle(req, res).catch((error: unknown) => {
      if (error instanceof BodyError) {
        writeJson(res, error.statusCode, { error: error.message });
        return;
      }
      logger.error('request failed', { url: req.url, error });
      writeJson(res, 500, { error: 'internal_error' });
    });
  });

  server.on('upgrade', (req, socket, head: Buffer) => {
    const url = new URL(req.url || '/', 'http://127.0.0.1');
    if (!authorized(req, url)) {
      socket.write('HTTP/1.1 401 Unauthorized\r\n\r\n');
      socket.destroy();
      return;
    }
    if (!services.web?.handleUpgrade(req, socket, head)) {
      socket.destroy();
    }
  });

  return new Promise<http.Server>((resolve, reject) => {
    server.once('error', reject);
    server.listen(options.port, options.host, () => {
      server.off('error', reject);
      const address = server.address();
      const boundPort = typeof address === 'object' && address ? address.port : options.port;
      logger.info(`HTTP listening on ${options.host}:${boundPort}`);
      resolve(server);
    });
  });
};
