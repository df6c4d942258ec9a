import crypto from 'node:crypto';
import type { IncomingMessage } from 'node:http';
import type { Duplex } from 'node:stream';
import { WebSocket, WebSocketServer, type RawData } from 'ws';
import { z } from 'zod';
import { sessionIdFor, type InboundMessage } from '../../shared/protocol.js';
import { createLogger, type LoggerLike } from '../../utils/logger.js';
import type { ChannelTransport, TransportDeps } from '../types.js';

export type ServerFrame =
  | { type: 'chunk'; text: string }
  | { type: 'reply'; text: string }
  | { type: 'error'; text: string }
  | { type: 'notice'; text: string }
  | { type: 'alert'; text: string };

const clientFrameSchema = z.object({
  type: z.literal('message'),
  text: z.string(),
});

const WS_PATH_RE = /^\/ws\/([^/?#]+)\/?(?:\?.*)?$/;

export function rawToText(raw: RawData): string {
  if (raw instanceof ArrayBuffer) {
    return Buffer.from(raw).toString('utf8');
  }
  if (Array.isArray(raw)) {
    return Buffer.concat(raw).toString('utf8');
  }
  return raw.toString('utf8');
}

/** Accepts `{ "type": "message", "text": ... }` or plain text. */
export const parseClientFrame = (raw: string) => {
  const trimmed = raw.trim();
  if (!trimmed.startsWith('{')) return trimmed;
  try {
    const parsed = clientFrameSchema.safeParse(JSON.parse(trimmed));
    return parsed.success ? parsed.data.text : undefined;
  } catch {
    return trimmed;
  }
};

/**
 * Web chat over WebSocket. Every socket of a session receives that session's
 * replies; every socket is also registered with the notifier for alerts.
 */
export class WebSocketTransport implements ChannelTransport {
  readonly name = 'web';
  private readonly wss = new WebSocketServer({ noServer: true });
  private readonly sockets = new Map<string, Set<WebSocket>>();
  private readonly logger: LoggerLike;

  constructor(
    private readonly enabled: boolean,
    private readonly deps: TransportDeps,
    logger?: LoggerLike,
  ) {
    this.logger = logger ?? createLogger('transports.web');
  }

  async start() {
    this.logger.info(this.enabled ? 'WebSocket transport ready' : 'WebSocket transport disabled');
  }

  async stop() {
    for (const client of this.wss.clients) {
      client.close(1001, 'server shutting down');
    }
    this.sockets.clear();
    await new Promise<void>((resolve) => {
      this.wss.close(() => resolve());
    });
  }

  connectionCount() {
    let count = 0;
    for (const set of this.sockets.values()) count += set.size;
    return count;
  }

  /** Returns false when the request is not for this transport. */
  handleUpgrade(req: IncomingMessage, socket: Duplex, head: Buffer) {
    const match = (req.url ?? '').match(WS_PATH_RE);
    if (!this.enabled || !match) {
      return false;
    }

    const sessionId = sessionIdFor('web', decodeURIComponent(match[1]));
    this.wss.handleUpgrade(req, socket, head, (ws) => {
      this.attach(ws, sessionId);
    });
    return true;
  }

  private attach(ws: WebSocket, sessionId: string) {
    const connectionId = crypto.randomUUID();
    const peers = this.sockets.get(sessionId) ?? new Set<WebSocket>();
    peers.add(ws);
    this.sockets.set(sessionId, peers);

    const unregister = this.deps.notifier.register(`web:${connectionId}`, async (text) => {
      this.send(ws, { type: 'alert', text });
    });
    this.logger.info('WebSocket connected', { sessionId, connectionId });

    ws.on('message', (raw) => {
      this.onMessage(sessionId, rawToText(raw)).catch((error: unknown) => {
        this.logger.error('websocket dispatch failed', { sessionId, error });
      });
    });

    ws.on('close', () => {
      unregister();
      peers.delete(ws);
      if (peers.size === 0 && this.sockets.get(sessionId) === peers) {
        this.sockets.delete(sessionId);
      }
      this.logger.info('WebSocket disconnected', { sessionId, connectionId });
    });

    ws.on('error', (error) => {
      this.logger.warn('WebSocket error', { sessionId, error: error.message });
    });
  }

  private async onMessage(sessionId: string, raw: string) {
    const text = parseClientFrame(raw);
    if (text === undefined) {
      await this.broadcast(sessionId, { type: 'error', text: 'unsupported frame' });
      return;
    }

    const inbound: InboundMessage = {
      id: crypto.randomUUID(),
      source: 'web',
      sessionId,
      senderId: sessionId,
      text,
      metadata: {},
      receivedAt: new Date().toISOString(),
    };

    await this.deps.dispatcher.inbound(inbound, {
      reply: (reply) => this.broadcast(sessionId, { type: 'reply', text: reply }),
      chunk: (chunk) => this.broadcast(sessionId, { type: 'chunk', text: chunk }),
      notice: (notice) => this.broadcast(sessionId, { type: 'notice', text: notice }),
      error: (error) => this.broadcast(sessionId, { type: 'error', text: error }),
    });
  }

  private async broadcast(sessionId: string, frame: ServerFrame) {
    const peers = this.sockets.get(sessionId);
    if (!peers || peers.size === 0) {
      throw new Error(`no open socket for ${sessionId}`);
    }
    let sent = 0;
    for (const ws of peers) {
      if (ws.readyState !== WebSocket.OPEN) continue;
      ws.send(JSON.stringify(frame));
      sent += 1;
    }
    if (sent === 0) {
      throw new Error(`no open socket for ${sessionId}`);
    }
  }

  private send(ws: WebSocket, frame: ServerFrame) {
    if (ws.readyState !== WebSocket.OPEN) {
      throw new Error('socket is not open');
    }
    ws.send(JSON.stringify(frame));
  }
}
