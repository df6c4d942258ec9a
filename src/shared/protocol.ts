export type TransportType = 'web' | 'api' | 'webhook' | 'discord' | 'slack';

export interface InboundMessage {
  id: string;
  source: TransportType;
  sessionId: string;
  senderId: string;
  senderName?: string;
  text: string;
  metadata: Record<string, string>;
  receivedAt: string;
}

export interface ReplyCallbacks {
  reply: (text: string) => Promise<void>;
  /** Incremental output for channels that can render partial replies. */
  chunk?: (text: string) => Promise<void>;
  /** Superseded and canceled notices. Falls back to reply. */
  notice?: (text: string) => Promise<void>;
  /** Failures, capacity rejections and invalid input. Falls back to reply. */
  error?: (text: string) => Promise<void>;
}

export type DispatchStatus =
  | 'succeeded'
  | 'failed'
  | 'timed_out'
  | 'canceled'
  | 'superseded'
  | 'rejected'
  | 'command'
  | 'invalid';

export interface DispatchResult {
  status: DispatchStatus;
  sessionId: string;
  text: string;
  retryAfterMs?: number;
}

export const MONITOR_SESSION_PREFIX = 'monitor:';

const sanitize = (value: string) => value.replace(/[^a-zA-Z0-9._:-]/g, '_');

export const sessionIdFor = (source: TransportType, ...parts: Array<string | null | undefined>) => {
  const tokens = parts.filter((part): part is string => typeof part === 'string' && part.length > 0).map(sanitize);
  return [source, ...(tokens.length > 0 ? tokens : ['main'])].join(':');
};
