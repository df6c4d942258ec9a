import type { AgentError } from '../shared/errors.js';

export interface EngineRequest {
  sessionId: string;
  text: string;
}

export interface EngineRunOptions {
  timeoutMs: number;
  signal?: AbortSignal;
  /** When set, the engine streams partial assistant text as it arrives. */
  onChunk?: (text: string) => void;
}

export type EngineResult =
  | { status: 'succeeded'; text: string; durationMs: number }
  | { status: 'timed_out' | 'canceled' | 'failed'; error: AgentError; durationMs: number; partialText?: string };

export interface AgentEngine {
  run(request: EngineRequest, options: EngineRunOptions): Promise<EngineResult>;
  /** Drop any conversational memory the agent keeps for this session. */
  forget(sessionId: string): void;
  ping(): Promise<boolean>;
}
