import crypto from 'node:crypto';
import type { AgentEngine, EngineResult } from '../engine/types.js';
import {
  AgentCanceledError,
  AgentTimeoutError,
  AgentUnavailableError,
  CapacityExceededError,
  errorMessage,
  type AgentError,
} from '../shared/errors.js';
import { createLogger, type LoggerLike } from '../utils/logger.js';

export type SessionState = 'idle' | 'running' | 'queued';

export type InvocationOutcome =
  | { status: 'succeeded'; text: string; durationMs: number }
  | { status: 'failed' | 'timed_out' | 'canceled'; error: AgentError; durationMs: number; partialText?: string }
  | { status: 'superseded'; supersededBy: string }
  | { status: 'rejected'; error: CapacityExceededError };

export interface InvocationHandle {
  invocationId: string;
  sessionId: string;
  result: Promise<InvocationOutcome>;
}

export interface SubmitOptions {
  onChunk?: (text: string) => void;
  timeoutMs?: number;
}

export interface SessionSnapshot {
  sessionId: string;
  state: SessionState;
  createdAt: string;
  lastActivityAt: string;
  hasPending: boolean;
  completed: number;
}

export interface SessionManagerStats {
  sessions: number;
  running: number;
  waiting: number;
  maxConcurrent: number;
  maxWaiting: number;
}

export interface SessionManagerOptions {
  engine: AgentEngine;
  maxConcurrent: number;
  maxWaiting: number;
  timeoutMs: number;
  /** Extra time a canceled or timed-out invocation gets to settle before it is finalized anyway. */
  cleanupGraceMs?: number;
  retryAfterMs?: number;
  logger?: LoggerLike;
  now?: () => number;
}

interface Submission {
  invocationId: string;
  text: string;
  options: SubmitOptions;
  resolve: (outcome: InvocationOutcome) => void;
}

interface ActiveInvocation {
  submission: Submission;
  startedAt: number;
  abort: AbortController;
  timers: Array<ReturnType<typeof setTimeout>>;
  settled: boolean;
  done: Promise<void>;
  markDone: () => void;
}

interface SessionRecord {
  id: string;
  createdAt: number;
  lastActivityAt: number;
  state: SessionState;
  active?: ActiveInvocation;
  pending?: Submission;
  completed: number;
}

const randomId = (prefix: string) => `${prefix}-${Date.now()}-${crypto.randomBytes(4).toString('hex')}`;

const toOutcome = (result: EngineResult): InvocationOutcome => {
  if (result.status === 'succeeded') {
    return { status: 'succeeded', text: result.text, durationMs: result.durationMs };
  }
  return { status: result.status, error: result.error, durationMs: result.durationMs, partialText: result.partialText };
};

/**
 * Owns every conversation's invocation state.
 *
 * One invocation in flight per session, at most one pending message per busy
 * session (the newest wins), and a global cap on concurrent invocations with a
 * FIFO wait list for idle sessions that arrive while the cap is reached. All
 * transitions run synchronously between awaits, so the event loop serializes them.
 */
export class SessionManager {
  private readonly sessions = new Map<string, SessionRecord>();
  private readonly waitList: string[] = [];
  private readonly logger: LoggerLike;
  private readonly now: () => number;
  private readonly cleanupGraceMs: number;
  private running = 0;
  private closed = false;

  constructor(private readonly options: SessionManagerOptions) {
    this.logger = options.logger ?? createLogger('control.sessions');
    this.now = options.now ?? Date.now;
    this.cleanupGraceMs = options.cleanupGraceMs ?? 10000;
  }

  submit(sessionId: string, text: string, options: SubmitOptions = {}): InvocationHandle {
    const invocationId = randomId('inv');
    let resolve: (outcome: InvocationOutcome) => void = () => {};
    const result = new Promise<InvocationOutcome>((done) => {
      resolve = done;
    });
    const handle: InvocationHandle = { invocationId, sessionId, result };
    const submission: Submission = { invocationId, text, options, resolve };

    if (this.closed) {
      resolve({
        status: 'canceled',
        error: new AgentCanceledError('dispatcher is shutting down', { sessionId }),
        durationMs: 0,
      });
      return handle;
    }

    const session = this.getOrCreate(sessionId);
    session.lastActivityAt = this.now();

    if (session.state === 'idle') {
      this.admit(session, submission);
      return handle;
    }

    const superseded = session.pending;
    session.pending = submission;
    if (superseded) {
      this.logger.info('pending message superseded', {
        sessionId,
        superseded: superseded.invocationId,
        by: invocationId,
      });
      superseded.resolve({ status: 'superseded', supersededBy: invocationId });
    }
    return handle;
  }

  /** Aborts the session's running invocation and drops its pending message. */
  cancel(sessionId: string, reason = 'canceled by request') {
    const session = this.sessions.get(sessionId);
    if (!session) return false;

    const hadWork = session.state !== 'idle';
    this.dropPending(session, reason);
    if (session.active) {
      this.abortActive(session, session.active, reason);
    }
    return hadWork;
  }

  async shutdown() {
    if (this.closed) return;
    this.closed = true;

    const settling: Array<Promise<void>> = [];
    for (const session of this.sessions.values()) {
      this.dropPending(session, 'dispatcher is shutting down');
      if (session.active) {
        settling.push(session.active.done);
        this.abortActive(session, session.active, 'dispatcher is shutting down');
      }
    }
    this.waitList.length = 0;

    await Promise.all(settling);
    this.logger.info('session manager stopped', { sessions: this.sessions.size });
  }

  getSession(sessionId: string): SessionSnapshot | undefined {
    const session = this.sessions.get(sessionId);
    return session ? this.snapshot(session) : undefined;
  }

  listSessions(): SessionSnapshot[] {
    return Array.from(this.sessions.values()).map((session) => this.snapshot(session));
  }

  stats(): SessionManagerStats {
    return {
      sessions: this.sessions.size,
      running: this.running,
      waiting: this.waitList.length,
      maxConcurrent: this.options.maxConcurrent,
      maxWaiting: this.options.maxWaiting,
    };
  }

  private snapshot(session: SessionRecord): SessionSnapshot {
    return {
      sessionId: session.id,
      state: session.state,
      createdAt: new Date(session.createdAt).toISOString(),
      lastActivityAt: new Date(session.lastActivityAt).toISOString(),
      hasPending: Boolean(session.pending),
      completed: session.completed,
    };
  }

  private getOrCreate(sessionId: string) {
    const existing = this.sessions.get(sessionId);
    if (existing) return existing;

    const now = this.now();
    const created: SessionRecord = {
      id: sessionId,
      createdAt: now,
      lastActivityAt: now,
      state: 'idle',
      completed: 0,
    };
    this.sessions.set(sessionId, created);
    return created;
  }

  // Idle session: start now, wait for a slot, or bounce with a retry-later signal.
  private admit(session: SessionRecord, submission: Submission) {
    if (this.running < this.options.maxConcurrent) {
      this.start(session, submission);
      return;
    }

    if (this.waitList.length >= this.options.maxWaiting) {
      const error = new CapacityExceededError(this.options.retryAfterMs ?? 5000, {
        sessionId: session.id,
        running: this.running,
        waiting: this.waitList.length,
      });
      this.logger.warn('invocation rejected, capacity exceeded', error.context);
      submission.resolve({ status: 'rejected', error });
      return;
    }

    session.state = 'queued';
    session.pending = submission;
    this.waitList.push(session.id);
    this.logger.debug('invocation waiting for a slot', { sessionId: session.id, position: this.waitList.length });
  }

  private start(session: SessionRecord, submission: Submission) {
    const timeoutMs = submission.options.timeoutMs ?? this.options.timeoutMs;
    let markDone: () => void = () => {};
    const done = new Promise<void>((resolve) => {
      markDone = resolve;
    });
    const active: ActiveInvocation = {
      submission,
      startedAt: this.now(),
      abort: new AbortController(),
      timers: [],
      settled: false,
      done,
      markDone,
    };

    this.running += 1;
    session.state = 'running';
    session.active = active;

    // The engine enforces timeoutMs itself; this catches an engine that never settles.
    active.timers.push(
      setTimeout(() => {
        if (active.settled) return;
        this.logger.error('invocation exceeded its deadline, forcing cleanup', {
          sessionId: session.id,
          invocationId: submission.invocationId,
          timeoutMs,
        });
        active.abort.abort();
        this.finish(session, active, {
          status: 'timed_out',
          error: new AgentTimeoutError(timeoutMs, { sessionId: session.id }),
          durationMs: this.now() - active.startedAt,
        });
      }, timeoutMs + this.cleanupGraceMs),
    );

    this.logger.debug('invocation started', {
      sessionId: session.id,
      invocationId: submission.invocationId,
      running: this.running,
    });

    Promise.resolve()
      .then(() =>
        this.options.engine.run(
          { sessionId: session.id, text: submission.text },
          { timeoutMs, signal: active.abort.signal, onChunk: submission.options.onChunk },
        ),
      )
      .then(
        (result) => this.finish(session, active, toOutcome(result)),
        (error: unknown) =>
          this.finish(session, active, {
            status: 'failed',
            error: new AgentUnavailableError(errorMessage(error), { sessionId: session.id }),
            durationMs: this.now() - active.startedAt,
          }),
      );
  }

  private finish(session: SessionRecord, active: ActiveInvocation, outcome: InvocationOutcome) {
    if (active.settled) return;
    active.settled = true;
    for (const timer of active.timers) {
      clearTimeout(timer);
    }

    this.running -= 1;
    session.active = undefined;
    session.state = 'idle';
    session.lastActivityAt = this.now();
    session.completed += 1;

    this.logger.debug('invocation finished', {
      sessionId: session.id,
      invocationId: active.submission.invocationId,
      status: outcome.status,
      running: this.running,
    });

    active.submission.resolve(outcome);
    active.markDone();

    if (this.closed) return;
    this.drainWaitList();

    const next = session.pending;
    if (next) {
      session.pending = undefined;
      this.admit(session, next);
    }
  }

  private drainWaitList() {
    while (this.running < this.options.maxConcurrent && this.waitList.length > 0) {
      const sessionId = this.waitList.shift();
      const session = sessionId ? this.sessions.get(sessionId) : undefined;
      if (!session || session.state !== 'queued' || !session.pending) continue;

      const submission = session.pending;
      session.pending = undefined;
      this.start(session, submission);
    }
  }

  private dropPending(session: SessionRecord, reason: string) {
    const pending = session.pending;
    if (!pending) return;

    session.pending = undefined;
    if (session.state === 'queued') {
      session.state = 'idle';
      const index = this.waitList.indexOf(session.id);
      if (index >= 0) this.waitList.splice(index, 1);
    }
    pending.resolve({
      status: 'canceled',
      error: new AgentCanceledError(reason, { sessionId: session.id }),
      durationMs: 0,
    });
  }

  private abortActive(session: SessionRecord, active: ActiveInvocation, reason: string) {
    active.abort.abort();
    active.timers.push(
      setTimeout(() => {
        this.finish(session, active, {
          status: 'canceled',
          error: new AgentCanceledError(reason, { sessionId: session.id }),
          durationMs: this.now() - active.startedAt,
        });
      }, this.cleanupGraceMs),
    );
  }
}
