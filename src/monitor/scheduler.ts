import type { InvocationHandle, SubmitOptions } from '../control/session-manager.js';
import { MONITOR_SESSION_PREFIX } from '../shared/protocol.js';
import { createLogger, type LoggerLike } from '../utils/logger.js';
import {
  fingerprint,
  isAllClear,
  parseSeverity,
  stripSeverityLine,
  type MonitorAlert,
} from './alerts.js';
import type { MonitorCheck } from './checks.js';

export type CheckRunStatus = 'alerted' | 'quiet' | 'suppressed' | 'failed' | 'skipped';

export interface MonitorCheckStatus {
  name: string;
  enabled: boolean;
  intervalMs: number;
  running: boolean;
  runs: number;
  alerts: number;
  lastRunAt: string | null;
  lastAlertAt: string | null;
  lastStatus: CheckRunStatus | null;
}

interface CheckState {
  check: MonitorCheck;
  running: boolean;
  runs: number;
  alerts: number;
  lastRunAt?: number;
  lastAlertAt?: number;
  lastFingerprint?: string;
  lastStatus?: CheckRunStatus;
}

export interface MonitorSchedulerOptions {
  checks: MonitorCheck[];
  submit: (sessionId: string, text: string, options?: SubmitOptions) => InvocationHandle;
  /** Drops the agent-side conversation so the next run starts fresh. */
  forget?: (sessionId: string) => void;
  onAlert: (alert: MonitorAlert) => Promise<void>;
  tickMs: number;
  initialDelayMs: number;
  silenceWindowMs: number;
  allClearMarkers?: string[];
  freshSession?: boolean;
  logger?: LoggerLike;
  now?: () => number;
}

export const monitorSessionId = (checkName: string) => `${MONITOR_SESSION_PREFIX}${checkName}`;

/**
 * Periodically asks the agent to run each enabled check and turns the
 * non-quiet replies into alerts. A check is never run twice concurrently and
 * the same finding is reported at most once per silence window.
 */
export class MonitorScheduler {
  private readonly states = new Map<string, CheckState>();
  private readonly inFlight = new Set<Promise<void>>();
  private readonly logger: LoggerLike;
  private readonly now: () => number;
  private startTimer?: ReturnType<typeof setTimeout>;
  private tickTimer?: ReturnType<typeof setInterval>;
  private ticks = 0;
  private halted = false;

  constructor(private readonly options: MonitorSchedulerOptions) {
    this.logger = options.logger ?? createLogger('monitor.scheduler');
    this.now = options.now ?? Date.now;
    for (const check of options.checks) {
      this.states.set(check.name, { check, running: false, runs: 0, alerts: 0 });
    }
  }

  start() {
    if (this.startTimer || this.tickTimer) return;
    this.halted = false;
    this.logger.info('monitor started', {
      checks: this.options.checks.filter((check) => check.enabled).map((check) => check.name),
      initialDelayMs: this.options.initialDelayMs,
    });
    this.startTimer = setTimeout(() => {
      this.startTimer = undefined;
      this.tickTimer = setInterval(() => {
        void this.tick();
      }, this.options.tickMs);
      void this.tick();
    }, this.options.initialDelayMs);
  }

  get stopped() {
    return this.halted;
  }

  /**
   * Clears the timers and refuses new runs synchronously; the returned promise
   * settles once in-flight runs finish, so cancel their invocations to stop fast.
   */
  async stop() {
    this.halted = true;
    if (this.startTimer) {
      clearTimeout(this.startTimer);
      this.startTimer = undefined;
    }
    if (this.tickTimer) {
      clearInterval(this.tickTimer);
      this.tickTimer = undefined;
    }
    await Promise.all(Array.from(this.inFlight));
  }

  /** Starts every due check and resolves once the runs started by this tick complete. */
  async tick() {
    if (this.halted) return;
    this.ticks += 1;
    const now = this.now();
    const started: Array<Promise<void>> = [];

    for (const state of this.states.values()) {
      if (!state.check.enabled || state.running) continue;
      const due = state.lastRunAt === undefined || now - state.lastRunAt >= state.check.intervalMs;
      if (!due) continue;
      started.push(this.launch(state));
    }

    await Promise.all(started);
  }

  /**
   * Runs one check immediately, outside its schedule. Returns undefined for an
   * unknown check and false when that check is already running or the
   * scheduler has been stopped.
   */
  async runNow(name: string): Promise<MonitorCheckStatus | false | undefined> {
    const state = this.states.get(name.toLowerCase());
    if (!state) return undefined;
    if (state.running || this.halted) return false;
    await this.launch(state);
    return this.snapshot(state);
  }

  status() {
    return {
      ticks: this.ticks,
      running: Boolean(this.startTimer || this.tickTimer),
      checks: Array.from(this.states.values()).map((state) => this.snapshot(state)),
    };
  }

  private launch(state: CheckState) {
    state.running = true;
    const run = this.runCheck(state).finally(() => {
      state.running = false;
      this.inFlight.delete(run);
    });
    this.inFlight.add(run);
    return run;
  }

  private async runCheck(state: CheckState) {
    const { check } = state;
    const sessionId = monitorSessionId(check.name);
    const startedAt = this.now();
    state.lastRunAt = Math.max(state.lastRunAt ?? startedAt, startedAt);
    state.runs += 1;

    this.logger.debug('running check', { check: check.name });
    const outcome = await this.options.submit(sessionId, check.prompt).result;

    if (this.options.freshSession !== false) {
      this.options.forget?.(sessionId);
    }

    if (outcome.status === 'superseded' || outcome.status === 'canceled') {
      state.lastStatus = 'skipped';
      this.logger.info('check run did not complete', { check: check.name, status: outcome.status });
      return;
    }

    if (outcome.status === 'succeeded') {
      if (isAllClear(outcome.text, this.options.allClearMarkers)) {
        state.lastStatus = 'quiet';
        state.lastFingerprint = undefined;
        this.logger.debug('check all clear', { check: check.name });
        return;
      }
      const body = stripSeverityLine(outcome.text) || outcome.text.trim();
      await this.raise(state, parseSeverity(outcome.text), body, 'alerted');
      return;
    }

    this.logger.warn('check failed', { check: check.name, status: outcome.status, error: outcome.error.message });
    await this.raise(state, 'warning', `Check could not complete: ${outcome.error.message}`, 'failed');
  }

  private async raise(
    state: CheckState,
    severity: MonitorAlert['severity'],
    text: string,
    status: 'alerted' | 'failed',
  ) {
    const now = this.now();
    const print = fingerprint(text);
    const silenced =
      print === state.lastFingerprint &&
      state.lastAlertAt !== undefined &&
      now - state.lastAlertAt < this.options.silenceWindowMs;

    state.lastFingerprint = print;
    if (silenced) {
      state.lastStatus = 'suppressed';
      this.logger.debug('duplicate alert suppressed', { check: state.check.name });
      return;
    }

    state.lastStatus = status;
    state.lastAlertAt = now;
    state.alerts += 1;

    const alert: MonitorAlert = {
      check: state.check.name,
      severity,
      text,
      timestamp: new Date(now).toISOString(),
    };
    try {
      await this.options.onAlert(alert);
    } catch (error) {
      this.logger.error('alert delivery failed', { check: state.check.name, error });
    }
  }

  private snapshot(state: CheckState): MonitorCheckStatus {
    return {
      name: state.check.name,
      enabled: state.check.enabled,
      intervalMs: state.check.intervalMs,
      running: state.running,
      runs: state.runs,
      alerts: state.alerts,
      lastRunAt: state.lastRunAt === undefined ? null : new Date(state.lastRunAt).toISOString(),
      lastAlertAt: state.lastAlertAt === undefined ? null : new Date(state.lastAlertAt).toISOString(),
      lastStatus: state.lastStatus ?? null,
    };
  }
}
