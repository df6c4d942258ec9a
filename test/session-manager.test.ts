import { describe, expect, it } from 'vitest';

import { SessionManager, type SessionManagerOptions } from '../src/control/session-manager.js';
import type { AgentEngine, EngineRequest, EngineResult, EngineRunOptions } from '../src/engine/types.js';
import { AgentCanceledError, AgentUnavailableError, CapacityExceededError } from '../src/shared/errors.js';
import { silentLogger } from '../src/utils/logger.js';

interface PendingCall {
  request: EngineRequest;
  options: EngineRunOptions;
  resolve: (result: EngineResult) => void;
}

class FakeEngine implements AgentEngine {
  readonly calls: PendingCall[] = [];
  readonly forgotten: string[] = [];
  settleOnAbort = true;
  failWith?: Error;

  run(request: EngineRequest, options: EngineRunOptions): Promise<EngineResult> {
    if (this.failWith) {
      return Promise.reject(this.failWith);
    }
    return new Promise((resolve) => {
      this.calls.push({ request, options, resolve });
      options.signal?.addEventListener('abort', () => {
        if (this.settleOnAbort) {
          resolve({ status: 'canceled', error: new AgentCanceledError('aborted'), durationMs: 1 });
        }
      });
    });
  }

  forget(sessionId: string) {
    this.forgotten.push(sessionId);
  }

  async ping() {
    return true;
  }

  reply(index: number, text: string) {
    this.calls[index].resolve({ status: 'succeeded', text, durationMs: 1 });
  }

  texts() {
    return this.calls.map((call) => `${call.request.sessionId}:${call.request.text}`);
  }
}

const flush = () => new Promise<void>((resolve) => setImmediate(resolve));

const createManager = (engine: FakeEngine, overrides: Partial<SessionManagerOptions> = {}) =>
  new SessionManager({
    engine,
    maxConcurrent: 3,
    maxWaiting: 10,
    timeoutMs: 10000,
    cleanupGraceMs: 50,
    logger: silentLogger,
    ...overrides,
  });

describe('session manager', () => {
  it('delivers a reply and returns the session to idle', async () => {
    const engine = new FakeEngine();
    const manager = createManager(engine);

    const handle = manager.submit('s1', 'status?');
    expect(manager.getSession('s1')?.state).toBe('running');
    await flush();
    expect(engine.texts()).toEqual(['s1:status?']);

    engine.reply(0, 'OK');
    await expect(handle.result).resolves.toEqual({ status: 'succeeded', text: 'OK', durationMs: 1 });
    expect(manager.getSession('s1')).toMatchObject({ state: 'idle', completed: 1, hasPending: false });
  });

  it('keeps only the latest message for a busy session', async () => {
    const engine = new FakeEngine();
    const manager = createManager(engine);

    const a = manager.submit('s1', 'A');
    const b = manager.submit('s1', 'B');
    const c = manager.submit('s1', 'C');
    await flush();

    await expect(b.result).resolves.toEqual({ status: 'superseded', supersededBy: c.invocationId });
    expect(engine.texts()).toEqual(['s1:A']);
    expect(manager.getSession('s1')?.hasPending).toBe(true);

    engine.reply(0, 'done A');
    await expect(a.result).resolves.toMatchObject({ status: 'succeeded', text: 'done A' });
    await flush();
    expect(engine.texts()).toEqual(['s1:A', 's1:C']);

    engine.reply(1, 'done C');
    await expect(c.result).resolves.toMatchObject({ status: 'succeeded', text: 'done C' });
    expect(manager.getSession('s1')?.state).toBe('idle');
  });

  it('holds sessions beyond the global cap in FIFO order', async () => {
    const engine = new FakeEngine();
    const manager = createManager(engine, { maxConcurrent: 2 });

    const first = manager.submit('s1', 'one');
    manager.submit('s2', 'two');
    const third = manager.submit('s3', 'three');
    await flush();

    expect(engine.texts()).toEqual(['s1:one', 's2:two']);
    expect(manager.getSession('s3')?.state).toBe('queued');
    expect(manager.stats()).toMatchObject({ running: 2, waiting: 1, maxConcurrent: 2 });

    engine.reply(0, 'ok');
    await first.result;
    await flush();

    expect(engine.texts()).toEqual(['s1:one', 's2:two', 's3:three']);
    expect(manager.stats()).toMatchObject({ running: 2, waiting: 0 });

    engine.reply(2, 'ok three');
    await expect(third.result).resolves.toMatchObject({ status: 'succeeded', text: 'ok three' });
  });

  it('rejects with a retry-later signal when the wait list is full', async () => {
    const engine = new FakeEngine();
    const manager = createManager(engine, { maxConcurrent: 1, maxWaiting: 1, retryAfterMs: 1500 });

    manager.submit('s1', 'one');
    manager.submit('s2', 'two');
    const rejected = manager.submit('s3', 'three');

    const outcome = await rejected.result;
    expect(outcome.status).toBe('rejected');
    if (outcome.status !== 'rejected') return;
    expect(outcome.error).toBeInstanceOf(CapacityExceededError);
    expect(outcome.error.retryAfterMs).toBe(1500);
    expect(manager.getSession('s3')?.state).toBe('idle');
  });

  it('lets a newer message take over a queued session', async () => {
    const engine = new FakeEngine();
    const manager = createManager(engine, { maxConcurrent: 1 });

    const first = manager.submit('s1', 'one');
    const older = manager.submit('s2', 'older');
    const newer = manager.submit('s2', 'newer');

    await expect(older.result).resolves.toEqual({ status: 'superseded', supersededBy: newer.invocationId });
    expect(manager.stats().waiting).toBe(1);

    await flush();
    engine.reply(0, 'ok');
    await first.result;
    await flush();

    expect(engine.texts()).toEqual(['s1:one', 's2:newer']);
  });

  it('passes per-call options to the engine', async () => {
    const engine = new FakeEngine();
    const manager = createManager(engine);
    const onChunk = () => {};

    manager.submit('s1', 'hello', { timeoutMs: 1234, onChunk });
    await flush();

    expect(engine.calls[0].options.timeoutMs).toBe(1234);
    expect(engine.calls[0].options.onChunk).toBe(onChunk);
  });

  it('finalizes a hung invocation as timed out after the cleanup grace', async () => {
    const engine = new FakeEngine();
    engine.settleOnAbort = false;
    const manager = createManager(engine, { timeoutMs: 60, cleanupGraceMs: 40 });

    const handle = manager.submit('s1', 'hang');
    const outcome = await handle.result;

    expect(outcome.status).toBe('timed_out');
    expect(engine.calls[0].options.signal?.aborted).toBe(true);
    expect(manager.getSession('s1')?.state).toBe('idle');
    expect(manager.stats().running).toBe(0);
  });

  it('cancels the running invocation and the pending message', async () => {
    const engine = new FakeEngine();
    const manager = createManager(engine);

    const running = manager.submit('s1', 'one');
    const pending = manager.submit('s1', 'two');
    await flush();

    expect(manager.cancel('s1', 'stop please')).toBe(true);

    const pendingOutcome = await pending.result;
    expect(pendingOutcome.status).toBe('canceled');
    if (pendingOutcome.status === 'canceled') {
      expect(pendingOutcome.error.message).toBe('stop please');
    }
    await expect(running.result).resolves.toMatchObject({ status: 'canceled' });
    expect(manager.getSession('s1')?.state).toBe('idle');
    expect(engine.calls).toHaveLength(1);
  });

  it('cancels everything on shutdown and refuses new work', async () => {
    const engine = new FakeEngine();
    const manager = createManager(engine, { maxConcurrent: 1 });

    const running = manager.submit('s1', 'one');
    const pending = manager.submit('s1', 'two');
    const queued = manager.submit('s2', 'three');
    await flush();

    await manager.shutdown();

    await expect(running.result).resolves.toMatchObject({ status: 'canceled' });
    await expect(pending.result).resolves.toMatchObject({ status: 'canceled' });
    await expect(queued.result).resolves.toMatchObject({ status: 'canceled' });
    expect(engine.calls).toHaveLength(1);
    expect(manager.stats()).toMatchObject({ running: 0, waiting: 0 });

    const late = await manager.submit('s3', 'late').result;
    expect(late.status).toBe('canceled');
    if (late.status === 'canceled') {
      expect(late.error.message).toBe('dispatcher is shutting down');
    }
  });

  it('reports an engine that throws as unavailable', async () => {
    const engine = new FakeEngine();
    engine.failWith = new Error('spawn exploded');
    const manager = createManager(engine);

    const outcome = await manager.submit('s1', 'hello').result;
    expect(outcome.status).toBe('failed');
    if (outcome.status !== 'failed') return;
    expect(outcome.error).toBeInstanceOf(AgentUnavailableError);
    expect(outcome.error.message).toBe('spawn exploded');
    expect(manager.getSession('s1')?.state).toBe('idle');
  });
});
