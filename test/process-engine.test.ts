import fs from 'node:fs/promises';
import os from 'node:os';
import path from 'node:path';
import { afterAll, beforeAll, describe, expect, it } from 'vitest';

import { ProcessEngine } from '../src/engine/process.js';
import type { EngineResult } from '../src/engine/types.js';
import {
  AgentCanceledError,
  AgentExitedError,
  AgentMalformedOutputError,
  AgentTimeoutError,
  AgentUnavailableError,
} from '../src/shared/errors.js';
import { silentLogger } from '../src/utils/logger.js';

const FIXTURE = String.raw`
const fs = require('node:fs');
const args = process.argv.slice(2);
const separator = args.indexOf('--');
const flags = separator >= 0 ? args.slice(0, separator) : args;
const prompt = separator >= 0 ? args.slice(separator + 1).join(' ') : undefined;
if (flags.includes('--version')) {
  process.stdout.write('1.0.0\n');
  process.exit(0);
}
const VALUE_FLAGS = ['--output-format', '--max-turns', '--max-budget-usd', '--mcp-config', '--allowedTools', '--resume'];
for (let i = 0; i < flags.length; i += 1) {
  if (VALUE_FLAGS.includes(flags[i])) {
    i += 1;
  } else if (flags[i] !== '-p' && flags[i] !== '--verbose') {
    process.stderr.write('unknown option ' + flags[i] + '\n');
    process.exit(1);
  }
}
const format = flags[flags.indexOf('--output-format') + 1];
const resumeAt = flags.indexOf('--resume');
const resume = resumeAt >= 0 ? flags[resumeAt + 1] : 'none';
const emit = (value) => process.stdout.write(JSON.stringify(value) + '\n');
const assistant = (text) => emit({ type: 'assistant', message: { content: [{ type: 'text', text }] } });

switch (prompt) {
  case 'sleep':
    setTimeout(() => {}, 60000);
    break;
  case 'count-term':
    process.on('SIGTERM', () => fs.appendFileSync('terms.log', 'TERM\n'));
    setInterval(() => {}, 1000);
    break;
  case 'ignore-term':
    process.on('SIGTERM', () => {});
    setInterval(() => {}, 1000);
    break;
  case 'fail':
    process.stderr.write('boom\n');
    process.exit(3);
    break;
  case 'garbage':
    process.stdout.write('[1,2,3]');
    break;
  case 'plain':
    process.stdout.write('just text\n');
    break;
  case 'empty':
    break;
  case 'is-error':
    emit({ type: 'result', is_error: true, result: 'budget exceeded', session_id: 'sess-err' });
    break;
  case 'no-result':
    emit({ type: 'result', session_id: 'sess-x' });
    break;
  case 'env':
    emit({ type: 'result', result: [process.env.STEWARD_SESSION, process.env.NOT_ALLOWED || 'none', process.env.HA_TOKEN].join('|') });
    break;
  case 'args':
    emit({ type: 'result', result: JSON.stringify(args) });
    break;
  case 'stream-truncated':
    emit({ type: 'system', subtype: 'init' });
    assistant('partial');
    break;
  default:
    if (format === 'stream-json') {
      emit({ type: 'system', subtype: 'init' });
      assistant('Hel');
      assistant('lo');
      emit({ type: 'result', result: 'Hello', session_id: 'sess-stream' });
    } else {
      emit({ type: 'result', result: 'echo:' + prompt + '|resume:' + resume, session_id: 'sess-1' });
    }
}
`;

let workDir = '';
let fixturePath = '';

beforeAll(async () => {
  workDir = await fs.mkdtemp(path.join(os.tmpdir(), 'steward-engine-'));
  fixturePath = path.join(workDir, 'fake-agent.cjs');
  await fs.writeFile(fixturePath, FIXTURE, 'utf8');
});

afterAll(async () => {
  await fs.rm(workDir, { recursive: true, force: true });
});

const buildEngine = (overrides: Partial<ConstructorParameters<typeof ProcessEngine>[0]> = {}) =>
  new ProcessEngine({
    command: process.execPath,
    args: [fixturePath],
    cwd: workDir,
    killGraceMs: 200,
    logger: silentLogger,
    ...overrides,
  });

const run = (engine: ProcessEngine, text: string, timeoutMs = 10000) =>
  engine.run({ sessionId: 'session-1', text }, { timeoutMs });

const expectFailure = (result: EngineResult) => {
  if (result.status === 'succeeded') {
    throw new Error(`expected a failure, got "${result.text}"`);
  }
  return result;
};

describe('process engine', () => {
  it('returns the result text and resumes the agent session on the next call', async () => {
    const engine = buildEngine();

    const first = await run(engine, 'hello');
    expect(first).toMatchObject({ status: 'succeeded', text: 'echo:hello|resume:none' });
    expect(engine.agentSessionFor('session-1')).toBe('sess-1');

    const second = await run(engine, 'again');
    expect(second).toMatchObject({ status: 'succeeded', text: 'echo:again|resume:sess-1' });

    engine.forget('session-1');
    const third = await run(engine, 'fresh');
    expect(third).toMatchObject({ status: 'succeeded', text: 'echo:fresh|resume:none' });
  });

  it('streams assistant text to onChunk and returns the final result', async () => {
    const engine = buildEngine();
    const chunks: string[] = [];

    const result = await engine.run(
      { sessionId: 'stream', text: 'hi' },
      { timeoutMs: 10000, onChunk: (text) => chunks.push(text) },
    );

    expect(chunks).toEqual(['Hel', 'lo']);
    expect(result).toMatchObject({ status: 'succeeded', text: 'Hello' });
    expect(engine.agentSessionFor('stream')).toBe('sess-stream');
  });

  it('treats a stream without a result event as malformed', async () => {
    const engine = buildEngine();
    const result = expectFailure(
      await engine.run({ sessionId: 'stream', text: 'stream-truncated' }, { timeoutMs: 10000, onChunk: () => {} }),
    );

    expect(result.status).toBe('failed');
    expect(result.error).toBeInstanceOf(AgentMalformedOutputError);
    expect(result.error.message).toBe('agent stream ended without a result event');
    expect(result.partialText).toBe('partial');
  });

  it('times out a hung agent', async () => {
    const result = expectFailure(await run(buildEngine(), 'sleep', 300));

    expect(result.status).toBe('timed_out');
    expect(result.error).toBeInstanceOf(AgentTimeoutError);
    expect(result.error.message).toBe('agent did not answer within 300ms');
  });

  it('escalates to SIGKILL when the agent ignores SIGTERM', async () => {
    const result = expectFailure(await run(buildEngine(), 'ignore-term', 500));

    expect(result.status).toBe('timed_out');
    expect(result.durationMs).toBeLessThan(5000);
  });

  it('cancels when the abort signal fires', async () => {
    const controller = new AbortController();
    setTimeout(() => controller.abort(), 200);

    const result = expectFailure(
      await buildEngine().run({ sessionId: 'cancel', text: 'sleep' }, { timeoutMs: 10000, signal: controller.signal }),
    );

    expect(result.status).toBe('canceled');
    expect(result.error).toBeInstanceOf(AgentCanceledError);
  });

  it('reports a non-zero exit with the stderr tail', async () => {
    const result = expectFailure(await run(buildEngine(), 'fail'));

    expect(result.status).toBe('failed');
    expect(result.error).toBeInstanceOf(AgentExitedError);
    expect(result.error.message).toBe('agent exited with code 3: boom');
  });

  it('reports an agent that cannot be started as unavailable', async () => {
    const engine = buildEngine({ command: path.join(workDir, 'missing-agent-binary'), args: [] });
    const result = expectFailure(await run(engine, 'hello'));

    expect(result.status).toBe('failed');
    expect(result.error).toBeInstanceOf(AgentUnavailableError);
  });

  it('rejects JSON that is not an object', async () => {
    const result = expectFailure(await run(buildEngine(), 'garbage'));
    expect(result.error).toBeInstanceOf(AgentMalformedOutputError);
    expect(result.error.message).toBe('agent output is not a JSON object');
  });

  it('rejects empty output', async () => {
    const result = expectFailure(await run(buildEngine(), 'empty'));
    expect(result.error.message).toBe('agent produced no output');
  });

  it('rejects a result object without text', async () => {
    const result = expectFailure(await run(buildEngine(), 'no-result'));
    expect(result.error.message).toBe('agent output has no "result" text');
  });

  it('surfaces an error result reported by the agent', async () => {
    const result = expectFailure(await run(buildEngine(), 'is-error'));
    expect(result.error).toBeInstanceOf(AgentExitedError);
    expect(result.error.message).toBe('agent reported an error: budget exceeded');
  });

  it('returns non-JSON output as plain text', async () => {
    const result = await run(buildEngine(), 'plain');
    expect(result).toMatchObject({ status: 'succeeded', text: 'just text' });
  });

  it('passes only allowlisted variables to the agent', async () => {
    const engine = buildEngine({
      env: { PATH: process.env.PATH, NOT_ALLOWED: 'test-secret', HA_TOKEN: 'test-secret' },
    });
    const result = await engine.run({ sessionId: 'env-session', text: 'env' }, { timeoutMs: 10000 });

    expect(result).toMatchObject({ status: 'succeeded', text: 'env-session|none|test-secret' });
  });

  it('builds the agent command line from its options', async () => {
    const mcpConfig = path.join(workDir, 'mcp.json');
    await fs.writeFile(mcpConfig, '{}', 'utf8');
    const engine = buildEngine({
      maxTurns: 4,
      maxBudgetUsd: '0.50',
      mcpConfigPath: mcpConfig,
      allowedTools: ['mcp__kubernetes__*', 'mcp__fluxcd__*'],
    });

    const result = await run(engine, 'args');
    if (result.status !== 'succeeded') throw result.error;

    expect(JSON.parse(result.text)).toEqual([
      '-p',
      '--output-format',
      'json',
      '--max-turns',
      '4',
      '--max-budget-usd',
      '0.50',
      '--mcp-config',
      mcpConfig,
      '--allowedTools',
      'mcp__kubernetes__*,mcp__fluxcd__*',
      '--',
      'args',
    ]);
  });

  it('passes text that starts with a dash as the prompt, not as an option', async () => {
    expect(await run(buildEngine(), '- restart pod X')).toMatchObject({
      status: 'succeeded',
      text: 'echo:- restart pod X|resume:none',
    });
    expect(await run(buildEngine(), '--version')).toMatchObject({
      status: 'succeeded',
      text: 'echo:--version|resume:none',
    });
  });

  it('terminates only once when an abort arrives after the timeout', async () => {
    const termLog = path.join(workDir, 'terms.log');
    await fs.rm(termLog, { force: true });
    const controller = new AbortController();
    setTimeout(() => controller.abort(), 700);

    const result = await buildEngine({ killGraceMs: 500 }).run(
      { sessionId: 'double-stop', text: 'count-term' },
      { timeoutMs: 500, signal: controller.signal },
    );

    expect(result.status).toBe('timed_out');
    expect(await fs.readFile(termLog, 'utf8')).toBe('TERM\n');
  });

  it('pings the agent with --version', async () => {
    expect(await buildEngine().ping()).toBe(true);
    expect(await buildEngine({ command: path.join(workDir, 'missing-agent-binary'), args: [] }).ping()).toBe(false);
  });
});
