import { spawn } from 'node:child_process';
import fs from 'node:fs';
import type { AgentEngine, EngineRequest, EngineResult, EngineRunOptions } from './types.js';
import {
  AgentCanceledError,
  AgentExitedError,
  AgentMalformedOutputError,
  AgentTimeoutError,
  AgentUnavailableError,
  errorMessage,
} from '../shared/errors.js';
import { createLogger, type LoggerLike } from '../utils/logger.js';
import { ensureDir, expandPath } from '../utils/path.js';
import { SERVICE_ENV_KEYS } from '../ops/services.js';

const AGENT_ENV_ALLOWLIST = [
  'HOME',
  'PATH',
  'USER',
  'LOGNAME',
  'SHELL',
  'LANG',
  'LC_ALL',
  'TZ',
  'HTTPS_PROXY',
  'HTTP_PROXY',
  'NO_PROXY',
  'ANTHROPIC_API_KEY',
  'CLAUDE_CODE_OAUTH_TOKEN',
  'CLAUDE_CONFIG_DIR',
  ...SERVICE_ENV_KEYS,
] as const;

const STDERR_TAIL_CHARS = 2000;

const buildAgentEnv = (sessionId: string, cwd: string, source: NodeJS.ProcessEnv): NodeJS.ProcessEnv => {
  const base: NodeJS.ProcessEnv = {
    STEWARD_SESSION: sessionId,
    PWD: cwd,
  };

  for (const key of AGENT_ENV_ALLOWLIST) {
    const value = source[key];
    if (typeof value === 'string' && value.length > 0) {
      base[key] = value;
    }
  }

  return base;
};

const splitArgs = (args: string | string[]) => {
  if (Array.isArray(args)) return args;
  if (!args.trim()) return [];
  return (
    args
      .trim()
      .match(/(?:"[^"]*"|[^\s"]+)/g)
      ?.map((value) => value.replace(/^"(.*)"$/, '$1')) ?? []
  );
};

interface ProcessOutcome {
  code: number | null;
  signal: NodeJS.Signals | null;
  stdout: string;
  stderr: string;
  timedOut: boolean;
  aborted: boolean;
  spawnError?: NodeJS.ErrnoException;
}

interface ExecOptions {
  timeoutMs: number;
  killGraceMs: number;
  cwd: string;
  env: NodeJS.ProcessEnv;
  signal?: AbortSignal;
  onStdoutLine?: (line: string) => void;
}

// Never rejects: every way the child can end is folded into the outcome.
const runProcess = (cmd: string, args: string[], options: ExecOptions): Promise<ProcessOutcome> =>
  new Promise((resolve) => {
    let stdout = '';
    let stderr = '';
    let lineBuffer = '';
    let timedOut = false;
    let aborted = false;
    let settled = false;
    let killTimer: ReturnType<typeof setTimeout> | undefined;
    let hardStopTimer: ReturnType<typeof setTimeout> | undefined;

    const child = spawn(cmd, args, {
      cwd: options.cwd,
      env: options.env,
      stdio: ['pipe', 'pipe', 'pipe'],
      windowsHide: true,
    });

    const settle = (code: number | null, signal: NodeJS.Signals | null, spawnError?: NodeJS.ErrnoException) => {
      if (settled) return;
      settled = true;
      clearTimeout(timeout);
      clearTimeout(killTimer);
      clearTimeout(hardStopTimer);
      options.signal?.removeEventListener('abort', abortHandler);
      if (lineBuffer.trim() && options.onStdoutLine) {
        options.onStdoutLine(lineBuffer);
      }
      resolve({ code, signal, stdout, stderr, timedOut, aborted, spawnError });
    };

    // SIGTERM first; SIGKILL after the grace period; give up on the pipes after one more.
    const terminate = () => {
      if (killTimer) return;
      child.kill('SIGTERM');
      killTimer = setTimeout(() => {
        child.kill('SIGKILL');
        hardStopTimer = setTimeout(() => settle(null, 'SIGKILL'), options.killGraceMs);
      }, options.killGraceMs);
    };

    child.stdout.setEncoding('utf8');
    child.stderr.setEncoding('utf8');
    child.stdout.on('data', (chunk: string) => {
      stdout += chunk;
      if (!options.onStdoutLine) return;
      lineBuffer += chunk;
      const lines = lineBuffer.split('\n');
      lineBuffer = lines.pop() ?? '';
      for (const line of lines) {
        if (line.trim()) options.onStdoutLine(line);
      }
    });
    child.stderr.on('data', (chunk: string) => {
      stderr += chunk;
    });

    // The agent reads its prompt from argv; an open stdin would make it wait for input.
    child.stdin.on('error', () => undefined);
    child.stdin.end();

    const timeout = setTimeout(() => {
      timedOut = true;
      terminate();
    }, options.timeoutMs);

    const abortHandler = () => {
      aborted = true;
      terminate();
    };

    if (options.signal?.aborted) {
      abortHandler();
    } else {
      options.signal?.addEventListener('abort', abortHandler, { once: true });
    }

    child.on('error', (error: NodeJS.ErrnoException) => {
      settle(null, null, error);
    });

    child.on('close', (code, signal) => {
      settle(code, signal);
    });
  });

interface ParsedResult {
  text: string;
  agentSessionId?: string;
}

const isRecord = (value: unknown): value is Record<string, unknown> =>
  typeof value === 'object' && value !== null && !Array.isArray(value);

const parseResultObject = (value: unknown): ParsedResult => {
  if (!isRecord(value)) {
    throw new AgentMalformedOutputError('agent output is not a JSON object');
  }

  if (value.is_error === true) {
    const detail = typeof value.result === 'string' ? value.result : String(value.subtype ?? 'unknown');
    throw new AgentExitedError(`agent reported an error: ${detail}`, 0);
  }

  if (typeof value.result !== 'string') {
    throw new AgentMalformedOutputError('agent output has no "result" text');
  }

  return {
    text: value.result,
    agentSessionId: typeof value.session_id === 'string' && value.session_id ? value.session_id : undefined,
  };
};

const assistantText = (event: Record<string, unknown>): string => {
  const message = event.message;
  if (!isRecord(message) || !Array.isArray(message.content)) return '';
  return message.content
    .filter(isRecord)
    .filter((block) => block.type === 'text' && typeof block.text === 'string')
    .map((block) => String(block.text))
    .join('');
};

const tryParseJson = (raw: string): { ok: true; value: unknown } | { ok: false } => {
  try {
    return { ok: true, value: JSON.parse(raw) };
  } catch {
    return { ok: false };
  }
};

export interface ProcessEngineOptions {
  command: string;
  args?: string | string[];
  cwd?: string;
  maxTurns?: number;
  maxBudgetUsd?: string;
  mcpConfigPath?: string;
  allowedTools?: string[];
  killGraceMs?: number;
  pingTimeoutMs?: number;
  env?: NodeJS.ProcessEnv;
  logger?: LoggerLike;
}

export class ProcessEngine implements AgentEngine {
  private readonly logger: LoggerLike;
  private readonly cwd: string;
  private readonly prefixArgs: string[];
  private readonly agentSessions = new Map<string, string>();

  constructor(private readonly options: ProcessEngineOptions) {
    this.logger = options.logger ?? createLogger('engine.process');
    this.cwd = expandPath(options.cwd || process.cwd());
    this.prefixArgs = splitArgs(options.args ?? '');
  }

  agentSessionFor(sessionId: string) {
    return this.agentSessions.get(sessionId);
  }

  forget(sessionId: string) {
    this.agentSessions.delete(sessionId);
  }

  private buildArgs(request: EngineRequest, streaming: boolean) {
    const args = [...this.prefixArgs, '-p', '--output-format', streaming ? 'stream-json' : 'json'];
    if (streaming) {
      args.push('--verbose');
    }
    args.push('--max-turns', String(this.options.maxTurns ?? 10));
    args.push('--max-budget-usd', this.options.maxBudgetUsd ?? '1.00');

    const mcpConfig = this.options.mcpConfigPath ? expandPath(this.options.mcpConfigPath) : '';
    if (mcpConfig && fs.existsSync(mcpConfig)) {
      args.push('--mcp-config', mcpConfig);
    }

    if (this.options.allowedTools && this.options.allowedTools.length > 0) {
      args.push('--allowedTools', this.options.allowedTools.join(','));
    }

    const resumeId = this.agentSessions.get(request.sessionId);
    if (resumeId) {
      args.push('--resume', resumeId);
    }
    // The prompt goes last, after `--`, so text starting with "-" is never read as an option.
    args.push('--', request.text);
    return args;
  }

  async run(request: EngineRequest, options: EngineRunOptions): Promise<EngineResult> {
    const startedAt = Date.now();
    const streaming = typeof options.onChunk === 'function';
    const args = this.buildArgs(request, streaming);
    const context = { sessionId: request.sessionId, command: this.options.command };

    let resultEvent: unknown;
    let sawJsonEvent = false;
    let partialText = '';
    const onStdoutLine = streaming
      ? (line: string) => {
          const parsed = tryParseJson(line.trim());
          if (!parsed.ok || !isRecord(parsed.value)) return;
          sawJsonEvent = true;
          if (parsed.value.type === 'assistant') {
            const text = assistantText(parsed.value);
            if (text) {
              partialText += text;
              options.onChunk?.(text);
            }
          } else if (parsed.value.type === 'result') {
            resultEvent = parsed.value;
          }
        }
      : undefined;

    await ensureDir(this.cwd);
    const outcome = await runProcess(this.options.command, args, {
      cwd: this.cwd,
      env: buildAgentEnv(request.sessionId, this.cwd, this.options.env ?? process.env),
      timeoutMs: options.timeoutMs,
      killGraceMs: this.options.killGraceMs ?? 5000,
      signal: options.signal,
      onStdoutLine,
    });
    const durationMs = Date.now() - startedAt;
    const partial = partialText || undefined;

    if (outcome.spawnError) {
      this.logger.error('agent process could not be started', { ...context, error: outcome.spawnError.message });
      return {
        status: 'failed',
        error: new AgentUnavailableError(`cannot start ${this.options.command}: ${outcome.spawnError.message}`, {
          ...context,
          errno: outcome.spawnError.code,
        }),
        durationMs,
      };
    }

    if (outcome.timedOut) {
      this.logger.warn('agent invocation timed out', { ...context, timeoutMs: options.timeoutMs });
      return { status: 'timed_out', error: new AgentTimeoutError(options.timeoutMs, context), durationMs, partialText: partial };
    }

    if (outcome.aborted) {
      this.logger.info('agent invocation canceled', context);
      return { status: 'canceled', error: new AgentCanceledError('invocation canceled', context), durationMs, partialText: partial };
    }

    if (outcome.code !== 0) {
      const stderrTail = outcome.stderr.trim().slice(-STDERR_TAIL_CHARS);
      this.logger.error('agent process exited abnormally', {
        ...context,
        code: outcome.code,
        signal: outcome.signal,
        stderr: stderrTail || undefined,
      });
      return {
        status: 'failed',
        error: new AgentExitedError(
          `agent exited with ${outcome.code === null ? `signal ${outcome.signal ?? 'unknown'}` : `code ${outcome.code}`}${
            stderrTail ? `: ${stderrTail}` : ''
          }`,
          outcome.code,
          context,
        ),
        durationMs,
        partialText: partial,
      };
    }

    if (outcome.stderr.trim()) {
      this.logger.debug('agent stderr', { ...context, stderr: outcome.stderr.trim().slice(-STDERR_TAIL_CHARS) });
    }

    try {
      const parsed = this.parseOutput(outcome.stdout, streaming, sawJsonEvent, resultEvent);
      if (parsed.agentSessionId) {
        this.agentSessions.set(request.sessionId, parsed.agentSessionId);
      }
      return { status: 'succeeded', text: parsed.text, durationMs };
    } catch (error) {
      if (error instanceof AgentMalformedOutputError || error instanceof AgentExitedError) {
        this.logger.warn('agent output rejected', { ...context, code: error.code, message: error.message });
        return { status: 'failed', error, durationMs, partialText: partial };
      }
      return {
        status: 'failed',
        error: new AgentMalformedOutputError(errorMessage(error), context),
        durationMs,
        partialText: partial,
      };
    }
  }

  private parseOutput(stdout: string, streaming: boolean, sawJsonEvent: boolean, resultEvent: unknown): ParsedResult {
    const output = stdout.trim();
    if (!output) {
      throw new AgentMalformedOutputError('agent produced no output');
    }

    if (streaming && sawJsonEvent) {
      if (resultEvent === undefined) {
        throw new AgentMalformedOutputError('agent stream ended without a result event');
      }
      return parseResultObject(resultEvent);
    }

    const parsed = tryParseJson(output);
    if (!parsed.ok) {
      this.logger.debug('agent output not JSON, returning raw text');
      return { text: output };
    }
    return parseResultObject(parsed.value);
  }

  async ping() {
    const outcome = await runProcess(this.options.command, [...this.prefixArgs, '--version'], {
      cwd: process.cwd(),
      env: buildAgentEnv('health', process.cwd(), this.options.env ?? process.env),
      timeoutMs: this.options.pingTimeoutMs ?? 10000,
      killGraceMs: 1000,
    });
    return !outcome.spawnError && !outcome.timedOut && outcome.code === 0;
  }
}
