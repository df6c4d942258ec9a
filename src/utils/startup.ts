import fs from 'node:fs';
import { execFileSync } from 'node:child_process';
import type { AppConfig } from '../config.js';
import { expandPath } from './path.js';

export interface StartupIssue {
  severity: 'warn' | 'error';
  area: string;
  message: string;
  remediation?: string;
  code?: string;
}

export interface StartupProbes {
  commandExists: (command: string) => boolean;
  dirWritable: (targetPath: string) => string | null;
  fileExists: (targetPath: string) => boolean;
  isRoot: () => boolean;
}

const ensureDirWritable = (targetPath: string): string | null => {
  try {
    fs.mkdirSync(targetPath, { recursive: true });
    fs.accessSync(targetPath, fs.constants.F_OK | fs.constants.R_OK | fs.constants.W_OK);
    return null;
  } catch (error) {
    return error instanceof Error ? error.message : String(error);
  }
};

const commandExists = (command: string): boolean => {
  if (!command.trim()) {
    return false;
  }

  if (command.includes('/')) {
    return fs.existsSync(command);
  }

  try {
    execFileSync('sh', ['-lc', `command -v ${JSON.stringify(command)}`], { stdio: 'ignore' });
    return true;
  } catch {
    return false;
  }
};

export const defaultProbes: StartupProbes = {
  commandExists,
  dirWritable: ensureDirWritable,
  fileExists: (targetPath) => fs.existsSync(targetPath),
  isRoot: () => process.getuid?.() === 0,
};

export const formatStartupIssue = (input: StartupIssue) => {
  if (!input.remediation) {
    return input.message;
  }
  return `${input.message} Remediation: ${input.remediation}`;
};

export const validateStartupConfig = (
  config: AppConfig,
  services: Record<string, boolean> = {},
  probes: StartupProbes = defaultProbes,
): StartupIssue[] => {
  const issues: StartupIssue[] = [];

  if (!config.CONTROL_AUTH_TOKEN) {
    issues.push({
      severity: 'warn',
      area: 'http',
      message: 'CONTROL_AUTH_TOKEN is empty; the HTTP API and WebSocket chat are unauthenticated.',
      remediation: 'Set CONTROL_AUTH_TOKEN in .env to a long random value (at least 24 characters), then restart steward.',
      code: 'missing_control_auth_token',
    });
  } else if (config.CONTROL_AUTH_TOKEN.length < 24) {
    issues.push({
      severity: 'warn',
      area: 'http',
      message: 'CONTROL_AUTH_TOKEN is short; use at least 24 characters.',
      remediation: 'Regenerate CONTROL_AUTH_TOKEN with a longer value and restart steward.',
      code: 'weak_control_auth_token',
    });
  }

  if (config.AGENT_MODE === 'process') {
    if (!probes.commandExists(config.AGENT_COMMAND)) {
      issues.push({
        severity: 'error',
        area: 'agent',
        message: `AGENT_COMMAND "${config.AGENT_COMMAND}" is not executable or not on PATH.`,
        remediation: 'Install the agent CLI, use an absolute AGENT_COMMAND path, or switch AGENT_MODE=mock.',
        code: 'agent_command_not_found',
      });
    }

    const agentCwd = expandPath(config.AGENT_CWD);
    const cwdErr = probes.dirWritable(agentCwd);
    if (cwdErr) {
      issues.push({
        severity: 'error',
        area: 'agent',
        message: `AGENT_CWD is not writable (${agentCwd}): ${cwdErr}`,
        remediation: `Create and chown the directory: mkdir -p "${agentCwd}" && chown -R $(id -un):$(id -gn) "${agentCwd}"`,
        code: 'agent_cwd_not_writable',
      });
    }

    if (config.AGENT_MCP_CONFIG && !probes.fileExists(expandPath(config.AGENT_MCP_CONFIG))) {
      issues.push({
        severity: 'warn',
        area: 'agent',
        message: `AGENT_MCP_CONFIG points to a missing file (${config.AGENT_MCP_CONFIG}); the agent runs without tools.`,
        remediation: 'Fix the path or unset AGENT_MCP_CONFIG.',
        code: 'mcp_config_missing',
      });
    }
  }

  if (!config.DISCORD_ENABLED && !config.SLACK_ENABLED && !config.WEB_ENABLED && !config.WEBHOOK_ENABLED) {
    issues.push({
      severity: 'warn',
      area: 'transports',
      message: 'No chat transport enabled; only the REST API will accept messages.',
      remediation: 'Enable WEB_ENABLED, WEBHOOK_ENABLED, SLACK_ENABLED or DISCORD_ENABLED.',
      code: 'no_transport_enabled',
    });
  }

  if (config.MONITOR_ENABLED) {
    if (!Object.values(services).some(Boolean)) {
      issues.push({
        severity: 'warn',
        area: 'monitor',
        message: 'Monitoring is enabled but no infrastructure service is configured; every check stays disabled.',
        remediation: 'Provide a kubeconfig or service tokens in the environment, or set MONITOR_ENABLED=false.',
        code: 'monitor_without_services',
      });
    }

    const hasAlertTarget =
      config.WEB_ENABLED ||
      (config.WEBHOOK_ENABLED && Boolean(config.WEBHOOK_OUTGOING_URL)) ||
      (config.SLACK_ENABLED && config.SLACK_NOTIFY_CHANNELS.length > 0) ||
      (config.DISCORD_ENABLED && config.DISCORD_NOTIFY_CHANNELS.length > 0);
    if (!hasAlertTarget) {
      issues.push({
        severity: 'warn',
        area: 'monitor',
        message: 'Monitoring is enabled but no channel can receive alerts.',
        remediation: 'Set SLACK_NOTIFY_CHANNELS, DISCORD_NOTIFY_CHANNELS or WEBHOOK_OUTGOING_URL.',
        code: 'monitor_without_alert_target',
      });
    }
  }

  if (config.HTTP_PORT === 0) {
    issues.push({
      severity: 'warn',
      area: 'http',
      message: 'HTTP_PORT is 0; HTTP will use an ephemeral port only.',
      remediation: 'Set HTTP_PORT to a stable port (for example 8080).',
      code: 'ephemeral_http_port',
    });
  }

  if (probes.isRoot()) {
    issues.push({
      severity: 'warn',
      area: 'runtime',
      message: 'Running as root; prefer a dedicated non-root user.',
      remediation: 'Run steward under an unprivileged account.',
      code: 'running_as_root',
    });
  }

  return issues;
};

export class StartupValidationError extends Error {
  constructor(public readonly issues: StartupIssue[]) {
    super(`startup validation failed with ${issues.filter((entry) => entry.severity === 'error').length} error(s)`);
    this.name = 'StartupValidationError';
  }

  get errorCount() {
    return this.issues.filter((entry) => entry.severity === 'error').length;
  }
}
