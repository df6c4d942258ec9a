import { describe, expect, it } from 'vitest';

import { parseAppConfig } from '../src/config.js';
import { formatStartupIssue, validateStartupConfig, type StartupProbes } from '../src/utils/startup.js';

const probes = (overrides: Partial<StartupProbes> = {}): StartupProbes => ({
  commandExists: () => true,
  dirWritable: () => null,
  fileExists: () => true,
  isRoot: () => false,
  ...overrides,
});

const baseConfig = (env: NodeJS.ProcessEnv = {}) =>
  parseAppConfig({ CONTROL_AUTH_TOKEN: 'test-secret-token-with-enough-length', ...env }, {});

const codes = (issues: ReturnType<typeof validateStartupConfig>) => issues.map((issue) => issue.code);

describe('startup validation', () => {
  it('reports nothing for a complete configuration', () => {
    const issues = validateStartupConfig(baseConfig(), { kubernetes: true }, probes());
    expect(issues).toEqual([]);
  });

  it('warns when CONTROL_AUTH_TOKEN is missing', () => {
    const issues = validateStartupConfig(baseConfig({ CONTROL_AUTH_TOKEN: '' }), { kubernetes: true }, probes());

    const issue = issues.find((entry) => entry.code === 'missing_control_auth_token');
    expect(issue?.severity).toBe('warn');
    expect(issue ? formatStartupIssue(issue) : '').toContain('Remediation:');
  });

  it('warns when CONTROL_AUTH_TOKEN is short', () => {
    const issues = validateStartupConfig(baseConfig({ CONTROL_AUTH_TOKEN: 'short' }), { kubernetes: true }, probes());
    expect(codes(issues)).toEqual(['weak_control_auth_token']);
  });

  it('errors when the agent command is not available on path', () => {
    const issues = validateStartupConfig(
      baseConfig({ AGENT_COMMAND: 'agent-command-that-does-not-exist' }),
      { kubernetes: true },
      probes({ commandExists: () => false }),
    );

    const issue = issues.find((entry) => entry.code === 'agent_command_not_found');
    expect(issue?.severity).toBe('error');
    expect(issue?.message).toBe('AGENT_COMMAND "agent-command-that-does-not-exist" is not executable or not on PATH.');
  });

  it('errors when the agent working directory is not writable', () => {
    const issues = validateStartupConfig(
      baseConfig({ AGENT_CWD: '/nowhere/agent' }),
      { kubernetes: true },
      probes({ dirWritable: () => 'EACCES: permission denied' }),
    );

    const issue = issues.find((entry) => entry.code === 'agent_cwd_not_writable');
    expect(issue?.severity).toBe('error');
    expect(issue?.message).toBe('AGENT_CWD is not writable (/nowhere/agent): EACCES: permission denied');
  });

  it('skips agent checks in mock mode', () => {
    const issues = validateStartupConfig(
      baseConfig({ AGENT_MODE: 'mock' }),
      { kubernetes: true },
      probes({ commandExists: () => false, dirWritable: () => 'nope', fileExists: () => false }),
    );
    expect(issues).toEqual([]);
  });

  it('warns about a missing MCP config file', () => {
    const issues = validateStartupConfig(
      baseConfig({ AGENT_MCP_CONFIG: '/tmp/missing-mcp.json' }),
      { kubernetes: true },
      probes({ fileExists: () => false }),
    );
    expect(codes(issues)).toEqual(['mcp_config_missing']);
  });

  it('warns when monitoring has no service and no alert target', () => {
    const issues = validateStartupConfig(baseConfig({ WEB_ENABLED: 'false' }), {}, probes());
    expect(codes(issues)).toEqual(['no_transport_enabled', 'monitor_without_services', 'monitor_without_alert_target']);
  });

  it('accepts an outgoing webhook as alert target', () => {
    const issues = validateStartupConfig(
      baseConfig({
        WEB_ENABLED: 'false',
        WEBHOOK_ENABLED: 'true',
        WEBHOOK_TOKEN: 'test-secret',
        WEBHOOK_OUTGOING_URL: 'https://chat.example.test/hook',
      }),
      { homeassistant: true },
      probes(),
    );
    expect(issues).toEqual([]);
  });

  it('warns when running as root', () => {
    const issues = validateStartupConfig(baseConfig(), { kubernetes: true }, probes({ isRoot: () => true }));
    expect(codes(issues)).toEqual(['running_as_root']);
  });
});
