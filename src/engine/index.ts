import type { AppConfig } from '../config.js';
import type { AgentEngine } from './types.js';
import { MockEngine } from './mock.js';
import { ProcessEngine } from './process.js';
import { createLogger } from '../utils/logger.js';

export const buildEngine = (config: AppConfig, allowedTools: string[] = []): AgentEngine => {
  if (config.AGENT_MODE === 'mock') {
    return new MockEngine();
  }

  return new ProcessEngine({
    command: config.AGENT_COMMAND,
    args: config.AGENT_ARGS,
    cwd: config.AGENT_CWD,
    maxTurns: config.AGENT_MAX_TURNS,
    maxBudgetUsd: config.AGENT_MAX_BUDGET_USD,
    mcpConfigPath: config.AGENT_MCP_CONFIG,
    allowedTools,
    logger: createLogger('engine.process', config.LOG_LEVEL),
  });
};
