import path from 'node:path';
import { config as loadDotenv, type DotenvParseOutput } from 'dotenv';
import { z, type ZodIssue } from 'zod';

const bool = z.preprocess((value) => {
  if (typeof value === 'boolean') return value;
  if (typeof value === 'number') {
    if (value === 1) return true;
    if (value === 0) return false;
    return value;
  }
  if (typeof value === 'string') {
    const normalized = value.trim().toLowerCase();
    if (['1', 'true', 'yes', 'on'].includes(normalized)) return true;
    if (['0', 'false', 'no', 'off'].includes(normalized)) return false;
    return value;
  }
  return value;
}, z.boolean());

const strList = (value: string) =>
  value
    .split(',')
    .map((item) => item.trim())
    .filter(Boolean);

const INTERVAL_ENTRY_RE = /^([a-z0-9._-]+)\s*=\s*(\d+)$/i;

// "cluster-health=5, homeassistant=60" -> minutes per check name
export const parseIntervalOverrides = (value: string): Record<string, number> => {
  const output: Record<string, number> = {};
  for (const entry of strList(value)) {
    const match = entry.match(INTERVAL_ENTRY_RE);
    if (!match) {
      throw new Error(`Invalid MONITOR_CHECK_INTERVALS entry "${entry}" (expected name=minutes)`);
    }
    const minutes = Number(match[2]);
    if (minutes < 1) {
      throw new Error(`MONITOR_CHECK_INTERVALS entry "${entry}" must be at least 1 minute`);
    }
    output[match[1].toLowerCase()] = minutes;
  }
  return output;
};

const schemaBase = z.object({
  NODE_ENV: z.string().default('production'),
  LOG_LEVEL: z.enum(['debug', 'info', 'warn', 'error']).default('info'),

  HTTP_HOST: z.string().default('0.0.0.0'),
  HTTP_PORT: z.coerce.number().int().min(0).max(65535).default(8080),
  CONTROL_AUTH_TOKEN: z.string().default(''),

  AGENT_MODE: z.enum(['process', 'mock']).default('process'),
  AGENT_COMMAND: z.string().default('claude'),
  AGENT_ARGS: z.string().default(''),
  AGENT_CWD: z.string().default('~/.local/share/steward/agent'),
  AGENT_TIMEOUT_MS: z.coerce.number().int().min(1000).default(300000),
  AGENT_MAX_TURNS: z.coerce.number().int().min(1).max(200).default(10),
  AGENT_MAX_BUDGET_USD: z.string().regex(/^\d+(\.\d+)?$/, 'must be a decimal amount').default('1.00'),
  AGENT_MCP_CONFIG: z.string().default('~/.local/share/steward/agent/mcp.json'),
  AGENT_STREAMING: bool.default(true),

  MAX_CONCURRENT_INVOCATIONS: z.coerce.number().int().min(1).max(64).default(3),
  MAX_WAITING_INVOCATIONS: z.coerce.number().int().min(0).max(10000).default(32),
  MAX_MESSAGE_BYTES: z.coerce.number().int().min(128).default(12000),

  MONITOR_ENABLED: bool.default(true),
  MONITOR_TICK_MS: z.coerce.number().int().min(1000).default(60000),
  MONITOR_INITIAL_DELAY_MS: z.coerce.number().int().min(0).default(60000),
  MONITOR_SILENCE_WINDOW_MS: z.coerce.number().int().min(0).default(6 * 60 * 60 * 1000),
  MONITOR_CHECK_INTERVALS: z.string().default(''),
  MONITOR_DISABLED_CHECKS: z.string().default(''),
  MONITOR_ALL_CLEAR_MARKERS: z.string().default('all clear,nothing to report,no issues found'),
  MONITOR_FRESH_SESSION: bool.default(true),

  WEB_ENABLED: bool.default(true),

  WEBHOOK_ENABLED: bool.default(false),
  WEBHOOK_TOKEN: z.string().default(''),
  WEBHOOK_OUTGOING_URL: z.string().default(''),

  SLACK_ENABLED: bool.default(false),
  SLACK_BOT_TOKEN: z.string().default(''),
  SLACK_APP_TOKEN: z.string().default(''),
  SLACK_SIGNING_SECRET: z.string().default(''),
  SLACK_ALLOWED_CHANNELS: z.string().default(''),
  SLACK_ALLOWED_USERS: z.string().default(''),
  SLACK_NOTIFY_CHANNELS: z.string().default(''),

  DISCORD_ENABLED: bool.default(false),
  DISCORD_TOKEN: z.string().default(''),
  DISCORD_TYPING_ENABLED: bool.default(true),
  DISCORD_ALLOWED_CHANNELS: z.string().default(''),
  DISCORD_ALLOWED_GUILDS: z.string().default(''),
  DISCORD_ALLOWED_USERS: z.string().default(''),
  DISCORD_NOTIFY_CHANNELS: z.string().default(''),
});

export const appConfigSchema = schemaBase.superRefine((input, ctx) => {
  if (input.AGENT_MODE === 'process' && !input.AGENT_COMMAND.trim()) {
    ctx.addIssue({
      code: z.ZodIssueCode.custom,
      path: ['AGENT_COMMAND'],
      message: 'AGENT_MODE=process requires AGENT_COMMAND to be set.',
    });
  }

  try {
    parseIntervalOverrides(input.MONITOR_CHECK_INTERVALS);
  } catch (error) {
    ctx.addIssue({
      code: z.ZodIssueCode.custom,
      path: ['MONITOR_CHECK_INTERVALS'],
      message: error instanceof Error ? error.message : String(error),
    });
  }

  if (input.WEBHOOK_ENABLED && !input.WEBHOOK_TOKEN) {
    ctx.addIssue({
      code: z.ZodIssueCode.custom,
      path: ['WEBHOOK_ENABLED'],
      message: 'WEBHOOK_ENABLED=true requires WEBHOOK_TOKEN.',
    });
  }

  if (input.WEBHOOK_OUTGOING_URL && !/^https?:\/\//i.test(input.WEBHOOK_OUTGOING_URL)) {
    ctx.addIssue({
      code: z.ZodIssueCode.custom,
      path: ['WEBHOOK_OUTGOING_URL'],
      message: 'WEBHOOK_OUTGOING_URL must be an http(s) URL.',
    });
  }

  if (input.SLACK_ENABLED && (!input.SLACK_BOT_TOKEN || !input.SLACK_APP_TOKEN || !input.SLACK_SIGNING_SECRET)) {
    ctx.addIssue({
      code: z.ZodIssueCode.custom,
      path: ['SLACK_ENABLED'],
      message: 'SLACK_ENABLED=true requires SLACK_BOT_TOKEN, SLACK_APP_TOKEN, and SLACK_SIGNING_SECRET.',
    });
  }

  if (input.DISCORD_ENABLED && !input.DISCORD_TOKEN) {
    ctx.addIssue({
      code: z.ZodIssueCode.custom,
      path: ['DISCORD_ENABLED'],
      message: 'DISCORD_ENABLED=true requires DISCORD_TOKEN.',
    });
  }
});

type SchemaInput = z.input<typeof appConfigSchema>;
type SchemaOutput = z.output<typeof appConfigSchema>;

const CONFIG_KEYS = Object.keys(schemaBase.shape);
const KNOWN_CONFIG_KEYS = new Set<string>(CONFIG_KEYS);

// Read by the service probe and passed through to the agent's MCP servers.
const ALLOWED_FOREIGN_ENV_KEYS = new Set<string>([
  'ANTHROPIC_API_KEY',
  'KUBECONFIG',
  'HA_URL',
  'HA_TOKEN',
  'PROMETHEUS_URL',
  'GRAFANA_URL',
  'GRAFANA_TOKEN',
  'FLUX_REPO_URL',
  'GIT_REPOS',
  'PLANKA_URL',
  'PLANKA_USER',
  'PLANKA_PASSWORD',
  'MINIFLUX_URL',
  'MINIFLUX_API_KEY',
  'IMMICH_URL',
  'IMMICH_API_KEY',
  'KARAKEEP_URL',
  'KARAKEEP_API_KEY',
  'MUSIC_ASSISTANT_URL',
]);

const formatIssue = (issue: ZodIssue) => {
  const key = issue.path.length > 0 ? issue.path.join('.') : '(root)';
  return `${key}: ${issue.message}`;
};

export const formatConfigSchemaIssues = (issues: ZodIssue[]): string =>
  issues.map((issue) => `- ${formatIssue(issue)}`).join('\n');

const unknownDotenvKeys = (input: DotenvParseOutput | undefined): string[] => {
  if (!input) return [];
  return Object.keys(input)
    .filter((key) => !KNOWN_CONFIG_KEYS.has(key) && !ALLOWED_FOREIGN_ENV_KEYS.has(key))
    .sort();
};

const pickConfigValues = (env: NodeJS.ProcessEnv): Partial<Record<keyof SchemaInput, string>> => {
  const output: Record<string, string | undefined> = {};
  for (const key of CONFIG_KEYS) {
    output[key] = env[key];
  }
  return output;
};

const envFilePath = process.env.STEWARD_ENV_FILE || path.join(process.cwd(), '.env');
const dotenvOutput = loadDotenv({ path: envFilePath });
const dotenvError: NodeJS.ErrnoException | undefined = dotenvOutput.error;
if (dotenvError && dotenvError.code !== 'ENOENT') {
  throw new Error(`Unable to load config file ${envFilePath}: ${dotenvError.message}`);
}

const parseSchema = (env: NodeJS.ProcessEnv): SchemaOutput => {
  const parsed = appConfigSchema.safeParse(pickConfigValues(env));
  if (!parsed.success) {
    throw new Error(`Invalid steward configuration:\n${formatConfigSchemaIssues(parsed.error.issues)}`);
  }
  return parsed.data;
};

export const parseAppConfig = (
  env: NodeJS.ProcessEnv = process.env,
  dotenvVars: DotenvParseOutput | undefined = dotenvOutput.parsed,
) => {
  const unknown = unknownDotenvKeys(dotenvVars);
  if (unknown.length > 0) {
    throw new Error(`Unknown config key(s) in ${envFilePath}: ${unknown.join(', ')}`);
  }

  const parsed = parseSchema(env);
  return {
    ...parsed,
    MONITOR_CHECK_INTERVALS: parseIntervalOverrides(parsed.MONITOR_CHECK_INTERVALS),
    MONITOR_DISABLED_CHECKS: strList(parsed.MONITOR_DISABLED_CHECKS).map((name) => name.toLowerCase()),
    MONITOR_ALL_CLEAR_MARKERS: strList(parsed.MONITOR_ALL_CLEAR_MARKERS),
    SLACK_ALLOWED_CHANNELS: strList(parsed.SLACK_ALLOWED_CHANNELS),
    SLACK_ALLOWED_USERS: strList(parsed.SLACK_ALLOWED_USERS),
    SLACK_NOTIFY_CHANNELS: strList(parsed.SLACK_NOTIFY_CHANNELS),
    DISCORD_ALLOWED_CHANNELS: strList(parsed.DISCORD_ALLOWED_CHANNELS),
    DISCORD_ALLOWED_GUILDS: strList(parsed.DISCORD_ALLOWED_GUILDS),
    DISCORD_ALLOWED_USERS: strList(parsed.DISCORD_ALLOWED_USERS),
    DISCORD_NOTIFY_CHANNELS: strList(parsed.DISCORD_NOTIFY_CHANNELS),
  };
};

export const config = parseAppConfig();

export type AppConfig = ReturnType<typeof parseAppConfig>;
