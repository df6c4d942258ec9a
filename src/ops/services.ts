import fs from 'node:fs';
import os from 'node:os';
import path from 'node:path';

type ServiceRequirement = { type: 'kubeconfig' } | { type: 'env'; vars: string[] };

export const SERVICE_REQUIREMENTS: Record<string, ServiceRequirement> = {
  kubernetes: { type: 'kubeconfig' },
  fluxcd: { type: 'kubeconfig' },
  homeassistant: { type: 'env', vars: ['HA_TOKEN'] },
  'grafana-prometheus': { type: 'env', vars: ['PROMETHEUS_URL'] },
  git: { type: 'env', vars: ['GIT_REPOS'] },
  planka: { type: 'env', vars: ['PLANKA_USER', 'PLANKA_PASSWORD'] },
  miniflux: { type: 'env', vars: ['MINIFLUX_API_KEY'] },
  immich: { type: 'env', vars: ['IMMICH_API_KEY'] },
  karakeep: { type: 'env', vars: ['KARAKEEP_API_KEY'] },
  'music-assistant': { type: 'env', vars: ['MUSIC_ASSISTANT_URL'] },
};

const IN_CLUSTER_TOKEN = '/var/run/secrets/kubernetes.io/serviceaccount/token';

export interface ServiceProbeOptions {
  env?: NodeJS.ProcessEnv;
  fileExists?: (file: string) => boolean;
}

const hasKubeconfig = (env: NodeJS.ProcessEnv, fileExists: (file: string) => boolean) => {
  const kubeconfig = env.KUBECONFIG || path.join(os.homedir(), '.kube', 'config');
  return fileExists(kubeconfig) || fileExists(IN_CLUSTER_TOKEN);
};

export const detectServices = (options: ServiceProbeOptions = {}): Record<string, boolean> => {
  const env = options.env ?? process.env;
  const fileExists = options.fileExists ?? ((file: string) => fs.existsSync(file));
  const result: Record<string, boolean> = {};

  for (const [name, requirement] of Object.entries(SERVICE_REQUIREMENTS)) {
    if (requirement.type === 'kubeconfig') {
      result[name] = hasKubeconfig(env, fileExists);
      continue;
    }
    result[name] = requirement.vars.every((key) => Boolean(env[key]?.trim()));
  }

  return result;
};

export const activeServices = (status: Record<string, boolean>) =>
  Object.entries(status)
    .filter(([, available]) => available)
    .map(([name]) => name);

export const allowedToolsFor = (services: string[]) => services.map((name) => `mcp__${name}__*`);

/** Env keys the agent's MCP servers read; forwarded to the agent process. */
export const SERVICE_ENV_KEYS = [
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
] as const;
