import { ALL_CLEAR_TOKEN } from './alerts.js';

export interface MonitorCheck {
  name: string;
  prompt: string;
  intervalMs: number;
  enabled: boolean;
  /** The check is useful if at least one of these services is configured. */
  requiredServices: string[];
}

const MINUTE_MS = 60_000;

const REPLY_CONTRACT =
  'This is an automated monitoring check. ' +
  `If everything is healthy, reply with exactly ${ALL_CLEAR_TOKEN} and nothing else. ` +
  'Otherwise start your reply with a line "SEVERITY: critical", "SEVERITY: warning" or "SEVERITY: info", ' +
  'then list each problem on its own line with the affected resource name.';

interface CheckDefinition {
  name: string;
  task: string;
  intervalMinutes: number;
  requiredServices: string[];
}

export const DEFAULT_CHECKS: readonly CheckDefinition[] = [
  {
    name: 'cluster-health',
    task:
      'Run a health check of the Kubernetes cluster. Look for pods in error, high restart counts, ' +
      'nodes under pressure, failing FluxCD reconciliations and firing Prometheus alerts.',
    intervalMinutes: 15,
    requiredServices: ['kubernetes', 'grafana-prometheus'],
  },
  {
    name: 'homeassistant',
    task:
      'Check the state of Home Assistant. Are there unavailable entities, automations in error, ' +
      'or sensors reporting abnormal values?',
    intervalMinutes: 30,
    requiredServices: ['homeassistant'],
  },
  {
    name: 'fluxcd-reconciliation',
    task:
      'Check the reconciliation state of every FluxCD resource: GitRepositories, Kustomizations ' +
      'and HelmReleases. Report anything that is not Ready.',
    intervalMinutes: 10,
    requiredServices: ['fluxcd'],
  },
];

export interface BuildChecksOptions {
  intervalOverrides?: Record<string, number>;
  disabled?: string[];
  services?: Record<string, boolean>;
}

export const buildChecks = (
  definitions: readonly CheckDefinition[] = DEFAULT_CHECKS,
  options: BuildChecksOptions = {},
): MonitorCheck[] =>
  definitions.map((definition) => {
    const minutes = options.intervalOverrides?.[definition.name] ?? definition.intervalMinutes;
    const servicesAvailable =
      !options.services ||
      definition.requiredServices.length === 0 ||
      definition.requiredServices.some((service) => options.services?.[service] === true);

    return {
      name: definition.name,
      prompt: `${definition.task}\n\n${REPLY_CONTRACT}`,
      intervalMs: minutes * MINUTE_MS,
      enabled: servicesAvailable && !(options.disabled ?? []).includes(definition.name),
      requiredServices: [...definition.requiredServices],
    };
  });
