import { describe, expect, it } from 'vitest';

import { activeServices, allowedToolsFor, detectServices } from '../src/ops/services.js';

describe('service detection', () => {
  it('derives availability from kubeconfig presence and env vars', () => {
    const services = detectServices({
      env: {
        KUBECONFIG: '/etc/steward/kubeconfig',
        HA_TOKEN: '   ',
        PROMETHEUS_URL: 'http://prometheus.local:9090',
        PLANKA_USER: 'steward',
        PLANKA_PASSWORD: 'test-secret',
        MINIFLUX_API_KEY: '',
      },
      fileExists: (file) => file === '/etc/steward/kubeconfig',
    });

    expect(services).toEqual({
      kubernetes: true,
      fluxcd: true,
      homeassistant: false,
      'grafana-prometheus': true,
      git: false,
      planka: true,
      miniflux: false,
      immich: false,
      karakeep: false,
      'music-assistant': false,
    });
    expect(activeServices(services)).toEqual(['kubernetes', 'fluxcd', 'grafana-prometheus', 'planka']);
  });

  it('treats an in-cluster service account as a kubeconfig', () => {
    const services = detectServices({
      env: {},
      fileExists: (file) => file === '/var/run/secrets/kubernetes.io/serviceaccount/token',
    });

    expect(services.kubernetes).toBe(true);
    expect(activeServices(services)).toEqual(['kubernetes', 'fluxcd']);
  });

  it('requires every env var of a multi-var service', () => {
    const services = detectServices({ env: { PLANKA_USER: 'steward' }, fileExists: () => false });
    expect(services.planka).toBe(false);
    expect(activeServices(services)).toEqual([]);
  });

  it('maps active services to MCP tool patterns', () => {
    expect(allowedToolsFor(['kubernetes', 'planka'])).toEqual(['mcp__kubernetes__*', 'mcp__planka__*']);
    expect(allowedToolsFor([])).toEqual([]);
  });
});
