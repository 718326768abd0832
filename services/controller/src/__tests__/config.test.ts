import { describe, it, expect, vi } from 'vitest';
import { DEFAULT_ANNOTATIONS } from '@rollwatch/shared';
import { loadConfig } from '../config.js';

vi.mock('@rollwatch/shared', async (importOriginal) => ({
  ...(await importOriginal<typeof import('@rollwatch/shared')>()),
  logger: { child: () => ({ info: vi.fn(), warn: vi.fn(), error: vi.fn(), debug: vi.fn() }) },
}));

describe('loadConfig', () => {
  it('applies defaults for an empty environment', () => {
    expect(loadConfig({})).toEqual({
      reloadStrategy: 'env-vars',
      watchNamespace: '',
      namespacesToIgnore: [],
      resourcesToIgnore: [],
      delayWindowMs: 10_000,
      healthPort: 9090,
      webhookUrl: undefined,
      alert: { webhookUrl: undefined, sink: 'raw', additionalInfo: undefined },
      annotations: DEFAULT_ANNOTATIONS,
    });
  });

  it('parses every variable', () => {
    const config = loadConfig({
      RELOAD_STRATEGY: 'annotations',
      WATCH_NAMESPACE: ' team-a ',
      NAMESPACES_TO_IGNORE: 'kube-system, monitoring,,',
      RESOURCES_TO_IGNORE: 'secrets',
      DELAYED_UPGRADE_WINDOW_MS: '2500',
      HEALTH_PORT: '8081',
      WEBHOOK_URL: 'http://hooks.local/upgrade',
      ALERT_WEBHOOK_URL: 'http://hooks.local/alert',
      ALERT_SINK: 'Teams',
      ALERT_ADDITIONAL_INFO: 'cluster: test',
    });

    expect(config.reloadStrategy).toBe('annotations');
    expect(config.watchNamespace).toBe('team-a');
    expect(config.namespacesToIgnore).toEqual(['kube-system', 'monitoring']);
    expect(config.resourcesToIgnore).toEqual(['secrets']);
    expect(config.delayWindowMs).toBe(2500);
    expect(config.healthPort).toBe(8081);
    expect(config.webhookUrl).toBe('http://hooks.local/upgrade');
    expect(config.alert).toEqual({
      webhookUrl: 'http://hooks.local/alert',
      sink: 'teams',
      additionalInfo: 'cluster: test',
    });
  });

  it('treats empty strings as unset', () => {
    const config = loadConfig({ RELOAD_STRATEGY: '', HEALTH_PORT: '', WEBHOOK_URL: '' });
    expect(config.reloadStrategy).toBe('env-vars');
    expect(config.healthPort).toBe(9090);
    expect(config.webhookUrl).toBeUndefined();
  });

  it('overrides annotation keys', () => {
    const config = loadConfig({
      AUTO_ANNOTATION: 'example.com/auto',
      CONFIGMAP_ANNOTATION: 'example.com/configmaps',
    });
    expect(config.annotations.auto).toBe('example.com/auto');
    expect(config.annotations.configmapReload).toBe('example.com/configmaps');
    expect(config.annotations.secretReload).toBe(DEFAULT_ANNOTATIONS.secretReload);
    expect(config.annotations.lastReloadedFrom).toBe(DEFAULT_ANNOTATIONS.lastReloadedFrom);
  });

  it('names the offending variable', () => {
    expect(() => loadConfig({ RELOAD_STRATEGY: 'rolling' })).toThrow(/RELOAD_STRATEGY/);
    expect(() => loadConfig({ RESOURCES_TO_IGNORE: 'pods' })).toThrow(/RESOURCES_TO_IGNORE/);
    expect(() => loadConfig({ DELAYED_UPGRADE_WINDOW_MS: 'soon' })).toThrow(/DELAYED_UPGRADE_WINDOW_MS/);
    expect(() => loadConfig({ HEALTH_PORT: '70000' })).toThrow(/HEALTH_PORT/);
    expect(() => loadConfig({ ALERT_SINK: 'pager' })).toThrow(/ALERT_SINK/);
  });
});
