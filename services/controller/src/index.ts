import * as k8s from '@kubernetes/client-node';
import { features, logger } from '@rollwatch/shared';
import { buildAdapterRegistry } from './adapters/index.js';
import type { AlertConfig } from './alerts.js';
import { loadConfig } from './config.js';
import { TriggerEvaluator } from './evaluator.js';
import { createHealthServer } from './health.js';
import { createWorkloadClients, detectOpenShift, loadKubeConfig } from './kube.js';
import { createOutcomeReporter, createReloadCounters } from './reporter.js';
import { drain } from './shutdown.js';
import { createStrategy } from './strategies.js';
import { ChangeDetector, createConfigInformers } from './watcher.js';

const log = logger.child({ module: 'controller-main' });

async function main() {
  log.info({ mode: features.mode }, 'starting controller');

  const config = loadConfig();
  const kc = loadKubeConfig();

  const openshift = features.isExplicit('openshift')
    ? features.isEnabled('openshift')
    : await detectOpenShift(kc.makeApiClient(k8s.ApisApi));
  const adapters = buildAdapterRegistry(
    { openshift, argoRollouts: features.isEnabled('argoRollouts') },
    config.annotations,
  );
  log.info({ kinds: adapters.map((a) => a.kind) }, 'workload kinds registered');

  let alert: AlertConfig | undefined;
  if (features.isEnabled('alertOnReload')) {
    if (config.alert.webhookUrl) {
      alert = { ...config.alert, webhookUrl: config.alert.webhookUrl };
    } else {
      log.warn('alertOnReload is enabled but ALERT_WEBHOOK_URL is not set, alerts disabled');
    }
  }

  const evaluator = new TriggerEvaluator({
    clients: createWorkloadClients(kc),
    strategy: createStrategy(config.reloadStrategy, config.annotations.lastReloadedFrom),
    reporter: createOutcomeReporter({
      counters: createReloadCounters(),
      events: kc.makeApiClient(k8s.CoreV1Api),
      alert,
    }),
    annotations: config.annotations,
    autoReloadAll: features.isEnabled('autoReloadAll'),
    delayWindowMs: config.delayWindowMs,
  });

  const detector = new ChangeDetector({
    config,
    reloadOnCreate: features.isEnabled('reloadOnCreate'),
    adapters,
    evaluator,
  });

  const healthServer = createHealthServer(() => detector.synced);
  healthServer.listen(config.healthPort, () => {
    log.info({ port: config.healthPort }, 'health probe listening');
  });

  const informers = createConfigInformers(kc, detector, config.watchNamespace);
  await informers.start();

  // Graceful shutdown
  const shutdown = async () => {
    log.info('shutting down');
    await drain({ informers, detector, coalescer: evaluator.coalescer, healthServer });
    process.exit(0);
  };

  for (const signal of ['SIGTERM', 'SIGINT'] as const) {
    process.on(signal, () => {
      shutdown().catch((err: unknown) => {
        log.error({ err }, 'shutdown failed');
        process.exit(1);
      });
    });
  }
}

main().catch((err) => {
  log.fatal({ err }, 'controller failed to start');
  process.exit(1);
});
