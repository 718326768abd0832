import { logger } from '@rollwatch/shared';
import type { DelayedUpgradeCoalescer } from './coalescer.js';
import type { ChangeDetector, ConfigInformers } from './watcher.js';

const log = logger.child({ module: 'shutdown' });

export interface DrainTargets {
  informers: Pick<ConfigInformers, 'stop'>;
  detector: Pick<ChangeDetector, 'idle'>;
  coalescer: Pick<DelayedUpgradeCoalescer, 'shutdown' | 'idle'>;
  healthServer: { close(): void };
}

/**
 * Stop taking events, finish the changes already queued, drop delayed batches
 * that have not fired, and wait for the flushes already running.
 */
export async function drain(targets: DrainTargets): Promise<void> {
  await targets.informers.stop();
  await targets.detector.idle();
  targets.coalescer.shutdown();
  await targets.coalescer.idle();
  targets.healthServer.close();
  log.info('drained');
}
