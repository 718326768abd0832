import { logger } from '@rollwatch/shared';

const log = logger.child({ module: 'alerts' });

export type AlertSink = 'slack' | 'teams' | 'gchat' | 'raw';

export interface AlertConfig {
  webhookUrl: string;
  sink: AlertSink;
  additionalInfo?: string;
}

/** Request body for each sink's incoming-webhook format. */
export function alertPayload(sink: AlertSink, message: string): Record<string, string> {
  switch (sink) {
    case 'slack':
    case 'gchat':
      return { text: message };
    case 'teams':
      return { '@type': 'MessageCard', text: message };
    case 'raw':
      return { message };
  }
}

async function postJson(url: string, body: unknown): Promise<void> {
  const res = await fetch(url, {
    method: 'POST',
    headers: { 'Content-Type': 'application/json' },
    body: JSON.stringify(body),
  });
  if (!res.ok) {
    const text = await res.text();
    throw new Error(`webhook ${res.status}: ${text}`);
  }
}

/** Best effort: failures are logged, never thrown. */
export async function sendWebhookAlert(config: AlertConfig, message: string): Promise<void> {
  const text = config.additionalInfo ? `${message}\n${config.additionalInfo}` : message;
  try {
    await postJson(config.webhookUrl, alertPayload(config.sink, text));
    log.info({ sink: config.sink }, 'reload alert sent');
  } catch (err) {
    log.error({ err, sink: config.sink }, 'failed to send reload alert');
  }
}

export const UPGRADE_WEBHOOK_BODY = { webhook: 'update successful' } as const;

/**
 * Webhook mode: notify an external system of the change instead of rolling workloads.
 * Best effort, like alerts.
 */
export async function sendUpgradeWebhook(url: string, context: { resource: string; kind: string; namespace: string }): Promise<void> {
  log.info({ ...context, url }, 'change detected, sending upgrade webhook');
  try {
    await postJson(url, UPGRADE_WEBHOOK_BODY);
  } catch (err) {
    log.error({ err, ...context }, 'failed to send upgrade webhook');
  }
}
