import { createHash } from 'node:crypto';
import type * as k8s from '@kubernetes/client-node';

/**
 * SHA-1 hex over `key=value` entries in sorted-key order, separated by `;`.
 * Buffer values are hashed as raw bytes. Key order in the input never changes the result.
 */
export function contentHash(values: Record<string, string | Buffer>): string {
  const hash = createHash('sha1');
  const entries = Object.entries(values).sort(([a], [b]) => (a < b ? -1 : a > b ? 1 : 0));
  entries.forEach(([key, value], i) => {
    if (i > 0) hash.update(';');
    hash.update(`${key}=`);
    hash.update(value);
  });
  return hash.digest('hex');
}

/** `data` as-is, `binaryData` as its base64 text. */
export function configMapHash(configMap: k8s.V1ConfigMap): string {
  return contentHash({ ...(configMap.data ?? {}), ...(configMap.binaryData ?? {}) });
}

/** Hashes the decoded bytes, so re-encoding the same data never looks like a change. */
export function secretHash(secret: k8s.V1Secret): string {
  const decoded: Record<string, Buffer> = {};
  for (const [key, value] of Object.entries(secret.data ?? {})) {
    decoded[key] = Buffer.from(value, 'base64');
  }
  return contentHash(decoded);
}
