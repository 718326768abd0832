import type { WorkloadKind } from './adapters/types.js';

/** A workload update was rejected by the API server. The API error is kept as `cause`. */
export class UpdateError extends Error {
  readonly kind: WorkloadKind;
  readonly namespace: string;
  readonly workload: string;

  constructor(kind: WorkloadKind, namespace: string, workload: string, cause: unknown) {
    const detail = cause instanceof Error ? cause.message : String(cause);
    super(`update of ${kind} '${workload}' in namespace '${namespace}' failed: ${detail}`, { cause });
    this.name = 'UpdateError';
    this.kind = kind;
    this.namespace = namespace;
    this.workload = workload;
  }
}
