export * from './types.js';
export { definePodTemplateAdapter, type PodTemplateAccess } from './pod-template.js';
export { deploymentAdapter, daemonSetAdapter, statefulSetAdapter } from './apps.js';
export { cronJobAdapter, jobFromCronJob } from './cronjob.js';
export { deploymentConfigAdapter, createRolloutAdapter, type DeploymentConfig, type Rollout } from './custom.js';
export { buildAdapterRegistry, type AdapterFlags } from './registry.js';
