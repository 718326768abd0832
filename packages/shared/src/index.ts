export * from './types.js';
export * from './annotations.js';
export { logger } from './logger.js';
export { getTracer, withSpan } from './tracing.js';
export {
  features,
  createFeatures,
  toEnvKey,
  type Features,
  type FeatureFlag,
  type RollwatchMode,
} from './features.js';
