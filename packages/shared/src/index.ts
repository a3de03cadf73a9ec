export { logger, preview, type Logger } from './logger.js';
export * from './errors.js';
export * from './model-types.js';
export { ModelRouter } from './model-router.js';
export { loadModelConfig, createDefaultConfig } from './model-config.js';
export { activeTraceId, withSpan, type SpanAttributes } from './tracing.js';
export { CircuitBreaker, type CircuitBreakerOptions, type CircuitState, type CircuitSnapshot } from './circuit-breaker.js';
export { features, createFeatures, toEnvKey, type Features, type FeatureFlag, type ParleyMode } from './features.js';
export { withTimeout, sleep } from './timeout.js';
export { KeyedMutex } from './keyed-mutex.js';
