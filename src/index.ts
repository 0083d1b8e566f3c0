export { run } from './cli.js';
export { buildConfig, loadConfig, parseListenAddress, type ServerConfig } from './config.js';
export { createServer } from './createServer.js';
export { MetricsServer, waitForShutdownSignal, type LifecycleState } from './lifecycle.js';
export { buildMetricsPipeline } from './pipeline.js';
export { createGenerator, drawCount, generateMetrics } from './metrics/generator.js';
export { MetricEnvelopeSchema, MetricsResponseSchema } from './metrics/schema.js';
export { serializeMetrics, type MetricEnvelope, type MetricKind } from './metrics/types.js';
export { parseBasicAuth, requireBasicAuthToken } from './middleware/auth.js';
export { injectRandomErrors } from './middleware/fault-injection.js';
export { ConfigError, ListenError, TlsLoadError, StartupError } from './errors.js';
export type { RandomSource, Clock } from './random.js';
