/**
 * Focus Orchestrator - public exports
 */

// Application
export {
  createFocusApp,
  createDefaultAdapters,
  createDefaultServices,
  type FocusApp,
  type FocusAppOptions,
} from './app.js';

// Configuration
export * from './config.js';

// Errors
export * from './errors.js';

// Conversation
export * from './conversation/message.js';
export * from './conversation/pairing.js';
export * from './conversation/truncation.js';
export * from './conversation/persistence.js';
export * from './conversation/store.js';

// Tools
export * from './tools/registry.js';
export * from './tools/executor.js';
export * from './tools/builtin/index.js';

// Backends
export * from './backends/types.js';
export * from './backends/complexity.js';
export * from './backends/retry.js';
export * from './backends/cloud.js';
export * from './backends/on-device.js';
export * from './backends/local-runtime.js';
export * from './backends/llm-provider.js';

// Orchestration
export * from './orchestrator/degradation.js';
export * from './orchestrator/orchestrator.js';
export * from './orchestrator/refiner.js';

// Services
export * from './services/clock.js';
export * from './services/tasks.js';
export * from './services/calendar.js';
export * from './services/scratchpad.js';
export * from './services/health.js';

// Observability
export { LOG_LEVEL_PRIORITY, LogLevelSchema, parseLogLevel } from './logging/levels.js';
export * from './observability/logger.js';
export * from './observability/metrics.js';
export * from './observability/tracing.js';
