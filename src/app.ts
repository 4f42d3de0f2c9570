/**
 * Application wiring
 *
 * Builds the registry, adapters, ladder, store and orchestrator from a
 * validated configuration. Every collaborator can be overridden, which is
 * how tests and embedders swap in fakes.
 */

import { CloudAdapter } from './backends/cloud.js';
import { createCloudModel, createLocalModel } from './backends/llm-provider.js';
import { AiSdkLocalRuntime } from './backends/local-runtime.js';
import { OnDeviceAdapter } from './backends/on-device.js';
import type { BackendAdapter } from './backends/types.js';
import type { Config } from './config.js';
import { FileConversationLog, type ConversationLog } from './conversation/persistence.js';
import { ConversationStore } from './conversation/store.js';
import { StructuredLogger } from './observability/logger.js';
import { createMetricsCollector, type MetricsCollector } from './observability/metrics.js';
import { DEFAULT_LADDER, loadLadderFile, type CapabilityTier } from './orchestrator/degradation.js';
import { Orchestrator, type OrchestratorEvent } from './orchestrator/orchestrator.js';
import { TaskRefiner } from './orchestrator/refiner.js';
import { InMemoryCalendarClient } from './services/calendar.js';
import { systemClock } from './services/clock.js';
import { InMemoryHealthSummaryProvider } from './services/health.js';
import { InMemoryScratchpadStore } from './services/scratchpad.js';
import { InMemoryTaskStore } from './services/tasks.js';
import { registerBuiltinTools, type ToolDependencies } from './tools/builtin/index.js';
import { ToolRegistry } from './tools/registry.js';

// =============================================================================
// Types
// =============================================================================

export interface FocusAppOptions {
  config: Config;
  services?: Partial<ToolDependencies> | undefined;
  adapters?: readonly BackendAdapter[] | undefined;
  ladder?: readonly CapabilityTier[] | undefined;
  log?: ConversationLog | undefined;
  logger?: StructuredLogger | undefined;
  metrics?: MetricsCollector | undefined;
  onEvent?: ((event: OrchestratorEvent) => void) | undefined;
}

export interface FocusApp {
  config: Config;
  orchestrator: Orchestrator;
  refiner: TaskRefiner;
  store: ConversationStore;
  registry: ToolRegistry;
  services: ToolDependencies;
  metrics: MetricsCollector;
  logger: StructuredLogger;
}

// =============================================================================
// Factories
// =============================================================================

/**
 * In-memory collaborators, overridden by whatever the caller supplies
 */
export function createDefaultServices(overrides: Partial<ToolDependencies> = {}): ToolDependencies {
  const clock = overrides.clock ?? systemClock;
  return {
    clock,
    tasks: overrides.tasks ?? new InMemoryTaskStore({ clock }),
    calendar: overrides.calendar ?? new InMemoryCalendarClient(),
    scratchpad: overrides.scratchpad ?? new InMemoryScratchpadStore(),
    health: overrides.health ?? new InMemoryHealthSummaryProvider(),
    dateTime: overrides.dateTime,
  };
}

/**
 * Cloud and on-device adapters from configuration
 *
 * @throws ConfigurationError when the cloud provider lacks credentials
 */
export async function createDefaultAdapters(config: Config, logger: StructuredLogger): Promise<BackendAdapter[]> {
  const cloud = new CloudAdapter({
    model: await createCloudModel(config.cloud),
    timeoutMs: config.cloud.timeoutMs,
    complexTimeoutMs: config.cloud.complexTimeoutMs,
    reasoningModel: config.cloud.reasoningModel,
    maxAttempts: config.cloud.maxAttempts,
    retryDelayMs: config.cloud.retryDelayMs,
    logger: logger.child('backend.cloud'),
  });

  const onDevice = new OnDeviceAdapter({
    runtime: new AiSdkLocalRuntime(createLocalModel(config.onDevice)),
    timeoutMs: config.onDevice.timeoutMs,
    complexTimeoutMs: config.onDevice.complexTimeoutMs,
    maxAttempts: config.onDevice.maxAttempts,
    retryDelayMs: config.onDevice.retryDelayMs,
    logger: logger.child('backend.on-device'),
  });

  return [cloud, onDevice];
}

/**
 * Wire the application and load the persisted conversation.
 *
 * @throws ConfigurationError on an invalid ladder or tool set
 * @throws PersistenceError when the history file cannot be read
 */
export async function createFocusApp(options: FocusAppOptions): Promise<FocusApp> {
  const { config } = options;
  const logger = options.logger ?? new StructuredLogger({ name: 'focus', minLevel: config.logLevel });
  const metrics = options.metrics ?? createMetricsCollector();

  const services = createDefaultServices(options.services);
  const registry = new ToolRegistry();
  registerBuiltinTools(registry, services);

  const adapters = options.adapters ?? (await createDefaultAdapters(config, logger));
  const ladder = options.ladder ?? (config.ladderFile ? await loadLadderFile(config.ladderFile) : DEFAULT_LADDER);

  const store = new ConversationStore({
    systemPrompt: config.systemPrompt,
    log: options.log ?? new FileConversationLog(config.historyFile),
    logger: logger.child('conversation'),
  });

  const orchestrator = new Orchestrator({
    store,
    registry,
    adapters,
    ladder,
    maxRecent: config.maxRecent,
    maxToolRounds: config.maxToolRounds,
    toolTimeoutMs: config.toolTimeoutMs,
    logger: logger.child('orchestrator'),
    metrics,
    onEvent: options.onEvent,
  });

  const refiner = new TaskRefiner({
    tasks: services.tasks,
    registry,
    adapters,
    toolTimeoutMs: config.toolTimeoutMs,
    logger: logger.child('refiner'),
    metrics,
  });

  await store.load();
  logger.info('Application ready', {
    tools: registry.size(),
    tiers: orchestrator.getLadder().map((tier) => tier.label),
  });

  return { config, orchestrator, refiner, store, registry, services, metrics, logger };
}
