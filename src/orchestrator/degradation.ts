/**
 * Degradation Controller
 *
 * Walks an ordered ladder of capability tiers, one walk per turn. Transport
 * retries belong to the adapters; this only decides which tier comes next
 * after an adapter has given up.
 */

import { readFile } from 'node:fs/promises';
import { z } from 'zod';
import { ConfigurationError, errorMessage, type BackendFailureKind } from '../errors.js';
import { createSilentLogger, type StructuredLogger } from '../observability/logger.js';
import type { MetricsCollector } from '../observability/metrics.js';
import { TOOL_SUBSETS } from '../tools/builtin/index.js';
import { ToolNameSchema, type ToolRegistry, type ToolSubset } from '../tools/registry.js';

// =============================================================================
// Types
// =============================================================================

export interface CapabilityTier {
  /** Id of the backend adapter serving this tier */
  readonly backendId: string;
  /** Tools offered at this tier; an empty list is text-only */
  readonly toolSubset: ToolSubset;
  readonly label: string;
}

export const CapabilityTierSchema = z.object({
  backendId: z.string().min(1),
  toolSubset: z.union([z.literal('all'), z.array(ToolNameSchema)]),
  label: z.string().min(1),
});

export const LadderSchema = z.array(CapabilityTierSchema).min(1, 'Ladder must have at least one tier');

/**
 * cloud-full → on-device-full → on-device-essential → on-device-minimal → text-only
 */
export const DEFAULT_LADDER: readonly CapabilityTier[] = [
  { backendId: 'cloud', toolSubset: 'all', label: 'cloud-full' },
  { backendId: 'on-device', toolSubset: TOOL_SUBSETS.onDeviceFull, label: 'on-device-full' },
  { backendId: 'on-device', toolSubset: TOOL_SUBSETS.essential, label: 'on-device-essential' },
  { backendId: 'on-device', toolSubset: TOOL_SUBSETS.minimal, label: 'on-device-minimal' },
  { backendId: 'on-device', toolSubset: [], label: 'text-only' },
];

export function isTextOnly(tier: CapabilityTier): boolean {
  return tier.toolSubset !== 'all' && tier.toolSubset.length === 0;
}

// =============================================================================
// Validation and Loading
// =============================================================================

export interface LadderValidationContext {
  registry: ToolRegistry;
  /** Ids of the adapters available to serve tiers */
  backendIds: Iterable<string>;
}

/**
 * Check a ladder against the registered tools and adapters.
 *
 * @throws ConfigurationError on an empty ladder, a last tier that offers
 * tools, duplicate labels, a tier without an adapter or an unregistered tool
 */
export function validateLadder(ladder: readonly CapabilityTier[], context: LadderValidationContext): void {
  const last = ladder[ladder.length - 1];
  if (!last) {
    throw new ConfigurationError('Ladder must have at least one tier');
  }
  if (!isTextOnly(last)) {
    throw new ConfigurationError(`Last tier must be text-only, got '${last.label}'`);
  }

  const backendIds = new Set(context.backendIds);
  const labels = new Set<string>();

  for (const tier of ladder) {
    if (labels.has(tier.label)) {
      throw new ConfigurationError(`Duplicate tier label: ${tier.label}`);
    }
    labels.add(tier.label);

    if (!backendIds.has(tier.backendId)) {
      throw new ConfigurationError(`No backend adapter for tier '${tier.label}': ${tier.backendId}`);
    }

    // Throws ConfigurationError naming the unknown tools
    context.registry.resolveSubset(tier.toolSubset);
  }
}

/**
 * Read a ladder from a JSON file: an array of
 * `{ backendId, toolSubset: "all" | string[], label }`.
 */
export async function loadLadderFile(path: string): Promise<CapabilityTier[]> {
  let raw: unknown;
  try {
    raw = JSON.parse(await readFile(path, 'utf8'));
  } catch (error) {
    throw new ConfigurationError(`Cannot read ladder file ${path}: ${errorMessage(error)}`, { path });
  }

  const result = LadderSchema.safeParse(raw);
  if (!result.success) {
    const issues = result.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`);
    throw new ConfigurationError(`Invalid ladder file ${path}: ${issues.join('; ')}`, { path, issues });
  }
  return result.data;
}

// =============================================================================
// DegradationController
// =============================================================================

export interface DegradationControllerOptions {
  logger?: StructuredLogger | undefined;
  metrics?: MetricsCollector | undefined;
}

export class DegradationController {
  private readonly ladder: readonly CapabilityTier[];
  private readonly logger: StructuredLogger;
  private readonly metrics: MetricsCollector | undefined;
  private index = 0;

  /**
   * @throws ConfigurationError on an empty ladder
   */
  constructor(ladder: readonly CapabilityTier[] = DEFAULT_LADDER, options: DegradationControllerOptions = {}) {
    if (ladder.length === 0) {
      throw new ConfigurationError('Ladder must have at least one tier');
    }
    this.ladder = [...ladder];
    this.logger = options.logger ?? createSilentLogger();
    this.metrics = options.metrics;
  }

  getLadder(): readonly CapabilityTier[] {
    return this.ladder;
  }

  /**
   * Start a turn's walk at the top tier
   */
  begin(): CapabilityTier {
    this.index = 0;
    return this.current();
  }

  current(): CapabilityTier {
    const tier = this.ladder[this.index];
    if (!tier) {
      throw new ConfigurationError('Ladder walk is past its last tier');
    }
    return tier;
  }

  /**
   * Tiers tried so far in this walk, including the current one
   */
  attempts(): number {
    return this.index + 1;
  }

  /**
   * Move to the next tier after the current one failed.
   *
   * @returns the next tier, or null when the ladder is exhausted
   */
  advance(reason: BackendFailureKind): CapabilityTier | null {
    const from = this.current();
    this.metrics?.recordDegradation(from.label, reason);

    const next = this.ladder[this.index + 1];
    if (!next) {
      this.logger.error('All tiers exhausted', { lastTier: from.label, reason, attempts: this.attempts() });
      return null;
    }

    this.index++;
    this.logger.warning('Degrading to next tier', { from: from.label, to: next.label, reason });
    return next;
  }
}
