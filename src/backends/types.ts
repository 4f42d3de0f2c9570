/**
 * Backend Adapter contract
 *
 * One uniform surface over structurally different model backends. An
 * adapter never throws: every error is classified into a failure outcome.
 */

import type { Message, ToolCallRequest } from '../conversation/message.js';
import type { BackendFailureKind } from '../errors.js';
import type { ToolDefinition } from '../tools/registry.js';

// =============================================================================
// Outcomes
// =============================================================================

export interface TextOutcome {
  kind: 'text';
  text: string;
}

export interface ToolCallsOutcome {
  kind: 'tool_calls';
  /** Non-empty, in the order the model requested them */
  toolCalls: ToolCallRequest[];
  /** Text the model sent alongside the calls, if any */
  text: string | null;
}

export interface FailureOutcome {
  kind: 'failure';
  failure: BackendFailureKind;
  message: string;
}

export type BackendOutcome = TextOutcome | ToolCallsOutcome | FailureOutcome;

export function textOutcome(text: string): TextOutcome {
  return { kind: 'text', text };
}

export function toolCallsOutcome(toolCalls: ToolCallRequest[], text: string | null = null): ToolCallsOutcome {
  return { kind: 'tool_calls', toolCalls, text };
}

export function failureOutcome(failure: BackendFailureKind, message: string): FailureOutcome {
  return { kind: 'failure', failure, message };
}

// =============================================================================
// Adapter
// =============================================================================

export interface SendRequest {
  /** Truncated window, leading system message first */
  window: readonly Message[];
  /** Tools offered at this tier; empty means a text-only request */
  tools: readonly ToolDefinition[];
  /** Label of the tier being tried, for logs */
  tierLabel?: string | undefined;
  /** Aborts the in-flight call on cancellation */
  signal?: AbortSignal | undefined;
}

export interface BackendAdapter {
  /** Matches `backendId` in capability tiers */
  readonly id: string;
  send(request: SendRequest): Promise<BackendOutcome>;
}
