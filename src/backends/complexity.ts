/**
 * Request complexity and adaptive timeouts
 */

import { latestUserText, type Message } from '../conversation/message.js';

/** Any of these in the latest user message marks the request complex */
export const COMPLEXITY_KEYWORDS = ['tools', 'build', 'ideas', 'how', 'create', 'develop'] as const;

/** Longer user messages are complex regardless of wording */
export const COMPLEX_LENGTH_THRESHOLD = 100;

export function isComplexText(text: string): boolean {
  const lowered = text.toLowerCase();
  return text.length > COMPLEX_LENGTH_THRESHOLD || COMPLEXITY_KEYWORDS.some((keyword) => lowered.includes(keyword));
}

/**
 * Classify by the latest user message in the window; a window without one
 * is simple.
 */
export function isComplexRequest(window: readonly Message[]): boolean {
  const text = latestUserText(window);
  return text !== undefined && isComplexText(text);
}

export interface TimeoutPolicy {
  timeoutMs: number;
  complexTimeoutMs: number;
  /** Reasoning models always get the extended timeout */
  reasoningModel?: boolean | undefined;
}

export function selectTimeout(window: readonly Message[], policy: TimeoutPolicy): number {
  if (policy.reasoningModel || isComplexRequest(window)) {
    return policy.complexTimeoutMs;
  }
  return policy.timeoutMs;
}
