/**
 * Tool call / tool response pairing
 *
 * Backends reject a tool message whose originating call is not in the same
 * request, so both truncation and log loading lean on these helpers.
 */

import { isToolMessage, requestsTools, type Message } from './message.js';

export interface PairingViolation {
  /** Index of the offending tool message */
  index: number;
  toolCallId: string;
  /** How many preceding assistant messages claim the id (0 or more than 1) */
  owners: number;
}

export interface RepairResult {
  messages: Message[];
  /** Number of messages removed */
  dropped: number;
}

/**
 * Index of the nearest assistant message before `index` whose tool calls
 * include the tool message's id, or -1.
 */
export function findToolCallOwner(messages: readonly Message[], index: number): number {
  const message = messages[index];
  if (!message || !isToolMessage(message)) {
    return -1;
  }

  for (let i = index - 1; i >= 0; i--) {
    const candidate = messages[i];
    if (candidate && requestsTools(candidate) && candidate.toolCalls.some((c) => c.id === message.toolCallId)) {
      return i;
    }
  }
  return -1;
}

/**
 * List tool messages that do not have exactly one preceding assistant
 * message carrying their id.
 */
export function findPairingViolations(messages: readonly Message[]): PairingViolation[] {
  const violations: PairingViolation[] = [];

  messages.forEach((message, index) => {
    if (!isToolMessage(message)) {
      return;
    }
    let owners = 0;
    for (let i = 0; i < index; i++) {
      const candidate = messages[i];
      if (candidate && requestsTools(candidate) && candidate.toolCalls.some((c) => c.id === message.toolCallId)) {
        owners++;
      }
    }
    if (owners !== 1) {
      violations.push({ index, toolCallId: message.toolCallId, owners });
    }
  });

  return violations;
}

/**
 * Remove the messages that break pairing in a loaded log:
 * - tool messages with no owning assistant call
 * - repeated responses to an id that already has one
 * - assistant tool-call messages missing a response for any of their calls,
 *   together with the responses they did get (an interrupted turn)
 */
export function repairPairing(messages: readonly Message[]): RepairResult {
  const drop = new Set<number>();
  const owners = new Map<number, number>();
  const responded = new Map<number, Set<string>>();

  messages.forEach((message, index) => {
    if (!isToolMessage(message)) {
      return;
    }
    const owner = findToolCallOwner(messages, index);
    if (owner === -1) {
      drop.add(index);
      return;
    }
    const ids = responded.get(owner) ?? new Set<string>();
    if (ids.has(message.toolCallId)) {
      drop.add(index);
      return;
    }
    ids.add(message.toolCallId);
    responded.set(owner, ids);
    owners.set(index, owner);
  });

  messages.forEach((message, index) => {
    if (!requestsTools(message)) {
      return;
    }
    const ids = responded.get(index) ?? new Set<string>();
    if (message.toolCalls.every((call) => ids.has(call.id))) {
      return;
    }
    drop.add(index);
    for (const [toolIndex, owner] of owners) {
      if (owner === index) {
        drop.add(toolIndex);
      }
    }
  });

  return {
    messages: messages.filter((_, index) => !drop.has(index)),
    dropped: drop.size,
  };
}
