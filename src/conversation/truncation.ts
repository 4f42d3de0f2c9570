/**
 * Request window truncation
 *
 * Bounds what is sent to a backend while keeping every tool response
 * together with the assistant message that requested it.
 */

import { isToolMessage, type Message } from './message.js';
import { findToolCallOwner } from './pairing.js';

/**
 * Build the window sent to a backend.
 *
 * The leading system message is always kept. The newest `maxRecent` messages
 * are collected; whenever a collected tool message's originating assistant
 * call lies before the window, the window is extended back to include it,
 * and the newly covered messages are checked the same way. Tool messages with
 * no originating call anywhere are left out.
 *
 * @returns `[system, ...window]` in chronological order
 */
export function truncateWindow(messages: readonly Message[], maxRecent: number): Message[] {
  const leading = messages[0];
  const system = leading?.role === 'system' ? leading : undefined;
  const body = system ? messages.slice(1) : messages.slice();

  let start = Math.max(0, body.length - Math.max(0, Math.floor(maxRecent)));

  // `start` only ever moves backward, so the scan keeps going over whatever
  // an extension pulls in
  for (let i = body.length - 1; i >= start; i--) {
    const owner = findToolCallOwner(body, i);
    if (owner !== -1 && owner < start) {
      start = owner;
    }
  }

  const window: Message[] = [];
  for (let i = start; i < body.length; i++) {
    const message = body[i];
    if (!message) {
      continue;
    }
    if (isToolMessage(message) && findToolCallOwner(body, i) === -1) {
      continue;
    }
    window.push(message);
  }

  return system ? [system, ...window] : window;
}
