/**
 * Tool call pairing tests
 */

import { describe, it, expect } from 'vitest';
import { findPairingViolations, findToolCallOwner, repairPairing } from '../../../src/conversation/pairing.js';
import {
  assistantText,
  assistantToolCalls,
  systemMessage,
  toolMessage,
  userMessage,
  type Message,
  type ToolCallRequest,
} from '../../../src/conversation/message.js';

const callA: ToolCallRequest = { id: 'call_a', name: 'getTasks', argumentsJSON: '{}' };
const callB: ToolCallRequest = { id: 'call_b', name: 'getScratchpad', argumentsJSON: '{}' };

describe('findToolCallOwner', () => {
  it('finds the assistant message that issued the call', () => {
    const messages: Message[] = [userMessage('hi'), assistantToolCalls([callA]), toolMessage(callA, 'ok')];
    expect(findToolCallOwner(messages, 2)).toBe(1);
  });

  it('returns -1 for non-tool messages and orphans', () => {
    const messages: Message[] = [userMessage('hi'), toolMessage(callA, 'ok')];
    expect(findToolCallOwner(messages, 0)).toBe(-1);
    expect(findToolCallOwner(messages, 1)).toBe(-1);
    expect(findToolCallOwner(messages, 5)).toBe(-1);
  });
});

describe('findPairingViolations', () => {
  it('reports nothing for a well-formed conversation', () => {
    const messages: Message[] = [
      systemMessage('sys'),
      userMessage('hi'),
      assistantToolCalls([callA, callB]),
      toolMessage(callA, 'a'),
      toolMessage(callB, 'b'),
      assistantText('done'),
    ];
    expect(findPairingViolations(messages)).toEqual([]);
  });

  it('reports orphaned tool messages', () => {
    const messages: Message[] = [systemMessage('sys'), toolMessage(callA, 'a')];
    expect(findPairingViolations(messages)).toEqual([{ index: 1, toolCallId: 'call_a', owners: 0 }]);
  });

  it('reports ids claimed by more than one assistant message', () => {
    const messages: Message[] = [assistantToolCalls([callA]), assistantToolCalls([callA]), toolMessage(callA, 'a')];
    expect(findPairingViolations(messages)).toEqual([{ index: 2, toolCallId: 'call_a', owners: 2 }]);
  });
});

describe('repairPairing', () => {
  it('leaves a well-formed log alone', () => {
    const messages: Message[] = [
      systemMessage('sys'),
      userMessage('hi'),
      assistantToolCalls([callA]),
      toolMessage(callA, 'a'),
      assistantText('done'),
    ];
    const result = repairPairing(messages);
    expect(result.dropped).toBe(0);
    expect(result.messages).toEqual(messages);
  });

  it('drops orphaned tool messages', () => {
    const messages: Message[] = [systemMessage('sys'), toolMessage(callA, 'a'), userMessage('hi')];
    const result = repairPairing(messages);
    expect(result.dropped).toBe(1);
    expect(result.messages.map((m) => m.role)).toEqual(['system', 'user']);
  });

  it('drops duplicate responses to the same call', () => {
    const messages: Message[] = [assistantToolCalls([callA]), toolMessage(callA, 'first'), toolMessage(callA, 'second')];
    const result = repairPairing(messages);
    expect(result.dropped).toBe(1);
    expect(result.messages.map((m) => m.content)).toEqual([null, 'first']);
  });

  it('drops an interrupted tool round together with its partial responses', () => {
    const messages: Message[] = [
      systemMessage('sys'),
      userMessage('hi'),
      assistantToolCalls([callA, callB]),
      toolMessage(callA, 'a'),
    ];
    const result = repairPairing(messages);
    expect(result.dropped).toBe(2);
    expect(result.messages.map((m) => m.role)).toEqual(['system', 'user']);
  });
});
