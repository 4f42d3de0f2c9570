import { describe, it, expect } from 'vitest';
import { isComplexRequest, isComplexText, selectTimeout } from '../../../src/backends/complexity.js';
import { assistantText, systemMessage, userMessage } from '../../../src/conversation/message.js';

describe('isComplexText', () => {
  it('flags keyword matches case-insensitively', () => {
    expect(isComplexText('HOW do I start?')).toBe(true);
    expect(isComplexText('give me ideas')).toBe(true);
  });

  it('matches keywords inside longer words', () => {
    expect(isComplexText('show my list')).toBe(true);
  });

  it('flags messages over 100 characters', () => {
    expect(isComplexText('a'.repeat(100))).toBe(false);
    expect(isComplexText('a'.repeat(101))).toBe(true);
  });

  it('leaves short plain messages simple', () => {
    expect(isComplexText('add milk')).toBe(false);
  });
});

describe('isComplexRequest', () => {
  it('looks at the latest user message only', () => {
    const window = [systemMessage('how to build tools'), userMessage('help me create a plan'), assistantText('ok'), userMessage('add milk')];
    expect(isComplexRequest(window)).toBe(false);
  });

  it('treats a window without user messages as simple', () => {
    expect(isComplexRequest([systemMessage('create ideas')])).toBe(false);
  });
});

describe('selectTimeout', () => {
  const policy = { timeoutMs: 30000, complexTimeoutMs: 300000 };

  it('uses the base timeout for simple requests', () => {
    expect(selectTimeout([userMessage('add milk')], policy)).toBe(30000);
  });

  it('extends the timeout for complex requests', () => {
    expect(selectTimeout([userMessage('how should I plan my week?')], policy)).toBe(300000);
  });

  it('always extends for reasoning models', () => {
    expect(selectTimeout([userMessage('add milk')], { ...policy, reasoningModel: true })).toBe(300000);
  });
});
