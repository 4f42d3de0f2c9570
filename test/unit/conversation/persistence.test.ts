/**
 * Conversation log persistence tests
 */

import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { mkdtemp, readFile, rm, writeFile } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import {
  FileConversationLog,
  InMemoryConversationLog,
  decodeConversationLog,
} from '../../../src/conversation/persistence.js';
import { assistantText, assistantToolCalls, systemMessage, toolMessage, userMessage } from '../../../src/conversation/message.js';
import { PersistenceError } from '../../../src/errors.js';

describe('decodeConversationLog', () => {
  it('parses one message per line and skips blank lines', () => {
    const lines = [
      JSON.stringify(systemMessage('sys')),
      '',
      JSON.stringify(userMessage('hi')),
      '',
    ].join('\n');

    const messages = decodeConversationLog(lines);

    expect(messages.map((m) => m.role)).toEqual(['system', 'user']);
  });

  it('rejects a line that is not JSON', () => {
    expect(() => decodeConversationLog('{"role":')).toThrow('Conversation log line 1 is not JSON');
  });

  it('rejects a line that is not a message', () => {
    const content = `${JSON.stringify(userMessage('hi'))}\n{"role":"robot","content":"x"}\n`;
    expect(() => decodeConversationLog(content)).toThrow(PersistenceError);
    expect(() => decodeConversationLog(content)).toThrow('Conversation log line 2 is not a valid message');
  });

  it('rejects an assistant message with neither text nor tool calls', () => {
    const line = JSON.stringify({ role: 'assistant', content: null, timestamp: new Date().toISOString() });
    expect(() => decodeConversationLog(line)).toThrow(PersistenceError);
  });
});

describe('FileConversationLog', () => {
  let dir: string;

  beforeEach(async () => {
    dir = await mkdtemp(join(tmpdir(), 'focus-log-'));
  });

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  it('loads an empty history when the file does not exist', async () => {
    const log = new FileConversationLog(join(dir, 'missing.jsonl'));
    await expect(log.load()).resolves.toEqual([]);
  });

  it('appends messages as JSON lines, creating the directory', async () => {
    const path = join(dir, 'nested', 'history.jsonl');
    const log = new FileConversationLog(path);
    const call = { id: 'call_1', name: 'getTasks', argumentsJSON: '{}' };

    await log.append([systemMessage('sys'), userMessage('hi')]);
    await log.append([assistantToolCalls([call]), toolMessage(call, 'none'), assistantText('All clear.')]);

    const raw = await readFile(path, 'utf8');
    expect(raw.trim().split('\n')).toHaveLength(5);

    const loaded = await log.load();
    expect(loaded.map((m) => m.role)).toEqual(['system', 'user', 'assistant', 'tool', 'assistant']);
    expect(loaded[2]).toMatchObject({ toolCalls: [call] });
    expect(loaded[3]).toMatchObject({ toolCallId: 'call_1', name: 'getTasks', content: 'none' });
  });

  it('ignores an empty append', async () => {
    const path = join(dir, 'history.jsonl');
    const log = new FileConversationLog(path);
    await log.append([]);
    await expect(log.load()).resolves.toEqual([]);
  });

  it('rewrites the whole file', async () => {
    const path = join(dir, 'history.jsonl');
    const log = new FileConversationLog(path);
    await log.append([systemMessage('sys'), userMessage('one'), userMessage('two')]);

    await log.rewrite([systemMessage('fresh')]);

    const loaded = await log.load();
    expect(loaded).toHaveLength(1);
    expect(loaded[0]?.content).toBe('fresh');
  });

  it('surfaces a corrupt file as a PersistenceError', async () => {
    const path = join(dir, 'history.jsonl');
    await writeFile(path, 'not json\n', 'utf8');
    await expect(new FileConversationLog(path).load()).rejects.toBeInstanceOf(PersistenceError);
  });

  it('exposes its path', () => {
    expect(new FileConversationLog('/tmp/x.jsonl').getPath()).toBe('/tmp/x.jsonl');
  });
});

describe('InMemoryConversationLog', () => {
  it('starts from the initial messages and copies on load', async () => {
    const log = new InMemoryConversationLog([systemMessage('sys')]);
    const first = await log.load();
    first.push(userMessage('mutated'));

    await log.append([userMessage('hi')]);
    const loaded = await log.load();
    expect(loaded.map((m) => m.content)).toEqual(['sys', 'hi']);

    await log.rewrite([]);
    await expect(log.load()).resolves.toEqual([]);
  });
});
