/**
 * Conversation persistence
 *
 * The full, untruncated conversation is kept as an append-only JSON Lines
 * log: one message per line, appended after every committed turn and
 * rewritten only on reset or repair.
 */

import { appendFile, mkdir, readFile, rename, writeFile } from 'node:fs/promises';
import { dirname } from 'node:path';
import { PersistenceError, errorMessage } from '../errors.js';
import { MessageSchema, type Message } from './message.js';

export interface ConversationLog {
  /** Every persisted message, oldest first. Empty when nothing was saved yet. */
  load(): Promise<Message[]>;
  append(messages: readonly Message[]): Promise<void>;
  /** Replace the whole log */
  rewrite(messages: readonly Message[]): Promise<void>;
}

function encode(messages: readonly Message[]): string {
  return messages.map((m) => `${JSON.stringify(m)}\n`).join('');
}

/**
 * Parse JSON Lines content. Blank lines are skipped; anything else that is
 * not a valid message is a PersistenceError naming the line.
 */
export function decodeConversationLog(content: string): Message[] {
  const messages: Message[] = [];
  const lines = content.split('\n');

  lines.forEach((line, index) => {
    if (line.trim() === '') {
      return;
    }
    let raw: unknown;
    try {
      raw = JSON.parse(line);
    } catch (error) {
      throw new PersistenceError(`Conversation log line ${index + 1} is not JSON`, {
        line: index + 1,
        reason: errorMessage(error),
      });
    }
    const parsed = MessageSchema.safeParse(raw);
    if (!parsed.success) {
      throw new PersistenceError(`Conversation log line ${index + 1} is not a valid message`, {
        line: index + 1,
        issues: parsed.error.issues.map((issue) => issue.message),
      });
    }
    messages.push(parsed.data);
  });

  return messages;
}

/**
 * JSON Lines file log
 */
export class FileConversationLog implements ConversationLog {
  constructor(private readonly path: string) {}

  getPath(): string {
    return this.path;
  }

  async load(): Promise<Message[]> {
    let content: string;
    try {
      content = await readFile(this.path, 'utf8');
    } catch (error) {
      if (error instanceof Error && 'code' in error && error.code === 'ENOENT') {
        return [];
      }
      throw new PersistenceError(`Could not read conversation log ${this.path}`, {
        reason: errorMessage(error),
      });
    }
    return decodeConversationLog(content);
  }

  async append(messages: readonly Message[]): Promise<void> {
    if (messages.length === 0) {
      return;
    }
    try {
      await mkdir(dirname(this.path), { recursive: true });
      await appendFile(this.path, encode(messages), 'utf8');
    } catch (error) {
      throw new PersistenceError(`Could not append to conversation log ${this.path}`, {
        reason: errorMessage(error),
      });
    }
  }

  async rewrite(messages: readonly Message[]): Promise<void> {
    const tmp = `${this.path}.tmp`;
    try {
      await mkdir(dirname(this.path), { recursive: true });
      await writeFile(tmp, encode(messages), 'utf8');
      await rename(tmp, this.path);
    } catch (error) {
      throw new PersistenceError(`Could not rewrite conversation log ${this.path}`, {
        reason: errorMessage(error),
      });
    }
  }
}

/**
 * Log kept in memory; used when no history file is configured and in tests.
 */
export class InMemoryConversationLog implements ConversationLog {
  private lines: Message[] = [];

  constructor(initial: readonly Message[] = []) {
    this.lines = [...initial];
  }

  async load(): Promise<Message[]> {
    return [...this.lines];
  }

  async append(messages: readonly Message[]): Promise<void> {
    this.lines.push(...messages);
  }

  async rewrite(messages: readonly Message[]): Promise<void> {
    this.lines = [...messages];
  }
}
