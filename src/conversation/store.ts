/**
 * Conversation Store
 *
 * Ordered, append-only message log for one chat session. Owns the request
 * window (truncation) and hands committed turns to the persistence log.
 * Only the orchestrator writes to it.
 */

import { createSilentLogger, type StructuredLogger } from '../observability/logger.js';
import { InMemoryConversationLog, type ConversationLog } from './persistence.js';
import { systemMessage, type Message } from './message.js';
import { repairPairing } from './pairing.js';
import { truncateWindow } from './truncation.js';

export interface ConversationStoreOptions {
  /** Content of the leading system message for new or cleared conversations */
  systemPrompt: string;
  log?: ConversationLog | undefined;
  logger?: StructuredLogger | undefined;
}

export class ConversationStore {
  private readonly systemPrompt: string;
  private readonly log: ConversationLog;
  private readonly logger: StructuredLogger;
  private messages: Message[];

  constructor(options: ConversationStoreOptions) {
    this.systemPrompt = options.systemPrompt;
    this.log = options.log ?? new InMemoryConversationLog();
    this.logger = options.logger ?? createSilentLogger();
    this.messages = [systemMessage(this.systemPrompt)];
  }

  /**
   * Reload the persisted log.
   *
   * A log that breaks tool-call pairing (the app was stopped mid-turn, or the
   * file was edited) is repaired by dropping the unpaired messages, and the
   * repaired history is written back. A log without a leading system message
   * gets the configured one.
   */
  async load(): Promise<void> {
    const persisted = await this.log.load();

    if (persisted.length === 0) {
      this.messages = [systemMessage(this.systemPrompt)];
      await this.log.rewrite(this.messages);
      return;
    }

    const { messages, dropped } = repairPairing(persisted);
    const needsSystem = messages[0]?.role !== 'system';
    this.messages = needsSystem ? [systemMessage(this.systemPrompt), ...messages] : messages;

    if (dropped > 0 || needsSystem) {
      this.logger.warning('Repaired persisted conversation', {
        dropped,
        addedSystemMessage: needsSystem,
        remaining: this.messages.length,
      });
      await this.log.rewrite(this.messages);
    }

    this.logger.info('Conversation loaded', { messages: this.messages.length });
  }

  /**
   * Append one message in memory. No validation beyond the type's shape.
   */
  append(message: Message): void {
    this.messages.push(message);
  }

  /**
   * Persist a completed turn, then append it. A failed write leaves the
   * in-memory history unchanged.
   */
  async commit(messages: readonly Message[]): Promise<void> {
    await this.log.append(messages);
    this.messages.push(...messages);
  }

  /**
   * Window to send to a backend: committed history followed by the
   * uncommitted messages of the turn in progress, truncated.
   */
  window(maxRecent: number, pending: readonly Message[] = []): Message[] {
    return truncateWindow([...this.messages, ...pending], maxRecent);
  }

  fullHistory(): readonly Message[] {
    return [...this.messages];
  }

  size(): number {
    return this.messages.length;
  }

  /**
   * Clear history back to the single system message.
   */
  async reset(): Promise<void> {
    this.messages = [systemMessage(this.systemPrompt)];
    await this.log.rewrite(this.messages);
    this.logger.info('Conversation cleared');
  }
}
