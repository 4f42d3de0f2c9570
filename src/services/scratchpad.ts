/**
 * Free-form notes the assistant can read and write
 */
export interface ScratchpadStore {
  get(): Promise<string>;
  set(content: string): Promise<void>;
}

export class InMemoryScratchpadStore implements ScratchpadStore {
  constructor(private content = '') {}

  async get(): Promise<string> {
    return this.content;
  }

  async set(content: string): Promise<void> {
    this.content = content;
  }
}
