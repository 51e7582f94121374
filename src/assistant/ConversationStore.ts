import type { ConversationRecord } from './types.js';
import { createLogger } from '../logger/index.js';

export interface ConversationStoreOptions {
  ttlSeconds: number;
  maxActive: number;
}

/**
 * Assistant conversations known to this process, most recently used first on lookup
 */
export class ConversationStore {
  private conversations: Map<string, ConversationRecord> = new Map();

  private logger = createLogger('ConversationStore');

  constructor(private options: ConversationStoreOptions) {}

  add(id: string): ConversationRecord {
    const now = Date.now();
    const record: ConversationRecord = { id, createdAt: now, lastUsed: now, messagesCount: 0 };
    this.conversations.set(id, record);
    return record;
  }

  /**
   * Record a message sent in a conversation, adopting ids created elsewhere
   */
  markUsed(id: string): ConversationRecord {
    const record = this.conversations.get(id) ?? this.add(id);
    record.lastUsed = Date.now();
    record.messagesCount++;
    return record;
  }

  get(id: string): ConversationRecord | undefined {
    return this.conversations.get(id);
  }

  /**
   * Drop conversations idle longer than the TTL
   */
  sweepExpired(): number {
    const cutoff = Date.now() - this.options.ttlSeconds * 1000;
    let removed = 0;
    for (const [id, record] of this.conversations) {
      if (record.lastUsed < cutoff) {
        this.conversations.delete(id);
        removed++;
        this.logger.info({ conversationId: id }, 'Expired assistant conversation removed');
      }
    }
    return removed;
  }

  get isFull(): boolean {
    return this.conversations.size >= this.options.maxActive;
  }

  evictLeastRecentlyUsed(): string | undefined {
    const oldest = this.pick((candidate, current) => candidate.lastUsed < current.lastUsed);
    if (oldest) {
      this.conversations.delete(oldest.id);
      this.logger.info({ conversationId: oldest.id }, 'Least recently used assistant conversation evicted');
    }
    return oldest?.id;
  }

  mostRecentlyUsed(): ConversationRecord | undefined {
    return this.pick((candidate, current) => candidate.lastUsed > current.lastUsed);
  }

  get size(): number {
    return this.conversations.size;
  }

  clear(): void {
    this.conversations.clear();
  }

  private pick(
    better: (candidate: ConversationRecord, current: ConversationRecord) => boolean
  ): ConversationRecord | undefined {
    let chosen: ConversationRecord | undefined;
    for (const record of this.conversations.values()) {
      if (!chosen || better(record, chosen)) {
        chosen = record;
      }
    }
    return chosen;
  }
}
