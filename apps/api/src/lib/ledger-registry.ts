import { Ledger } from '@kasbook/core';
import { maskSessionId, type Logger } from '@kasbook/observability';

export interface LedgerRegistryOptions {
  maxSessions: number;
  logger?: Logger;
}

/**
 * One Ledger per session, held in memory
 *
 * Ledgers are not safe to share between callers, so every session gets its
 * own instance. When the cap is reached the least recently used session is
 * dropped. Nothing survives a restart.
 */
export class LedgerRegistry {
  // Map iteration order doubles as recency order: oldest first
  private ledgers = new Map<string, Ledger>();
  private readonly maxSessions: number;
  private readonly logger: Logger | undefined;

  constructor(options: LedgerRegistryOptions) {
    if (!Number.isInteger(options.maxSessions) || options.maxSessions < 1) {
      throw new Error(`maxSessions must be a positive integer, got ${options.maxSessions}`);
    }
    this.maxSessions = options.maxSessions;
    this.logger = options.logger;
  }

  get size(): number {
    return this.ledgers.size;
  }

  has(sessionId: string): boolean {
    return this.ledgers.has(sessionId);
  }

  /**
   * Get the session's ledger, creating an empty one on first use
   */
  resolve(sessionId: string): Ledger {
    const existing = this.ledgers.get(sessionId);
    if (existing) {
      this.ledgers.delete(sessionId);
      this.ledgers.set(sessionId, existing);
      return existing;
    }

    const ledger = new Ledger();
    this.ledgers.set(sessionId, ledger);
    this.evictOverflow();
    return ledger;
  }

  private evictOverflow(): void {
    for (const sessionId of this.ledgers.keys()) {
      if (this.ledgers.size <= this.maxSessions) return;
      this.ledgers.delete(sessionId);
      this.logger?.info({ session: maskSessionId(sessionId) }, 'Evicted least recently used ledger session');
    }
  }
}
