import { describe, it, expect } from 'vitest';
import { createLogger } from '@kasbook/observability';
import { LedgerRegistry } from '../ledger-registry.js';

describe('LedgerRegistry', () => {
  it('should return the same ledger for the same session', () => {
    const registry = new LedgerRegistry({ maxSessions: 5 });

    const first = registry.resolve('session-a');
    first.add({ date: '2024-01-01', description: '', amount: 10, category: 'Food', type: 'Expense' });

    expect(registry.resolve('session-a')).toBe(first);
    expect(registry.resolve('session-a').size).toBe(1);
  });

  it('should create separate ledgers per session', () => {
    const registry = new LedgerRegistry({ maxSessions: 5 });

    expect(registry.resolve('session-a')).not.toBe(registry.resolve('session-b'));
    expect(registry.size).toBe(2);
  });

  it('should evict the least recently used session when full', () => {
    const logs: string[] = [];
    const logger = createLogger({ level: 'info' }, { write: (log: string) => { logs.push(log); } });
    const registry = new LedgerRegistry({ maxSessions: 2, logger });

    registry.resolve('session-a');
    registry.resolve('session-b');
    registry.resolve('session-a'); // a is now most recent
    registry.resolve('session-c');

    expect(registry.has('session-a')).toBe(true);
    expect(registry.has('session-b')).toBe(false);
    expect(registry.has('session-c')).toBe(true);
    expect(logs).toHaveLength(1);
    expect(JSON.parse(logs[0] ?? '{}')).toMatchObject({
      session: '****on-b',
      msg: 'Evicted least recently used ledger session',
    });
  });

  it('should reject a non-positive session cap', () => {
    expect(() => new LedgerRegistry({ maxSessions: 0 })).toThrow(
      'maxSessions must be a positive integer, got 0'
    );
  });
});
