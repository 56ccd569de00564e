import { StoreUnavailableError } from '../errors.js';
import type { KeyValueStore, KvCommand } from '../kv.js';

interface Entry {
  value: string | Set<string>;
  expiresAt?: number;
}

export interface InMemoryStoreOptions {
  /** Sweep interval for expired keys; 0 disables the sweeper. */
  sweepIntervalMs?: number;
  now?: () => number;
}

export interface InMemoryStore extends KeyValueStore {
  exec(commands: KvCommand[]): Promise<void>;
  /** Number of live keys, for tests and diagnostics. */
  size(): number;
}

/**
 * Process-local store with per-key expiry. Single-process only; used for
 * development (SESSION_STORE=memory) and as the in-process stand-in in tests.
 */
export function createInMemoryStore(options: InMemoryStoreOptions = {}): InMemoryStore {
  const data = new Map<string, Entry>();
  const now = options.now ?? Date.now;
  const sweepIntervalMs = options.sweepIntervalMs ?? 60_000;

  let sweeper: NodeJS.Timeout | undefined;
  if (sweepIntervalMs > 0) {
    sweeper = setInterval(() => {
      const t = now();
      for (const [key, entry] of data.entries()) {
        if (entry.expiresAt !== undefined && entry.expiresAt <= t) {
          data.delete(key);
        }
      }
    }, sweepIntervalMs);
    sweeper.unref();
  }

  function live(key: string): Entry | undefined {
    const entry = data.get(key);
    if (!entry) return undefined;
    if (entry.expiresAt !== undefined && entry.expiresAt <= now()) {
      data.delete(key);
      return undefined;
    }
    return entry;
  }

  function setOf(key: string): Set<string> | undefined {
    const entry = live(key);
    if (!entry) return undefined;
    if (typeof entry.value === 'string') {
      throw new StoreUnavailableError(`WRONGTYPE ${key} holds a string`, 'set');
    }
    return entry.value;
  }

  function stringOf(key: string): string | null {
    const entry = live(key);
    if (!entry) return null;
    if (typeof entry.value !== 'string') {
      throw new StoreUnavailableError(`WRONGTYPE ${key} holds a set`, 'get');
    }
    return entry.value;
  }

  const ops = {
    set(key: string, value: string, ttlSec: number): void {
      data.set(key, { value, expiresAt: now() + ttlSec * 1000 });
    },
    del(key: string): number {
      const existed = live(key) !== undefined;
      data.delete(key);
      return existed ? 1 : 0;
    },
    sAdd(key: string, member: string): void {
      const members = setOf(key);
      if (members) {
        members.add(member);
        return;
      }
      data.set(key, { value: new Set([member]) });
    },
    sRem(key: string, member: string): void {
      const members = setOf(key);
      if (!members) return;
      members.delete(member);
      // Empty sets do not exist
      if (members.size === 0) data.delete(key);
    },
    expire(key: string, ttlSec: number): boolean {
      const entry = live(key);
      if (!entry) return false;
      entry.expiresAt = now() + ttlSec * 1000;
      return true;
    },
  };

  function apply(command: KvCommand): void {
    switch (command.op) {
      case 'set':
        ops.set(command.key, command.value, command.ttlSec);
        return;
      case 'del':
        ops.del(command.key);
        return;
      case 'sAdd':
        ops.sAdd(command.key, command.member);
        return;
      case 'sRem':
        ops.sRem(command.key, command.member);
        return;
      case 'expire':
        ops.expire(command.key, command.ttlSec);
        return;
    }
  }

  return {
    async get(key) {
      return stringOf(key);
    },

    async set(key, value, ttlSec) {
      ops.set(key, value, ttlSec);
    },

    async del(key) {
      return ops.del(key);
    },

    async sAdd(key, member) {
      ops.sAdd(key, member);
    },

    async sRem(key, member) {
      ops.sRem(key, member);
    },

    async sMembers(key) {
      return [...(setOf(key) ?? [])];
    },

    async sCard(key) {
      return setOf(key)?.size ?? 0;
    },

    async expire(key, ttlSec) {
      return ops.expire(key, ttlSec);
    },

    async exec(commands) {
      for (const command of commands) apply(command);
    },

    async ping() {
      return true;
    },

    async close() {
      if (sweeper) clearInterval(sweeper);
      sweeper = undefined;
      data.clear();
    },

    size() {
      let n = 0;
      for (const key of [...data.keys()]) {
        if (live(key)) n += 1;
      }
      return n;
    },
  };
}
