export type KvCommand =
  | { op: 'set'; key: string; value: string; ttlSec: number }
  | { op: 'del'; key: string }
  | { op: 'sAdd'; key: string; member: string }
  | { op: 'sRem'; key: string; member: string }
  | { op: 'expire'; key: string; ttlSec: number };

/**
 * Key-value store with per-key expiry and string sets.
 *
 * Implementations report every failure (connection, command, timeout) as
 * StoreUnavailableError and never retry.
 */
export interface KeyValueStore {
  get(key: string): Promise<string | null>;
  set(key: string, value: string, ttlSec: number): Promise<void>;
  /** Number of keys removed. */
  del(key: string): Promise<number>;
  sAdd(key: string, member: string): Promise<void>;
  sRem(key: string, member: string): Promise<void>;
  sMembers(key: string): Promise<string[]>;
  sCard(key: string): Promise<number>;
  /** False when the key does not exist. */
  expire(key: string, ttlSec: number): Promise<boolean>;
  /** Runs the commands as one atomic batch, in order. Optional. */
  exec?(commands: KvCommand[]): Promise<void>;
  ping(): Promise<boolean>;
  close(): Promise<void>;
}

export const sessionKey = (sessionId: string): string => `session:${sessionId}`;
export const userIndexKey = (userId: string): string => `user_sessions:${userId}`;
