import { randomUUID } from 'node:crypto';
import type { Logger } from '../util/logging.js';
import { incCorruptRecords, incEvictions, incOp, incStoreFailure } from '../util/metrics.js';
import { InvalidArgumentError, isStoreUnavailable } from './errors.js';
import { sessionKey, userIndexKey, type KeyValueStore, type KvCommand } from './kv.js';
import { deserializeSession, serializeSession } from './session_codec.js';
import type {
  NewMessage,
  Session,
  SessionMessage,
  SessionPatch,
  SessionSearch,
  SessionSettings,
  SessionStats,
  SessionStatus,
} from '../types/session.js';

export const DEFAULT_LIST_LIMIT = 50;
export const DEFAULT_MESSAGES_LIMIT = 100;

const byRecentActivity = (a: Session, b: Session): number =>
  b.lastActivityAt.getTime() - a.lastActivityAt.getTime() || a.sessionId.localeCompare(b.sessionId);

/**
 * Owns session records and the per-user index.
 *
 * Record write, index add and index expiry are separate store commands; they go
 * as one batch when the store supports it and sequentially otherwise. A failure
 * part-way leaves whatever was already written (an unindexed record after a
 * failed create, for example). Nothing here retries.
 *
 * Reads (get, delete, list, count) degrade to null/false/partial/0 when the store
 * fails. Writes (create, update, heartbeat and friends) rethrow.
 */
export class SessionManager {
  constructor(
    private readonly store: KeyValueStore,
    private readonly settings: SessionSettings,
    private readonly log: Logger,
    private readonly now: () => number = Date.now,
  ) {}

  async create(
    userId: string,
    clientId?: string | null,
    metadata?: Record<string, unknown>,
  ): Promise<Session> {
    if (!userId || !userId.trim()) {
      incOp('create', 'invalid');
      throw new InvalidArgumentError('user_id is required', 'user_id');
    }

    const at = new Date(this.now());
    const session: Session = {
      sessionId: randomUUID(),
      userId,
      title: null,
      clientId: clientId ?? null,
      createdAt: at,
      updatedAt: at,
      lastActivityAt: at,
      status: 'active',
      context: {},
      messages: [],
      metadata: { ...metadata },
    };

    try {
      await this.write(session);
    } catch (err) {
      this.fail('create', err);
      throw err;
    }

    await this.enforceLimit(userId);

    incOp('create', 'ok');
    this.log.info({ sessionId: session.sessionId, userId }, 'session created');
    return session;
  }

  async get(sessionId: string): Promise<Session | null> {
    try {
      return await this.load(sessionId);
    } catch (err) {
      this.fail('get', err);
      this.log.error({ err, sessionId }, 'session read failed');
      return null;
    }
  }

  async update(sessionId: string, patch: SessionPatch): Promise<Session | null> {
    return this.mutate('update', sessionId, (session) => {
      if (patch.title !== undefined) session.title = patch.title;
      if (patch.status !== undefined) session.status = patch.status;
      if (patch.context !== undefined) session.context = { ...session.context, ...patch.context };
      if (patch.metadata !== undefined) session.metadata = { ...session.metadata, ...patch.metadata };
      session.updatedAt = this.tick(session.updatedAt);
    });
  }

  /**
   * Marks the session as in use: refreshes lastActivityAt and updatedAt to the
   * same instant and resets the TTL.
   */
  async heartbeat(sessionId: string): Promise<Session | null> {
    return this.mutate('heartbeat', sessionId, (session) => {
      this.touch(session);
    });
  }

  async archive(sessionId: string): Promise<Session | null> {
    return this.setStatus('archive', sessionId, 'archived');
  }

  async restore(sessionId: string): Promise<Session | null> {
    return this.setStatus('restore', sessionId, 'active');
  }

  async appendMessage(
    sessionId: string,
    input: NewMessage,
  ): Promise<{ session: Session; message: SessionMessage } | null> {
    const session = await this.mutate('append_message', sessionId, (current) => {
      const at = this.touch(current);
      current.messages.push({
        messageId: randomUUID(),
        role: input.role ?? 'user',
        content: input.content ?? '',
        timestamp: at,
        metadata: { ...input.metadata },
      });
    });
    if (!session) return null;
    return { session, message: session.messages[session.messages.length - 1] };
  }

  async delete(sessionId: string): Promise<boolean> {
    try {
      const session = await this.load(sessionId);
      if (!session) {
        incOp('delete', 'not_found');
        return false;
      }

      await this.store.sRem(userIndexKey(session.userId), session.sessionId);
      const removed = await this.store.del(sessionKey(session.sessionId));

      incOp('delete', removed > 0 ? 'ok' : 'not_found');
      this.log.info({ sessionId, userId: session.userId }, 'session deleted');
      return removed > 0;
    } catch (err) {
      this.fail('delete', err);
      this.log.error({ err, sessionId }, 'session delete failed');
      return false;
    }
  }

  /**
   * Live sessions of a user, most recently active first, paged after sorting.
   * Expired or corrupt records still listed in the index are skipped.
   */
  async list(userId: string, limit = DEFAULT_LIST_LIMIT, offset = 0): Promise<Session[]> {
    if (limit <= 0) return [];
    const sessions = await this.liveSessions(userId);
    const start = Math.max(0, offset);
    return sessions.slice(start, start + limit);
  }

  /**
   * Size of the user's index. Stale ids are only pruned by delete, so this can
   * run ahead of list().
   */
  async count(userId: string): Promise<number> {
    try {
      return await this.store.sCard(userIndexKey(userId));
    } catch (err) {
      this.fail('count', err);
      this.log.error({ err, userId }, 'session count failed');
      return 0;
    }
  }

  async messages(
    sessionId: string,
    limit = DEFAULT_MESSAGES_LIMIT,
  ): Promise<{ messages: SessionMessage[]; total: number } | null> {
    const session = await this.get(sessionId);
    if (!session) return null;
    const total = session.messages.length;
    const messages = limit > 0 && total > limit ? session.messages.slice(total - limit) : session.messages;
    return { messages, total };
  }

  async stats(sessionId: string): Promise<SessionStats | null> {
    const session = await this.get(sessionId);
    if (!session) return null;
    return {
      sessionId: session.sessionId,
      messageCount: session.messages.length,
      durationSeconds: Math.floor((session.lastActivityAt.getTime() - session.createdAt.getTime()) / 1000),
      status: session.status,
      createdAt: session.createdAt,
      lastActivityAt: session.lastActivityAt,
    };
  }

  /**
   * Filters the user's live sessions by exact status and case-insensitive title
   * substring. Sessions without a title never match a query.
   */
  async search(userId: string, params: SessionSearch = {}): Promise<{ sessions: Session[]; total: number }> {
    const query = params.query?.toLowerCase();
    const filtered = (await this.liveSessions(userId)).filter((session) => {
      if (params.status !== undefined && session.status !== params.status) return false;
      if (query !== undefined) {
        return session.title !== null && session.title.toLowerCase().includes(query);
      }
      return true;
    });
    return { sessions: filtered.slice(0, params.limit ?? DEFAULT_LIST_LIMIT), total: filtered.length };
  }

  private async setStatus(op: string, sessionId: string, status: SessionStatus): Promise<Session | null> {
    return this.mutate(op, sessionId, (session) => {
      session.status = status;
      session.updatedAt = this.tick(session.updatedAt);
    });
  }

  /** Load, apply, persist with a fresh TTL. Store failures propagate. */
  private async mutate(
    op: string,
    sessionId: string,
    apply: (session: Session) => void,
  ): Promise<Session | null> {
    try {
      const session = await this.load(sessionId);
      if (!session) {
        incOp(op, 'not_found');
        return null;
      }
      apply(session);
      await this.write(session);
      incOp(op, 'ok');
      this.log.debug({ sessionId, op }, 'session updated');
      return session;
    } catch (err) {
      this.fail(op, err);
      throw err;
    }
  }

  private async load(sessionId: string): Promise<Session | null> {
    if (!sessionId || !sessionId.trim()) return null;

    const raw = await this.store.get(sessionKey(sessionId));
    if (raw === null) return null;

    try {
      return deserializeSession(raw);
    } catch (err) {
      incCorruptRecords();
      this.log.warn({ err, sessionId }, 'corrupt session record treated as absent');
      return null;
    }
  }

  /**
   * Record, index membership and index TTL, in that order.
   */
  private async write(session: Session): Promise<void> {
    const ttlSec = this.settings.ttlSec;
    const indexKey = userIndexKey(session.userId);
    const commands: KvCommand[] = [
      { op: 'set', key: sessionKey(session.sessionId), value: serializeSession(session), ttlSec },
      { op: 'sAdd', key: indexKey, member: session.sessionId },
      { op: 'expire', key: indexKey, ttlSec },
    ];

    if (this.store.exec) {
      await this.store.exec(commands);
      return;
    }
    for (const command of commands) {
      await this.run(command);
    }
  }

  private async run(command: KvCommand): Promise<void> {
    switch (command.op) {
      case 'set':
        await this.store.set(command.key, command.value, command.ttlSec);
        return;
      case 'del':
        await this.store.del(command.key);
        return;
      case 'sAdd':
        await this.store.sAdd(command.key, command.member);
        return;
      case 'sRem':
        await this.store.sRem(command.key, command.member);
        return;
      case 'expire':
        await this.store.expire(command.key, command.ttlSec);
        return;
    }
  }

  private async liveSessions(userId: string): Promise<Session[]> {
    let ids: string[];
    try {
      ids = await this.store.sMembers(userIndexKey(userId));
    } catch (err) {
      this.fail('list', err);
      this.log.error({ err, userId }, 'session index read failed');
      return [];
    }

    const loaded = await Promise.all(ids.map((id) => this.get(id)));
    return loaded.filter((s): s is Session => s !== null).sort(byRecentActivity);
  }

  /**
   * Deletes the least recently active sessions once the user has more than
   * maxSessionsPerUser live ones. The index size only gates the check: expired
   * ids it still names are not counted against the limit. Failures are logged,
   * never thrown.
   */
  private async enforceLimit(userId: string): Promise<void> {
    const max = this.settings.maxSessionsPerUser;
    try {
      const indexed = await this.store.sCard(userIndexKey(userId));
      if (indexed <= max) return;

      const live = await this.liveSessions(userId);
      const excess = live.length - max;
      if (excess <= 0) return;

      const oldestFirst = live.reverse();
      for (const session of oldestFirst.slice(0, excess)) {
        if (await this.delete(session.sessionId)) {
          incEvictions();
          this.log.info({ sessionId: session.sessionId, userId, max }, 'session evicted by per-user limit');
        }
      }
    } catch (err) {
      this.fail('enforce_limit', err);
      this.log.error({ err, userId }, 'session limit enforcement failed');
    }
  }

  /** Sets lastActivityAt and updatedAt to one instant past both. */
  private touch(session: Session): Date {
    const latest = Math.max(session.updatedAt.getTime(), session.lastActivityAt.getTime());
    const at = this.tick(new Date(latest));
    session.lastActivityAt = at;
    session.updatedAt = at;
    return at;
  }

  /** Current time, at least 1 ms after previous. */
  private tick(previous: Date): Date {
    return new Date(Math.max(this.now(), previous.getTime() + 1));
  }

  private fail(op: string, err: unknown): void {
    incOp(op, 'error');
    if (isStoreUnavailable(err)) incStoreFailure(err.operation);
  }
}
