import type { Request, RequestHandler, Response, Router } from 'express';
import express from 'express';
import type { ZodError } from 'zod';
import { toStdError } from '../core/errors.js';
import { formatTimestamp } from '../core/session_codec.js';
import type { SessionManager } from '../core/session_manager.js';
import {
  AppendMessageInput,
  CreateSessionInput,
  ListMessagesQuery,
  ListSessionsQuery,
  SearchSessionsInput,
  UpdateSessionInput,
  toMessageResponse,
  toSessionResponse,
} from '../schemas/session.js';
import type { Session } from '../types/session.js';
import type { Logger } from '../util/logging.js';

type Handler = (req: Request, res: Response) => Promise<unknown>;

const badRequest = (res: Response, error: ZodError) =>
  res.status(400).json({ error: 'invalid_request', details: error.flatten() });

const notFound = (res: Response, sessionId: string) =>
  res.status(404).json({ error: 'not_found', message: `Session ${sessionId} not found` });

function requireUser(req: Request, res: Response): string | undefined {
  const userId = req.header('X-User-ID')?.trim();
  if (!userId) {
    res.status(401).json({ error: 'unauthorized', message: 'X-User-ID header is required' });
    return undefined;
  }
  return userId;
}

export const sessionsRouter = (manager: SessionManager, log: Logger): Router => {
  const r = express.Router();

  const route =
    (name: string, handler: Handler): RequestHandler =>
    (req, res) => {
      handler(req, res).catch((err: unknown) => {
        const std = toStdError(err, name);
        if (std.status >= 500) {
          log.error({ err, route: name }, 'request failed');
        }
        if (res.headersSent) return;
        if (std.status === 400) {
          res.status(400).json({ error: 'invalid_request', details: std.details ?? { message: std.message } });
          return;
        }
        res.status(std.status).json({ error: 'internal_error', message: std.message });
      });
    };

  /** Loads the session and checks it belongs to the caller; answers 404/403 itself. */
  async function owned(req: Request, res: Response, userId: string): Promise<Session | undefined> {
    const sessionId = req.params.id;
    const session = await manager.get(sessionId);
    if (!session) {
      notFound(res, sessionId);
      return undefined;
    }
    if (session.userId !== userId) {
      log.warn({ sessionId, userId }, 'session access denied');
      res.status(403).json({ error: 'forbidden', message: 'Not authorized to access this session' });
      return undefined;
    }
    return session;
  }

  r.post(
    '/',
    route('create', async (req, res) => {
      const userId = requireUser(req, res);
      if (!userId) return;
      const parsed = CreateSessionInput.safeParse(req.body ?? {});
      if (!parsed.success) return badRequest(res, parsed.error);

      const { client_id, metadata, session_type, timeout_minutes } = parsed.data;
      const session = await manager.create(userId, client_id, {
        ...metadata,
        session_type,
        timeout_minutes,
      });
      return res.status(201).json(toSessionResponse(session));
    }),
  );

  r.get(
    '/',
    route('list', async (req, res) => {
      const userId = requireUser(req, res);
      if (!userId) return;
      const parsed = ListSessionsQuery.safeParse(req.query);
      if (!parsed.success) return badRequest(res, parsed.error);

      const { limit, offset } = parsed.data;
      const [sessions, total] = await Promise.all([
        manager.list(userId, limit, offset),
        manager.count(userId),
      ]);
      return res.json({ sessions: sessions.map(toSessionResponse), total, limit, offset });
    }),
  );

  r.post(
    '/search',
    route('search', async (req, res) => {
      const userId = requireUser(req, res);
      if (!userId) return;
      const parsed = SearchSessionsInput.safeParse(req.body ?? {});
      if (!parsed.success) return badRequest(res, parsed.error);

      const { sessions, total } = await manager.search(userId, parsed.data);
      return res.json({
        sessions: sessions.map((s) => ({
          session_id: s.sessionId,
          title: s.title,
          status: s.status,
          created_at: formatTimestamp(s.createdAt),
          message_count: s.messages.length,
        })),
        total,
      });
    }),
  );

  r.get(
    '/:id',
    route('get', async (req, res) => {
      const userId = requireUser(req, res);
      if (!userId) return;
      const session = await owned(req, res, userId);
      if (!session) return;
      return res.json(toSessionResponse(session));
    }),
  );

  r.put(
    '/:id',
    route('update', async (req, res) => {
      const userId = requireUser(req, res);
      if (!userId) return;
      const parsed = UpdateSessionInput.safeParse(req.body ?? {});
      if (!parsed.success) return badRequest(res, parsed.error);
      if (!(await owned(req, res, userId))) return;

      const updated = await manager.update(req.params.id, parsed.data);
      if (!updated) return notFound(res, req.params.id);
      return res.json(toSessionResponse(updated));
    }),
  );

  r.delete(
    '/:id',
    route('delete', async (req, res) => {
      const userId = requireUser(req, res);
      if (!userId) return;
      if (!(await owned(req, res, userId))) return;

      if (!(await manager.delete(req.params.id))) {
        return res.status(500).json({ error: 'internal_error', message: 'Failed to delete session' });
      }
      return res.status(204).end();
    }),
  );

  r.post(
    '/:id/heartbeat',
    route('heartbeat', async (req, res) => {
      const userId = requireUser(req, res);
      if (!userId) return;
      if (!(await owned(req, res, userId))) return;

      const session = await manager.heartbeat(req.params.id);
      if (!session) return notFound(res, req.params.id);
      return res.json({
        session_id: session.sessionId,
        last_activity_at: formatTimestamp(session.lastActivityAt),
        status: session.status,
        message: 'Heartbeat updated',
      });
    }),
  );

  r.get(
    '/:id/stats',
    route('stats', async (req, res) => {
      const userId = requireUser(req, res);
      if (!userId) return;
      if (!(await owned(req, res, userId))) return;

      const stats = await manager.stats(req.params.id);
      if (!stats) return notFound(res, req.params.id);
      return res.json({
        session_id: stats.sessionId,
        message_count: stats.messageCount,
        duration_seconds: stats.durationSeconds,
        status: stats.status,
        created_at: formatTimestamp(stats.createdAt),
        last_activity_at: formatTimestamp(stats.lastActivityAt),
      });
    }),
  );

  r.post(
    '/:id/messages',
    route('append_message', async (req, res) => {
      const userId = requireUser(req, res);
      if (!userId) return;
      const parsed = AppendMessageInput.safeParse(req.body ?? {});
      if (!parsed.success) return badRequest(res, parsed.error);
      if (!(await owned(req, res, userId))) return;

      const result = await manager.appendMessage(req.params.id, parsed.data);
      if (!result) return notFound(res, req.params.id);
      return res.status(201).json({
        session_id: result.session.sessionId,
        message: toMessageResponse(result.message),
        total_messages: result.session.messages.length,
      });
    }),
  );

  r.get(
    '/:id/messages',
    route('messages', async (req, res) => {
      const userId = requireUser(req, res);
      if (!userId) return;
      const parsed = ListMessagesQuery.safeParse(req.query);
      if (!parsed.success) return badRequest(res, parsed.error);
      if (!(await owned(req, res, userId))) return;

      const result = await manager.messages(req.params.id, parsed.data.limit);
      if (!result) return notFound(res, req.params.id);
      return res.json({
        session_id: req.params.id,
        messages: result.messages.map(toMessageResponse),
        total: result.total,
        returned: result.messages.length,
      });
    }),
  );

  r.post(
    '/:id/archive',
    route('archive', async (req, res) => {
      const userId = requireUser(req, res);
      if (!userId) return;
      if (!(await owned(req, res, userId))) return;

      const session = await manager.archive(req.params.id);
      if (!session) return notFound(res, req.params.id);
      return res.json({ session_id: session.sessionId, status: session.status });
    }),
  );

  r.post(
    '/:id/restore',
    route('restore', async (req, res) => {
      const userId = requireUser(req, res);
      if (!userId) return;
      if (!(await owned(req, res, userId))) return;

      const session = await manager.restore(req.params.id);
      if (!session) return notFound(res, req.params.id);
      return res.json({ session_id: session.sessionId, status: session.status });
    }),
  );

  return r;
};
