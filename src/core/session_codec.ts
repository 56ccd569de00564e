import { z } from 'zod';
import { SessionDecodeError } from './errors.js';
import { SESSION_STATUSES, type Session, type SessionMessage } from '../types/session.js';

// Offset is mandatory; fractions beyond milliseconds are truncated.
const ISO_TIMESTAMP = /^(\d{4}-\d{2}-\d{2}T\d{2}:\d{2}:\d{2})(?:\.(\d{1,9}))?(Z|[+-]\d{2}:\d{2})$/i;

/**
 * Parses an ISO-8601 timestamp carrying either a `Z` suffix or an explicit offset
 * such as `+00:00`. Returns undefined for anything else.
 */
export function parseTimestamp(value: string): Date | undefined {
  const match = ISO_TIMESTAMP.exec(value.trim());
  if (!match) return undefined;
  const [, base, fraction = '', zone] = match;
  const millis = fraction.padEnd(3, '0').slice(0, 3);
  const date = new Date(`${base}.${millis}${zone.toUpperCase()}`);
  return Number.isNaN(date.getTime()) ? undefined : date;
}

export function formatTimestamp(date: Date): string {
  return date.toISOString();
}

const Timestamp = z.string().transform((value, ctx) => {
  const date = parseTimestamp(value);
  if (!date) {
    ctx.addIssue({ code: z.ZodIssueCode.custom, message: `invalid timestamp: ${value}` });
    return z.NEVER;
  }
  return date;
});

const JsonMap = z.record(z.unknown());

export const MessageRecordSchema = z.object({
  message_id: z.string(),
  role: z.string(),
  content: z.string(),
  timestamp: Timestamp,
  metadata: JsonMap.default({}),
});

export const SessionRecordSchema = z.object({
  session_id: z.string().min(1),
  user_id: z.string().min(1),
  title: z.string().nullable().default(null),
  client_id: z.string().nullable().default(null),
  created_at: Timestamp,
  updated_at: Timestamp,
  last_activity_at: Timestamp,
  status: z.enum(SESSION_STATUSES).default('active'),
  context: JsonMap.default({}),
  messages: z.array(MessageRecordSchema).default([]),
  metadata: JsonMap.default({}),
});

/** Persisted shape of a message; timestamps are ISO strings. */
export interface MessageRecord {
  message_id: string;
  role: string;
  content: string;
  timestamp: string;
  metadata: Record<string, unknown>;
}

/** Persisted shape of a session, keyed by the wire field names. */
export interface SessionRecord {
  session_id: string;
  user_id: string;
  title: string | null;
  client_id: string | null;
  created_at: string;
  updated_at: string;
  last_activity_at: string;
  status: Session['status'];
  context: Record<string, unknown>;
  messages: MessageRecord[];
  metadata: Record<string, unknown>;
}

export function toMessageRecord(message: SessionMessage): MessageRecord {
  return {
    message_id: message.messageId,
    role: message.role,
    content: message.content,
    timestamp: formatTimestamp(message.timestamp),
    metadata: message.metadata,
  };
}

export function toSessionRecord(session: Session): SessionRecord {
  return {
    session_id: session.sessionId,
    user_id: session.userId,
    title: session.title,
    client_id: session.clientId,
    created_at: formatTimestamp(session.createdAt),
    updated_at: formatTimestamp(session.updatedAt),
    last_activity_at: formatTimestamp(session.lastActivityAt),
    status: session.status,
    context: session.context,
    messages: session.messages.map(toMessageRecord),
    metadata: session.metadata,
  };
}

export function serializeSession(session: Session): string {
  return JSON.stringify(toSessionRecord(session));
}

/**
 * Decodes a stored payload. Throws SessionDecodeError for malformed JSON or a
 * record that does not match the schema.
 */
export function deserializeSession(raw: string): Session {
  let data: unknown;
  try {
    data = JSON.parse(raw);
  } catch (err) {
    throw new SessionDecodeError('session payload is not valid JSON', { cause: err });
  }

  const parsed = SessionRecordSchema.safeParse(data);
  if (!parsed.success) {
    const fields = parsed.error.issues.map((issue) => issue.path.join('.') || '(root)');
    throw new SessionDecodeError(`session payload failed validation: ${fields.join(', ')}`, {
      cause: parsed.error,
    });
  }

  const record = parsed.data;
  return {
    sessionId: record.session_id,
    userId: record.user_id,
    title: record.title,
    clientId: record.client_id,
    createdAt: record.created_at,
    updatedAt: record.updated_at,
    lastActivityAt: record.last_activity_at,
    status: record.status,
    context: record.context,
    messages: record.messages.map((m) => ({
      messageId: m.message_id,
      role: m.role,
      content: m.content,
      timestamp: m.timestamp,
      metadata: m.metadata,
    })),
    metadata: record.metadata,
  };
}
