import { z } from 'zod';
import { formatTimestamp } from '../core/session_codec.js';
import { SESSION_STATUSES, type Session, type SessionMessage } from '../types/session.js';

const JsonMap = z.record(z.unknown());

export const SessionStatusSchema = z.enum(SESSION_STATUSES);

export const CreateSessionInput = z.object({
  timeout_minutes: z.number().int().min(60).max(480).default(180),
  session_type: z.string().min(1).default('troubleshooting'),
  client_id: z.string().min(1).optional(),
  metadata: JsonMap.optional(),
});

export const UpdateSessionInput = z.object({
  title: z.string().max(500).optional(),
  status: SessionStatusSchema.optional(),
  context: JsonMap.optional(),
  metadata: JsonMap.optional(),
});

export const ListSessionsQuery = z.object({
  limit: z.coerce.number().int().min(1).max(100).default(50),
  offset: z.coerce.number().int().min(0).default(0),
});

export const ListMessagesQuery = z.object({
  limit: z.coerce.number().int().min(1).max(500).default(100),
});

export const AppendMessageInput = z.object({
  role: z.string().min(1).optional(),
  content: z.string().optional(),
  metadata: JsonMap.optional(),
});

export const SearchSessionsInput = z.object({
  status: SessionStatusSchema.optional(),
  query: z.string().optional(),
  limit: z.number().int().min(1).max(1000).default(50),
});

export interface SessionResponse {
  session_id: string;
  user_id: string;
  title: string | null;
  client_id: string | null;
  created_at: string;
  updated_at: string;
  last_activity_at: string;
  status: Session['status'];
  message_count: number;
  metadata: Record<string, unknown>;
}

export function toSessionResponse(session: Session): SessionResponse {
  return {
    session_id: session.sessionId,
    user_id: session.userId,
    title: session.title,
    client_id: session.clientId,
    created_at: formatTimestamp(session.createdAt),
    updated_at: formatTimestamp(session.updatedAt),
    last_activity_at: formatTimestamp(session.lastActivityAt),
    status: session.status,
    message_count: session.messages.length,
    metadata: session.metadata,
  };
}

export interface MessageResponse {
  message_id: string;
  role: string;
  content: string;
  timestamp: string;
  metadata: Record<string, unknown>;
}

export function toMessageResponse(message: SessionMessage): MessageResponse {
  return {
    message_id: message.messageId,
    role: message.role,
    content: message.content,
    timestamp: formatTimestamp(message.timestamp),
    metadata: message.metadata,
  };
}
