export const SESSION_STATUSES = ['active', 'in_progress', 'completed', 'archived', 'abandoned'] as const;

export type SessionStatus = (typeof SESSION_STATUSES)[number];

export interface SessionMessage {
  messageId: string;
  /** Conventionally user, assistant or system; not enforced. */
  role: string;
  content: string;
  timestamp: Date;
  metadata: Record<string, unknown>;
}

export interface Session {
  sessionId: string;
  userId: string;
  title: string | null;
  clientId: string | null;
  createdAt: Date;
  updatedAt: Date;
  lastActivityAt: Date;
  status: SessionStatus;
  context: Record<string, unknown>;
  messages: SessionMessage[];
  metadata: Record<string, unknown>;
}

/**
 * Partial update. Scalars replace, maps merge key by key.
 */
export interface SessionPatch {
  title?: string;
  status?: SessionStatus;
  context?: Record<string, unknown>;
  metadata?: Record<string, unknown>;
}

export interface NewMessage {
  role?: string;
  content?: string;
  metadata?: Record<string, unknown>;
}

export interface SessionStats {
  sessionId: string;
  messageCount: number;
  durationSeconds: number;
  status: SessionStatus;
  createdAt: Date;
  lastActivityAt: Date;
}

export interface SessionSearch {
  status?: SessionStatus;
  query?: string;
  limit?: number;
}

export interface SessionSettings {
  ttlSec: number;
  maxSessionsPerUser: number;
}
