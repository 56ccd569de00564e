import {
  deserializeSession,
  formatTimestamp,
  parseTimestamp,
  serializeSession,
} from '../../../src/core/session_codec.js';
import { SessionDecodeError } from '../../../src/core/errors.js';
import type { Session } from '../../../src/types/session.js';

const base = (): Session => ({
  sessionId: 's-1',
  userId: 'u-1',
  title: 'Printer offline',
  clientId: 'web',
  createdAt: new Date('2024-01-15T10:00:00.000Z'),
  updatedAt: new Date('2024-01-15T10:05:00.000Z'),
  lastActivityAt: new Date('2024-01-15T10:05:00.000Z'),
  status: 'in_progress',
  context: { device: 'printer-3' },
  messages: [
    {
      messageId: 'm-1',
      role: 'user',
      content: 'It will not print',
      timestamp: new Date('2024-01-15T10:01:00.000Z'),
      metadata: {},
    },
  ],
  metadata: { session_type: 'troubleshooting' },
});

describe('parseTimestamp', () => {
  it('accepts Z and explicit offsets', () => {
    expect(parseTimestamp('2024-01-15T10:00:00Z')?.toISOString()).toBe('2024-01-15T10:00:00.000Z');
    expect(parseTimestamp('2024-01-15T10:00:00+00:00')?.toISOString()).toBe('2024-01-15T10:00:00.000Z');
    expect(parseTimestamp('2024-01-15T12:00:00+02:00')?.toISOString()).toBe('2024-01-15T10:00:00.000Z');
  });

  it('truncates sub-millisecond fractions and pads short ones', () => {
    expect(parseTimestamp('2024-01-15T10:00:00.123456+00:00')?.toISOString()).toBe('2024-01-15T10:00:00.123Z');
    expect(parseTimestamp('2024-01-15T10:00:00.5Z')?.toISOString()).toBe('2024-01-15T10:00:00.500Z');
  });

  it('rejects values without an offset or that are not dates', () => {
    expect(parseTimestamp('2024-01-15T10:00:00')).toBeUndefined();
    expect(parseTimestamp('yesterday')).toBeUndefined();
    expect(parseTimestamp('2024-13-45T10:00:00Z')).toBeUndefined();
  });
});

describe('serializeSession', () => {
  it('writes wire field names and ISO timestamps', () => {
    const record = JSON.parse(serializeSession(base()));
    expect(record).toEqual({
      session_id: 's-1',
      user_id: 'u-1',
      title: 'Printer offline',
      client_id: 'web',
      created_at: '2024-01-15T10:00:00.000Z',
      updated_at: '2024-01-15T10:05:00.000Z',
      last_activity_at: '2024-01-15T10:05:00.000Z',
      status: 'in_progress',
      context: { device: 'printer-3' },
      messages: [
        {
          message_id: 'm-1',
          role: 'user',
          content: 'It will not print',
          timestamp: '2024-01-15T10:01:00.000Z',
          metadata: {},
        },
      ],
      metadata: { session_type: 'troubleshooting' },
    });
  });

  it('formats with millisecond precision', () => {
    expect(formatTimestamp(new Date(Date.UTC(2024, 0, 15, 10, 0, 0, 7)))).toBe('2024-01-15T10:00:00.007Z');
  });
});

describe('deserializeSession', () => {
  it('restores what serializeSession wrote', () => {
    const session = base();
    expect(deserializeSession(serializeSession(session))).toEqual(session);
  });

  it('fills defaults for optional fields', () => {
    const session = deserializeSession(
      JSON.stringify({
        session_id: 's-2',
        user_id: 'u-2',
        created_at: '2024-01-15T10:00:00+00:00',
        updated_at: '2024-01-15T10:00:00+00:00',
        last_activity_at: '2024-01-15T10:00:00+00:00',
      }),
    );
    expect(session.title).toBeNull();
    expect(session.clientId).toBeNull();
    expect(session.status).toBe('active');
    expect(session.context).toEqual({});
    expect(session.messages).toEqual([]);
    expect(session.metadata).toEqual({});
  });

  it('throws SessionDecodeError for malformed JSON', () => {
    expect(() => deserializeSession('{not json')).toThrow(SessionDecodeError);
    expect(() => deserializeSession('{not json')).toThrow('session payload is not valid JSON');
  });

  it('names the failing fields', () => {
    const raw = JSON.stringify({
      session_id: 's-3',
      user_id: 'u-3',
      created_at: 'not-a-date',
      updated_at: '2024-01-15T10:00:00Z',
      last_activity_at: '2024-01-15T10:00:00Z',
      status: 'paused',
    });
    expect(() => deserializeSession(raw)).toThrow('session payload failed validation: created_at, status');
  });
});
