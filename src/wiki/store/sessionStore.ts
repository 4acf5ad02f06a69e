import Redis from 'ioredis';
import { v4 as uuidv4 } from 'uuid';
import { z } from 'zod';
import { config } from '../../shared/config';
import { getNow } from '../../shared/clock';
import { ResourceAcquisitionFailure } from '../../shared/errors';
import { AuthenticatedSession, PendingSession, Principal, Session } from '../../shared/types';

/**
 * Keyed session map. Each record is written and read as a whole value, so a
 * request always sees one consistent principal for its session.
 */
export interface SessionStore {
  connect(): Promise<void>;
  disconnect(): Promise<void>;
  createPending(returnUrl: string | null): Promise<PendingSession>;
  createAuthenticated(principal: Principal): Promise<AuthenticatedSession>;
  /** Returns null for unknown or expired sessions. */
  get(sessionId: string): Promise<Session | null>;
  delete(sessionId: string): Promise<boolean>;
}

const storedSessionSchema = z.discriminatedUnion('state', [
  z.object({
    id: z.string(),
    createdAt: z.number(),
    expiresAt: z.number(),
    state: z.literal('pending'),
    returnUrl: z.string().nullable(),
  }),
  z.object({
    id: z.string(),
    createdAt: z.number(),
    expiresAt: z.number(),
    state: z.literal('authenticated'),
    principal: z.object({ login: z.string(), roles: z.array(z.string()) }),
  }),
]);

function sessionIdentity(ttlMs: number): { id: string; createdAt: number; expiresAt: number } {
  const now = getNow().getTime();
  return { id: uuidv4(), createdAt: now, expiresAt: now + ttlMs };
}

function pendingSession(ttlMs: number, returnUrl: string | null): PendingSession {
  return { ...sessionIdentity(ttlMs), state: 'pending', returnUrl };
}

function authenticatedSession(ttlMs: number, principal: Principal): AuthenticatedSession {
  return { ...sessionIdentity(ttlMs), state: 'authenticated', principal };
}

export class InMemorySessionStore implements SessionStore {
  private sessions: Map<string, Session> = new Map();

  constructor(private readonly ttlMs: number = config.wiki.sessionTtlMs) {}

  async connect(): Promise<void> {
    // No-op for in-memory store
  }

  async disconnect(): Promise<void> {
    this.sessions.clear();
  }

  async createPending(returnUrl: string | null): Promise<PendingSession> {
    const session = pendingSession(this.ttlMs, returnUrl);
    this.sessions.set(session.id, session);
    return session;
  }

  async createAuthenticated(principal: Principal): Promise<AuthenticatedSession> {
    const session = authenticatedSession(this.ttlMs, principal);
    this.sessions.set(session.id, session);
    return session;
  }

  async get(sessionId: string): Promise<Session | null> {
    const session = this.sessions.get(sessionId);
    if (!session) return null;

    if (session.expiresAt <= getNow().getTime()) {
      this.sessions.delete(sessionId);
      return null;
    }
    return session;
  }

  async delete(sessionId: string): Promise<boolean> {
    return this.sessions.delete(sessionId);
  }

  size(): number {
    return this.sessions.size;
  }
}

export class RedisSessionStore implements SessionStore {
  private client: Redis | null = null;

  constructor(
    private readonly redisUrl: string = config.db.redisUrl,
    private readonly ttlMs: number = config.wiki.sessionTtlMs
  ) {}

  async connect(): Promise<void> {
    this.client = new Redis(this.redisUrl, {
      maxRetriesPerRequest: 3,
      retryStrategy: (times) => {
        if (times > 3) return null;
        return Math.min(times * 100, 1000);
      },
    });

    await this.client.ping();
  }

  async disconnect(): Promise<void> {
    if (this.client) {
      await this.client.quit();
      this.client = null;
    }
  }

  private connected(): Redis {
    if (!this.client) throw new ResourceAcquisitionFailure('Redis not connected');
    return this.client;
  }

  private async save<S extends Session>(session: S): Promise<S> {
    try {
      await this.connected().set(`session:${session.id}`, JSON.stringify(session), 'PX', this.ttlMs);
    } catch (error) {
      throw new ResourceAcquisitionFailure('Session store unavailable', { cause: error });
    }
    return session;
  }

  async createPending(returnUrl: string | null): Promise<PendingSession> {
    return this.save(pendingSession(this.ttlMs, returnUrl));
  }

  async createAuthenticated(principal: Principal): Promise<AuthenticatedSession> {
    return this.save(authenticatedSession(this.ttlMs, principal));
  }

  async get(sessionId: string): Promise<Session | null> {
    let data: string | null;
    try {
      data = await this.connected().get(`session:${sessionId}`);
    } catch (error) {
      throw new ResourceAcquisitionFailure('Session store unavailable', { cause: error });
    }
    if (!data) return null;

    // Redis expires the key itself; unreadable records count as no session
    let raw: unknown;
    try {
      raw = JSON.parse(data);
    } catch {
      return null;
    }
    const parsed = storedSessionSchema.safeParse(raw);
    return parsed.success ? parsed.data : null;
  }

  async delete(sessionId: string): Promise<boolean> {
    try {
      const removed = await this.connected().del(`session:${sessionId}`);
      return removed === 1;
    } catch (error) {
      throw new ResourceAcquisitionFailure('Session store unavailable', { cause: error });
    }
  }
}

// Create the appropriate store based on environment
export function createSessionStore(): SessionStore {
  // Always use in-memory for tests to avoid Redis dependency
  if (config.isTest) {
    return new InMemorySessionStore();
  }
  return new RedisSessionStore();
}
