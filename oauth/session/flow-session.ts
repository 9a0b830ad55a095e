import { randomUUID } from "node:crypto";
import type {} from "@fastify/cookie";
import type { FastifyReply, FastifyRequest } from "fastify";

/** Per-user string storage for the span of one authorization round trip. */
export interface FlowSession {
  get(key: string): Promise<string | undefined>;
  set(key: string, value: string): Promise<void>;
  delete(key: string): Promise<void>;
}

/**
 * Resolves the session of the request being handled, or `undefined` when the
 * server has no session support.
 */
export type SessionResolver = (
  request: FastifyRequest,
  reply: FastifyReply,
) => FlowSession | undefined;

export interface SessionStore {
  get(sessionId: string, key: string): Promise<string | undefined>;
  set(sessionId: string, key: string, value: string): Promise<void>;
  delete(sessionId: string, key: string): Promise<void>;
}

export const DEFAULT_SESSION_TTL_MS = 5 * 60 * 1000;

type StoredSession = {
  values: Map<string, string>;
  expiresAt: number;
};

/**
 * In-memory session store.
 *
 * Only works for single-process deployments. A session expires `ttlMs` after
 * its last write; expired sessions are evicted on reads and writes.
 */
export class MemorySessionStore implements SessionStore {
  // Ordered by expiry: a write moves its session to the end.
  private sessions = new Map<string, StoredSession>();
  private readonly ttlMs: number;

  constructor(options: { ttlMs?: number } = {}) {
    this.ttlMs = options.ttlMs ?? DEFAULT_SESSION_TTL_MS;
  }

  get size(): number {
    return this.sessions.size;
  }

  async get(sessionId: string, key: string): Promise<string | undefined> {
    this.evictExpired();
    return this.sessions.get(sessionId)?.values.get(key);
  }

  async set(sessionId: string, key: string, value: string): Promise<void> {
    this.evictExpired();
    const values =
      this.sessions.get(sessionId)?.values ?? new Map<string, string>();
    values.set(key, value);

    this.sessions.delete(sessionId);
    this.sessions.set(sessionId, {
      values,
      expiresAt: Date.now() + this.ttlMs,
    });
  }

  async delete(sessionId: string, key: string): Promise<void> {
    const session = this.sessions.get(sessionId);
    if (!session) return;

    session.values.delete(key);
    if (session.values.size === 0) {
      this.sessions.delete(sessionId);
    }
  }

  private evictExpired() {
    const now = Date.now();
    for (const [sessionId, session] of this.sessions) {
      if (session.expiresAt > now) {
        break;
      }
      this.sessions.delete(sessionId);
    }
  }
}

export function bindSession(store: SessionStore, sessionId: string): FlowSession {
  return {
    get: (key) => store.get(sessionId, key),
    set: (key, value) => store.set(sessionId, key, value),
    delete: (key) => store.delete(sessionId, key),
  };
}

export const DEFAULT_SESSION_COOKIE = "contacts_sid";

/**
 * Session resolver keyed by a signed session-id cookie. Requires
 * `@fastify/cookie` to be registered with a `secret`.
 */
export function createCookieSession(
  store: SessionStore,
  options: { cookieName?: string; secure?: boolean } = {},
): SessionResolver {
  const cookieName = options.cookieName ?? DEFAULT_SESSION_COOKIE;

  return (request, reply) => {
    const signed = request.cookies[cookieName];
    if (signed) {
      const { valid, value } = request.unsignCookie(signed);
      if (valid && value) {
        return bindSession(store, value);
      }
    }

    const sessionId = randomUUID();
    reply.setCookie(cookieName, sessionId, {
      signed: true,
      httpOnly: true,
      sameSite: "lax",
      secure: options.secure ?? false,
      path: "/",
    });
    return bindSession(store, sessionId);
  };
}
