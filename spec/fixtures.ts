import Fastify, { type FastifyBaseLogger } from "fastify";
import type { Contact } from "../oauth/providers/provider-adapter.ts";
import type { FlowSession } from "../oauth/session/flow-session.ts";

export const SESSION_SECRET = "test-secret-test-secret-test-secret";

export const CONTACTS: Contact[] = [
  {
    id: "contact-1",
    name: "Ada Example",
    email: "ada@example.com",
    emails: ["ada@example.com"],
    phoneNumbers: [],
  },
];

/** in-process stand-in for a user's session */
export class FakeSession implements FlowSession {
  readonly values = new Map<string, string>();

  async get(key: string): Promise<string | undefined> {
    return this.values.get(key);
  }

  async set(key: string, value: string): Promise<void> {
    this.values.set(key, value);
  }

  async delete(key: string): Promise<void> {
    this.values.delete(key);
  }
}

export function silentLogger(): FastifyBaseLogger {
  return Fastify({ logger: false }).log;
}
