import Fastify, { type FastifyServerOptions } from "fastify";
import path from "node:path";
import { fileURLToPath } from "node:url";
import cookie from "@fastify/cookie";
import view from "@fastify/view";
import ejs from "ejs";
import type { AppConfig } from "./config.ts";
import { registerContactsFlow } from "./flow/contacts-flow.ts";
import { DEFAULT_MOUNT_PATH } from "./flow/flow-paths.ts";
import { GmailProviderAdapter } from "./providers/gmail.ts";
import { HotmailProviderAdapter } from "./providers/hotmail.ts";
import { MockProviderAdapter } from "./providers/mock-provider.ts";
import type { ProviderAdapter } from "./providers/provider-adapter.ts";
import { registerContactsRoute } from "./routes/contacts-route.ts";
import { registerFailureRoute } from "./routes/failure-route.ts";
import { registerHomeRoute } from "./routes/home-route.ts";
import {
  MemorySessionStore,
  createCookieSession,
  type SessionStore,
} from "./session/flow-session.ts";

const __filename = fileURLToPath(import.meta.url);
const __dirname = path.dirname(__filename);

export type ServerOptions = {
  providers: ProviderAdapter[];
  sessionSecret: string;
  sessionStore?: SessionStore;
  secureCookies?: boolean;
  baseUrl?: string;
  mountPath?: string;
  logger?: FastifyServerOptions["logger"];
};

export function createProviders(config: AppConfig): ProviderAdapter[] {
  const http = { sslCaFile: config.sslCaFile, timeoutMs: config.httpTimeoutMs };
  const providers: ProviderAdapter[] = [];
  if (config.gmail) {
    providers.push(new GmailProviderAdapter({ ...config.gmail, ...http }));
  }
  if (config.hotmail) {
    providers.push(new HotmailProviderAdapter({ ...config.hotmail, ...http }));
  }

  if (!config.testMode) {
    return providers;
  }
  const names =
    providers.length > 0
      ? providers.map((provider) => provider.name)
      : ["gmail", "hotmail"];
  return names.map((name) => new MockProviderAdapter(name));
}

export async function initServer(options: ServerOptions) {
  const mountPath = options.mountPath ?? DEFAULT_MOUNT_PATH;
  const fastify = Fastify({
    logger: options.logger ?? false,
    disableRequestLogging: true,
  });

  // The flow's hook reads cookies, so the cookie parser has to be in place first.
  await fastify.register(cookie, { secret: options.sessionSecret });
  await fastify.register(view, {
    engine: {
      ejs,
    },
    root: path.join(__dirname, "templates"),
  });

  registerContactsFlow(fastify, {
    providers: options.providers,
    session: createCookieSession(
      options.sessionStore ?? new MemorySessionStore(),
      { secure: options.secureCookies },
    ),
    mountPath,
    baseUrl: options.baseUrl,
  });

  registerHomeRoute(
    fastify,
    mountPath,
    options.providers.map((provider) => provider.name),
  );
  registerContactsRoute(fastify, mountPath);
  registerFailureRoute(fastify, mountPath);

  return fastify;
}
