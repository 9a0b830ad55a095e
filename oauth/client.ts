import { loadConfig } from "./config.ts";
import { createProviders, initServer } from "./server.ts";

main().catch((error: unknown) => {
  console.error(error);
  process.exit(1);
});

async function main() {
  const config = loadConfig();
  const fastify = await initServer({
    providers: createProviders(config),
    sessionSecret: config.sessionSecret,
    secureCookies: config.baseUrl?.startsWith("https://") ?? false,
    baseUrl: config.baseUrl,
    logger: {
      transport: {
        target: "pino-pretty",
        options: {
          translateTime: "HH:MM:ss Z",
          ignore: "pid,hostname",
        },
      },
    },
  });

  if (config.testMode) {
    fastify.log.warn("Test mode: providers are replaced by canned contacts");
  }

  try {
    await fastify.listen({ port: config.port, host: config.host });
    fastify.log.info("Contacts import server is booted");
  } catch (err) {
    fastify.log.error(err);
    process.exit(1);
  }
}
