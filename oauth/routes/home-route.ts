import type { FastifyInstance } from "fastify";

export function registerHomeRoute(
  fastify: FastifyInstance,
  mountPath: string,
  providerNames: string[],
) {
  fastify.get("/", async function (request, reply) {
    return reply.view("index.ejs", { mountPath, providerNames });
  });
}
