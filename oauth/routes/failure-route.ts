import type { FastifyInstance } from "fastify";
import { failurePath } from "../flow/flow-paths.ts";

export function registerFailureRoute(
  fastify: FastifyInstance,
  mountPath: string,
) {
  fastify.get<{
    Querystring: Record<string, string | undefined>;
  }>(failurePath(mountPath), async function (request, reply) {
    const { error_message: errorMessage, ...queryParams } = request.query;
    return reply.view("failure.ejs", {
      errorMessage: errorMessage ?? "unknown",
      queryParams,
    });
  });
}
