import type { FastifyInstance } from "fastify";

// Runs after the contacts flow has handled the provider callback and
// attached the result to the request.
export function registerContactsRoute(
  fastify: FastifyInstance,
  mountPath: string,
) {
  // The flow treats every path under the callback prefix as a callback, so
  // the route serves the whole prefix too.
  for (const url of [
    `${mountPath}/:provider/callback`,
    `${mountPath}/:provider/callback*`,
  ]) {
    fastify.get<{
      Params: {
        provider: string;
      };
    }>(url, async function (request, reply) {
      const { contacts, contactsQueryParams } = request;
      if (!contacts) {
        return reply.code(404).view("failure.ejs", {
          errorMessage: "unknown_provider",
          queryParams: {},
        });
      }

      request.log.info(
        { provider: request.params.provider, count: contacts.length },
        `${mountPath}/${request.params.provider}/callback - rendering contacts`,
      );
      return reply.view("contacts.ejs", {
        provider: request.params.provider,
        contacts,
        queryParamsJson: JSON.stringify(contactsQueryParams ?? {}, null, 2),
      });
    });
  }
}
