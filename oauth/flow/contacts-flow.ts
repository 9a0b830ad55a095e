import type { FastifyInstance, FastifyReply, FastifyRequest } from "fastify";
import type {
  ContactsResult,
  ProviderAdapter,
  ProviderRequestContext,
} from "../providers/provider-adapter.ts";
import type { FlowSession, SessionResolver } from "../session/flow-session.ts";
import {
  decodeQuery,
  encodeQuery,
  splitRequestUrl,
  type QueryParams,
} from "../utils/query-codec.ts";
import { decodeStateToken } from "../utils/state-token.ts";
import { ConfigurationError, settle, type FlowError } from "./errors.ts";
import {
  DEFAULT_MOUNT_PATH,
  failurePath,
  flowPaths,
  resolveTransition,
  type FlowPaths,
} from "./flow-paths.ts";

declare module "fastify" {
  interface FastifyRequest {
    /** Set by a successful contacts callback. */
    contacts: ContactsResult | null;
    /** Query params the user arrived with at the entry path. */
    contactsQueryParams: QueryParams | null;
  }
}

export const DEFAULT_SESSION_NAMESPACE = "contacts";

export type ContactsFlowOptions = {
  providers: ProviderAdapter[];
  session: SessionResolver;
  mountPath?: string;
  sessionNamespace?: string;
  /** Public origin used to build callback URLs. Defaults to the request's. */
  baseUrl?: string;
};

type ContactsFlow = FlowPaths & {
  provider: ProviderAdapter;
  sessionKey: string;
};

export function sessionKey(namespace: string, flowName: string): string {
  return `${namespace}.${flowName}.query_string`;
}

/**
 * Intercepts the entry and callback paths of every provider. The entry path
 * redirects to the provider's consent screen. The callback path fetches the
 * contacts and hands the request on to the route registered at that path,
 * or redirects to `<mount>/failure` with an `error_message`.
 */
export function registerContactsFlow(
  fastify: FastifyInstance,
  options: ContactsFlowOptions,
) {
  const mountPath = options.mountPath ?? DEFAULT_MOUNT_PATH;
  const namespace = options.sessionNamespace ?? DEFAULT_SESSION_NAMESPACE;

  if (options.providers.length === 0) {
    throw new ConfigurationError("At least one contacts provider is required");
  }
  const flows: ContactsFlow[] = [];
  for (const provider of options.providers) {
    if (flows.some((flow) => flow.name === provider.name)) {
      throw new ConfigurationError(
        `Duplicate contacts provider: "${provider.name}"`,
      );
    }
    flows.push({
      ...flowPaths(mountPath, provider.name),
      provider,
      sessionKey: sessionKey(namespace, provider.name),
    });
  }

  if (!fastify.hasRequestDecorator("contacts")) {
    fastify.decorateRequest("contacts", null);
    fastify.decorateRequest("contactsQueryParams", null);
  }

  fastify.addHook("onRequest", async function (request, reply) {
    const { path, queryString } = splitRequestUrl(request.url);
    const transition = resolveTransition(path, flows);
    if (transition.kind === "pass") {
      return;
    }

    const session = options.session(request, reply);
    if (!session) {
      throw new ConfigurationError(
        "A session is required to import contacts; register a session resolver",
      );
    }

    const origin = options.baseUrl ?? `${request.protocol}://${request.host}`;
    const context: ProviderRequestContext = {
      query: decodeQuery(queryString),
      redirectUri: `${origin}${transition.flow.callbackPath}`,
      log: request.log,
    };

    if (transition.kind === "entry") {
      return handleEntry(
        transition.flow,
        session,
        path,
        queryString,
        context,
        reply,
      );
    }
    return handleCallback(
      transition.flow,
      session,
      path,
      context,
      request,
      reply,
    );
  });

  async function handleEntry(
    flow: ContactsFlow,
    session: FlowSession,
    path: string,
    queryString: string,
    context: ProviderRequestContext,
    reply: FastifyReply,
  ) {
    await session.set(flow.sessionKey, queryString);

    const result = await settle(() =>
      flow.provider.requestAuthorizationFromUser(context.query, context),
    );
    if (!result.ok) {
      return redirectToFailure(
        reply,
        path,
        context,
        decodeStateToken(context.query.state),
        result.error,
      );
    }

    context.log.info(
      { provider: flow.name },
      `${flow.entryPath} - redirecting to provider authorization`,
    );
    return reply.redirect(result.value, 302);
  }

  async function handleCallback(
    flow: ContactsFlow,
    session: FlowSession,
    path: string,
    context: ProviderRequestContext,
    request: FastifyRequest,
    reply: FastifyReply,
  ) {
    const storedQueryString = await session.get(flow.sessionKey);
    await session.delete(flow.sessionKey);

    // Providers that echo `state` back win over what the session remembered.
    const stateParams = decodeStateToken(context.query.state);
    const originatorParams =
      Object.keys(stateParams).length > 0
        ? stateParams
        : decodeQuery(storedQueryString);

    const result = await settle(() => flow.provider.fetchContacts(context));
    if (!result.ok) {
      return redirectToFailure(
        reply,
        path,
        context,
        originatorParams,
        result.error,
      );
    }

    context.log.info(
      { provider: flow.name, count: result.value.length },
      `${flow.callbackPath} - contacts imported`,
    );
    request.contacts = result.value;
    request.contactsQueryParams = originatorParams;
  }

  function redirectToFailure(
    reply: FastifyReply,
    path: string,
    context: ProviderRequestContext,
    originatorParams: QueryParams,
    error: FlowError,
  ) {
    context.log.error(
      { errorKind: error.kind, path },
      `Error ${error.kind} while processing ${path}: ${error.message}`,
    );

    const currentParams: QueryParams = { ...context.query };
    delete currentParams.state;
    // Spread keeps a "__proto__" param as an own key.
    const failureQuery: QueryParams = {
      ...currentParams,
      ...originatorParams,
      error_message: error.kind,
    };

    return reply.redirect(
      `${failurePath(mountPath)}?${encodeQuery(failureQuery)}`,
      302,
    );
  }
}
