import type { FastifyBaseLogger } from "fastify";
import type { FlowResult } from "../flow/errors.ts";
import type { QueryParams } from "../utils/query-codec.ts";

export type Contact = {
  id: string;
  name?: string;
  firstName?: string;
  lastName?: string;
  email?: string;
  emails: string[];
  phoneNumbers: string[];
};

export type ContactsResult = Contact[];

export type ProviderRequestContext = {
  /** Query params of the request being handled. */
  query: QueryParams;
  /** Absolute URL of this provider's callback path. */
  redirectUri: string;
  log: FastifyBaseLogger;
};

/**
 * A contacts provider plugged into the flow. Both methods may return a failed
 * result or throw one of the flow's error classes.
 */
export interface ProviderAdapter {
  /** Flow name, used in the entry, callback and session key. */
  readonly name: string;

  /** Resolves to the URL of the provider's consent screen. */
  requestAuthorizationFromUser(
    params: QueryParams,
    context: ProviderRequestContext,
  ): Promise<FlowResult<string>>;

  fetchContacts(
    context: ProviderRequestContext,
  ): Promise<FlowResult<ContactsResult>>;
}
