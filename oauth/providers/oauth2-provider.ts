import { z } from "zod";
import {
  ProviderError,
  fail,
  ok,
  type FlowResult,
} from "../flow/errors.ts";
import { ProviderHttpClient, type ProviderHttpOptions } from "../utils/http.ts";
import type { QueryParams } from "../utils/query-codec.ts";
import { encodeStateToken } from "../utils/state-token.ts";
import type {
  ContactsResult,
  ProviderAdapter,
  ProviderRequestContext,
} from "./provider-adapter.ts";

export type OAuth2ProviderOptions = ProviderHttpOptions & {
  clientId: string;
  clientSecret: string;
  /** Overrides the provider's default scope. */
  scope?: string;
};

const tokenResponseSchema = z.object({
  access_token: z.string().min(1),
  token_type: z.string().optional(),
  expires_in: z.number().optional(),
});

/**
 * Authorization code grant shared by the OAuth 2.0 contacts providers.
 * Subclasses supply the endpoints and the contacts request.
 */
export abstract class OAuth2ProviderAdapter implements ProviderAdapter {
  abstract readonly name: string;
  protected abstract readonly authorizationEndpoint: string;
  protected abstract readonly tokenEndpoint: string;
  protected abstract readonly defaultScope: string;

  protected readonly http: ProviderHttpClient;

  constructor(protected readonly options: OAuth2ProviderOptions) {
    this.http = new ProviderHttpClient(options);
  }

  protected abstract fetchContactsWithToken(
    accessToken: string,
  ): Promise<ContactsResult>;

  protected extraAuthorizationParams(): Record<string, string> {
    return {};
  }

  // OAuth, Authorization Code Grant, Authorization Request - https://datatracker.ietf.org/doc/html/rfc6749#section-4.1.1
  async requestAuthorizationFromUser(
    params: QueryParams,
    context: ProviderRequestContext,
  ): Promise<FlowResult<string>> {
    const authorizeUrl = new URL(this.authorizationEndpoint);
    authorizeUrl.search = new URLSearchParams({
      response_type: "code",
      client_id: this.options.clientId,
      redirect_uri: context.redirectUri,
      scope: this.options.scope ?? this.defaultScope,
      state: encodeStateToken(params),
      ...this.extraAuthorizationParams(),
    }).toString();

    context.log.debug(
      { provider: this.name, authorizeUrl: authorizeUrl.toString() },
      "Authorization Request",
    );
    return ok(authorizeUrl.toString());
  }

  // OAuth, Authorization Code Grant, Authorization Response - https://datatracker.ietf.org/doc/html/rfc6749#section-4.1.2
  async fetchContacts(
    context: ProviderRequestContext,
  ): Promise<FlowResult<ContactsResult>> {
    const { code, error } = context.query;
    if (error) {
      return fail(
        "not_authorized",
        `${this.name} authorization failed: ${error}`,
      );
    }
    if (!code) {
      return fail(
        "not_authorized",
        `${this.name} callback did not include an authorization code`,
      );
    }

    const accessToken = await this.exchangeCodeForToken(
      code,
      context.redirectUri,
    );
    return ok(await this.fetchContactsWithToken(accessToken));
  }

  // OAuth, Access Token Request - https://datatracker.ietf.org/doc/html/rfc6749#section-4.1.3
  protected async exchangeCodeForToken(
    code: string,
    redirectUri: string,
  ): Promise<string> {
    const body = await this.http.requestJson(this.tokenEndpoint, {
      method: "POST",
      headers: { "content-type": "application/x-www-form-urlencoded" },
      body: new URLSearchParams({
        grant_type: "authorization_code",
        code,
        redirect_uri: redirectUri,
        client_id: this.options.clientId,
        client_secret: this.options.clientSecret,
      }).toString(),
    });
    return parseResponse(tokenResponseSchema, body, this.tokenEndpoint)
      .access_token;
  }
}

export function parseResponse<T extends z.ZodTypeAny>(
  schema: T,
  body: unknown,
  url: string,
): z.infer<T> {
  const parsed = schema.safeParse(body);
  if (!parsed.success) {
    const issues = parsed.error.issues
      .map((issue) => `${issue.path.join(".") || "(root)"} ${issue.message}`)
      .join("; ");
    throw new ProviderError(`Unexpected response from ${url}: ${issues}`);
  }
  return parsed.data;
}
