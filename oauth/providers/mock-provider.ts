import { fail, ok, type FlowError, type FlowResult } from "../flow/errors.ts";
import { encodeQuery, type QueryParams } from "../utils/query-codec.ts";
import { encodeStateToken } from "../utils/state-token.ts";
import type {
  Contact,
  ContactsResult,
  ProviderAdapter,
  ProviderRequestContext,
} from "./provider-adapter.ts";

export const MOCK_AUTHORIZATION_CODE = "mock-code";

export const DEFAULT_MOCK_CONTACTS: Contact[] = [
  {
    id: "mock-1",
    name: "Ada Example",
    firstName: "Ada",
    lastName: "Example",
    email: "ada@example.com",
    emails: ["ada@example.com"],
    phoneNumbers: ["+1 555 0100"],
  },
  {
    id: "mock-2",
    name: "Grace Example",
    firstName: "Grace",
    lastName: "Example",
    email: "grace@example.com",
    emails: ["grace@example.com"],
    phoneNumbers: [],
  },
];

export type MockProviderOptions = {
  contacts?: Contact[];
  /** Makes every `fetchContacts` call fail with this error. */
  failure?: FlowError;
};

/**
 * Stands in for a real provider: the consent screen is skipped and the user
 * goes straight to the callback, where canned contacts (or a canned failure)
 * are returned.
 */
export class MockProviderAdapter implements ProviderAdapter {
  constructor(
    readonly name: string,
    private readonly options: MockProviderOptions = {},
  ) {}

  async requestAuthorizationFromUser(
    params: QueryParams,
    context: ProviderRequestContext,
  ): Promise<FlowResult<string>> {
    const query = encodeQuery({
      code: MOCK_AUTHORIZATION_CODE,
      state: encodeStateToken(params),
    });
    return ok(`${context.redirectUri}?${query}`);
  }

  async fetchContacts(): Promise<FlowResult<ContactsResult>> {
    const { failure } = this.options;
    if (failure) {
      return fail(failure.kind, failure.message);
    }
    return ok(this.options.contacts ?? DEFAULT_MOCK_CONTACTS);
  }
}
