import { z } from "zod";
import { OAuth2ProviderAdapter, parseResponse } from "./oauth2-provider.ts";
import type { Contact, ContactsResult } from "./provider-adapter.ts";

const CONNECTIONS_URL = "https://people.googleapis.com/v1/people/me/connections";

const valueListSchema = z
  .array(z.object({ value: z.string().optional() }))
  .optional();

const connectionsResponseSchema = z.object({
  connections: z
    .array(
      z.object({
        resourceName: z.string(),
        names: z
          .array(
            z.object({
              displayName: z.string().optional(),
              givenName: z.string().optional(),
              familyName: z.string().optional(),
            }),
          )
          .optional(),
        emailAddresses: valueListSchema,
        phoneNumbers: valueListSchema,
      }),
    )
    .optional(),
  nextPageToken: z.string().optional(),
});

type Connection = NonNullable<
  z.infer<typeof connectionsResponseSchema>["connections"]
>[number];

/** Google contacts through the People API. */
export class GmailProviderAdapter extends OAuth2ProviderAdapter {
  readonly name = "gmail";
  protected readonly authorizationEndpoint =
    "https://accounts.google.com/o/oauth2/v2/auth";
  protected readonly tokenEndpoint = "https://oauth2.googleapis.com/token";
  protected readonly defaultScope =
    "https://www.googleapis.com/auth/contacts.readonly";

  protected extraAuthorizationParams(): Record<string, string> {
    return { access_type: "online", prompt: "consent" };
  }

  protected async fetchContactsWithToken(
    accessToken: string,
  ): Promise<ContactsResult> {
    const contacts: Contact[] = [];
    let pageToken: string | undefined;

    do {
      const url = new URL(CONNECTIONS_URL);
      url.searchParams.set("personFields", "names,emailAddresses,phoneNumbers");
      url.searchParams.set("pageSize", "1000");
      if (pageToken) {
        url.searchParams.set("pageToken", pageToken);
      }

      const body = await this.http.requestJson(url.toString(), {
        headers: { authorization: `Bearer ${accessToken}` },
      });
      const page = parseResponse(connectionsResponseSchema, body, CONNECTIONS_URL);

      for (const connection of page.connections ?? []) {
        contacts.push(toContact(connection));
      }
      pageToken = page.nextPageToken;
    } while (pageToken);

    return contacts;
  }
}

function toContact(connection: Connection): Contact {
  const name = connection.names?.[0];
  const emails = values(connection.emailAddresses);
  return {
    id: connection.resourceName,
    name: name?.displayName,
    firstName: name?.givenName,
    lastName: name?.familyName,
    email: emails[0],
    emails,
    phoneNumbers: values(connection.phoneNumbers),
  };
}

function values(list: { value?: string }[] | undefined): string[] {
  return (list ?? []).flatMap((item) => (item.value ? [item.value] : []));
}
