import { z } from "zod";
import { OAuth2ProviderAdapter, parseResponse } from "./oauth2-provider.ts";
import type { Contact, ContactsResult } from "./provider-adapter.ts";

const CONTACTS_URL = "https://graph.microsoft.com/v1.0/me/contacts";

const contactsResponseSchema = z.object({
  value: z.array(
    z.object({
      id: z.string(),
      displayName: z.string().nullish(),
      givenName: z.string().nullish(),
      surname: z.string().nullish(),
      emailAddresses: z
        .array(z.object({ address: z.string().nullish() }))
        .nullish(),
      mobilePhone: z.string().nullish(),
      homePhones: z.array(z.string()).nullish(),
      businessPhones: z.array(z.string()).nullish(),
    }),
  ),
  "@odata.nextLink": z.string().optional(),
});

type GraphContact = z.infer<typeof contactsResponseSchema>["value"][number];

/** Outlook.com / Microsoft 365 contacts through Microsoft Graph. */
export class HotmailProviderAdapter extends OAuth2ProviderAdapter {
  readonly name = "hotmail";
  protected readonly authorizationEndpoint =
    "https://login.microsoftonline.com/common/oauth2/v2.0/authorize";
  protected readonly tokenEndpoint =
    "https://login.microsoftonline.com/common/oauth2/v2.0/token";
  protected readonly defaultScope = "Contacts.Read";

  protected async fetchContactsWithToken(
    accessToken: string,
  ): Promise<ContactsResult> {
    const contacts: Contact[] = [];
    const firstPage = new URL(CONTACTS_URL);
    firstPage.searchParams.set("$top", "100");
    let next: string | undefined = firstPage.toString();

    while (next) {
      const body = await this.http.requestJson(next, {
        headers: { authorization: `Bearer ${accessToken}` },
      });
      const page = parseResponse(contactsResponseSchema, body, CONTACTS_URL);

      for (const contact of page.value) {
        contacts.push(toContact(contact));
      }
      next = page["@odata.nextLink"];
    }

    return contacts;
  }
}

function toContact(contact: GraphContact): Contact {
  const emails = (contact.emailAddresses ?? []).flatMap((email) =>
    email.address ? [email.address] : [],
  );
  const phoneNumbers = [
    ...(contact.mobilePhone ? [contact.mobilePhone] : []),
    ...(contact.homePhones ?? []),
    ...(contact.businessPhones ?? []),
  ];
  return {
    id: contact.id,
    name: contact.displayName ?? undefined,
    firstName: contact.givenName ?? undefined,
    lastName: contact.surname ?? undefined,
    email: emails[0],
    emails,
    phoneNumbers,
  };
}
