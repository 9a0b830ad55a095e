import { z } from "zod";
import type { QueryParams } from "./query-codec.ts";

const statePayloadSchema = z.object({
  qs: z.unknown().optional(),
});

// Checked as entries: a record schema would drop a "__proto__" key.
const queryEntriesSchema = z.array(z.tuple([z.string(), z.string()]));

export function encodeStateToken(params: QueryParams): string {
  return Buffer.from(JSON.stringify({ qs: params }), "utf8").toString(
    "base64url",
  );
}

// A token that does not decode to {"qs": {...}} carries no params.
export function decodeStateToken(token: string | undefined): QueryParams {
  if (!token) {
    return {};
  }

  let payload: unknown;
  try {
    payload = JSON.parse(Buffer.from(token, "base64url").toString("utf8"));
  } catch {
    return {};
  }

  const parsed = statePayloadSchema.safeParse(payload);
  if (!parsed.success) {
    return {};
  }
  const { qs } = parsed.data;
  if (typeof qs !== "object" || qs === null || Array.isArray(qs)) {
    return {};
  }
  const entries = queryEntriesSchema.safeParse(Object.entries(qs));
  return entries.success ? Object.fromEntries(entries.data) : {};
}
