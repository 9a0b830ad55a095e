import { z } from "zod";
import { ConfigurationError } from "./flow/errors.ts";
import { DEFAULT_HTTP_TIMEOUT_MS } from "./utils/http.ts";

const optionalString = z
  .string()
  .optional()
  .transform((value) => (value ? value : undefined));

export const EnvSchema = z.object({
  PORT: z.coerce.number().int().min(0).max(65535).default(3000),
  HOST: z.string().default("localhost"),
  /** Public origin used in redirect URIs, e.g. https://app.example.com */
  BASE_URL: z
    .string()
    .url()
    .optional()
    .transform((value) => value?.replace(/\/+$/, "")),
  SESSION_SECRET: z
    .string({ required_error: "SESSION_SECRET is required" })
    .min(32, "SESSION_SECRET must be at least 32 characters"),
  CONTACTS_SSL_CA_FILE: optionalString,
  CONTACTS_HTTP_TIMEOUT_MS: z.coerce
    .number()
    .int()
    .positive()
    .default(DEFAULT_HTTP_TIMEOUT_MS),
  CONTACTS_TEST_MODE: z
    .enum(["true", "false"])
    .default("false")
    .transform((value) => value === "true"),
  GOOGLE_CLIENT_ID: optionalString,
  GOOGLE_CLIENT_SECRET: optionalString,
  MICROSOFT_CLIENT_ID: optionalString,
  MICROSOFT_CLIENT_SECRET: optionalString,
});

export type Env = z.infer<typeof EnvSchema>;

export type ProviderCredentials = { clientId: string; clientSecret: string };

export type AppConfig = {
  port: number;
  host: string;
  baseUrl?: string;
  sessionSecret: string;
  sslCaFile?: string;
  httpTimeoutMs: number;
  testMode: boolean;
  gmail?: ProviderCredentials;
  hotmail?: ProviderCredentials;
};

export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const parsed = EnvSchema.safeParse(env);
  if (!parsed.success) {
    const issues = parsed.error.issues
      .map((issue) => `${issue.path.join(".")}: ${issue.message}`)
      .join(", ");
    throw new ConfigurationError(`Invalid configuration: ${issues}`);
  }
  const vars = parsed.data;

  return {
    port: vars.PORT,
    host: vars.HOST,
    baseUrl: vars.BASE_URL,
    sessionSecret: vars.SESSION_SECRET,
    sslCaFile: vars.CONTACTS_SSL_CA_FILE,
    httpTimeoutMs: vars.CONTACTS_HTTP_TIMEOUT_MS,
    testMode: vars.CONTACTS_TEST_MODE,
    gmail: credentials(vars.GOOGLE_CLIENT_ID, vars.GOOGLE_CLIENT_SECRET),
    hotmail: credentials(vars.MICROSOFT_CLIENT_ID, vars.MICROSOFT_CLIENT_SECRET),
  };
}

function credentials(
  clientId: string | undefined,
  clientSecret: string | undefined,
): ProviderCredentials | undefined {
  if (!clientId || !clientSecret) {
    return undefined;
  }
  return { clientId, clientSecret };
}
