import { MockAgent, errors } from "undici";
import { afterEach, beforeEach, describe, expect, it } from "vitest";
import {
  AuthorizationDeniedError,
  ProviderError,
  ProviderTimeoutError,
  classifyFailure,
} from "../../oauth/flow/errors.ts";
import { ProviderHttpClient } from "../../oauth/utils/http.ts";

const ORIGIN = "https://api.example.com";
const URL_UNDER_TEST = `${ORIGIN}/data`;

describe("cl:ProviderHttpClient", () => {
  let mockAgent: MockAgent;
  let client: ProviderHttpClient;

  beforeEach(() => {
    mockAgent = new MockAgent();
    mockAgent.disableNetConnect();
    client = new ProviderHttpClient({ dispatcher: mockAgent });
  });

  afterEach(async () => {
    await mockAgent.close();
  });

  it("should parse a JSON response", async () => {
    mockAgent
      .get(ORIGIN)
      .intercept({ path: "/data", method: "GET" })
      .reply(200, { items: [1, 2] });

    expect(await client.requestJson(URL_UNDER_TEST)).toEqual({ items: [1, 2] });
  });

  it("should send the requested method", async () => {
    mockAgent
      .get(ORIGIN)
      .intercept({ path: "/data", method: "POST" })
      .reply(200, { ok: true });

    const body = await client.requestJson(URL_UNDER_TEST, {
      method: "POST",
      headers: { "content-type": "application/x-www-form-urlencoded" },
      body: "a=1",
    });

    expect(body).toEqual({ ok: true });
  });

  it("should treat 401 and 403 as a denied authorization", async () => {
    mockAgent
      .get(ORIGIN)
      .intercept({ path: "/data", method: "GET" })
      .reply(403, "forbidden");

    await expect(client.requestJson(URL_UNDER_TEST)).rejects.toThrow(
      new AuthorizationDeniedError(
        "https://api.example.com/data responded with 403: forbidden",
      ),
    );
  });

  it("should treat other error statuses as provider errors", async () => {
    mockAgent
      .get(ORIGIN)
      .intercept({ path: "/data", method: "GET" })
      .reply(502, "bad gateway");

    const error = await client.requestJson(URL_UNDER_TEST).catch((e) => e);

    expect(error).toBeInstanceOf(ProviderError);
    expect(classifyFailure(error)?.kind).toBe("internal_error");
  });

  it("should reject a body that is not JSON", async () => {
    mockAgent
      .get(ORIGIN)
      .intercept({ path: "/data", method: "GET" })
      .reply(200, "<html></html>");

    await expect(client.requestJson(URL_UNDER_TEST)).rejects.toThrow(
      "https://api.example.com/data responded with a non-JSON body",
    );
  });

  it("should report transport timeouts as timeouts", async () => {
    mockAgent
      .get(ORIGIN)
      .intercept({ path: "/data", method: "GET" })
      .replyWithError(new errors.HeadersTimeoutError());

    const error = await client.requestJson(URL_UNDER_TEST).catch((e) => e);

    expect(error).toBeInstanceOf(ProviderTimeoutError);
    expect(classifyFailure(error)?.kind).toBe("timeout");
  });

  it("should report other transport failures as provider errors", async () => {
    mockAgent
      .get(ORIGIN)
      .intercept({ path: "/data", method: "GET" })
      .replyWithError(new Error("socket hang up"));

    const error = await client.requestJson(URL_UNDER_TEST).catch((e) => e);

    expect(error).toBeInstanceOf(ProviderError);
    expect(error).not.toBeInstanceOf(ProviderTimeoutError);
  });

  it("should read the CA bundle when one is configured", () => {
    expect(
      () => new ProviderHttpClient({ sslCaFile: "/nonexistent/ca.pem" }),
    ).toThrow(/ENOENT/);
  });
});
