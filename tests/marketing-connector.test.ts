import { describe, expect, it, vi } from "vitest";
import { PLACEHOLDER_ACCESS_TOKEN, type CredentialInput } from "../src/core/connectors/credentials.js";
import { ConfigurationError } from "../src/core/connectors/errors.js";
import { MarketingConnector } from "../src/core/connectors/marketing-connector.js";
import { FakeGateway, basicHeader, jsonResponse, textResponse } from "./helpers/fake-gateway.js";

const BASE_URL = "https://marketing.test/api";

const CONTACT = {
  id: 100,
  points: 50,
  tags: ["High_Value"],
  fields: {
    core: {
      email: { value: "maria@example.com" },
      firstname: { value: "Maria" }
    }
  }
};

function createConnector(gateway: FakeGateway, credentials: CredentialInput = { accessToken: "test-token" }) {
  return new MarketingConnector({ baseUrl: BASE_URL, credentials, gateway });
}

function keyedContacts(from: number, to: number): Record<string, { id: number }> {
  const out: Record<string, { id: number }> = {};
  for (let id = from; id < to; id += 1) {
    out[String(id)] = { id };
  }
  return out;
}

describe("MarketingConnector.getContactByEmail", () => {
  it("searches by email and returns the single match", async () => {
    const gateway = new FakeGateway().enqueue(jsonResponse(200, { total: 1, contacts: { "100": CONTACT } }));
    const result = await createConnector(gateway).getContactByEmail("maria@example.com");

    expect(result).toEqual({ ok: true, value: CONTACT });
    expect(gateway.requests[0]).toEqual({
      method: "GET",
      url: `${BASE_URL}/contacts`,
      query: { search: "email:maria@example.com", limit: 1 },
      body: undefined,
      headers: { authorization: "Bearer test-token" }
    });
  });

  it("returns not-found for an empty mapping", async () => {
    const gateway = new FakeGateway().enqueue(jsonResponse(200, { total: 0, contacts: {} }));
    const result = await createConnector(gateway).getContactByEmail("nobody@example.com");

    expect(result).toEqual({
      ok: false,
      error: { kind: "not_found", code: "not_found", message: "No marketing contact found with email: nobody@example.com." }
    });
  });

  it("accepts an empty list in place of an empty mapping", async () => {
    const gateway = new FakeGateway().enqueue(jsonResponse(200, { total: 0, contacts: [] }));
    const result = await createConnector(gateway).getContactByEmail("nobody@example.com");

    expect(result.ok).toBe(false);
    if (!result.ok) {
      expect(result.error.kind).toBe("not_found");
    }
  });

  it("rejects an empty email without a request", async () => {
    const gateway = new FakeGateway();
    const result = await createConnector(gateway).getContactByEmail("  ");

    expect(result.ok).toBe(false);
    expect(gateway.requests).toHaveLength(0);
  });
});

describe("MarketingConnector.listContacts", () => {
  it("returns records in mapping order with the remote total", async () => {
    const gateway = new FakeGateway().enqueue(
      jsonResponse(200, { total: "150", contacts: { "7": { id: 7 }, "9": { id: 9 } } })
    );
    const result = await createConnector(gateway).listContacts(2, 0);

    expect(result).toEqual({ ok: true, value: { records: [{ id: 7 }, { id: 9 }], total: 150 } });
    expect(gateway.requests[0]?.query).toEqual({ limit: 2, start: 0 });
  });

  it("surfaces structured validation errors with the remote message", async () => {
    const gateway = new FakeGateway().enqueue(
      jsonResponse(400, { errors: [{ message: "The email field is required.", code: 400 }] })
    );
    const result = await createConnector(gateway).listContacts(1, 0);

    expect(result).toEqual({
      ok: false,
      error: {
        kind: "validation",
        code: "400",
        httpStatus: 400,
        message: "Marketing validation error: The email field is required."
      }
    });
  });

  it("reads the first validation entry even when later entries lack a message", async () => {
    const gateway = new FakeGateway().enqueue(
      jsonResponse(422, { errors: [{ message: "email: invalid", code: 422 }, { code: 400 }] })
    );
    const result = await createConnector(gateway).addTagToContact(100, "VIP");

    expect(result).toEqual({
      ok: false,
      error: { kind: "validation", code: "422", httpStatus: 422, message: "Marketing validation error: email: invalid" }
    });
  });

  it("keeps unstructured failures as plain HTTP errors", async () => {
    const gateway = new FakeGateway().enqueue(textResponse(503, "Service Unavailable"));
    const result = await createConnector(gateway).listContacts(1, 0);

    expect(result).toEqual({
      ok: false,
      error: { kind: "http_status", httpStatus: 503, message: "HTTP 503 error. Detail: Service Unavailable" }
    });
  });

  it("rejects a non-positive limit", async () => {
    const gateway = new FakeGateway();
    const result = await createConnector(gateway).listContacts(0, 0);

    expect(result.ok).toBe(false);
    if (!result.ok) {
      expect(result.error.kind).toBe("invalid_input");
    }
    expect(gateway.requests).toHaveLength(0);
  });
});

describe("MarketingConnector.listAllContacts", () => {
  it("walks pages of 100 until a short page", async () => {
    const gateway = new FakeGateway().enqueue(
      jsonResponse(200, { total: 150, contacts: keyedContacts(0, 100) }),
      jsonResponse(200, { total: 150, contacts: keyedContacts(100, 150) })
    );
    const result = await createConnector(gateway).listAllContacts();

    expect(result.ok).toBe(true);
    if (result.ok) {
      expect(result.value).toHaveLength(150);
      expect(result.value[0]).toEqual({ id: 0 });
      expect(result.value[149]).toEqual({ id: 149 });
    }
    expect(gateway.requests.map((request) => request.query)).toEqual([
      { limit: 100, start: 0 },
      { limit: 100, start: 100 }
    ]);
  });

  it("stops at the record ceiling when the remote always returns full pages", async () => {
    const fullPage = { total: 50_000, contacts: keyedContacts(0, 100) };
    const gateway = new FakeGateway().respondAlways(() => jsonResponse(200, fullPage));
    const result = await createConnector(gateway).listAllContacts();

    expect(gateway.requests).toHaveLength(100);
    expect(gateway.requests[99]?.query).toEqual({ limit: 100, start: 9_900 });
    expect(result.ok).toBe(true);
    if (result.ok) {
      expect(result.value).toHaveLength(10_000);
    }
  });

  it("fails fast on a record ceiling that is not a positive integer", () => {
    expect(
      () =>
        new MarketingConnector({
          baseUrl: BASE_URL,
          credentials: { accessToken: "test-token" },
          gateway: new FakeGateway(),
          maxRecords: Number.NaN
        })
    ).toThrow("marketing: record ceiling must be a positive integer: NaN");
  });

  it("stops after the failing page", async () => {
    const gateway = new FakeGateway().enqueue(
      jsonResponse(200, { total: 300, contacts: keyedContacts(0, 100) }),
      { kind: "transport_error", message: "Request timed out after 1000ms", timedOut: true }
    );
    const result = await createConnector(gateway).listAllContacts();

    expect(result).toEqual({
      ok: false,
      error: { kind: "transport", code: "timeout", message: "Request timed out after 1000ms" }
    });
    expect(gateway.requests).toHaveLength(2);
  });
});

describe("MarketingConnector.addTagToContact", () => {
  it("posts a singleton tag list and returns the contact", async () => {
    const gateway = new FakeGateway().enqueue(jsonResponse(200, { success: true, contact: CONTACT }));
    const result = await createConnector(gateway).addTagToContact(100, "New_Tag");

    expect(result).toEqual({ ok: true, value: CONTACT });
    expect(gateway.requests[0]).toMatchObject({
      method: "POST",
      url: `${BASE_URL}/contacts/100/tags/add`,
      body: { tags: ["New_Tag"] }
    });
  });

  it("distinguishes rejected input from an unreachable service", async () => {
    const gateway = new FakeGateway().enqueue(
      jsonResponse(422, { errors: [{ message: "Tag name is too long.", code: 422 }] }),
      { kind: "transport_error", message: "Connection error: getaddrinfo ENOTFOUND", timedOut: false }
    );
    const connector = createConnector(gateway);

    const rejected = await connector.addTagToContact(100, "x".repeat(300));
    const unreachable = await connector.addTagToContact(100, "Short");

    expect(rejected.ok ? null : rejected.error.kind).toBe("validation");
    expect(rejected.ok ? null : rejected.error.message).toBe("Marketing validation error: Tag name is too long.");
    expect(unreachable.ok ? null : unreachable.error.kind).toBe("transport");
  });

  it("rejects an empty tag without a request", async () => {
    const gateway = new FakeGateway();
    const result = await createConnector(gateway).addTagToContact(100, "");

    expect(result.ok).toBe(false);
    expect(gateway.requests).toHaveLength(0);
  });
});

describe("MarketingConnector.getContactSegments", () => {
  it("lists the segments of a contact", async () => {
    const gateway = new FakeGateway().enqueue(
      jsonResponse(200, {
        total: 2,
        lists: {
          "3": { id: 3, name: "Newsletter", alias: "newsletter" },
          "8": { id: 8, name: "VIP", alias: "vip" }
        }
      })
    );
    const result = await createConnector(gateway).getContactSegments(100);

    expect(result).toEqual({
      ok: true,
      value: [
        { id: 3, name: "Newsletter", alias: "newsletter" },
        { id: 8, name: "VIP", alias: "vip" }
      ]
    });
    expect(gateway.requests[0]?.url).toBe(`${BASE_URL}/contacts/100/segments`);
  });
});

describe("MarketingConnector credentials", () => {
  it("uses basic auth when no token is given", async () => {
    const gateway = new FakeGateway().enqueue(jsonResponse(200, { total: 0, contacts: {} }));
    const connector = createConnector(gateway, { username: "test-user", secret: "test-password" });
    await connector.listContacts(1, 0);

    expect(connector.authScheme).toBe("basic");
    expect(gateway.requests[0]?.headers).toEqual({ authorization: basicHeader("test-user", "test-password") });
  });

  it("prefers basic credentials over a client id pair", () => {
    const connector = createConnector(new FakeGateway(), {
      username: "test-user",
      secret: "test-password",
      clientId: "test-client",
      clientSecret: "test-secret"
    });
    expect(connector.authScheme).toBe("basic");
  });

  it("falls back to the placeholder token for a client id pair", async () => {
    const gateway = new FakeGateway().enqueue(jsonResponse(200, { total: 0, contacts: {} }));
    const connector = createConnector(gateway, { clientId: "test-client", clientSecret: "test-secret" });
    await connector.listContacts(1, 0);

    expect(connector.authScheme).toBe("client_credentials");
    expect(gateway.requests[0]?.headers).toEqual({ authorization: `Bearer ${PLACEHOLDER_ACCESS_TOKEN}` });
  });

  it("exchanges client credentials once and reuses the token", async () => {
    const gateway = new FakeGateway().enqueue(
      jsonResponse(200, { total: 0, contacts: {} }),
      jsonResponse(200, { total: 0, contacts: {} })
    );
    const tokenExchange = vi.fn(async () => "exchanged-token");
    const connector = createConnector(gateway, { clientId: "test-client", clientSecret: "test-secret", tokenExchange });

    await connector.listContacts(1, 0);
    await connector.listContacts(1, 1);

    expect(tokenExchange).toHaveBeenCalledTimes(1);
    expect(tokenExchange).toHaveBeenCalledWith({ clientId: "test-client", clientSecret: "test-secret" });
    expect(gateway.requests.map((request) => request.headers)).toEqual([
      { authorization: "Bearer exchanged-token" },
      { authorization: "Bearer exchanged-token" }
    ]);
  });

  it("reports a failed exchange at first call as a configuration error", async () => {
    const gateway = new FakeGateway();
    const connector = createConnector(gateway, {
      clientId: "test-client",
      clientSecret: "test-secret",
      tokenExchange: async () => {
        throw new Error("token endpoint not configured");
      }
    });
    const result = await connector.getContactByEmail("maria@example.com");

    expect(result).toEqual({
      ok: false,
      error: {
        kind: "configuration",
        code: "token_exchange_failed",
        message: "Token exchange failed: token endpoint not configured"
      }
    });
    expect(gateway.requests).toHaveLength(0);
  });

  it("fails at construction when no credential shape is complete", () => {
    expect(() => createConnector(new FakeGateway(), { clientId: "test-client" })).toThrow(ConfigurationError);
    expect(() => createConnector(new FakeGateway(), {})).toThrow(
      "marketing: no usable credentials; provide an access token, a username and secret, or a client id and secret."
    );
  });
});
