import { z } from "zod";
import type { Logger } from "../../lib/logger.js";
import { silentLogger } from "../../lib/logger.js";
import { normalizeBaseUrl, resolveCredentials, type CredentialInput, type CredentialProvider } from "./credentials.js";
import { FetchHttpGateway, joinUrl, summarizeBody, type HttpGateway, type HttpMethod, type QueryValue, type RawResponse } from "./http-gateway.js";
import { collectAllPages, resolvePagingLimits } from "./pagination.js";
import { err, ok, type ConnectorResult, type ContactPage, type ContactRecord } from "./types.js";

const recordSchema = z.record(z.string(), z.unknown());

// Keyed by id as a string; an empty collection may come back as [] instead of {}.
const keyedRecordsSchema = z.union([z.array(recordSchema), z.record(z.string(), recordSchema)]);

const contactListSchema = z.object({
  total: z.union([z.number(), z.string()]).optional(),
  contacts: keyedRecordsSchema.optional()
});

const contactEnvelopeSchema = z.object({
  contact: recordSchema
});

const segmentListSchema = z.object({
  lists: keyedRecordsSchema.optional()
});

// Only the first entry is read; later entries may be of any shape.
const validationErrorSchema = z.object({
  errors: z.array(z.unknown()).min(1)
});

const validationEntrySchema = z.object({
  message: z.string(),
  code: z.union([z.string(), z.number()]).optional()
});

export type Segment = Record<string, unknown>;
export type ContactId = number | string;

export interface MarketingConnectorOptions {
  baseUrl: string;
  credentials: CredentialInput;
  gateway?: HttpGateway | undefined;
  pageSize?: number | undefined;
  maxRecords?: number | undefined;
  logger?: Logger | undefined;
}

function toList(records: z.infer<typeof keyedRecordsSchema> | undefined): ContactRecord[] {
  if (!records) {
    return [];
  }
  return Array.isArray(records) ? records : Object.values(records);
}

function toTotal(raw: number | string | undefined, fallback: number): number {
  if (raw === undefined) {
    return fallback;
  }
  const value = typeof raw === "number" ? raw : Number.parseInt(raw, 10);
  return Number.isFinite(value) ? value : fallback;
}

function invalidResponse(message: string): ConnectorResult<never> {
  return err({ kind: "api", code: "invalid_response", message });
}

/**
 * Structured `errors[]` bodies are reported as validation failures whatever
 * the status code; any other non-2xx is a plain HTTP failure.
 */
export function normalizeMarketingResponse(response: RawResponse): ConnectorResult<unknown> {
  const validation = validationErrorSchema.safeParse(response.body);
  if (validation.success) {
    const first = validationEntrySchema.safeParse(validation.data.errors[0]);
    if (first.success) {
      return err({
        kind: "validation",
        code: first.data.code === undefined ? undefined : String(first.data.code),
        httpStatus: response.status,
        message: `Marketing validation error: ${first.data.message}`
      });
    }
  }

  if (response.status < 200 || response.status >= 300) {
    return err({
      kind: "http_status",
      httpStatus: response.status,
      message: `HTTP ${response.status} error. Detail: ${summarizeBody(response.text)}`
    });
  }

  if (response.body === null) {
    return err({
      kind: "api",
      code: "invalid_response",
      httpStatus: response.status,
      message: "Marketing API returned a response body that is not JSON."
    });
  }
  return ok(response.body);
}

export class MarketingConnector {
  readonly system = "marketing";
  private readonly baseUrl: string;
  private readonly credentials: CredentialProvider;
  private readonly gateway: HttpGateway;
  private readonly pageSize: number;
  private readonly maxRecords: number;
  private readonly logger: Logger;

  constructor(options: MarketingConnectorOptions) {
    this.logger = options.logger ?? silentLogger;
    this.baseUrl = normalizeBaseUrl(this.system, options.baseUrl);
    this.credentials = resolveCredentials(this.system, options.credentials, this.logger);
    this.gateway = options.gateway ?? new FetchHttpGateway();
    const limits = resolvePagingLimits(this.system, options);
    this.pageSize = limits.pageSize;
    this.maxRecords = limits.maxRecords;
  }

  get authScheme(): CredentialProvider["scheme"] {
    return this.credentials.scheme;
  }

  /** The API has no direct by-email lookup, so this goes through search. */
  async getContactByEmail(email: string): Promise<ConnectorResult<ContactRecord>> {
    if (email.trim().length === 0) {
      return err({ kind: "invalid_input", code: "missing_email", message: "Email must not be empty." });
    }
    const result = await this.request("GET", "contacts", { query: { search: `email:${email}`, limit: 1 } });
    if (!result.ok) {
      return result;
    }
    const parsed = contactListSchema.safeParse(result.value);
    if (!parsed.success) {
      return invalidResponse("Marketing contact search returned an unexpected shape.");
    }
    const [first] = toList(parsed.data.contacts);
    if (!first) {
      return err({ kind: "not_found", code: "not_found", message: `No marketing contact found with email: ${email}.` });
    }
    return ok(first);
  }

  async listContacts(limit: number, start: number): Promise<ConnectorResult<ContactPage>> {
    if (!Number.isInteger(limit) || limit < 1 || !Number.isInteger(start) || start < 0) {
      return err({
        kind: "invalid_input",
        code: "invalid_page",
        message: `Invalid page request: limit=${limit}, start=${start}.`
      });
    }
    const result = await this.request("GET", "contacts", { query: { limit, start } });
    if (!result.ok) {
      return result;
    }
    const parsed = contactListSchema.safeParse(result.value);
    if (!parsed.success) {
      return invalidResponse("Marketing contact list returned an unexpected shape.");
    }
    const records = toList(parsed.data.contacts);
    return ok({ records, total: toTotal(parsed.data.total, records.length) });
  }

  async listAllContacts(): Promise<ConnectorResult<ContactRecord[]>> {
    return collectAllPages(
      async (cursor) => {
        const page = await this.listContacts(cursor.pageSize, cursor.offset);
        return page.ok ? ok(page.value.records) : page;
      },
      {
        label: "marketing.listAllContacts",
        pageSize: this.pageSize,
        maxRecords: this.maxRecords,
        logger: this.logger
      }
    );
  }

  async addTagToContact(contactId: ContactId, tag: string): Promise<ConnectorResult<ContactRecord>> {
    const id = String(contactId).trim();
    if (id.length === 0) {
      return err({ kind: "invalid_input", code: "missing_contact_id", message: "Contact id must not be empty." });
    }
    if (tag.trim().length === 0) {
      return err({ kind: "invalid_input", code: "missing_tag", message: "Tag must not be empty." });
    }
    const result = await this.request("POST", `contacts/${encodeURIComponent(id)}/tags/add`, {
      body: { tags: [tag] }
    });
    if (!result.ok) {
      return result;
    }
    const parsed = contactEnvelopeSchema.safeParse(result.value);
    if (!parsed.success) {
      return invalidResponse("Marketing tag response did not include the contact.");
    }
    return ok(parsed.data.contact);
  }

  async getContactSegments(contactId: ContactId): Promise<ConnectorResult<Segment[]>> {
    const id = String(contactId).trim();
    if (id.length === 0) {
      return err({ kind: "invalid_input", code: "missing_contact_id", message: "Contact id must not be empty." });
    }
    const result = await this.request("GET", `contacts/${encodeURIComponent(id)}/segments`, {});
    if (!result.ok) {
      return result;
    }
    const parsed = segmentListSchema.safeParse(result.value);
    if (!parsed.success) {
      return invalidResponse("Marketing segment list returned an unexpected shape.");
    }
    return ok(toList(parsed.data.lists));
  }

  private async request(
    method: HttpMethod,
    endpoint: string,
    options: { query?: Record<string, QueryValue> | undefined; body?: unknown }
  ): Promise<ConnectorResult<unknown>> {
    const authorization = await this.credentials.authorizationHeader();
    if (!authorization.ok) {
      return authorization;
    }

    const outcome = await this.gateway.send({
      method,
      url: joinUrl(this.baseUrl, endpoint),
      query: options.query,
      body: options.body,
      headers: { authorization: authorization.value }
    });

    if (outcome.kind === "transport_error") {
      return err({
        kind: "transport",
        code: outcome.timedOut ? "timeout" : "connection_error",
        message: outcome.message
      });
    }
    return normalizeMarketingResponse(outcome.response);
  }
}
