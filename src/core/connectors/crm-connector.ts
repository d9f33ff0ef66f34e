import { z } from "zod";
import type { Logger } from "../../lib/logger.js";
import { silentLogger } from "../../lib/logger.js";
import { normalizeBaseUrl, resolveCredentials, type CredentialInput, type CredentialProvider } from "./credentials.js";
import { FetchHttpGateway, joinUrl, summarizeBody, type HttpGateway, type HttpMethod, type QueryValue, type RawResponse } from "./http-gateway.js";
import { collectAllPages, resolvePagingLimits } from "./pagination.js";
import { isIdentifier, selectByEmail, withLimit } from "./query-language.js";
import { err, ok, type ConnectorResult, type ContactRecord } from "./types.js";

export const DEFAULT_SCORE_FIELD = "cf_lead_score";
export const MIN_SCORE = 0;
export const MAX_SCORE = 100;

const envelopeSchema = z.object({
  success: z.unknown(),
  result: z.unknown(),
  error: z.unknown()
});

const remoteErrorSchema = z.object({
  code: z.union([z.string(), z.number()]).optional(),
  message: z.string().optional()
});

const recordSchema = z.record(z.string(), z.unknown());
const recordListSchema = z.array(recordSchema);

export interface CrmConnectorOptions {
  baseUrl: string;
  credentials: CredentialInput;
  gateway?: HttpGateway | undefined;
  pageSize?: number | undefined;
  maxRecords?: number | undefined;
  scoreField?: string | undefined;
  logger?: Logger | undefined;
}

interface RemoteError {
  code?: string | undefined;
  message?: string | undefined;
}

function readRemoteError(value: unknown): RemoteError {
  const parsed = remoteErrorSchema.safeParse(value);
  if (!parsed.success) {
    return {};
  }
  return {
    code: parsed.data.code === undefined ? undefined : String(parsed.data.code),
    message: parsed.data.message
  };
}

function invalidResponse(message: string, httpStatus: number): ConnectorResult<never> {
  return err({ kind: "api", code: "invalid_response", message, httpStatus });
}

/**
 * The CRM answers 200 for every request it can parse and reports logical
 * failures as `{ success: false, error: { code, message } }` in the body.
 */
export function normalizeCrmResponse(response: RawResponse): ConnectorResult<unknown> {
  const envelope = envelopeSchema.safeParse(response.body);
  const remoteError: RemoteError = envelope.success ? readRemoteError(envelope.data.error) : {};

  if (response.status < 200 || response.status >= 300) {
    const detail = remoteError.message ?? summarizeBody(response.text);
    return err({
      kind: "http_status",
      code: remoteError.code,
      httpStatus: response.status,
      message: `HTTP ${response.status} error. Detail: ${detail}`
    });
  }

  if (!envelope.success) {
    return invalidResponse("CRM returned a response body that is not a JSON object.", response.status);
  }

  if (envelope.data.success !== true) {
    const code = remoteError.code ?? "CRM_UNKNOWN_ERROR";
    const message = remoteError.message ?? "Unknown CRM API error.";
    return err({
      kind: "api",
      code,
      httpStatus: response.status,
      message: `CRM API error (${code}): ${message}`
    });
  }

  return ok(envelope.data.result);
}

export class CrmConnector {
  readonly system = "crm";
  readonly scoreField: string;
  private readonly baseUrl: string;
  private readonly credentials: CredentialProvider;
  private readonly gateway: HttpGateway;
  private readonly pageSize: number;
  private readonly maxRecords: number;
  private readonly logger: Logger;

  constructor(options: CrmConnectorOptions) {
    this.logger = options.logger ?? silentLogger;
    this.baseUrl = normalizeBaseUrl(this.system, options.baseUrl);
    this.credentials = resolveCredentials(this.system, options.credentials, this.logger);
    this.gateway = options.gateway ?? new FetchHttpGateway();
    const limits = resolvePagingLimits(this.system, options);
    this.pageSize = limits.pageSize;
    this.maxRecords = limits.maxRecords;
    this.scoreField = options.scoreField ?? DEFAULT_SCORE_FIELD;
  }

  get authScheme(): CredentialProvider["scheme"] {
    return this.credentials.scheme;
  }

  /**
   * Runs a query-language statement exactly as given. Callers that splice
   * user input into the statement must quote it themselves (see
   * `quoteLiteral`); this method does not inspect the string.
   */
  async query(queryString: string): Promise<ConnectorResult<ContactRecord[]>> {
    const result = await this.request("GET", "query", { query: { query: queryString } });
    if (!result.ok) {
      return result;
    }
    const rows = recordListSchema.safeParse(result.value);
    if (!rows.success) {
      return err({ kind: "api", code: "invalid_response", message: "CRM query result is not a list of records." });
    }
    return ok(rows.data);
  }

  /** `baseQuery` must not carry its own LIMIT clause. */
  async queryAll(baseQuery: string): Promise<ConnectorResult<ContactRecord[]>> {
    if (baseQuery.trim().length === 0) {
      return err({ kind: "invalid_input", code: "empty_query", message: "CRM query must not be empty." });
    }
    return collectAllPages((cursor) => this.query(withLimit(baseQuery, cursor.offset, cursor.pageSize)), {
      label: "crm.queryAll",
      pageSize: this.pageSize,
      maxRecords: this.maxRecords,
      logger: this.logger
    });
  }

  async retrieveByEmail(email: string, module = "Contacts"): Promise<ConnectorResult<ContactRecord>> {
    if (!isIdentifier(module)) {
      return err({ kind: "invalid_input", code: "invalid_module", message: `Invalid CRM module name: ${module}` });
    }
    const result = await this.query(selectByEmail(module, email));
    if (!result.ok) {
      return result;
    }
    const [first] = result.value;
    if (!first) {
      return err({ kind: "not_found", code: "not_found", message: `No ${module} record found with email: ${email}.` });
    }
    return ok(first);
  }

  async update(recordId: string, fieldValues: ContactRecord): Promise<ConnectorResult<ContactRecord>> {
    if (recordId.trim().length === 0) {
      return err({ kind: "invalid_input", code: "missing_record_id", message: "CRM record id must not be empty." });
    }
    const element = { ...fieldValues, id: recordId };
    const result = await this.request("POST", "update", {
      body: {
        operation: "update",
        element: JSON.stringify(element)
      }
    });
    if (!result.ok) {
      return result;
    }
    const record = recordSchema.safeParse(result.value);
    if (!record.success) {
      return err({ kind: "api", code: "invalid_response", message: "CRM update result is not a record." });
    }
    return ok(record.data);
  }

  async updateScore(recordId: string, score: number): Promise<ConnectorResult<ContactRecord>> {
    if (!Number.isFinite(score) || score < MIN_SCORE || score > MAX_SCORE) {
      return err({
        kind: "invalid_input",
        code: "invalid_score",
        message: `Invalid score ${score}: must be between ${MIN_SCORE} and ${MAX_SCORE}.`
      });
    }
    return this.update(recordId, { [this.scoreField]: score });
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
    return normalizeCrmResponse(outcome.response);
  }
}
