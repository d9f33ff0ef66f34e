export type HttpMethod = "GET" | "POST" | "PATCH";

export type QueryValue = string | number | boolean | null | undefined;

export interface HttpRequest {
  method: HttpMethod;
  url: string;
  query?: Record<string, QueryValue> | undefined;
  body?: unknown;
  headers?: Record<string, string> | undefined;
}

export interface RawResponse {
  status: number;
  text: string;
  /** Parsed JSON when the body parses, otherwise null. */
  body: unknown;
}

export type GatewayOutcome =
  | { kind: "response"; response: RawResponse }
  | { kind: "transport_error"; message: string; timedOut: boolean };

/**
 * Transport seam shared by the connectors. Implementations never throw:
 * anything that prevents a response from arriving is a `transport_error`.
 */
export interface HttpGateway {
  send(request: HttpRequest): Promise<GatewayOutcome>;
}

export interface FetchHttpGatewayOptions {
  fetchFn?: typeof fetch | undefined;
  timeoutMs?: number | undefined;
  userAgent?: string | undefined;
}

export function joinUrl(baseUrl: string, endpoint: string): string {
  return `${baseUrl.replace(/\/+$/, "")}/${endpoint.replace(/^\/+/, "")}`;
}

/** Body text trimmed to a length that fits in an error message. */
export function summarizeBody(text: string, maxLength = 500): string {
  const trimmed = text.trim();
  if (trimmed.length === 0) {
    return "no response body";
  }
  return trimmed.length > maxLength ? `${trimmed.slice(0, maxLength)}...` : trimmed;
}

function toUrl(url: string, query?: Record<string, QueryValue>): string {
  const target = new URL(url);
  if (query) {
    for (const [key, value] of Object.entries(query)) {
      if (value === undefined || value === null) {
        continue;
      }
      target.searchParams.set(key, String(value));
    }
  }
  return target.toString();
}

function parseJson(text: string): unknown {
  if (text.trim().length === 0) {
    return null;
  }
  try {
    return JSON.parse(text) as unknown;
  } catch {
    return null;
  }
}

export class FetchHttpGateway implements HttpGateway {
  private readonly fetchFn: typeof fetch;
  private readonly timeoutMs: number;
  private readonly userAgent: string;

  constructor(options: FetchHttpGatewayOptions = {}) {
    this.fetchFn = options.fetchFn ?? fetch;
    this.timeoutMs = options.timeoutMs ?? 30_000;
    this.userAgent = options.userAgent ?? "crm-agent-connectors/0.1";
  }

  async send(request: HttpRequest): Promise<GatewayOutcome> {
    let url: string;
    try {
      url = toUrl(request.url, request.query);
    } catch (error) {
      return {
        kind: "transport_error",
        message: `Invalid request URL: ${error instanceof Error ? error.message : String(error)}`,
        timedOut: false
      };
    }

    const headers: Record<string, string> = {
      accept: "application/json",
      "user-agent": this.userAgent,
      ...request.headers
    };
    const body = request.body === undefined ? undefined : JSON.stringify(request.body);
    if (body !== undefined) {
      headers["content-type"] = "application/json";
    }

    const controller = new AbortController();
    const timeout = setTimeout(() => controller.abort(), this.timeoutMs);
    try {
      const response = await this.fetchFn(url, {
        method: request.method,
        headers,
        ...(body !== undefined ? { body } : {}),
        signal: controller.signal
      });
      const text = await response.text();
      return {
        kind: "response",
        response: {
          status: response.status,
          text,
          body: parseJson(text)
        }
      };
    } catch (error) {
      if (controller.signal.aborted) {
        return {
          kind: "transport_error",
          message: `Request timed out after ${this.timeoutMs}ms`,
          timedOut: true
        };
      }
      return {
        kind: "transport_error",
        message: `Connection error: ${error instanceof Error ? error.message : String(error)}`,
        timedOut: false
      };
    } finally {
      clearTimeout(timeout);
    }
  }
}
