import type { Logger } from "../../lib/logger.js";
import { silentLogger } from "../../lib/logger.js";
import { ConfigurationError } from "./errors.js";
import { err, ok, type ConnectorResult } from "./types.js";

export type AuthScheme = "bearer" | "basic" | "client_credentials";

/**
 * Produces the `Authorization` header for every outgoing request.
 * Providers are swappable; connectors only see this interface.
 */
export interface CredentialProvider {
  readonly scheme: AuthScheme;
  authorizationHeader(): Promise<ConnectorResult<string>>;
}

export interface CredentialInput {
  accessToken?: string | undefined;
  username?: string | undefined;
  secret?: string | undefined;
  clientId?: string | undefined;
  clientSecret?: string | undefined;
  tokenExchange?: TokenExchange | undefined;
}

export type TokenExchange = (input: { clientId: string; clientSecret: string }) => Promise<string>;

export const PLACEHOLDER_ACCESS_TOKEN = "placeholder-access-token";

function present(value: string | undefined): value is string {
  return typeof value === "string" && value.trim().length > 0;
}

export class BearerTokenCredentials implements CredentialProvider {
  readonly scheme = "bearer";

  constructor(private readonly token: string) {}

  async authorizationHeader(): Promise<ConnectorResult<string>> {
    return ok(`Bearer ${this.token}`);
  }
}

export class BasicCredentials implements CredentialProvider {
  readonly scheme = "basic";
  private readonly header: string;

  constructor(username: string, secret: string) {
    this.header = `Basic ${Buffer.from(`${username}:${secret}`, "utf8").toString("base64")}`;
  }

  async authorizationHeader(): Promise<ConnectorResult<string>> {
    return ok(this.header);
  }
}

/**
 * Client-id/secret pair resolved through a token exchange on first use.
 * The token is kept for the life of the provider; there is no refresh.
 */
export class ClientCredentialsProvider implements CredentialProvider {
  readonly scheme = "client_credentials";
  private token: string | null = null;

  constructor(
    private readonly clientId: string,
    private readonly clientSecret: string,
    private readonly exchange: TokenExchange,
    private readonly logger: Logger = silentLogger
  ) {}

  async authorizationHeader(): Promise<ConnectorResult<string>> {
    if (this.token === null) {
      try {
        this.token = await this.exchange({ clientId: this.clientId, clientSecret: this.clientSecret });
      } catch (error) {
        this.logger.error({ clientId: this.clientId, err: error }, "client credentials token exchange failed");
        return err({
          kind: "configuration",
          code: "token_exchange_failed",
          message: `Token exchange failed: ${error instanceof Error ? error.message : String(error)}`
        });
      }
    }
    return ok(`Bearer ${this.token}`);
  }
}

export function placeholderTokenExchange(logger: Logger = silentLogger): TokenExchange {
  return async ({ clientId }) => {
    logger.warn(
      { clientId },
      "using placeholder token for client credentials; configure a real token exchange before production use"
    );
    return PLACEHOLDER_ACCESS_TOKEN;
  };
}

/**
 * Picks the credential shape in precedence order: bearer token, then basic
 * username/secret, then client id/secret. Throws when none is complete.
 */
export function resolveCredentials(system: string, input: CredentialInput, logger: Logger = silentLogger): CredentialProvider {
  if (present(input.accessToken)) {
    return new BearerTokenCredentials(input.accessToken.trim());
  }
  if (present(input.username) && present(input.secret)) {
    return new BasicCredentials(input.username, input.secret);
  }
  if (present(input.clientId) && present(input.clientSecret)) {
    return new ClientCredentialsProvider(
      input.clientId,
      input.clientSecret,
      input.tokenExchange ?? placeholderTokenExchange(logger),
      logger
    );
  }
  throw new ConfigurationError(
    system,
    "no usable credentials; provide an access token, a username and secret, or a client id and secret."
  );
}

export function normalizeBaseUrl(system: string, raw: string): string {
  let url: URL;
  try {
    url = new URL(raw);
  } catch {
    throw new ConfigurationError(system, `invalid base URL: ${raw}`);
  }
  if (url.protocol !== "http:" && url.protocol !== "https:") {
    throw new ConfigurationError(system, `base URL must use http or https: ${raw}`);
  }
  return raw.replace(/\/+$/, "");
}
