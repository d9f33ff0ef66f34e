import { createHash, timingSafeEqual } from "node:crypto";
import { ZodError } from "zod";
import { ZodError as ZodV4Error } from "zod/v4";
import { createId } from "../lib/id.js";
import type { ConnectorContext } from "../core/services/connector-context.js";

export function requestIdFromHeaders(headers: Record<string, unknown>): string {
  const header = headers["x-request-id"];
  if (typeof header === "string" && header.trim().length > 0) {
    return header;
  }
  if (Array.isArray(header) && typeof header[0] === "string" && header[0].trim().length > 0) {
    return header[0];
  }
  return createId("req");
}

export function authHeaderFromHeaders(headers: Record<string, unknown>): string | undefined {
  const header = headers.authorization;
  if (typeof header === "string") {
    return header;
  }
  if (Array.isArray(header) && typeof header[0] === "string") {
    return header[0];
  }
  return undefined;
}

export class HttpError extends Error {
  constructor(
    public readonly statusCode: number,
    public readonly errorCode: string,
    message: string
  ) {
    super(message);
  }
}

function digest(value: string): Buffer {
  return createHash("sha256").update(value, "utf8").digest();
}

/** No-op unless an API token is configured. */
export function authenticate(context: ConnectorContext, headers: Record<string, unknown>): void {
  const expected = context.config.apiToken;
  if (!expected) {
    return;
  }
  const authHeader = authHeaderFromHeaders(headers);
  const match = authHeader?.match(/^Bearer\s+(.+)$/i);
  const presented = match?.[1]?.trim();
  if (!presented) {
    throw new HttpError(401, "unauthorized", "Missing bearer token.");
  }
  if (!timingSafeEqual(digest(presented), digest(expected))) {
    throw new HttpError(401, "unauthorized", "Invalid bearer token.");
  }
}

export function handleError(
  error: unknown,
  reply: { status: (code: number) => { send: (body: unknown) => unknown } },
  requestId?: string
) {
  const errorBody = (body: Record<string, unknown>) =>
    requestId
      ? {
          ...body,
          requestId
        }
      : body;

  if (error instanceof ZodError || error instanceof ZodV4Error) {
    return reply.status(400).send({
      error: errorBody({
        code: "validation_error",
        message: "Invalid request payload.",
        details: error.issues
      })
    });
  }

  if (error instanceof HttpError) {
    return reply.status(error.statusCode).send({
      error: errorBody({
        code: error.errorCode,
        message: error.message
      })
    });
  }

  if (error instanceof Error) {
    return reply.status(500).send({
      error: errorBody({
        code: "internal_error",
        message: error.message
      })
    });
  }

  return reply.status(500).send({
    error: errorBody({
      code: "internal_error",
      message: "Unexpected error."
    })
  });
}
