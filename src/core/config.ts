import { z } from "zod";
import type { CredentialInput } from "./connectors/credentials.js";
import { DEFAULT_MAX_RECORDS } from "./connectors/pagination.js";
import { DEFAULT_SCORE_FIELD } from "./connectors/crm-connector.js";

const envSchema = z.object({
  PORT: z.coerce.number().int().min(0).max(65_535).default(8080),
  HOST: z.string().default("0.0.0.0"),
  LOG_LEVEL: z.enum(["fatal", "error", "warn", "info", "debug", "trace", "silent"]).default("info"),
  API_TOKEN: z.string().optional(),
  ALLOWED_TOOLS: z.string().optional(),

  CRM_BASE_URL: z.string().optional(),
  CRM_USERNAME: z.string().optional(),
  CRM_ACCESS_KEY: z.string().optional(),
  CRM_ACCESS_TOKEN: z.string().optional(),
  CRM_SCORE_FIELD: z.string().default(DEFAULT_SCORE_FIELD),

  MARKETING_BASE_URL: z.string().optional(),
  MARKETING_ACCESS_TOKEN: z.string().optional(),
  MARKETING_USERNAME: z.string().optional(),
  MARKETING_PASSWORD: z.string().optional(),
  MARKETING_CLIENT_ID: z.string().optional(),
  MARKETING_CLIENT_SECRET: z.string().optional(),

  CONNECTOR_MAX_RECORDS: z.coerce.number().int().positive().default(DEFAULT_MAX_RECORDS),
  CONNECTOR_TIMEOUT_MS: z.coerce.number().int().positive().default(30_000),
  BODY_LIMIT_BYTES: z.coerce.number().int().positive().default(1_048_576)
});

export type LogLevel = z.infer<typeof envSchema>["LOG_LEVEL"];

export interface SystemSettings {
  baseUrl: string;
  credentials: CredentialInput;
}

export interface CrmSettings extends SystemSettings {
  scoreField: string;
}

export interface AppConfig {
  port: number;
  host: string;
  logLevel: LogLevel;
  apiToken: string | null;
  allowedTools: string | undefined;
  crm: CrmSettings | null;
  marketing: SystemSettings | null;
  maxRecords: number;
  timeoutMs: number;
  bodyLimitBytes: number;
}

function withoutBlanks(env: NodeJS.ProcessEnv): Record<string, string> {
  const out: Record<string, string> = {};
  for (const [key, value] of Object.entries(env)) {
    if (typeof value === "string" && value.trim().length > 0) {
      out[key] = value.trim();
    }
  }
  return out;
}

/**
 * Reads settings once from the environment. A system is enabled by its base
 * URL; its credentials are checked when the connector is constructed.
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const parsed = envSchema.parse(withoutBlanks(env));

  const crm: CrmSettings | null = parsed.CRM_BASE_URL
    ? {
        baseUrl: parsed.CRM_BASE_URL,
        credentials: {
          accessToken: parsed.CRM_ACCESS_TOKEN,
          username: parsed.CRM_USERNAME,
          secret: parsed.CRM_ACCESS_KEY
        },
        scoreField: parsed.CRM_SCORE_FIELD
      }
    : null;

  const marketing: SystemSettings | null = parsed.MARKETING_BASE_URL
    ? {
        baseUrl: parsed.MARKETING_BASE_URL,
        credentials: {
          accessToken: parsed.MARKETING_ACCESS_TOKEN,
          username: parsed.MARKETING_USERNAME,
          secret: parsed.MARKETING_PASSWORD,
          clientId: parsed.MARKETING_CLIENT_ID,
          clientSecret: parsed.MARKETING_CLIENT_SECRET
        }
      }
    : null;

  return {
    port: parsed.PORT,
    host: parsed.HOST,
    logLevel: parsed.LOG_LEVEL,
    apiToken: parsed.API_TOKEN ?? null,
    allowedTools: parsed.ALLOWED_TOOLS,
    crm,
    marketing,
    maxRecords: parsed.CONNECTOR_MAX_RECORDS,
    timeoutMs: parsed.CONNECTOR_TIMEOUT_MS,
    bodyLimitBytes: parsed.BODY_LIMIT_BYTES
  };
}
