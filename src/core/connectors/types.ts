export type ContactRecord = Record<string, unknown>;

export type ErrorKind =
  | "transport"
  | "http_status"
  | "api"
  | "validation"
  | "not_found"
  | "invalid_input"
  | "configuration";

export interface ErrorInfo {
  kind: ErrorKind;
  message: string;
  code?: string | undefined;
  httpStatus?: number | undefined;
}

export type ConnectorResult<T> = { ok: true; value: T } | { ok: false; error: ErrorInfo };

export interface ContactPage {
  records: ContactRecord[];
  total: number;
}

export function ok<T>(value: T): ConnectorResult<T> {
  return { ok: true, value };
}

export function err<T = never>(error: ErrorInfo): ConnectorResult<T> {
  return { ok: false, error };
}
