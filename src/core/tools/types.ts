import * as z from "zod/v4";
import type { ContactRecord, ErrorInfo, ErrorKind } from "../connectors/types.js";

/**
 * JSON result handed to the agent layer. The `status` field is the only
 * discriminator callers rely on; everything else is payload.
 */
export type ToolResult =
  | { status: "success"; [key: string]: unknown }
  | { status: "not_found"; message: string }
  | { status: "error"; message: string; errorKind: ErrorKind; code: string | null; httpStatus: number | null };

export interface RegisteredTool {
  readonly name: string;
  readonly title: string;
  readonly description: string;
  readonly input: z.ZodObject;
  invoke(args: unknown): Promise<ToolResult>;
}

export interface ToolDefinition<Schema extends z.ZodObject> {
  name: string;
  title: string;
  description: string;
  input: Schema;
  handler: (input: z.output<Schema>) => Promise<ToolResult>;
}

export function defineTool<Schema extends z.ZodObject>(definition: ToolDefinition<Schema>): RegisteredTool {
  return {
    name: definition.name,
    title: definition.title,
    description: definition.description,
    input: definition.input,
    invoke: async (args) => definition.handler(definition.input.parse(args ?? {}))
  };
}

export function toolFailure(error: ErrorInfo): ToolResult {
  if (error.kind === "not_found") {
    return { status: "not_found", message: error.message };
  }
  return {
    status: "error",
    message: error.message,
    errorKind: error.kind,
    code: error.code ?? null,
    httpStatus: error.httpStatus ?? null
  };
}

export function readRecordId(record: ContactRecord): string | null {
  const id = record.id;
  if (typeof id === "string" && id.trim().length > 0) {
    return id;
  }
  if (typeof id === "number" && Number.isFinite(id)) {
    return String(id);
  }
  return null;
}

export function missingIdFailure(system: string): ToolResult {
  return {
    status: "error",
    message: `The ${system} record has no usable id.`,
    errorKind: "api",
    code: "invalid_response",
    httpStatus: null
  };
}
