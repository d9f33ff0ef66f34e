import type { FastifyInstance } from "fastify";
import { randomUUID } from "node:crypto";
import { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import { StreamableHTTPServerTransport } from "@modelcontextprotocol/sdk/server/streamableHttp.js";
import type { Transport } from "@modelcontextprotocol/sdk/shared/transport.js";
import { isInitializeRequest } from "@modelcontextprotocol/sdk/types.js";
import type { ConnectorContext } from "../../core/services/connector-context.js";
import type { RegisteredTool } from "../../core/tools/types.js";
import { authenticate, handleError, requestIdFromHeaders } from "../http.js";

type SessionEntry = {
  transport: StreamableHTTPServerTransport;
  server: McpServer;
  createdAt: number;
};

const SESSION_TTL_MS = 60 * 60 * 1000;

function registerTool(server: McpServer, tool: RegisteredTool, context: ConnectorContext): void {
  server.registerTool(
    tool.name,
    {
      title: tool.title,
      description: tool.description,
      inputSchema: tool.input.shape
    },
    async (args) => {
      try {
        const result = await tool.invoke(args);
        return {
          content: [{ type: "text", text: JSON.stringify(result) }],
          structuredContent: result,
          isError: result.status === "error"
        };
      } catch (error) {
        context.logger.warn({ tool: tool.name, err: error }, "mcp tool call rejected");
        return {
          content: [{ type: "text", text: error instanceof Error ? error.message : "Tool call failed." }],
          isError: true
        };
      }
    }
  );
}

export function registerMcpRoutes(app: FastifyInstance, context: ConnectorContext): void {
  const sessions = new Map<string, SessionEntry>();

  async function createSession(): Promise<SessionEntry> {
    const server = new McpServer(
      {
        name: "crm-agent-connectors",
        version: "0.1.0"
      },
      {
        capabilities: {
          tools: {}
        }
      }
    );
    for (const tool of context.toolRegistry.list()) {
      registerTool(server, tool, context);
    }

    const transport: StreamableHTTPServerTransport = new StreamableHTTPServerTransport({
      sessionIdGenerator: () => randomUUID(),
      onsessioninitialized: (sessionId) => {
        if (sessions.has(sessionId)) return;
        sessions.set(sessionId, { transport, server, createdAt: Date.now() });
        transport.onclose = () => {
          const removed = sessions.get(sessionId);
          sessions.delete(sessionId);
          void removed?.server.close().catch(() => undefined);
        };
      }
    });

    // The SDK's transport class and interface disagree under exactOptionalPropertyTypes.
    await server.connect(transport as unknown as Transport);
    return { transport, server, createdAt: Date.now() };
  }

  const evictionTimer = setInterval(() => {
    const cutoff = Date.now() - SESSION_TTL_MS;
    for (const [sessionId, entry] of sessions.entries()) {
      if (entry.createdAt < cutoff) {
        sessions.delete(sessionId);
        void entry.transport.close().catch(() => undefined);
        void entry.server.close().catch(() => undefined);
      }
    }
  }, 60_000).unref();

  app.addHook("onClose", async () => {
    clearInterval(evictionTimer);
    for (const entry of sessions.values()) {
      await entry.transport.close().catch(() => undefined);
      await entry.server.close().catch(() => undefined);
    }
    sessions.clear();
  });

  app.all("/mcp", async (request, reply) => {
    const headers = request.headers;
    try {
      authenticate(context, headers);
    } catch (error) {
      return handleError(error, reply, requestIdFromHeaders(headers));
    }

    const sessionIdHeader = headers["mcp-session-id"];
    const sessionId =
      typeof sessionIdHeader === "string" && sessionIdHeader.trim().length > 0 ? sessionIdHeader.trim() : null;

    let entry = sessionId ? (sessions.get(sessionId) ?? null) : null;
    if (!entry) {
      if (request.method !== "POST" || !isInitializeRequest(request.body)) {
        return reply.status(400).send({
          error: {
            code: "bad_request",
            message: "MCP session not initialized. Send initialize first."
          }
        });
      }
      entry = await createSession();
    }

    reply.hijack();
    await entry.transport.handleRequest(request.raw, reply.raw, request.body);
  });
}
