import type { FastifyInstance } from "fastify";
import type { ConnectorContext } from "../../core/services/connector-context.js";
import { HttpError, authenticate, handleError, requestIdFromHeaders } from "../http.js";

export function registerToolRoutes(app: FastifyInstance, context: ConnectorContext): void {
  app.get("/v1/tools", async (request, reply) => {
    try {
      authenticate(context, request.headers);
      return reply.send({ items: context.toolRegistry.summaries() });
    } catch (error) {
      return handleError(error, reply, requestIdFromHeaders(request.headers));
    }
  });

  app.post<{ Params: { name: string } }>("/v1/tools/:name", async (request, reply) => {
    const requestId = requestIdFromHeaders(request.headers);
    try {
      authenticate(context, request.headers);
      const { name } = request.params;
      const tool = context.toolRegistry.get(name);
      if (!tool) {
        throw new HttpError(404, "tool_not_found", `Unknown tool: ${name}`);
      }
      const result = await tool.invoke(request.body);
      context.logger.info({ requestId, tool: tool.name, status: result.status }, "tool invoked");
      return reply.send(result);
    } catch (error) {
      return handleError(error, reply, requestId);
    }
  });
}
