import Fastify from "fastify";
import { createConnectorContext, type ConnectorContext } from "../core/services/connector-context.js";
import { requestIdFromHeaders } from "./http.js";
import { registerMcpRoutes } from "./routes/mcp.js";
import { registerPublicRoutes } from "./routes/public.js";
import { registerToolRoutes } from "./routes/tools.js";

export function buildServer(context: ConnectorContext = createConnectorContext()) {
  const app = Fastify({
    logger: false,
    bodyLimit: context.config.bodyLimitBytes
  });

  app.addHook("onRequest", async (request, reply) => {
    const requestId = requestIdFromHeaders(request.headers);
    request.headers["x-request-id"] = requestId;
    reply.header("x-request-id", requestId);
    reply.header("x-content-type-options", "nosniff");
    reply.header("x-frame-options", "DENY");
    reply.header("cache-control", "no-store");
  });

  app.addHook("onResponse", async (request, reply) => {
    context.logger.info(
      {
        requestId: requestIdFromHeaders(request.headers),
        method: request.method,
        url: request.url,
        statusCode: reply.statusCode,
        durationMs: Math.round(reply.elapsedTime)
      },
      "request completed"
    );
  });

  registerPublicRoutes(app, context);
  registerToolRoutes(app, context);
  registerMcpRoutes(app, context);

  return app;
}
