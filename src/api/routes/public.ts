import type { FastifyInstance } from "fastify";
import type { ConnectorContext } from "../../core/services/connector-context.js";

export function registerPublicRoutes(app: FastifyInstance, context: ConnectorContext): void {
  app.get("/health", async () => ({
    status: "ok",
    service: "crm-agent-connectors",
    timestamp: new Date().toISOString(),
    connectors: {
      crm: context.crm ? { configured: true, authScheme: context.crm.authScheme } : { configured: false },
      marketing: context.marketing
        ? { configured: true, authScheme: context.marketing.authScheme }
        : { configured: false }
    }
  }));
}
