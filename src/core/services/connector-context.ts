import { createLogger, type Logger } from "../../lib/logger.js";
import { loadConfig, type AppConfig } from "../config.js";
import type { TokenExchange } from "../connectors/credentials.js";
import { CrmConnector } from "../connectors/crm-connector.js";
import { FetchHttpGateway, type HttpGateway } from "../connectors/http-gateway.js";
import { MarketingConnector } from "../connectors/marketing-connector.js";
import { createCrmTools } from "../tools/crm-tools.js";
import { createMarketingTools } from "../tools/marketing-tools.js";
import { ToolRegistry } from "../tools/registry.js";
import type { RegisteredTool } from "../tools/types.js";

export interface ConnectorContext {
  config: AppConfig;
  logger: Logger;
  crm: CrmConnector | null;
  marketing: MarketingConnector | null;
  toolRegistry: ToolRegistry;
}

export interface ConnectorContextOptions {
  config?: AppConfig | undefined;
  logger?: Logger | undefined;
  gateway?: HttpGateway | undefined;
  tokenExchange?: TokenExchange | undefined;
}

/**
 * Builds the connectors and their tools once, at process start. Throws
 * `ConfigurationError` when a configured system has no usable credentials.
 */
export function createConnectorContext(options: ConnectorContextOptions = {}): ConnectorContext {
  const config = options.config ?? loadConfig();
  const logger = options.logger ?? createLogger(config.logLevel);
  const gateway = options.gateway ?? new FetchHttpGateway({ timeoutMs: config.timeoutMs });

  const crm = config.crm
    ? new CrmConnector({
        baseUrl: config.crm.baseUrl,
        credentials: config.crm.credentials,
        scoreField: config.crm.scoreField,
        maxRecords: config.maxRecords,
        gateway,
        logger: logger.child({ connector: "crm" })
      })
    : null;

  const marketing = config.marketing
    ? new MarketingConnector({
        baseUrl: config.marketing.baseUrl,
        credentials: { ...config.marketing.credentials, tokenExchange: options.tokenExchange },
        maxRecords: config.maxRecords,
        gateway,
        logger: logger.child({ connector: "marketing" })
      })
    : null;

  const tools: RegisteredTool[] = [
    ...(crm ? createCrmTools(crm) : []),
    ...(marketing ? createMarketingTools(marketing) : [])
  ];

  return {
    config,
    logger,
    crm,
    marketing,
    toolRegistry: new ToolRegistry(tools, config.allowedTools)
  };
}
