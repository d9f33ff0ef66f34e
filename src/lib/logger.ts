import { pino, type LevelWithSilent, type Logger } from "pino";

export type { Logger };

export function createLogger(level: LevelWithSilent): Logger {
  return pino({
    name: "crm-agent-connectors",
    level
  });
}

export const silentLogger: Logger = pino({ level: "silent" });
