import pino, { type Logger } from "pino";
import { config } from "../config";

let rootLogger: Logger | null = null;

const buildRootLogger = (): Logger => {
  if (!rootLogger) {
    rootLogger = pino({
      level: config.logLevel,
      base: { service: config.serviceName },
      timestamp: () => `,"timestamp":"${new Date().toISOString()}"`
    });
  }

  return rootLogger;
};

export const getLogger = (bindings?: Record<string, unknown>): Logger => {
  const logger = buildRootLogger();
  return bindings ? logger.child(bindings) : logger;
};

export type { Logger };
