import pino, { type BaseLogger } from "pino";

// The subset of pino the stages call; Fastify's request and app loggers satisfy it too.
export type AgentLogger = Pick<BaseLogger, "debug" | "info" | "warn" | "error">;

export function createAgentLogger(level = process.env.LOG_LEVEL ?? "info"): AgentLogger {
  return pino({ name: "reqcase-agents", level });
}

export const defaultAgentLogger = createAgentLogger();
