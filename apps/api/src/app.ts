import Fastify, { type FastifyInstance, type FastifyServerOptions } from "fastify";

import type { LlmGateway } from "@reqcase/agents";
import type { TaskRegistry } from "@reqcase/shared";
import type { ApiConfig } from "./config";
import { InMemoryTaskStore } from "./modules/tasks/taskStore";
import { BackgroundTaskRunner } from "./modules/tasks/taskRunner";
import { registerTaskRoutes } from "./modules/tasks/tasks.routes";
import { registerTestCaseRoutes } from "./modules/testCases/testCases.routes";

export interface BuildAppOptions {
  config: ApiConfig;
  gateway: LlmGateway;
  registry?: TaskRegistry;
  runner?: BackgroundTaskRunner;
  logger?: FastifyServerOptions["logger"];
}

export interface BuiltApp {
  app: FastifyInstance;
  registry: TaskRegistry;
  runner: BackgroundTaskRunner;
}

export function buildApp(options: BuildAppOptions): BuiltApp {
  const app = Fastify({ logger: options.logger ?? { level: options.config.logLevel } });
  const registry = options.registry ?? new InMemoryTaskStore();
  const runner = options.runner ?? new BackgroundTaskRunner(app.log);

  app.get("/health", async () => ({ ok: true }));

  registerTaskRoutes(app, { registry });
  registerTestCaseRoutes(app, {
    registry,
    runner,
    gateway: options.gateway,
    config: options.config,
    logger: app.log,
  });

  // In-flight stage executions finish before the server closes.
  app.addHook("onClose", async () => {
    await runner.drain();
  });

  return { app, registry, runner };
}
