import { config as loadDotenv } from "dotenv";
import { resolve } from "node:path";

import { HttpLlmGateway, loadLlmConfig } from "@reqcase/agents";
import { buildApp } from "./app";
import { loadApiConfig } from "./config";

loadDotenv({ path: resolve(__dirname, "../../../.env") });

const HOUR_MS = 60 * 60 * 1000;

async function start() {
  const config = loadApiConfig();
  const llmConfig = loadLlmConfig();
  const { app, registry } = buildApp({ config, gateway: new HttpLlmGateway(llmConfig) });

  // Finished tasks are dropped once they are older than the retention window.
  const retentionMs = config.taskRetentionHours * HOUR_MS;
  const pruneTimer = setInterval(() => {
    void registry
      .prune(retentionMs)
      .then((removed) => {
        if (removed > 0) {
          app.log.info({ removed }, "Pruned finished tasks");
        }
      })
      .catch((err: unknown) => {
        app.log.error({ err }, "Task pruning failed");
      });
  }, Math.min(retentionMs, HOUR_MS));
  pruneTimer.unref();

  app.addHook("onClose", async () => {
    clearInterval(pruneTimer);
  });

  for (const signal of ["SIGINT", "SIGTERM"] as const) {
    process.once(signal, () => {
      app.log.info({ signal }, "Shutting down");
      app.close().then(
        () => process.exit(0),
        (err: unknown) => {
          app.log.error({ err }, "Shutdown failed");
          process.exit(1);
        }
      );
    });
  }

  app.log.info({ provider: llmConfig.provider, model: llmConfig.model }, "LLM gateway configured");
  await app.listen({ port: config.port, host: config.host });
}

start().catch((err) => {
  console.error(err);
  process.exit(1);
});
