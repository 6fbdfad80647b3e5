import type { FastifyInstance } from "fastify";
import { createTestCasesController, type TestCasesControllerDeps } from "./testCases.controller";

export function registerTestCaseRoutes(app: FastifyInstance, deps: TestCasesControllerDeps) {
  const controller = createTestCasesController(deps);

  app.post("/function-modules/extract-async", controller.extractModules); // Starts extraction; returns a task id to poll.
  app.post("/function-modules/extract", controller.extractModulesNow); // Runs extraction and answers with the result.
  app.post("/test-cases/generate-async", controller.generateTestCases); // Starts generation for confirmed function points.
  app.post("/test-cases/generate", controller.generateTestCasesNow); // Runs generation and answers with the result.
  app.post("/modules/rematch", controller.rematchModule); // Re-anchors one edited function point synchronously.
}
