import type { FastifyInstance } from "fastify";
import type { TaskRegistry } from "@reqcase/shared";
import { createTasksController } from "./tasks.controller";

export function registerTaskRoutes(app: FastifyInstance, deps: { registry: TaskRegistry }) {
  const controller = createTasksController(deps);

  app.get("/tasks", controller.listTasks); // Lists known tasks, newest first.
  app.get("/tasks/:taskId", controller.getTask); // Polls one task: status, progress, partial and final result.
}
