import type { FastifyReply, FastifyRequest } from "fastify";
import { z } from "zod";

import { TaskNotFoundError, type TaskRegistry } from "@reqcase/shared";
import { GetTaskResponseSchema, ListTasksResponseSchema, TaskIdParamsSchema } from "./tasks.dtos";

export function createTasksController(deps: { registry: TaskRegistry }) {
  const { registry } = deps;

  return {
    async getTask(request: FastifyRequest, reply: FastifyReply) {
      try {
        const { taskId } = TaskIdParamsSchema.parse(request.params);
        const task = await registry.get(taskId);
        return reply.send(GetTaskResponseSchema.parse({ task }));
      } catch (err: unknown) {
        if (err instanceof TaskNotFoundError) {
          return reply.code(404).send({ error: "task_not_found", message: err.message });
        }
        if (err instanceof z.ZodError) {
          return reply.code(400).send({ error: "bad_request", issues: err.issues });
        }
        throw err;
      }
    },

    async listTasks(_request: FastifyRequest, reply: FastifyReply) {
      const tasks = await registry.list();
      return reply.send(
        ListTasksResponseSchema.parse({
          total: tasks.length,
          tasks: tasks.map((task) => ({
            id: task.id,
            kind: task.kind,
            status: task.status,
            percent: task.progress.percent,
            created_at: task.created_at,
            updated_at: task.updated_at,
          })),
        })
      );
    },
  };
}
