import { z } from "zod";
import { TaskSchema, TaskStatusSchema, TaskSummarySchema } from "@reqcase/shared";

// Request params for fetching a specific task by ID
export const TaskIdParamsSchema = z.object({ taskId: z.uuid() }).strict();

export const GetTaskResponseSchema = z.object({ task: TaskSchema }).strict();

export const ListTasksResponseSchema = z
  .object({
    total: z.number().int().nonnegative(),
    tasks: z.array(TaskSummarySchema),
  })
  .strict();

// Returned by every *-async endpoint; clients poll GET /tasks/:taskId afterwards
export const TaskAcceptedResponseSchema = z
  .object({
    task_id: z.uuid(),
    status: TaskStatusSchema,
    message: z.string(),
  })
  .strict();
