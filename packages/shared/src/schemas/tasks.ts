import { z } from "zod";
import { TASK_KINDS, TASK_STATUSES, TERMINAL_TASK_STATUSES } from "../constants";
import { ExtractionResultSchema } from "./functionPoints";
import { GenerationPartialResultSchema, GenerationResultSchema } from "./testCases";

const IsoDateSchema = z.iso.datetime();

export const TaskKindSchema = z.enum(TASK_KINDS);
export type TaskKind = z.infer<typeof TaskKindSchema>;

export const TaskStatusSchema = z.enum(TASK_STATUSES);
export type TaskStatus = z.infer<typeof TaskStatusSchema>;

export function isTerminalStatus(status: TaskStatus): boolean {
  return TERMINAL_TASK_STATUSES.some((terminal) => terminal === status);
}

export const TaskProgressSchema = z
  .object({
    stage: z.string().min(1),
    current: z.number().int().nonnegative(),
    total: z.number().int().nonnegative(),
    message: z.string(),
    percent: z.number().int().min(0).max(100),
    current_item: z.string().optional(),
  })
  .strict()
  .refine((value) => value.total === 0 || value.current <= value.total, {
    message: "current must not exceed total",
    path: ["current"],
  });

export type TaskProgress = z.infer<typeof TaskProgressSchema>;

// What a stage reports; percent is derived by the registry.
export type TaskProgressUpdate = Omit<TaskProgress, "percent">;

export const TaskResultSchema = z.union([ExtractionResultSchema, GenerationResultSchema]);
export type TaskResult = z.infer<typeof TaskResultSchema>;

export const TaskSchema = z
  .object({
    id: z.uuid(),
    kind: TaskKindSchema,
    status: TaskStatusSchema,
    progress: TaskProgressSchema,
    partial_result: GenerationPartialResultSchema.nullable(),
    result: TaskResultSchema.nullable(),
    error: z.string().min(1).nullable(),
    created_at: IsoDateSchema,
    updated_at: IsoDateSchema,
    started_at: IsoDateSchema.optional(),
    completed_at: IsoDateSchema.optional(),
  })
  .strict()
  .refine((task) => task.result === null || task.error === null, {
    message: "result and error are mutually exclusive",
  });

export type Task = z.infer<typeof TaskSchema>;

// Minimal task shape used by GET /tasks.
export const TaskSummarySchema = z
  .object({
    id: z.uuid(),
    kind: TaskKindSchema,
    status: TaskStatusSchema,
    percent: z.number().int().min(0).max(100),
    created_at: IsoDateSchema,
    updated_at: IsoDateSchema,
  })
  .strict();

export type TaskSummary = z.infer<typeof TaskSummarySchema>;

export function computePercent(current: number, total: number): number {
  if (total <= 0) {
    return 0;
  }
  return Math.min(100, Math.round((current / total) * 100));
}
