import type { FastifyReply, FastifyRequest } from "fastify";
import { z } from "zod";

import {
  rematchFunctionPoint,
  runExtractionAgent,
  runGenerationAgent,
  type AgentLogger,
  type LlmGateway,
  type LlmOverrides,
} from "@reqcase/agents";
import type { Task, TaskKind, TaskRegistry } from "@reqcase/shared";
import type { ApiConfig } from "../../config";
import { InMemoryTaskStore } from "../tasks/taskStore";
import type { BackgroundTaskRunner } from "../tasks/taskRunner";
import { TaskAcceptedResponseSchema } from "../tasks/tasks.dtos";
import {
  ExtractModulesRequestSchema,
  ExtractModulesResponseSchema,
  GenerateTestCasesRequestSchema,
  GenerateTestCasesResponseSchema,
  RematchModuleRequestSchema,
  RematchModuleResponseSchema,
  StageFailedResponseSchema,
} from "./testCases.dtos";

export interface TestCasesControllerDeps {
  registry: TaskRegistry;
  runner: BackgroundTaskRunner;
  gateway: LlmGateway;
  config: Pick<ApiConfig, "defaultMaxWorkers" | "generationMaxRetries" | "generationRetryBackoffMs">;
  logger: AgentLogger;
}

type ExtractModulesRequest = z.infer<typeof ExtractModulesRequestSchema>;
type GenerateTestCasesRequest = z.infer<typeof GenerateTestCasesRequestSchema>;

// A stage run bound to its input, waiting for the registry and task that will track it.
type StageJob = (registry: TaskRegistry, taskId: string) => Promise<void>;

function toLlmOverrides(input: ExtractModulesRequest | GenerateTestCasesRequest): LlmOverrides {
  return {
    model: input.model_name,
    baseUrl: input.base_url,
    temperature: input.temperature,
    maxTokens: input.max_tokens,
  };
}

export function createTestCasesController(deps: TestCasesControllerDeps) {
  const { registry, runner, gateway, config, logger } = deps;

  function extractionJob(input: ExtractModulesRequest): StageJob {
    return (target, taskId) =>
      runExtractionAgent(
        { registry: target, gateway, logger },
        {
          taskId,
          requirementDoc: input.requirement_doc,
          enableUnderstanding: input.enable_understanding,
          llm: toLlmOverrides(input),
        }
      );
  }

  function generationJob(input: GenerateTestCasesRequest): StageJob {
    return (target, taskId) =>
      runGenerationAgent(
        { registry: target, gateway, logger },
        {
          taskId,
          requirementDoc: input.requirement_doc,
          functionPoints: input.confirmed_function_points,
          documentUnderstanding: input.document_understanding,
          llm: toLlmOverrides(input),
          options: {
            maxWorkers: input.max_workers ?? config.defaultMaxWorkers,
            limit: input.limit,
            maxRetries: config.generationMaxRetries,
            retryBackoffMs: config.generationRetryBackoffMs,
            enableUnderstanding: input.enable_understanding,
          },
        }
      );
  }

  async function accept(kind: TaskKind, job: StageJob, message: string, reply: FastifyReply) {
    const task = await registry.create(kind);
    runner.dispatch(task.id, () => job(registry, task.id));
    return reply.code(202).send(TaskAcceptedResponseSchema.parse({ task_id: task.id, status: task.status, message }));
  }

  // Synchronous routes run the same stage against a throwaway store and wait for it.
  async function runInline(kind: TaskKind, job: StageJob): Promise<Task> {
    const scratch = new InMemoryTaskStore();
    const task = await scratch.create(kind);
    await job(scratch, task.id);
    return scratch.get(task.id);
  }

  return {
    async extractModules(request: FastifyRequest, reply: FastifyReply) {
      try {
        const input = ExtractModulesRequestSchema.parse(request.body);
        return await accept("extract_modules", extractionJob(input), "Function point extraction started", reply);
      } catch (err: unknown) {
        if (err instanceof z.ZodError) {
          return reply.code(400).send({ error: "bad_request", issues: err.issues });
        }
        throw err;
      }
    },

    async extractModulesNow(request: FastifyRequest, reply: FastifyReply) {
      try {
        const input = ExtractModulesRequestSchema.parse(request.body);
        const task = await runInline("extract_modules", extractionJob(input));
        if (task.status !== "completed") {
          return reply
            .code(500)
            .send(StageFailedResponseSchema.parse({ error: "extraction_failed", message: task.error ?? "" }));
        }
        return reply.send(ExtractModulesResponseSchema.parse(task.result));
      } catch (err: unknown) {
        if (err instanceof z.ZodError) {
          return reply.code(400).send({ error: "bad_request", issues: err.issues });
        }
        throw err;
      }
    },

    async generateTestCases(request: FastifyRequest, reply: FastifyReply) {
      try {
        const input = GenerateTestCasesRequestSchema.parse(request.body);
        return await accept(
          "generate_test_cases",
          generationJob(input),
          `Test case generation started for ${input.confirmed_function_points.length} function points`,
          reply
        );
      } catch (err: unknown) {
        if (err instanceof z.ZodError) {
          return reply.code(400).send({ error: "bad_request", issues: err.issues });
        }
        throw err;
      }
    },

    async generateTestCasesNow(request: FastifyRequest, reply: FastifyReply) {
      try {
        const input = GenerateTestCasesRequestSchema.parse(request.body);
        const task = await runInline("generate_test_cases", generationJob(input));
        if (task.status !== "completed") {
          return reply
            .code(500)
            .send(StageFailedResponseSchema.parse({ error: "generation_failed", message: task.error ?? "" }));
        }
        return reply.send(GenerateTestCasesResponseSchema.parse(task.result));
      } catch (err: unknown) {
        if (err instanceof z.ZodError) {
          return reply.code(400).send({ error: "bad_request", issues: err.issues });
        }
        throw err;
      }
    },

    async rematchModule(request: FastifyRequest, reply: FastifyReply) {
      try {
        const input = RematchModuleRequestSchema.parse(request.body);
        const result = rematchFunctionPoint(input.requirement_doc, input.module_data, input.all_modules);
        return reply.send(RematchModuleResponseSchema.parse(result));
      } catch (err: unknown) {
        if (err instanceof z.ZodError) {
          return reply.code(400).send({ error: "bad_request", issues: err.issues });
        }
        throw err;
      }
    },
  };
}
