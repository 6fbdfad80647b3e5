import {
  DEFAULT_MAX_WORKERS,
  TASK_STAGES,
  type DocumentUnderstanding,
  type FunctionPointInput,
  type FunctionPointOutcome,
  type GenerationPartialResult,
  type GenerationResult,
  type TaskRegistry,
  type TestCase,
} from "@reqcase/shared";
import { createIdAllocator } from "../functionPointIds";
import { defaultAgentLogger, type AgentLogger } from "../logger";
import { matchPassage, sliceLines, splitLines } from "../matching/passageMatcher";
import type { LlmGateway, LlmOverrides } from "../providers/llmClient";
import { parseModelJson } from "../providers/jsonOutput";
import { buildGenerationPrompt } from "../prompts";
import { understandDocument } from "../understanding/documentUnderstanding";
import { normalizeTestCases } from "./testCaseNormalizer";
import { runWorkerPool } from "./workerPool";

export const DEFAULT_GENERATION_MAX_RETRIES = 2;
export const DEFAULT_GENERATION_RETRY_BACKOFF_MS = 500;

export interface GenerationOptions {
  maxWorkers?: number;
  limit?: number;
  /** Extra attempts after the first one. */
  maxRetries?: number;
  /** Base delay; attempt n waits `retryBackoffMs * 2^n`. */
  retryBackoffMs?: number;
  /** Per-call timeout handed to the gateway. */
  timeoutMs?: number;
  /** Run a document understanding pass unless one is supplied with the input. */
  enableUnderstanding?: boolean;
}

export interface GenerationAgentDeps {
  registry: TaskRegistry;
  gateway: LlmGateway;
  logger?: AgentLogger;
  sleep?: (ms: number) => Promise<void>;
}

export interface GenerationInput {
  taskId: string;
  requirementDoc: string;
  functionPoints: FunctionPointInput[];
  options?: GenerationOptions;
  /** An understanding from an earlier call; used as is instead of asking the model again. */
  documentUnderstanding?: DocumentUnderstanding | null;
  llm?: LlmOverrides;
}

/** One queued unit of work: a function point with its id settled. */
interface GenerationUnit {
  id: string;
  name: string;
  description: string;
  point: FunctionPointInput;
}

const wait = (ms: number) => new Promise<void>((resolve) => setTimeout(resolve, ms));

function buildFailureMessage(error: unknown) {
  return error instanceof Error ? error.message : String(error);
}

function emptyPartial(): GenerationPartialResult {
  return { test_cases: [], by_function_point: {} };
}

function resolveSnippet(requirementDoc: string, point: FunctionPointInput) {
  if (point.matched_content?.trim()) {
    return point.matched_content;
  }
  const { start, end } = matchPassage(requirementDoc, point);
  return sliceLines(splitLines(requirementDoc), start, end);
}

export function buildGenerationResult(
  units: { id: string }[],
  outcomes: Map<string, FunctionPointOutcome>,
  counts: { total: number; limit: number },
  understanding: DocumentUnderstanding | null = null
): GenerationResult {
  const ordered = units
    .map((unit) => outcomes.get(unit.id))
    .filter((outcome): outcome is FunctionPointOutcome => outcome !== undefined);
  const testCases: TestCase[] = ordered.flatMap((outcome) => outcome.test_cases);
  const scoreSum = testCases.reduce((sum, testCase) => sum + testCase.quality_score, 0);

  return {
    test_cases: testCases,
    by_function_point: Object.fromEntries(ordered.map((outcome) => [outcome.function_point_id, outcome])),
    meta: {
      total_function_points: counts.total,
      processed_function_points: ordered.filter((outcome) => outcome.status === "completed").length,
      skipped_function_points: counts.total - units.length,
      degraded_function_points: ordered.filter((outcome) => outcome.status === "degraded").length,
      limit: counts.limit,
      total_warnings: ordered.reduce((sum, outcome) => sum + outcome.warnings.length, 0),
      average_quality_score: testCases.length > 0 ? Math.round((scoreSum / testCases.length) * 100) / 100 : 0,
      test_cases_with_issues: testCases.filter((testCase) => testCase.quality_issues.length > 0).length,
    },
    document_understanding: understanding,
  };
}

/**
 * Runs the generation stage for a Pending task.
 *
 * Function points are processed by a bounded worker pool. A unit that keeps
 * failing after its retries is recorded as degraded with a warning and the task
 * still completes; only an empty input or an unexpected pool error fails it.
 * Outcomes are merged into `partial_result` as each unit finishes.
 */
export async function runGenerationAgent(deps: GenerationAgentDeps, input: GenerationInput): Promise<void> {
  const { registry, gateway } = deps;
  const logger = deps.logger ?? defaultAgentLogger;
  const sleep = deps.sleep ?? wait;
  const { taskId, requirementDoc } = input;
  const options = input.options ?? {};
  const maxRetries = options.maxRetries ?? DEFAULT_GENERATION_MAX_RETRIES;
  const retryBackoffMs = options.retryBackoffMs ?? DEFAULT_GENERATION_RETRY_BACKOFF_MS;
  const stage = TASK_STAGES.generatingTestCases;

  try {
    const allocateId = createIdAllocator();
    const usable: GenerationUnit[] = input.functionPoints
      .filter((point) => point.name.trim().length > 0)
      .map((point, index) => ({
        id: allocateId(point.id, index + 1),
        name: point.name.trim(),
        description: point.description?.trim() ?? "",
        point,
      }));

    if (usable.length === 0) {
      throw new Error("No function points to generate test cases for.");
    }

    const units = options.limit === undefined ? usable : usable.slice(0, options.limit);
    const total = units.length;
    let finished = 0;

    const startMessage = `Generating test cases for ${total} function points`;
    let understanding = input.documentUnderstanding ?? null;
    if (!understanding && options.enableUnderstanding) {
      await registry.markRunning(taskId, {
        stage: TASK_STAGES.understandingDocument,
        current: 0,
        total,
        message: "Analysing requirement document",
      });
      understanding = await understandDocument({ gateway, logger }, { taskId, requirementDoc, callOptions: input.llm });
      await registry.updateProgress(taskId, { stage, current: 0, total, message: startMessage });
    } else {
      await registry.markRunning(taskId, { stage, current: 0, total, message: startMessage });
    }
    await registry.updatePartialResult(taskId, emptyPartial());

    async function generateUnit(unit: GenerationUnit): Promise<FunctionPointOutcome> {
      const snippet = resolveSnippet(requirementDoc, unit.point);
      const prompt = buildGenerationPrompt({ name: unit.name, description: unit.description, snippet, understanding });
      let lastError = "unknown error";

      for (let attempt = 0; attempt <= maxRetries; attempt += 1) {
        try {
          const text = await gateway.generate(prompt, { ...input.llm, timeoutMs: options.timeoutMs });
          const { testCases, warnings } = normalizeTestCases(parseModelJson(text, "generation"), unit);
          return {
            function_point_id: unit.id,
            name: unit.name,
            status: "completed",
            test_cases: testCases,
            warnings,
            source: snippet,
          };
        } catch (error) {
          lastError = buildFailureMessage(error);
          logger.warn(
            { taskId, functionPoint: unit.name, attempt: attempt + 1, err: error },
            "Test case generation attempt failed"
          );
          if (attempt < maxRetries) {
            await sleep(retryBackoffMs * 2 ** attempt);
          }
        }
      }

      return {
        function_point_id: unit.id,
        name: unit.name,
        status: "degraded",
        test_cases: [],
        warnings: [`[${unit.name}] generation failed after ${maxRetries + 1} attempts: ${lastError}`],
        source: snippet,
      };
    }

    const outcomes = new Map<string, FunctionPointOutcome>();
    // Units currently being generated, by id, in start order.
    const inFlight = new Map<string, string>();

    await runWorkerPool(
      units,
      async (unit) => {
        inFlight.set(unit.id, unit.name);
        await registry.updateProgress(taskId, {
          stage,
          current: finished,
          total,
          message: `Generating test cases for ${unit.name}`,
          current_item: unit.name,
        });

        const outcome = await generateUnit(unit);
        outcomes.set(unit.id, outcome);

        await registry.updatePartialResult(taskId, (current) => {
          const base = current ?? emptyPartial();
          return {
            test_cases: [...base.test_cases, ...outcome.test_cases],
            by_function_point: { ...base.by_function_point, [unit.id]: outcome },
          };
        });
        finished += 1;
        inFlight.delete(unit.id);
        const stillRunning = [...inFlight.values()].at(-1);
        await registry.updateProgress(taskId, {
          stage,
          current: finished,
          total,
          message: `Finished ${finished}/${total} function points`,
          ...(stillRunning === undefined ? {} : { current_item: stillRunning }),
        });
      },
      { concurrency: options.maxWorkers ?? DEFAULT_MAX_WORKERS }
    );

    const result = buildGenerationResult(
      units,
      outcomes,
      { total: usable.length, limit: options.limit ?? units.length },
      understanding
    );
    await registry.complete(taskId, result);
    logger.info({ taskId, ...result.meta }, "Test case generation completed");
  } catch (error) {
    const message = buildFailureMessage(error);
    logger.error({ taskId, err: error }, "Test case generation failed");
    await registry.fail(taskId, `Test case generation failed: ${message}`);
  }
}
