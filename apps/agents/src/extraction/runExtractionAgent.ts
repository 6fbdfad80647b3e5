import { z } from "zod";
import {
  TASK_STAGES,
  type DocumentUnderstanding,
  type ExtractionResult,
  type SkippedEntry,
  type TaskRegistry,
} from "@reqcase/shared";
import { createIdAllocator } from "../functionPointIds";
import { defaultAgentLogger, type AgentLogger } from "../logger";
import { matchFunctionPoints, type FunctionPointDraft } from "../matching/passageMatcher";
import type { LlmGateway, LlmOverrides } from "../providers/llmClient";
import { ModelOutputError, parseModelJson, toStringList } from "../providers/jsonOutput";
import { buildExtractionPrompt } from "../prompts";
import { understandDocument } from "../understanding/documentUnderstanding";

export type DraftOutcome =
  | { kind: "ok"; draft: Omit<FunctionPointDraft, "id">; suppliedId?: string }
  | { kind: "skipped"; index: number; reason: string };

const EnvelopeSchema = z.union([
  z.object({ function_modules: z.array(z.unknown()) }).transform((value) => value.function_modules),
  z.object({ function_points: z.array(z.unknown()) }).transform((value) => value.function_points),
  z.array(z.unknown()),
]);

const RawEntrySchema = z.record(z.string(), z.unknown());

function toText(value: unknown) {
  return typeof value === "string" ? value.trim() : "";
}

function toSuppliedId(value: unknown) {
  if (typeof value === "number" && Number.isFinite(value)) {
    return String(value);
  }
  return toText(value) || undefined;
}

/** Classifies one raw model entry; a missing or blank name skips the entry. */
export function parseFunctionPointEntry(raw: unknown, index: number): DraftOutcome {
  const entry = RawEntrySchema.safeParse(raw);
  if (!entry.success) {
    return { kind: "skipped", index, reason: "entry is not an object" };
  }

  const name = toText(entry.data.name);
  if (!name) {
    return { kind: "skipped", index, reason: "entry has no usable name" };
  }

  return {
    kind: "ok",
    suppliedId: toSuppliedId(entry.data.id),
    draft: {
      name,
      description: toText(entry.data.description),
      keywords: toStringList(entry.data.keywords),
      exact_phrases: toStringList(entry.data.exact_phrases),
      section_hint: toText(entry.data.section_hint),
    },
  };
}

export function parseFunctionPointDrafts(payload: unknown): {
  drafts: FunctionPointDraft[];
  skipped: SkippedEntry[];
} {
  const envelope = EnvelopeSchema.safeParse(payload);
  if (!envelope.success) {
    throw new ModelOutputError("extraction", "has no function_modules array");
  }

  const allocateId = createIdAllocator();
  const drafts: FunctionPointDraft[] = [];
  const skipped: SkippedEntry[] = [];

  envelope.data.forEach((raw, index) => {
    const outcome = parseFunctionPointEntry(raw, index);
    if (outcome.kind === "skipped") {
      skipped.push({ index: outcome.index, reason: outcome.reason });
      return;
    }
    drafts.push({ id: allocateId(outcome.suppliedId, drafts.length + 1), ...outcome.draft });
  });

  return { drafts, skipped };
}

export interface ExtractionAgentDeps {
  registry: TaskRegistry;
  gateway: LlmGateway;
  logger?: AgentLogger;
}

export interface ExtractionInput {
  taskId: string;
  requirementDoc: string;
  /** Run a document understanding pass first and feed it into the prompt. */
  enableUnderstanding?: boolean;
  llm?: LlmOverrides;
}

function buildFailureMessage(error: unknown) {
  return error instanceof Error ? error.message : String(error);
}

/**
 * Runs the extraction stage for a Pending task: an optional understanding pass,
 * one extraction call, then passage matching and boundary resolution. Every
 * failure ends in `fail`; the promise only rejects when the registry itself is
 * unreachable. A failed understanding pass only drops the extra context.
 */
export async function runExtractionAgent(deps: ExtractionAgentDeps, input: ExtractionInput): Promise<void> {
  const { registry, gateway } = deps;
  const logger = deps.logger ?? defaultAgentLogger;
  const { taskId, requirementDoc } = input;
  const stage = TASK_STAGES.extractingModules;
  const total = input.enableUnderstanding ? 2 : 1;

  try {
    let understanding: DocumentUnderstanding | null = null;
    if (input.enableUnderstanding) {
      await registry.markRunning(taskId, {
        stage: TASK_STAGES.understandingDocument,
        current: 0,
        total,
        message: "Analysing requirement document",
      });
      understanding = await understandDocument(
        { gateway, logger },
        { taskId, requirementDoc, callOptions: input.llm }
      );
      await registry.updateProgress(taskId, {
        stage,
        current: 1,
        total,
        message: "Extracting function points",
      });
    } else {
      await registry.markRunning(taskId, {
        stage,
        current: 0,
        total,
        message: "Extracting function points",
      });
    }

    const text = await gateway.generate(buildExtractionPrompt(requirementDoc, understanding), input.llm);
    const { drafts, skipped } = parseFunctionPointDrafts(parseModelJson(text, "extraction"));

    for (const entry of skipped) {
      logger.warn({ taskId, ...entry }, "Skipped unusable function point entry");
    }

    const { function_points, boundary_conflicts } = matchFunctionPoints(requirementDoc, drafts, logger);
    const result: ExtractionResult = {
      function_points,
      requirement_doc: requirementDoc,
      skipped_entries: skipped,
      boundary_conflicts,
      document_understanding: understanding,
    };

    await registry.updateProgress(taskId, {
      stage,
      current: total,
      total,
      message: `Extracted ${function_points.length} function points`,
    });
    await registry.complete(taskId, result);
    logger.info({ taskId, functionPoints: function_points.length }, "Function point extraction completed");
  } catch (error) {
    const message = buildFailureMessage(error);
    logger.error({ taskId, err: error }, "Function point extraction failed");
    await registry.fail(taskId, `Function point extraction failed: ${message}`);
  }
}
