import { z } from "zod";
import type { TestCase } from "@reqcase/shared";
import { ModelOutputError } from "../providers/jsonOutput";
import { inferPriority, normalizePriority, scoreTestCase } from "../quality/qualityScorer";

const EnvelopeSchema = z.union([
  z.object({ test_cases: z.array(z.unknown()) }).transform((value) => value.test_cases),
  z.array(z.unknown()),
]);

const RawCaseSchema = z.record(z.string(), z.unknown());

function toText(value: unknown) {
  if (typeof value === "string") {
    return value.trim();
  }
  if (Array.isArray(value)) {
    return value.filter((item): item is string => typeof item === "string").join("\n").trim();
  }
  return "";
}

function toSteps(value: unknown): string[] | null {
  if (typeof value === "string") {
    return value
      .split("\n")
      .map((step) => step.trim())
      .filter((step) => step.length > 0);
  }
  if (!Array.isArray(value)) {
    return null;
  }
  return value
    .filter((step) => typeof step === "string" || typeof step === "number")
    .map((step) => String(step).trim())
    .filter((step) => step.length > 0);
}

export interface NormalizedCases {
  testCases: TestCase[];
  warnings: string[];
}

/**
 * Turns a parsed model payload into scored test cases for one function point.
 * Entries that are not objects or carry no step list are dropped with a warning.
 * Throws `ModelOutputError` when no usable case remains.
 */
export function normalizeTestCases(
  payload: unknown,
  functionPoint: { id: string; name: string }
): NormalizedCases {
  const envelope = EnvelopeSchema.safeParse(payload);
  if (!envelope.success) {
    throw new ModelOutputError("generation", "has no test_cases array");
  }

  const testCases: TestCase[] = [];
  const warnings: string[] = [];

  envelope.data.forEach((raw, index) => {
    const entry = RawCaseSchema.safeParse(raw);
    const steps = entry.success ? toSteps(entry.data.steps) : null;
    if (!entry.success || steps === null) {
      warnings.push(`[${functionPoint.name}] case ${index + 1} is malformed and was dropped`);
      return;
    }

    const fields = entry.data;
    const caseName = toText(fields.case_name);
    const expectedResult = toText(fields.expected_result);
    const draft = {
      case_name: caseName,
      module_name: toText(fields.module_name) || functionPoint.name,
      sub_module: toText(fields.sub_module),
      description: toText(fields.description),
      preconditions: toText(fields.preconditions),
      steps,
      expected_result: expectedResult,
    };
    const quality = scoreTestCase(draft);

    testCases.push({
      id: `${functionPoint.id}-tc${testCases.length + 1}`,
      ...draft,
      priority:
        normalizePriority(fields.priority) ??
        inferPriority({ case_name: caseName, expected_result: expectedResult }),
      quality_score: quality.score,
      quality_issues: quality.issues,
    });
  });

  if (testCases.length === 0) {
    throw new ModelOutputError("generation", "contains no usable test cases");
  }

  return { testCases, warnings };
}
