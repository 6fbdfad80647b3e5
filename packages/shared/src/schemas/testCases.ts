import { z } from "zod";
import { FUNCTION_POINT_OUTCOME_STATUSES, TEST_CASE_PRIORITIES } from "../constants";
import { DocumentUnderstandingSchema } from "./understanding";

export const TestCasePrioritySchema = z.enum(TEST_CASE_PRIORITIES);
export type TestCasePriority = z.infer<typeof TestCasePrioritySchema>;

export const TestCaseSchema = z
  .object({
    id: z.string().min(1),
    module_name: z.string(),
    sub_module: z.string(),
    case_name: z.string(),
    description: z.string(),
    preconditions: z.string(),
    steps: z.array(z.string()),
    expected_result: z.string(),
    priority: TestCasePrioritySchema,
    quality_score: z.number().min(0).max(1),
    quality_issues: z.array(z.string()),
  })
  .strict();

export type TestCase = z.infer<typeof TestCaseSchema>;

/** The fields the quality scorer reads; everything else is irrelevant to scoring. */
export type ScorableTestCase = Pick<
  TestCase,
  "case_name" | "module_name" | "preconditions" | "steps" | "expected_result"
>;

export const FunctionPointOutcomeStatusSchema = z.enum(FUNCTION_POINT_OUTCOME_STATUSES);
export type FunctionPointOutcomeStatus = z.infer<typeof FunctionPointOutcomeStatusSchema>;

export const FunctionPointOutcomeSchema = z
  .object({
    function_point_id: z.string().min(1),
    name: z.string().min(1),
    status: FunctionPointOutcomeStatusSchema,
    test_cases: z.array(TestCaseSchema),
    warnings: z.array(z.string()),
    source: z.string(),
  })
  .strict();

export type FunctionPointOutcome = z.infer<typeof FunctionPointOutcomeSchema>;

export const GenerationPartialResultSchema = z
  .object({
    test_cases: z.array(TestCaseSchema),
    by_function_point: z.record(z.string(), FunctionPointOutcomeSchema),
  })
  .strict();

export type GenerationPartialResult = z.infer<typeof GenerationPartialResultSchema>;

export const GenerationMetaSchema = z
  .object({
    total_function_points: z.number().int().nonnegative(),
    processed_function_points: z.number().int().nonnegative(),
    skipped_function_points: z.number().int().nonnegative(),
    degraded_function_points: z.number().int().nonnegative(),
    limit: z.number().int().nonnegative(),
    total_warnings: z.number().int().nonnegative(),
    average_quality_score: z.number().min(0).max(1),
    test_cases_with_issues: z.number().int().nonnegative(),
  })
  .strict();

export type GenerationMeta = z.infer<typeof GenerationMetaSchema>;

export const GenerationResultSchema = GenerationPartialResultSchema.extend({
  meta: GenerationMetaSchema,
  document_understanding: DocumentUnderstandingSchema.nullable().default(null),
}).strict();

export type GenerationResult = z.infer<typeof GenerationResultSchema>;
