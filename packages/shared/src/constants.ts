// packages/shared/src/constants.ts

/** Kinds of background work a task can carry. */
export const TASK_KINDS = ["extract_modules", "generate_test_cases"] as const;

/** Task lifecycle. completed and failed are terminal. */
export const TASK_STATUSES = ["pending", "running", "completed", "failed"] as const;

export const TERMINAL_TASK_STATUSES = ["completed", "failed"] as const;

/** Progress stage names reported while a task runs. */
export const TASK_STAGES = {
  queued: "queued",
  understandingDocument: "understanding_document",
  extractingModules: "extracting_modules",
  generatingTestCases: "generating_test_cases",
} as const;

/** Strength of the evidence behind a passage match. */
export const MATCH_CONFIDENCES = ["high", "medium", "low"] as const;

/** Coarse size rating attached to a document understanding. */
export const DOCUMENT_COMPLEXITIES = ["simple", "moderate", "complex"] as const;

export const TEST_CASE_PRIORITIES = ["high", "medium", "low"] as const;

/** Outcome of one function point inside a generation run. */
export const FUNCTION_POINT_OUTCOME_STATUSES = ["completed", "degraded"] as const;

/** Bounds for the generation worker pool. */
export const MIN_MAX_WORKERS = 1;
export const MAX_MAX_WORKERS = 8;
export const DEFAULT_MAX_WORKERS = 4;

/** Upper bound on the number of function points a single generation may process. */
export const MAX_GENERATION_LIMIT = 50;

/** Shortest requirement document the API accepts. */
export const MIN_REQUIREMENT_DOC_LENGTH = 10;
