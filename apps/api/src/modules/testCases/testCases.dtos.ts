import { z } from "zod";
import {
  DocumentUnderstandingSchema,
  ExtractionResultSchema,
  FunctionPointInputSchema,
  GenerationResultSchema,
  MAX_GENERATION_LIMIT,
  MAX_MAX_WORKERS,
  MIN_MAX_WORKERS,
  MIN_REQUIREMENT_DOC_LENGTH,
  RematchResultSchema,
} from "@reqcase/shared";

// Kept verbatim: line positions are computed against the text as sent.
const RequirementDocSchema = z
  .string()
  .refine((value) => value.trim().length >= MIN_REQUIREMENT_DOC_LENGTH, {
    message: `requirement_doc must contain at least ${MIN_REQUIREMENT_DOC_LENGTH} characters`,
  });

// Per-request model settings; omitted fields use the server's LLM configuration.
const LlmOverrideFields = {
  model_name: z.string().trim().min(1).optional(),
  base_url: z.url().optional(),
  temperature: z.number().min(0).max(2).optional(),
  max_tokens: z.number().int().positive().optional(),
};

export const ExtractModulesRequestSchema = z
  .object({
    requirement_doc: RequirementDocSchema,
    enable_understanding: z.boolean().default(true),
    ...LlmOverrideFields,
  })
  .strict();

export const GenerateTestCasesRequestSchema = z
  .object({
    requirement_doc: RequirementDocSchema,
    confirmed_function_points: z.array(FunctionPointInputSchema).min(1),
    max_workers: z.number().int().min(MIN_MAX_WORKERS).max(MAX_MAX_WORKERS).optional(),
    limit: z.number().int().min(1).max(MAX_GENERATION_LIMIT).optional(),
    enable_understanding: z.boolean().default(true),
    document_understanding: DocumentUnderstandingSchema.nullable().optional(),
    ...LlmOverrideFields,
  })
  .strict();

export const ExtractModulesResponseSchema = ExtractionResultSchema;
export const GenerateTestCasesResponseSchema = GenerationResultSchema;

export const StageFailedResponseSchema = z
  .object({
    error: z.enum(["extraction_failed", "generation_failed"]),
    message: z.string(),
  })
  .strict();

export const RematchModuleRequestSchema = z
  .object({
    requirement_doc: z.string().min(1),
    module_data: FunctionPointInputSchema,
    all_modules: z.array(FunctionPointInputSchema).default([]),
  })
  .strict();

export const RematchModuleResponseSchema = RematchResultSchema;
