import { z } from "zod";
import { MATCH_CONFIDENCES } from "../constants";
import { DocumentUnderstandingSchema } from "./understanding";

export const MatchConfidenceSchema = z.enum(MATCH_CONFIDENCES);
export type MatchConfidence = z.infer<typeof MatchConfidenceSchema>;

// [start_line, end_line], 1-based and inclusive.
export const LineRangeSchema = z
  .tuple([z.number().int().positive(), z.number().int().positive()])
  .refine(([start, end]) => start <= end, { message: "start_line must not exceed end_line" });

export type LineRange = z.infer<typeof LineRangeSchema>;

// Anchor data the matcher works from.
export const FunctionPointAnchorsSchema = z.object({
  keywords: z.array(z.string()).default([]),
  exact_phrases: z.array(z.string()).default([]),
  section_hint: z.string().default(""),
});

export type FunctionPointAnchors = z.infer<typeof FunctionPointAnchorsSchema>;

export const FunctionPointSchema = FunctionPointAnchorsSchema.extend({
  id: z.string().min(1),
  name: z.string().min(1),
  description: z.string().default(""),
  matched_content: z.string(),
  matched_positions: LineRangeSchema,
  match_confidence: MatchConfidenceSchema,
}).strict();

export type FunctionPoint = z.infer<typeof FunctionPointSchema>;

/**
 * A function point as a client sends it back after review: only the name is
 * mandatory, and a user-edited `matched_content` takes precedence over
 * re-matching the document.
 */
export const FunctionPointInputSchema = FunctionPointAnchorsSchema.extend({
  id: z.string().min(1).optional(),
  name: z.string().trim().min(1),
  description: z.string().optional(),
  matched_content: z.string().optional(),
  matched_positions: LineRangeSchema.optional(),
  match_confidence: MatchConfidenceSchema.optional(),
});

export type FunctionPointInput = z.infer<typeof FunctionPointInputSchema>;

export const SkippedEntrySchema = z
  .object({
    index: z.number().int().nonnegative(),
    reason: z.string().min(1),
  })
  .strict();

export type SkippedEntry = z.infer<typeof SkippedEntrySchema>;

export const BoundaryConflictSchema = z
  .object({
    earlier_id: z.string().min(1),
    later_id: z.string().min(1),
  })
  .strict();

export type BoundaryConflict = z.infer<typeof BoundaryConflictSchema>;

export const ExtractionResultSchema = z
  .object({
    function_points: z.array(FunctionPointSchema),
    requirement_doc: z.string(),
    skipped_entries: z.array(SkippedEntrySchema).default([]),
    boundary_conflicts: z.array(BoundaryConflictSchema).default([]),
    document_understanding: DocumentUnderstandingSchema.nullable().default(null),
  })
  .strict();

export type ExtractionResult = z.infer<typeof ExtractionResultSchema>;

export const RematchResultSchema = z
  .object({
    matched_content: z.string(),
    matched_positions: LineRangeSchema,
    match_confidence: MatchConfidenceSchema,
  })
  .strict();

export type RematchResult = z.infer<typeof RematchResultSchema>;
