import { z } from "zod";
import { DOCUMENT_COMPLEXITIES } from "../constants";

export const DocumentComplexitySchema = z.enum(DOCUMENT_COMPLEXITIES);
export type DocumentComplexity = z.infer<typeof DocumentComplexitySchema>;

/** Heading layout of a requirement document, derived without the model. */
export const DocumentStructureSchema = z
  .object({
    has_sections: z.boolean(),
    section_count: z.number().int().nonnegative(),
    hierarchy_levels: z.array(z.number().int().positive()),
    main_sections: z.array(z.string()),
  })
  .strict();

export type DocumentStructure = z.infer<typeof DocumentStructureSchema>;

/**
 * A whole-document summary produced before extraction or generation. Clients
 * may send it back with a generation request to skip the model call.
 */
export const DocumentUnderstandingSchema = z
  .object({
    document_type: z.string().min(1),
    main_topic: z.string(),
    business_goals: z.array(z.string()),
    structure: DocumentStructureSchema,
    key_concepts: z.array(z.string()),
    key_terms: z.array(z.string()),
    business_rules: z.array(z.string()),
    completeness: z.string(),
    clarity: z.string(),
    quality_score: z.number().min(0).max(1),
    total_sections: z.number().int().nonnegative(),
    total_lines: z.number().int().positive(),
    estimated_complexity: DocumentComplexitySchema,
  })
  .strict();

export type DocumentUnderstanding = z.infer<typeof DocumentUnderstandingSchema>;
