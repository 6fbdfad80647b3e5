import { z } from "zod";
import type { DocumentComplexity, DocumentStructure, DocumentUnderstanding } from "@reqcase/shared";
import type { AgentLogger } from "../logger";
import { parseHeading, splitLines } from "../matching/passageMatcher";
import type { LlmCallOptions, LlmGateway } from "../providers/llmClient";
import { ModelOutputError, parseModelJson, toStringList } from "../providers/jsonOutput";
import { buildUnderstandingPrompt } from "../prompts";

const SIMPLE_LIMITS = { lines: 100, sections: 5 };
const MODERATE_LIMITS = { lines: 500, sections: 15 };

const ratingText = z.string().trim().min(1).catch("unknown");

// Only document_type is required; every other field falls back when the model omits or mangles it.
const ModelUnderstandingSchema = z.object({
  document_type: z.string().trim().min(1),
  main_topic: z.string().trim().catch(""),
  business_goals: z.unknown().transform(toStringList),
  key_concepts: z.unknown().transform(toStringList),
  key_terms: z.unknown().transform(toStringList),
  business_rules: z.unknown().transform(toStringList),
  completeness: ratingText,
  clarity: ratingText,
  quality_score: z.coerce.number().min(0).max(1).catch(0.5),
});

export function estimateComplexity(totalLines: number, sectionCount: number): DocumentComplexity {
  if (totalLines < SIMPLE_LIMITS.lines && sectionCount < SIMPLE_LIMITS.sections) {
    return "simple";
  }
  if (totalLines < MODERATE_LIMITS.lines && sectionCount < MODERATE_LIMITS.sections) {
    return "moderate";
  }
  return "complex";
}

/** Heading statistics for `doc`; the same heading forms the passage matcher recognises. */
export function analyzeDocumentStructure(doc: string): DocumentStructure {
  const headings = splitLines(doc).flatMap((text, index) => {
    const heading = parseHeading(text, index + 1);
    return heading ? [heading] : [];
  });

  return {
    has_sections: headings.length > 0,
    section_count: headings.length,
    hierarchy_levels: [...new Set(headings.map((heading) => heading.level))].sort((a, b) => a - b),
    main_sections: headings.filter((heading) => heading.level === 1).map((heading) => heading.title),
  };
}

export interface UnderstandingDeps {
  gateway: LlmGateway;
  logger: AgentLogger;
}

/**
 * Asks the model for a whole-document summary and combines it with the heading
 * structure. Returns null when the call or its output fails; callers carry on
 * without the extra context.
 */
export async function understandDocument(
  deps: UnderstandingDeps,
  input: { taskId: string; requirementDoc: string; callOptions?: LlmCallOptions }
): Promise<DocumentUnderstanding | null> {
  const { taskId, requirementDoc } = input;

  try {
    const text = await deps.gateway.generate(buildUnderstandingPrompt(requirementDoc), input.callOptions);
    const reply = ModelUnderstandingSchema.safeParse(parseModelJson(text, "understanding"));
    if (!reply.success) {
      throw new ModelOutputError("understanding", "has no document_type");
    }

    const structure = analyzeDocumentStructure(requirementDoc);
    const totalLines = splitLines(requirementDoc).length;
    const understanding: DocumentUnderstanding = {
      ...reply.data,
      structure,
      total_sections: structure.section_count,
      total_lines: totalLines,
      estimated_complexity: estimateComplexity(totalLines, structure.section_count),
    };
    deps.logger.info(
      { taskId, documentType: understanding.document_type, qualityScore: understanding.quality_score },
      "Document understanding completed"
    );
    return understanding;
  } catch (error) {
    deps.logger.warn({ taskId, err: error }, "Document understanding failed; continuing without it");
    return null;
  }
}
