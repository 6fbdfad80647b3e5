import type { DocumentUnderstanding } from "@reqcase/shared";

export function buildUnderstandingPrompt(requirementDoc: string) {
  return [
    "You are a business analyst. Read the requirement document below and summarise it for a test team.",
    "Return one JSON object only. No markdown, no commentary.",
    "Rules:",
    "- `document_type` names the kind of document, e.g. product requirement, interface spec, change request.",
    "- `business_goals`, `key_concepts`, `key_terms` and `business_rules` only list what the document states.",
    "- `completeness` and `clarity` are one of high, medium, low.",
    "- `quality_score` is a number from 0 to 1 rating how testable the document is.",
    "- Write in the same language as the document.",
    "Output format:",
    JSON.stringify(
      {
        document_type: "product requirement",
        main_topic: "one-sentence topic",
        business_goals: ["goal"],
        key_concepts: ["concept"],
        key_terms: ["term"],
        business_rules: ["rule"],
        completeness: "medium",
        clarity: "high",
        quality_score: 0.8,
      },
      null,
      2
    ),
    "Requirement document:",
    requirementDoc,
  ].join("\n");
}

// Empty when there is no understanding, so callers can spread it unconditionally.
function understandingContext(understanding: DocumentUnderstanding | null | undefined): string[] {
  if (!understanding) {
    return [];
  }
  const listed = (label: string, items: string[]) => (items.length > 0 ? [`- ${label}: ${items.join("; ")}`] : []);
  return [
    "Document context:",
    `- Type: ${understanding.document_type}`,
    ...(understanding.main_topic ? [`- Topic: ${understanding.main_topic}`] : []),
    ...listed("Business goals", understanding.business_goals),
    ...listed("Key terms", understanding.key_terms),
    ...listed("Business rules", understanding.business_rules),
  ];
}

export function buildExtractionPrompt(requirementDoc: string, understanding?: DocumentUnderstanding | null) {
  return [
    "You are a senior test engineer. Split the requirement document below into function points.",
    "Return one JSON object only. No markdown, no commentary.",
    "Rules:",
    "- One function point per independently testable feature, page, popup or business rule.",
    "- Do not invent features that the document does not describe.",
    "- Copy `exact_phrases` verbatim from the document (headings or distinctive sentences).",
    "- `keywords` are 2-5 short terms that appear in the document near the feature.",
    "- `section_hint` is the heading text of the section that describes the feature, or an empty string.",
    "- Write names and descriptions in the same language as the document.",
    "Output format:",
    JSON.stringify(
      {
        function_modules: [
          {
            name: "function point name",
            description: "one-sentence summary",
            keywords: ["term"],
            exact_phrases: ["phrase copied from the document"],
            section_hint: "section heading",
          },
        ],
      },
      null,
      2
    ),
    ...understandingContext(understanding),
    "Requirement document:",
    requirementDoc,
  ].join("\n");
}

export function buildGenerationPrompt(input: {
  name: string;
  description: string;
  snippet: string;
  understanding?: DocumentUnderstanding | null;
}) {
  return [
    `You are a test engineer. Write test cases for the function point "${input.name}".`,
    "Return one JSON object only. No markdown, no commentary.",
    ...understandingContext(input.understanding),
    "Requirement excerpt:",
    input.snippet,
    "Function point:",
    input.description ? `${input.name}: ${input.description}` : input.name,
    "Rules:",
    `- Only cover behaviour of "${input.name}" that the excerpt describes; do not invent buttons, pages or flows.`,
    "- `expected_result` quotes the excerpt's own sentence wherever one exists.",
    "- Every case has at least 3 steps, one concrete user action per step.",
    "- Steps are actions an end user can perform in the product. No back-office, database or manual operations.",
    "- Cover the main flow, boundaries and constraints.",
    "- `priority` is one of high, medium, low.",
    "- Write in the same language as the excerpt.",
    "Output format:",
    JSON.stringify(
      {
        test_cases: [
          {
            case_name: "case name",
            sub_module: "optional sub-area",
            description: "what the case verifies",
            preconditions: "required state",
            steps: ["step 1", "step 2", "step 3"],
            expected_result: "sentence quoted from the excerpt",
            priority: "high",
          },
        ],
      },
      null,
      2
    ),
  ].join("\n");
}
