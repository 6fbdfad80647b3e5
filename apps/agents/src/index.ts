export { fromEnv, loadLlmConfig, LLM_PROVIDERS, type LlmConfig, type LlmProvider } from "./config";
export { createAgentLogger, defaultAgentLogger, type AgentLogger } from "./logger";
export {
  HttpLlmGateway,
  LlmGatewayError,
  type LlmCallOptions,
  type LlmOverrides,
  type LlmGateway,
} from "./providers/llmClient";
export { ModelOutputError, type ModelOutputSource } from "./providers/jsonOutput";
export {
  matchFunctionPoints,
  matchPassage,
  rematchFunctionPoint,
  resolveBoundaries,
  type FunctionPointDraft,
  type PassageCandidate,
} from "./matching/passageMatcher";
export { inferPriority, scoreTestCase, type QualityAssessment } from "./quality/qualityScorer";
export { runExtractionAgent, type ExtractionAgentDeps, type ExtractionInput } from "./extraction/runExtractionAgent";
export {
  DEFAULT_GENERATION_MAX_RETRIES,
  DEFAULT_GENERATION_RETRY_BACKOFF_MS,
  runGenerationAgent,
  type GenerationAgentDeps,
  type GenerationInput,
  type GenerationOptions,
} from "./generation/runGenerationAgent";
