/** Which model call produced the text being parsed. */
export type ModelOutputSource = "extraction" | "generation" | "understanding";

const SOURCE_LABELS: Record<ModelOutputSource, string> = {
  extraction: "Extraction",
  generation: "Generation",
  understanding: "Understanding",
};

/** Raised when model text cannot be turned into the JSON shape a stage expects. */
export class ModelOutputError extends Error {
  constructor(
    readonly source: ModelOutputSource,
    detail: string
  ) {
    super(`${SOURCE_LABELS[source]} output ${detail}.`);
    this.name = "ModelOutputError";
  }
}

const FENCE = /^```[\w-]*[^\S\n]*\n?([\s\S]*?)\s*```$/;
// Control characters other than tab, newline and carriage return.
const CONTROL_CHARACTERS = /[\u0000-\u0008\u000b\u000c\u000e-\u001f]/g;
// Chat-template tokens some local models leak into their output.
const TEMPLATE_TOKENS = /<\|[^|]+\|>/g;

/** Drops a ``` fence around the whole text, whatever language tag it carries. */
export function unwrapFence(text: string) {
  const trimmed = text.trim();
  const fenced = FENCE.exec(trimmed);
  return fenced ? fenced[1].trim() : trimmed;
}

export type JsonSlice = { found: "none" } | { found: "unterminated" } | { found: "value"; json: string };

/**
 * Finds the first object or array in `text` and returns it up to its matching
 * closer. Brackets inside string literals do not count.
 */
export function sliceFirstJsonValue(text: string): JsonSlice {
  const start = text.search(/[{[]/);
  if (start === -1) {
    return { found: "none" };
  }

  const closers: string[] = [];
  let inString = false;

  for (let index = start; index < text.length; index += 1) {
    const char = text[index];
    if (inString) {
      if (char === "\\") {
        index += 1;
      } else if (char === '"') {
        inString = false;
      }
      continue;
    }

    if (char === '"') {
      inString = true;
    } else if (char === "{") {
      closers.push("}");
    } else if (char === "[") {
      closers.push("]");
    } else if (char === closers[closers.length - 1]) {
      closers.pop();
      if (closers.length === 0) {
        return { found: "value", json: text.slice(start, index + 1) };
      }
    }
  }

  return { found: "unterminated" };
}

/** Parses the JSON value a model embedded in its reply, tagging failures with `source`. */
export function parseModelJson(text: string, source: ModelOutputSource): unknown {
  const cleaned = unwrapFence(text.replace(TEMPLATE_TOKENS, "").replace(CONTROL_CHARACTERS, ""));
  if (!cleaned) {
    throw new ModelOutputError(source, "is empty");
  }

  const slice = sliceFirstJsonValue(cleaned);
  if (slice.found === "none") {
    throw new ModelOutputError(source, "contains no JSON value");
  }
  if (slice.found === "unterminated") {
    throw new ModelOutputError(source, "ends before its JSON value is closed");
  }

  try {
    return JSON.parse(slice.json);
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    throw new ModelOutputError(source, `is not valid JSON (${message})`);
  }
}

/** Reads a model field meant to hold strings; a lone string counts as a one-item list. */
export function toStringList(value: unknown): string[] {
  if (typeof value === "string") {
    return value.trim() ? [value.trim()] : [];
  }
  if (!Array.isArray(value)) {
    return [];
  }
  return value
    .filter((item): item is string => typeof item === "string")
    .map((item) => item.trim())
    .filter((item) => item.length > 0);
}
