import type {
  BoundaryConflict,
  FunctionPoint,
  FunctionPointInput,
  MatchConfidence,
  RematchResult,
} from "@reqcase/shared";
import type { AgentLogger } from "../logger";

/** Anchor data the matcher reads from a function point. */
export interface MatchTarget {
  name: string;
  keywords: string[];
  exact_phrases: string[];
  section_hint: string;
}

/** A 1-based, inclusive line range plus the evidence tier that produced it. */
export interface PassageCandidate {
  start: number;
  end: number;
  confidence: MatchConfidence;
}

export type FunctionPointDraft = Omit<FunctionPoint, "matched_content" | "matched_positions" | "match_confidence">;

export interface BoundaryInput {
  id: string;
  start: number;
  end: number;
}

// A line is "hot" above this keyword density; a run peaking at MEDIUM_DENSITY or more is medium confidence.
const HOT_DENSITY = 0.1;
const MEDIUM_DENSITY = 0.3;

export function splitLines(doc: string) {
  return doc.split("\n");
}

export function sliceLines(lines: string[], start: number, end: number) {
  return lines.slice(start - 1, end).join("\n");
}

function lineAtOffset(doc: string, offset: number) {
  let line = 1;
  for (let index = 0; index < offset; index += 1) {
    if (doc[index] === "\n") {
      line += 1;
    }
  }
  return line;
}

function uniqueNonBlank(values: string[], normalize: (value: string) => string) {
  return [...new Set(values.map(normalize).filter((value) => value.length > 0))];
}

export function matchExactPhrases(doc: string, phrases: string[]): PassageCandidate | null {
  let start = Number.POSITIVE_INFINITY;
  let end = 0;

  for (const phrase of uniqueNonBlank(phrases, (value) => value.trim())) {
    const offset = doc.indexOf(phrase);
    if (offset === -1) {
      continue;
    }
    start = Math.min(start, lineAtOffset(doc, offset));
    end = Math.max(end, lineAtOffset(doc, offset + phrase.length - 1));
  }

  return end === 0 ? null : { start, end, confidence: "high" };
}

export function matchKeywordDensity(lines: string[], keywords: string[]): PassageCandidate | null {
  const needles = uniqueNonBlank(keywords, (value) => value.trim().toLowerCase());
  if (needles.length === 0) {
    return null;
  }

  const scores = lines.map((line) => {
    const lower = line.toLowerCase();
    return needles.filter((needle) => lower.includes(needle)).length;
  });
  const window = 3 * needles.length;
  const density = scores.map((score, index) => {
    const before = index > 0 ? scores[index - 1] : 0;
    const after = index + 1 < scores.length ? scores[index + 1] : 0;
    return (before + score + after) / window;
  });

  // Longest contiguous hot run; the earliest wins ties.
  let best: { start: number; end: number } | null = null;
  let runStart = -1;
  for (let index = 0; index <= lines.length; index += 1) {
    const hot = index < lines.length && density[index] > HOT_DENSITY;
    if (hot && runStart === -1) {
      runStart = index;
    }
    if (!hot && runStart !== -1) {
      if (!best || index - runStart > best.end - best.start + 1) {
        best = { start: runStart, end: index - 1 };
      }
      runStart = -1;
    }
  }

  if (!best) {
    return null;
  }

  let first = best.start;
  let last = best.end;
  while (first < best.end && scores[first] === 0) {
    first += 1;
  }
  while (last > first && scores[last] === 0) {
    last -= 1;
  }
  // A run carried only by its neighbours keeps its full extent.
  if (scores[first] === 0) {
    first = best.start;
    last = best.end;
  }

  const peak = Math.max(...density.slice(best.start, best.end + 1));
  return {
    start: first + 1,
    end: last + 1,
    confidence: peak >= MEDIUM_DENSITY ? "medium" : "low",
  };
}

export interface Heading {
  line: number;
  level: number;
  title: string;
}

const MARKDOWN_HEADING = /^(#{1,6})\s+(.+?)\s*#*$/;
const NUMBERED_HEADING = /^(\d+(?:\.\d+)*)(?:[.、)）]\s*|\s+)([^\s\d].*)$/;
const CHINESE_HEADING = /^[一二三四五六七八九十]+[、.．]\s*(\S.*)$/;
const CHINESE_SUB_HEADING = /^[(（][一二三四五六七八九十]+[)）]\s*(\S.*)$/;

export function parseHeading(text: string, line: number): Heading | null {
  const trimmed = text.trim();

  const markdown = trimmed.match(MARKDOWN_HEADING);
  if (markdown) {
    return { line, level: markdown[1].length, title: markdown[2].replace(/\*\*/g, "").trim() };
  }
  const numbered = trimmed.match(NUMBERED_HEADING);
  if (numbered) {
    return { line, level: numbered[1].split(".").length, title: numbered[2].trim() };
  }
  const chinese = trimmed.match(CHINESE_HEADING);
  if (chinese) {
    return { line, level: 1, title: chinese[1].trim() };
  }
  const chineseSub = trimmed.match(CHINESE_SUB_HEADING);
  if (chineseSub) {
    return { line, level: 2, title: chineseSub[1].trim() };
  }
  return null;
}

export function matchSection(lines: string[], hints: string[]): PassageCandidate | null {
  const headings = lines
    .map((text, index) => parseHeading(text, index + 1))
    .filter((heading): heading is Heading => heading !== null);

  for (const hint of uniqueNonBlank(hints, (value) => value.trim().toLowerCase())) {
    const position = headings.findIndex((heading) => {
      const title = heading.title.toLowerCase();
      return title === hint || title.startsWith(hint);
    });
    if (position === -1) {
      continue;
    }

    const heading = headings[position];
    const next = headings.slice(position + 1).find((candidate) => candidate.level <= heading.level);
    return {
      start: heading.line,
      end: next ? next.line - 1 : lines.length,
      confidence: "low",
    };
  }

  return null;
}

/**
 * Locates the passage of `doc` that backs a function point.
 *
 * Evidence is tried strongest first: verbatim phrases, then keyword density,
 * then a heading matching the section hint or name. With no evidence at all the
 * whole document is returned at low confidence; this never throws.
 */
export function matchPassage(doc: string, target: MatchTarget): PassageCandidate {
  const lines = splitLines(doc);
  return (
    matchExactPhrases(doc, target.exact_phrases) ??
    matchKeywordDensity(lines, target.keywords) ??
    matchSection(lines, [target.section_hint, target.name]) ?? {
      start: 1,
      end: lines.length,
      confidence: "low",
    }
  );
}

/**
 * Clips each range so it ends before the nearest later range (by start line)
 * that begins inside it. A later range starting on the same line cannot be
 * clipped away; every such pair stays overlapping and is reported as a
 * conflict. Results come back in input order.
 */
export function resolveBoundaries(
  candidates: BoundaryInput[]
): { resolved: BoundaryInput[]; conflicts: BoundaryConflict[] } {
  const resolved = candidates.map(({ id, start, end }) => ({ id, start, end }));
  const order = resolved
    .map((candidate, index) => ({ candidate, index }))
    .sort((left, right) => left.candidate.start - right.candidate.start || left.index - right.index)
    .map(({ candidate }) => candidate);
  const conflicts: BoundaryConflict[] = [];

  order.forEach((current, position) => {
    const overlapping = order.slice(position + 1).filter((later) => later.start <= current.end);
    const clipAt = overlapping.find((later) => later.start > current.start);
    if (clipAt) {
      current.end = clipAt.start - 1;
    }
    // Later starts never move, so whatever still overlaps here stays overlapping.
    for (const later of overlapping) {
      if (later.start <= current.end) {
        conflicts.push({ earlier_id: current.id, later_id: later.id });
      }
    }
  });

  return { resolved, conflicts };
}

export function matchFunctionPoints(
  doc: string,
  drafts: FunctionPointDraft[],
  logger?: AgentLogger
): { function_points: FunctionPoint[]; boundary_conflicts: BoundaryConflict[] } {
  const lines = splitLines(doc);
  const candidates = drafts.map((draft) => ({ id: draft.id, ...matchPassage(doc, draft) }));
  const { resolved, conflicts } = resolveBoundaries(candidates);

  for (const conflict of conflicts) {
    logger?.warn(conflict, "Overlapping passages left unresolved");
  }

  return {
    function_points: drafts.map((draft, index) => {
      const { start, end } = resolved[index];
      return {
        ...draft,
        matched_content: sliceLines(lines, start, end),
        matched_positions: [start, end],
        match_confidence: candidates[index].confidence,
      };
    }),
    boundary_conflicts: conflicts,
  };
}

function isSameFunctionPoint(left: FunctionPointInput, right: FunctionPointInput) {
  if (left.id && right.id) {
    return left.id === right.id;
  }
  return left.name.trim() === right.name.trim();
}

/**
 * Re-anchors one function point after the user edited it. The other points keep
 * their current positions; only the target is clipped against them.
 */
export function rematchFunctionPoint(
  doc: string,
  target: FunctionPointInput,
  all: FunctionPointInput[]
): RematchResult {
  const lines = splitLines(doc);
  const candidate = matchPassage(doc, target);

  const others: BoundaryInput[] = [];
  all.forEach((other, index) => {
    if (!other.matched_positions || isSameFunctionPoint(other, target)) {
      return;
    }
    const [start, end] = other.matched_positions;
    others.push({ id: `other_${index}`, start, end });
  });

  const { resolved } = resolveBoundaries([{ id: "target", start: candidate.start, end: candidate.end }, ...others]);
  const { start, end } = resolved[0];

  return {
    matched_content: sliceLines(lines, start, end),
    matched_positions: [start, end],
    match_confidence: candidate.confidence,
  };
}
