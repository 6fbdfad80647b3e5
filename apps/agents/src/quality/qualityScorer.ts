import type { ScorableTestCase, TestCasePriority } from "@reqcase/shared";

// Expected results that assert nothing concrete.
export const GENERIC_EXPECTED_PHRASES = [
  "正确显示",
  "正常显示",
  "验证通过",
  "符合预期",
  "满足要求",
  "点击关闭直接消失",
  "操作成功",
  "显示正确",
  "功能正常",
] as const;

// Steps an end user cannot perform in the product.
export const DISALLOWED_STEP_ACTIONS = ["登录后台", "查看数据库", "手动投放", "后台操作"] as const;

const HIGH_PRIORITY_TERMS = ["核心", "主要", "主流程", "登录", "支付", "core", "primary", "main flow", "login", "payment"];
const LOW_PRIORITY_TERMS = ["边界", "异常", "兼容", "boundary", "exception", "edge case", "compatib"];

const PRIORITY_ALIASES: Record<string, TestCasePriority> = {
  high: "high",
  medium: "medium",
  low: "low",
  p0: "high",
  p1: "medium",
  p2: "low",
  高: "high",
  中: "medium",
  低: "low",
};

export interface QualityAssessment {
  score: number;
  issues: string[];
}

/** Advisory score in [0, 1]; low scores are reported, never filtered. */
export function scoreTestCase(testCase: ScorableTestCase): QualityAssessment {
  const issues: string[] = [];
  let score = 1;

  if (!testCase.case_name.trim()) {
    issues.push("case name is missing");
    score -= 0.3;
  }
  if (!testCase.module_name.trim()) {
    issues.push("module name is missing");
    score -= 0.2;
  }

  const stepCount = testCase.steps.length;
  if (stepCount < 2) {
    issues.push(`too few steps (${stepCount}, at least 2 required)`);
    score -= 0.2;
  } else if (stepCount < 3) {
    issues.push(`few steps (${stepCount}, 3 recommended)`);
    score -= 0.1;
  }

  const expected = testCase.expected_result.trim();
  if (!expected) {
    issues.push("expected result is missing");
    score -= 0.3;
  } else {
    if (GENERIC_EXPECTED_PHRASES.some((phrase) => expected.includes(phrase))) {
      issues.push("expected result is a generic phrase");
      score -= 0.1;
    }
    if ([...expected].length < 5) {
      issues.push("expected result is too short");
      score -= 0.1;
    }
  }

  const preconditions = testCase.preconditions.trim();
  if (preconditions && [...preconditions].length < 3) {
    issues.push("preconditions are too short");
    score -= 0.05;
  }

  testCase.steps.forEach((rawStep, index) => {
    const step = rawStep.trim();
    if ([...step].length < 5) {
      issues.push(`step ${index + 1} is too short`);
      score -= 0.05;
    }
    if (DISALLOWED_STEP_ACTIONS.some((action) => step.includes(action))) {
      issues.push(`step ${index + 1} contains an action users cannot perform`);
      score -= 0.1;
    }
  });

  return {
    score: Math.round(Math.min(1, Math.max(0, score)) * 100) / 100,
    issues,
  };
}

export function normalizePriority(value: unknown): TestCasePriority | null {
  if (typeof value !== "string") {
    return null;
  }
  return PRIORITY_ALIASES[value.trim().toLowerCase()] ?? null;
}

export function inferPriority(testCase: Pick<ScorableTestCase, "case_name" | "expected_result">): TestCasePriority {
  const text = `${testCase.case_name} ${testCase.expected_result}`.toLowerCase();
  if (HIGH_PRIORITY_TERMS.some((term) => text.includes(term))) {
    return "high";
  }
  if (LOW_PRIORITY_TERMS.some((term) => text.includes(term))) {
    return "low";
  }
  return "medium";
}
