import { describe, expect, it } from "vitest";
import type { ScorableTestCase } from "@reqcase/shared";
import { inferPriority, normalizePriority, scoreTestCase } from "./qualityScorer";

const wellFormed: ScorableTestCase = {
  case_name: "密码错误提示",
  module_name: "登录",
  preconditions: "已安装应用",
  steps: ["打开应用登录页", "输入错误的密码", "点击登录按钮"],
  expected_result: "提示密码错误请重新输入",
};

describe("scoreTestCase", () => {
  it("gives a complete case full marks", () => {
    expect(scoreTestCase(wellFormed)).toEqual({ score: 1, issues: [] });
  });

  it("scores a one-step case without expected result below 0.5", () => {
    const assessment = scoreTestCase({ ...wellFormed, steps: ["ok"], expected_result: "" });

    expect(assessment.score).toBe(0.45);
    expect(assessment.issues).toEqual([
      "too few steps (1, at least 2 required)",
      "expected result is missing",
      "step 1 is too short",
    ]);
    expect(new Set(assessment.issues).size).toBeGreaterThanOrEqual(3);
  });

  it("charges the smaller penalty for exactly two steps", () => {
    const assessment = scoreTestCase({ ...wellFormed, steps: ["打开设置页面", "点击退出登录"] });
    expect(assessment).toEqual({ score: 0.9, issues: ["few steps (2, 3 recommended)"] });
  });

  it("flags generic expected results and back-office steps", () => {
    const assessment = scoreTestCase({
      ...wellFormed,
      steps: ["打开应用进入首页", "登录后台修改配置", "点击提交按钮"],
      expected_result: "页面正确显示",
    });

    expect(assessment.score).toBe(0.8);
    expect(assessment.issues).toEqual([
      "expected result is a generic phrase",
      "step 2 contains an action users cannot perform",
    ]);
  });

  it("penalises very short preconditions", () => {
    expect(scoreTestCase({ ...wellFormed, preconditions: "无" })).toEqual({
      score: 0.95,
      issues: ["preconditions are too short"],
    });
  });

  it("clamps at zero", () => {
    const assessment = scoreTestCase({
      case_name: "",
      module_name: " ",
      preconditions: "",
      steps: [],
      expected_result: "",
    });
    expect(assessment.score).toBe(0);
    expect(assessment.issues).toHaveLength(4);
  });

  it("is deterministic", () => {
    const input = { ...wellFormed, steps: ["看", "点击确认按钮"] };
    expect(scoreTestCase(input)).toEqual(scoreTestCase(input));
  });
});

describe("priority", () => {
  it("infers high for core flows and low for edge cases", () => {
    expect(inferPriority({ case_name: "支付成功跳转", expected_result: "跳转到订单详情" })).toBe("high");
    expect(inferPriority({ case_name: "昵称超长的边界校验", expected_result: "提示最多20个字" })).toBe("low");
    expect(inferPriority({ case_name: "修改昵称", expected_result: "昵称更新为新值" })).toBe("medium");
  });

  it("normalises model-supplied priorities", () => {
    expect(normalizePriority(" HIGH ")).toBe("high");
    expect(normalizePriority("P2")).toBe("low");
    expect(normalizePriority("中")).toBe("medium");
    expect(normalizePriority("urgent")).toBeNull();
    expect(normalizePriority(1)).toBeNull();
  });
});
