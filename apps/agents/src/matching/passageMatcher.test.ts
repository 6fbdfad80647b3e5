import { describe, expect, it } from "vitest";
import { FunctionPointInputSchema } from "@reqcase/shared";
import {
  matchFunctionPoints,
  matchPassage,
  parseHeading,
  rematchFunctionPoint,
  resolveBoundaries,
  type MatchTarget,
} from "./passageMatcher";

const DOC = [
  "# 需求说明",
  "背景介绍",
  "## 登录模块",
  "支持用户登录并记住账号",
  "密码错误时提示",
  "## 支付模块",
  "支持微信支付",
  "支付失败时重试",
  "## 其他",
  "结束",
].join("\n");

const target = (overrides: Partial<MatchTarget>): MatchTarget => ({
  name: "未命名",
  keywords: [],
  exact_phrases: [],
  section_hint: "",
  ...overrides,
});

describe("matchPassage", () => {
  it("anchors an exact phrase to its line with high confidence", () => {
    expect(matchPassage(DOC, target({ exact_phrases: ["用户登录"] }))).toEqual({
      start: 4,
      end: 4,
      confidence: "high",
    });
  });

  it("spans every exact phrase that was found and ignores missing ones", () => {
    expect(matchPassage(DOC, target({ exact_phrases: ["登录模块", "不存在的句子", "密码错误时提示"] }))).toEqual({
      start: 3,
      end: 5,
      confidence: "high",
    });
  });

  it("takes the densest keyword run trimmed to lines that contain a keyword", () => {
    expect(matchPassage(DOC, target({ keywords: ["支付", "重试"] }))).toEqual({
      start: 6,
      end: 8,
      confidence: "medium",
    });
  });

  it("falls back to the section named by the hint", () => {
    expect(matchPassage(DOC, target({ section_hint: "支付模块" }))).toEqual({
      start: 6,
      end: 8,
      confidence: "low",
    });
  });

  it("uses the function point name as a section hint", () => {
    expect(matchPassage(DOC, target({ name: "其他" }))).toEqual({ start: 9, end: 10, confidence: "low" });
  });

  it("returns the whole document when there is no evidence", () => {
    expect(matchPassage(DOC, target({ name: "不存在", keywords: ["缺失"] }))).toEqual({
      start: 1,
      end: 10,
      confidence: "low",
    });
  });
});

describe("parseHeading", () => {
  it("recognises markdown, numbered and Chinese headings", () => {
    expect(parseHeading("## 登录模块", 1)).toEqual({ line: 1, level: 2, title: "登录模块" });
    expect(parseHeading("1.2 支付流程", 2)).toEqual({ line: 2, level: 2, title: "支付流程" });
    expect(parseHeading("三、消息通知", 3)).toEqual({ line: 3, level: 1, title: "消息通知" });
    expect(parseHeading("（二）推送设置", 4)).toEqual({ line: 4, level: 2, title: "推送设置" });
    expect(parseHeading("普通段落", 5)).toBeNull();
  });
});

describe("resolveBoundaries", () => {
  it("clips an earlier range that runs into the next one", () => {
    const { resolved, conflicts } = resolveBoundaries([
      { id: "a", start: 1, end: 8 },
      { id: "b", start: 5, end: 12 },
    ]);
    expect(resolved).toEqual([
      { id: "a", start: 1, end: 4 },
      { id: "b", start: 5, end: 12 },
    ]);
    expect(conflicts).toEqual([]);
  });

  it("returns ranges in input order", () => {
    const { resolved } = resolveBoundaries([
      { id: "b", start: 5, end: 12 },
      { id: "a", start: 1, end: 8 },
    ]);
    expect(resolved.map(({ id, start, end }) => [id, start, end])).toEqual([
      ["b", 5, 12],
      ["a", 1, 4],
    ]);
  });

  it("records a conflict instead of emptying a range", () => {
    const { resolved, conflicts } = resolveBoundaries([
      { id: "a", start: 3, end: 8 },
      { id: "b", start: 3, end: 10 },
    ]);
    expect(resolved[0]).toEqual({ id: "a", start: 3, end: 8 });
    expect(conflicts).toEqual([{ earlier_id: "a", later_id: "b" }]);
  });

  it("still clips against a later range after a same-line conflict", () => {
    const { resolved, conflicts } = resolveBoundaries([
      { id: "a", start: 1, end: 10 },
      { id: "b", start: 1, end: 3 },
      { id: "c", start: 4, end: 12 },
    ]);
    expect(resolved).toEqual([
      { id: "a", start: 1, end: 3 },
      { id: "b", start: 1, end: 3 },
      { id: "c", start: 4, end: 12 },
    ]);
    expect(conflicts).toEqual([{ earlier_id: "a", later_id: "b" }]);
  });

  it("reports every range that shares a start line", () => {
    const { resolved, conflicts } = resolveBoundaries([
      { id: "a", start: 2, end: 6 },
      { id: "b", start: 2, end: 4 },
      { id: "c", start: 2, end: 9 },
    ]);
    expect(resolved.map(({ end }) => end)).toEqual([6, 4, 9]);
    expect(conflicts).toEqual([
      { earlier_id: "a", later_id: "b" },
      { earlier_id: "a", later_id: "c" },
      { earlier_id: "b", later_id: "c" },
    ]);
  });
});

describe("matchFunctionPoints", () => {
  it("builds function points with resolved passages", () => {
    const { function_points, boundary_conflicts } = matchFunctionPoints(DOC, [
      { ...target({ section_hint: "需求说明" }), id: "fp_1", name: "需求总览", description: "" },
      { ...target({ exact_phrases: ["支持微信支付"] }), id: "fp_2", name: "微信支付", description: "" },
    ]);

    expect(boundary_conflicts).toEqual([]);
    expect(function_points[0].matched_positions).toEqual([1, 6]);
    expect(function_points[0].match_confidence).toBe("low");
    expect(function_points[1]).toMatchObject({
      id: "fp_2",
      matched_positions: [7, 7],
      matched_content: "支持微信支付",
      match_confidence: "high",
    });
  });
});

describe("rematchFunctionPoint", () => {
  it("clips the target against the other points' current positions", () => {
    const login = FunctionPointInputSchema.parse({ name: "登录", section_hint: "需求说明", matched_positions: [3, 5] });
    const pay = FunctionPointInputSchema.parse({ name: "支付", matched_positions: [6, 8] });

    expect(rematchFunctionPoint(DOC, login, [login, pay])).toEqual({
      matched_content: ["# 需求说明", "背景介绍", "## 登录模块", "支持用户登录并记住账号", "密码错误时提示"].join("\n"),
      matched_positions: [1, 5],
      match_confidence: "low",
    });
  });

  it("identifies the target by id before name", () => {
    const edited = FunctionPointInputSchema.parse({ id: "fp_1", name: "需求总览", section_hint: "需求说明" });
    const stale = FunctionPointInputSchema.parse({ id: "fp_1", name: "登录", matched_positions: [3, 5] });
    const renamed = FunctionPointInputSchema.parse({ id: "fp_2", name: "需求总览", matched_positions: [3, 5] });

    expect(rematchFunctionPoint(DOC, edited, [stale]).matched_positions).toEqual([1, 10]);
    expect(rematchFunctionPoint(DOC, edited, [renamed]).matched_positions).toEqual([1, 2]);
  });
});
