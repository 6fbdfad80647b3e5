import { describe, expect, it, vi } from "vitest";
import { ExtractionResultSchema } from "@reqcase/shared";
import { createAgentLogger } from "../logger";
import { LlmGatewayError, type LlmCallOptions, type LlmGateway } from "../providers/llmClient";
import { RecordingRegistry } from "../testing/recordingRegistry";
import { parseFunctionPointDrafts, parseFunctionPointEntry, runExtractionAgent } from "./runExtractionAgent";

const DOC = [
  "# 需求说明",
  "背景介绍",
  "## 登录模块",
  "支持用户登录并记住账号",
  "密码错误时提示",
  "## 支付模块",
  "支持微信支付",
  "支付失败时重试",
].join("\n");

const logger = createAgentLogger("silent");

function gatewayReturning(text: string): LlmGateway {
  return { generate: vi.fn(async (_prompt: string) => text) };
}

async function runWith(gateway: LlmGateway) {
  const registry = new RecordingRegistry();
  const task = await registry.create("extract_modules");
  await runExtractionAgent({ registry, gateway, logger }, { taskId: task.id, requirementDoc: DOC });
  return { registry, task: await registry.get(task.id) };
}

describe("parseFunctionPointEntry", () => {
  it("skips entries without a usable name", () => {
    expect(parseFunctionPointEntry({ name: "   " }, 3)).toEqual({
      kind: "skipped",
      index: 3,
      reason: "entry has no usable name",
    });
    expect(parseFunctionPointEntry("登录", 0)).toEqual({ kind: "skipped", index: 0, reason: "entry is not an object" });
  });

  it("tolerates loosely typed anchors", () => {
    expect(parseFunctionPointEntry({ id: 7, name: " 登录 ", keywords: "登录", exact_phrases: [1, "用户登录"] }, 0)).toEqual({
      kind: "ok",
      suppliedId: "7",
      draft: {
        name: "登录",
        description: "",
        keywords: ["登录"],
        exact_phrases: ["用户登录"],
        section_hint: "",
      },
    });
  });
});

describe("parseFunctionPointDrafts", () => {
  it("replaces missing and duplicated ids with positional ones", () => {
    const { drafts } = parseFunctionPointDrafts({
      function_modules: [{ id: "x", name: "A" }, { id: "x", name: "B" }, { name: "C" }],
    });
    expect(drafts.map((draft) => draft.id)).toEqual(["x", "fp_2", "fp_3"]);
  });

  it("accepts the function_points key and bare arrays", () => {
    expect(parseFunctionPointDrafts({ function_points: [{ name: "A" }] }).drafts).toHaveLength(1);
    expect(parseFunctionPointDrafts([{ name: "A" }, { name: "B" }]).drafts).toHaveLength(2);
  });
});

describe("runExtractionAgent", () => {
  it("completes with anchored function points and reports skipped entries", async () => {
    const modelOutput = [
      "```json",
      JSON.stringify({
        function_modules: [
          { name: "用户登录", exact_phrases: ["用户登录"] },
          { name: "  " },
          "stray text",
          { id: "pay", name: "支付", section_hint: "支付模块" },
        ],
      }),
      "```",
    ].join("\n");

    const { registry, task } = await runWith(gatewayReturning(modelOutput));

    expect(task.status).toBe("completed");
    expect(task.error).toBeNull();
    expect(task.progress).toMatchObject({ stage: "extracting_modules", current: 1, total: 1, percent: 100 });
    expect(registry.progressHistory[0]).toMatchObject({ stage: "extracting_modules", current: 0, total: 1 });

    const result = ExtractionResultSchema.parse(task.result);
    expect(result.requirement_doc).toBe(DOC);
    expect(result.skipped_entries).toEqual([
      { index: 1, reason: "entry has no usable name" },
      { index: 2, reason: "entry is not an object" },
    ]);
    expect(result.function_points.map((point) => [point.id, point.matched_positions, point.match_confidence])).toEqual([
      ["fp_1", [4, 4], "high"],
      ["pay", [6, 8], "low"],
    ]);
    expect(result.function_points[1].matched_content).toBe("## 支付模块\n支持微信支付\n支付失败时重试");
  });

  it("fails the task when the gateway fails", async () => {
    const gateway: LlmGateway = {
      generate: vi.fn(async () => {
        throw new LlmGatewayError("LLM request timed out after 10ms.");
      }),
    };

    const { task } = await runWith(gateway);

    expect(task.status).toBe("failed");
    expect(task.result).toBeNull();
    expect(task.error).toBe("Function point extraction failed: LLM request timed out after 10ms.");
  });

  it("fails the task when the output has no function point list", async () => {
    const { task } = await runWith(gatewayReturning('{"modules": []}'));

    expect(task.status).toBe("failed");
    expect(task.error).toBe("Function point extraction failed: Extraction output has no function_modules array.");
  });

  it("runs an understanding pass first and returns it with the result", async () => {
    const generate = vi.fn(async (prompt: string, _options?: LlmCallOptions) =>
      prompt.startsWith("You are a business analyst")
        ? JSON.stringify({ document_type: "产品需求", key_terms: ["微信支付"] })
        : JSON.stringify({ function_modules: [{ name: "用户登录", exact_phrases: ["用户登录"] }] })
    );
    const registry = new RecordingRegistry();
    const created = await registry.create("extract_modules");

    await runExtractionAgent(
      { registry, gateway: { generate }, logger },
      { taskId: created.id, requirementDoc: DOC, enableUnderstanding: true, llm: { model: "llama3:8b" } }
    );

    const task = await registry.get(created.id);
    expect(registry.progressHistory.map((update) => [update.stage, update.current, update.total])).toEqual([
      ["understanding_document", 0, 2],
      ["extracting_modules", 1, 2],
      ["extracting_modules", 2, 2],
    ]);
    const result = ExtractionResultSchema.parse(task.result);
    expect(result.document_understanding).toMatchObject({ document_type: "产品需求", key_terms: ["微信支付"] });
    expect(generate.mock.calls[1][0]).toContain("- Key terms: 微信支付");
    expect(generate.mock.calls.map(([, options]) => options)).toEqual([{ model: "llama3:8b" }, { model: "llama3:8b" }]);
  });

  it("still extracts when the understanding pass fails", async () => {
    const generate = vi.fn(async (prompt: string) => {
      if (prompt.startsWith("You are a business analyst")) {
        throw new LlmGatewayError("LLM request timed out after 10ms.");
      }
      return JSON.stringify({ function_modules: [{ name: "用户登录", exact_phrases: ["用户登录"] }] });
    });
    const registry = new RecordingRegistry();
    const created = await registry.create("extract_modules");

    await runExtractionAgent(
      { registry, gateway: { generate }, logger },
      { taskId: created.id, requirementDoc: DOC, enableUnderstanding: true }
    );

    const task = await registry.get(created.id);
    expect(task.status).toBe("completed");
    const result = ExtractionResultSchema.parse(task.result);
    expect(result.document_understanding).toBeNull();
    expect(result.function_points).toHaveLength(1);
  });
});
