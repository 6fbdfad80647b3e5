import { describe, expect, it } from "vitest";
import { ModelOutputError, parseModelJson, sliceFirstJsonValue, toStringList, unwrapFence } from "./jsonOutput";

describe("unwrapFence", () => {
  it("removes a fence with a language tag", () => {
    expect(unwrapFence('```json\n{"a": 1}\n```')).toBe('{"a": 1}');
  });

  it("leaves unfenced text trimmed", () => {
    expect(unwrapFence('  {"a": 1} \n')).toBe('{"a": 1}');
  });
});

describe("sliceFirstJsonValue", () => {
  it("matches nested brackets of both kinds", () => {
    expect(sliceFirstJsonValue('结果: {"a": [1, {"b": 2}]} 完')).toEqual({ found: "value", json: '{"a": [1, {"b": 2}]}' });
  });

  it("ignores brackets and escaped quotes inside strings", () => {
    expect(sliceFirstJsonValue('{"a": "x\\"}]"} tail')).toEqual({ found: "value", json: '{"a": "x\\"}]"}' });
  });

  it("reports text without a value and values that never close", () => {
    expect(sliceFirstJsonValue("plain text")).toEqual({ found: "none" });
    expect(sliceFirstJsonValue('{"a": [1')).toEqual({ found: "unterminated" });
  });
});

describe("parseModelJson", () => {
  it("extracts the first balanced value around chatter", () => {
    expect(parseModelJson('Here you go: {"a": {"b": "}"}} and that is all {"c": 2}', "extraction")).toEqual({
      a: { b: "}" },
    });
  });

  it("accepts a top-level array", () => {
    expect(parseModelJson("[1, 2]", "generation")).toEqual([1, 2]);
  });

  it("drops leaked chat-template tokens", () => {
    expect(parseModelJson('{"a": "x<|im_end|>"}', "generation")).toEqual({ a: "x" });
  });

  it("tags failures with the call that produced the text", () => {
    const error = (() => {
      try {
        parseModelJson("   ", "understanding");
      } catch (err) {
        return err;
      }
    })();

    expect(error).toBeInstanceOf(ModelOutputError);
    expect(error).toMatchObject({ source: "understanding", message: "Understanding output is empty." });
  });

  it("rejects text without JSON", () => {
    expect(() => parseModelJson("no structured output", "extraction")).toThrow(
      "Extraction output contains no JSON value."
    );
  });

  it("rejects an unterminated object", () => {
    expect(() => parseModelJson('{"a": 1', "generation")).toThrow(
      "Generation output ends before its JSON value is closed."
    );
  });

  it("rejects malformed JSON", () => {
    expect(() => parseModelJson("{a: 1}", "extraction")).toThrow(/^Extraction output is not valid JSON \(/);
  });
});

describe("toStringList", () => {
  it("keeps trimmed, non-blank strings", () => {
    expect(toStringList([" 登录 ", 3, "", "支付"])).toEqual(["登录", "支付"]);
    expect(toStringList(" 单个 ")).toEqual(["单个"]);
    expect(toStringList({ a: 1 })).toEqual([]);
  });
});
