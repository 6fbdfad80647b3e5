import { describe, expect, it } from "vitest";
import type { GenerationPartialResult } from "@reqcase/shared";
import { RecordingRegistry } from "./recordingRegistry";

const progress = { stage: "generating_test_cases", current: 0, total: 3, message: "Starting" };

describe("RecordingRegistry", () => {
  it("applies concurrent merges for one task one after another", async () => {
    const registry = new RecordingRegistry();
    const task = await registry.create("generate_test_cases");
    await registry.markRunning(task.id, progress);
    const append = (id: string) => (current: GenerationPartialResult | null): GenerationPartialResult => ({
      test_cases: current?.test_cases ?? [],
      by_function_point: {
        ...current?.by_function_point,
        [id]: { function_point_id: id, name: id, status: "completed", test_cases: [], warnings: [], source: "" },
      },
    });

    await Promise.all(["fp_1", "fp_2", "fp_3"].map((id) => registry.updatePartialResult(task.id, append(id))));

    const stored = await registry.get(task.id);
    expect(Object.keys(stored.partial_result?.by_function_point ?? {})).toEqual(["fp_1", "fp_2", "fp_3"]);
    expect(registry.partialHistory.map((partial) => Object.keys(partial.by_function_point).length)).toEqual([1, 2, 3]);
  });

  it("hands out frozen snapshots", async () => {
    const registry = new RecordingRegistry();
    const task = await registry.create("extract_modules");
    const running = await registry.markRunning(task.id, progress);

    expect(() => {
      running.progress.current = 2;
    }).toThrow(TypeError);
  });
});
