import { describe, expect, it, vi } from "vitest";
import { buildGenerationPrompt, GeneratorAgent, normalizeArtifactPath } from "../../src/agents/generatorAgent";
import { GenerationUnavailableError } from "../../src/llm/generationError";
import { GenerationRequest } from "../../src/types";
import { createRunContext } from "../fakes";

const request: GenerationRequest = {
  taskDescription: "REST client for a todo API at https://todo.example.test",
  memoryHints: []
};

describe("GeneratorAgent", () => {
  it("extracts files from a JSON reply", async () => {
    const llm = {
      generate: vi.fn(async () =>
        JSON.stringify({
          files: [
            { path: "./driver.py", content: "class Driver: ..." },
            { path: "run_tests.py", content: "print('ALL TESTS PASSED')" }
          ]
        })
      )
    };
    const { context } = createRunContext();

    const generated = await new GeneratorAgent(llm, 1234).generate(request, context, 1);

    expect(generated.files).toEqual({
      "driver.py": "class Driver: ...",
      "run_tests.py": "print('ALL TESTS PASSED')"
    });
    expect(llm.generate).toHaveBeenCalledWith(expect.any(String), expect.any(String), 1234);
  });

  it("falls back to FILE blocks", async () => {
    const raw = ["FILE: driver.py", "```python", "x = 1", "```"].join("\n");
    const llm = { generate: vi.fn(async () => raw) };
    const { context } = createRunContext();

    const generated = await new GeneratorAgent(llm).generate(request, context, 1);

    expect(generated).toEqual({ files: { "driver.py": "x = 1" }, rawModelOutput: raw });
  });

  it("rejects replies without files as malformed", async () => {
    const llm = { generate: vi.fn(async () => "Sorry, I cannot help with that.") };
    const { context } = createRunContext();

    const promise = new GeneratorAgent(llm).generate(request, context, 1);

    await expect(promise).rejects.toBeInstanceOf(GenerationUnavailableError);
    await expect(promise).rejects.toMatchObject({ kind: "malformed", message: "Generator reply contained no files." });
  });

  it("records prompt and response with the attempt number", async () => {
    const llm = { generate: vi.fn(async () => '{"files":[{"path":"a.py","content":""}]}') };
    const { context } = createRunContext();

    await new GeneratorAgent(llm).generate(request, context, 3);

    const entries = context.transcript.recent(10);
    expect(entries.map((entry) => [entry.agent, entry.kind, entry.attempt])).toEqual([
      ["generator", "prompt", 3],
      ["generator", "response", 3]
    ]);
  });
});

describe("normalizeArtifactPath", () => {
  it("normalizes separators and dot segments", () => {
    expect(normalizeArtifactPath("tests\\unit/../run_tests.py")).toBe("tests/run_tests.py");
  });

  it("rejects paths that leave the bundle", () => {
    expect(() => normalizeArtifactPath("../evil.py")).toThrow("Generated file path is not relative to the bundle: ../evil.py");
    expect(() => normalizeArtifactPath("/etc/passwd")).toThrow(GenerationUnavailableError);
  });
});

describe("buildGenerationPrompt", () => {
  it("lists memory hints and marks their absence", () => {
    expect(buildGenerationPrompt(request)).toContain("Lessons from earlier runs:\n(none yet)");
    expect(buildGenerationPrompt({ ...request, memoryHints: ["Send the token as a bearer header"] })).toContain(
      "Lessons from earlier runs:\n- Send the token as a bearer header"
    );
  });

  it("carries the previous failure and the fix directive", () => {
    const prompt = buildGenerationPrompt({
      ...request,
      priorFailureContext: {
        attemptNumber: 1,
        outcome: { kind: "fail", category: "logic", message: "1 of 2 test(s) failed", rawErrors: ["test_get: KeyError: 'id'"] },
        diagnosis: {
          category: "logic",
          rootCause: "Items use item_id",
          canFix: true,
          fixStrategy: "prompt_adjustment",
          fixDescription: "Read item_id",
          promptModification: "Never assume an id field."
        }
      }
    });

    expect(prompt).toContain(
      [
        "Previous failure:",
        "Attempt 1 failed (logic): 1 of 2 test(s) failed",
        "- test_get: KeyError: 'id'",
        "Root cause: Items use item_id",
        "Fix (prompt_adjustment): Read item_id",
        "Additional instruction: Never assume an id field."
      ].join("\n")
    );
  });
});
