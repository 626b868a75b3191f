import path from "node:path";
import { z } from "zod";
import { config } from "../config";
import { GenerationUnavailableError } from "../llm/generationError";
import { GenerationRequest, RunContext } from "../types";
import { extractFileBlocks, parseJsonObjectChain } from "../utils/json";

export interface TextGeneratorLike {
  generate(prompt: string, system: string, maxOutputTokens: number): Promise<string>;
}

export interface GeneratedFiles {
  files: Record<string, string>;
  rawModelOutput: string;
}

export interface GeneratorAgentLike {
  generate(request: GenerationRequest, run: RunContext, attemptNumber: number): Promise<GeneratedFiles>;
}

const filesSchema = z.object({
  files: z
    .array(
      z.object({
        path: z.string().min(1),
        content: z.string()
      })
    )
    .min(1)
});

const harnessContract = [
  "The bundle runs in an empty directory with the command `" + config.sandboxCommand + "`.",
  "Include that entry file. It must exercise the driver and finally print:",
  "JSON_RESULT_START",
  '{"tests_passed": <int>, "tests_failed": <int>, "errors": [{"test": "<name>", "error": "<message>"}]}',
  "JSON_RESULT_END",
  "and also print `ALL TESTS PASSED` when nothing failed."
].join("\n");

export const normalizeArtifactPath = (candidate: string): string => {
  const normalized = path.posix.normalize(candidate.trim().replace(/\\/g, "/"));
  if (!normalized || normalized === "." || normalized.startsWith("../") || normalized === ".." || path.posix.isAbsolute(normalized)) {
    throw new GenerationUnavailableError("malformed", `Generated file path is not relative to the bundle: ${candidate}`);
  }
  return normalized;
};

export const buildGenerationPrompt = (request: GenerationRequest): string => {
  const sections = [`Target:\n${request.taskDescription}`];

  sections.push(
    `Lessons from earlier runs:\n${
      request.memoryHints.length > 0 ? request.memoryHints.map((hint) => `- ${hint}`).join("\n") : "(none yet)"
    }`
  );

  const prior = request.priorFailureContext;
  if (prior) {
    const lines = [
      `Attempt ${prior.attemptNumber} failed (${prior.outcome.category}): ${prior.outcome.message}`,
      ...prior.outcome.rawErrors.slice(0, 10).map((error) => `- ${error}`),
      `Root cause: ${prior.diagnosis.rootCause}`,
      `Fix (${prior.diagnosis.fixStrategy}): ${prior.diagnosis.fixDescription}`
    ];
    if (prior.diagnosis.promptModification) {
      lines.push(`Additional instruction: ${prior.diagnosis.promptModification}`);
    }
    sections.push(`Previous failure:\n${lines.join("\n")}`);
  }

  sections.push(`Test harness:\n${harnessContract}`);
  sections.push("Regenerate the complete driver; every file must be complete.");
  return sections.join("\n\n");
};

export class GeneratorAgent implements GeneratorAgentLike {
  constructor(
    private readonly llm: TextGeneratorLike,
    private readonly maxOutputTokens = config.generatorMaxTokens
  ) {}

  async generate(request: GenerationRequest, run: RunContext, attemptNumber: number): Promise<GeneratedFiles> {
    const system = [
      "You are the generator agent in a self-healing driver generation loop.",
      "You write a complete API client driver with its tests.",
      "Return only a JSON object with key files: an array of { path, content } with full file content.",
      "Paths are relative to the bundle root."
    ].join(" ");
    const prompt = buildGenerationPrompt(request);

    await run.transcript.record({ agent: "generator", kind: "prompt", text: prompt, attempt: attemptNumber });
    const raw = await this.llm.generate(prompt, system, this.maxOutputTokens);
    await run.transcript.record({ agent: "generator", kind: "response", text: raw, attempt: attemptNumber });

    return { files: this.extractFiles(raw), rawModelOutput: raw };
  }

  private extractFiles(raw: string): Record<string, string> {
    const json = parseJsonObjectChain(raw);
    if (json.kind === "parsed") {
      const strict = filesSchema.safeParse(json.value);
      if (strict.success) {
        return Object.fromEntries(strict.data.files.map((file) => [normalizeArtifactPath(file.path), file.content]));
      }
    }

    const blocks = extractFileBlocks(raw);
    if (blocks.kind === "parsed") {
      return Object.fromEntries(Object.entries(blocks.value).map(([filePath, content]) => [normalizeArtifactPath(filePath), content]));
    }

    throw new GenerationUnavailableError("malformed", "Generator reply contained no files.");
  }
}
