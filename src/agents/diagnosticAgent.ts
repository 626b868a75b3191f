import { z } from "zod";
import { config } from "../config";
import { Diagnosis, FailOutcome, FailureCategory, RunContext, TranscriptEntry, failureCategories } from "../types";
import { parseJsonObjectChain } from "../utils/json";
import { errorMessage, tailLines } from "../utils/text";
import { TextGeneratorLike } from "./generatorAgent";

export interface DiagnosticContext {
  generationHistory: TranscriptEntry[];
  attemptNumber: number;
}

export interface DiagnosticAgentLike {
  diagnose(outcome: FailOutcome, context: DiagnosticContext, run: RunContext): Promise<Diagnosis>;
}

export const UNPARSEABLE_ROOT_CAUSE = "could not parse diagnosis";

const diagnosisSchema = z.object({
  error_type: z.string().min(1),
  root_cause: z.string().min(1),
  can_fix: z.boolean(),
  fix_strategy: z.enum(["prompt_adjustment", "regenerate", "give_up"]).optional(),
  fix_description: z.string().default(""),
  prompt_modification: z.string().optional()
});

const categoryAliases: Record<string, FailureCategory> = {
  api: "api_mismatch",
  syntax: "formatting",
  import: "formatting",
  network: "environment"
};

const isFailureCategory = (value: string): value is FailureCategory => failureCategories.some((category) => category === value);

export const normalizeCategory = (errorType: string, fallback: FailureCategory): FailureCategory => {
  const key = errorType.trim().toLowerCase();
  if (isFailureCategory(key)) return key;
  return categoryAliases[key] ?? fallback;
};

const giveUp = (outcome: FailOutcome, rootCause: string): Diagnosis => ({
  category: outcome.category,
  rootCause,
  canFix: false,
  fixStrategy: "give_up",
  fixDescription: "No automatic fix available."
});

export class DiagnosticAgent implements DiagnosticAgentLike {
  constructor(
    private readonly llm: TextGeneratorLike,
    private readonly maxOutputTokens = config.diagnosticMaxTokens,
    private readonly logTailLines = config.logTailLines
  ) {}

  buildPrompt(outcome: FailOutcome, context: DiagnosticContext): string {
    const history = context.generationHistory.length
      ? context.generationHistory
          .map((entry) => `--- ${entry.agent} ${entry.kind} #${entry.sequence} ---\n${tailLines(entry.text, this.logTailLines)}`)
          .join("\n\n")
      : "(no history)";

    return [
      `Attempt: ${context.attemptNumber}`,
      `Failure category: ${outcome.category}`,
      `Failure message: ${outcome.message}`,
      `Raw errors:\n${outcome.rawErrors.length ? outcome.rawErrors.slice(0, 10).map((error) => `- ${error}`).join("\n") : "(none)"}`,
      `Recent generation log (last ${this.logTailLines} lines per entry):\n${history}`
    ].join("\n\n");
  }

  async diagnose(outcome: FailOutcome, context: DiagnosticContext, run: RunContext): Promise<Diagnosis> {
    const system = [
      "You are the diagnostic agent in a self-healing driver generation loop.",
      "Find the root cause of the failure and decide whether regenerating the driver can fix it.",
      "Return only a JSON object with keys: error_type (logic|formatting|api_mismatch|environment|unknown),",
      "root_cause, can_fix (boolean), fix_strategy (prompt_adjustment|regenerate|give_up), fix_description,",
      "prompt_modification (optional).",
      "Use give_up when the failure cannot be fixed by regenerating code, for example missing credentials."
    ].join(" ");
    const prompt = this.buildPrompt(outcome, context);

    let raw: string;
    try {
      await run.transcript.record({ agent: "diagnostic", kind: "prompt", text: prompt, attempt: context.attemptNumber });
      raw = await this.llm.generate(prompt, system, this.maxOutputTokens);
      await run.transcript.record({ agent: "diagnostic", kind: "response", text: raw, attempt: context.attemptNumber });
    } catch (error: unknown) {
      return giveUp(outcome, `diagnosis unavailable: ${errorMessage(error)}`);
    }

    const json = parseJsonObjectChain(raw);
    if (json.kind === "unparseable") {
      return giveUp(outcome, UNPARSEABLE_ROOT_CAUSE);
    }

    const strict = diagnosisSchema.safeParse(json.value);
    if (!strict.success) {
      return giveUp(outcome, UNPARSEABLE_ROOT_CAUSE);
    }

    const data = strict.data;
    return {
      category: normalizeCategory(data.error_type, outcome.category),
      rootCause: data.root_cause,
      canFix: data.can_fix,
      fixStrategy: data.fix_strategy ?? (data.can_fix ? "regenerate" : "give_up"),
      fixDescription: data.fix_description,
      ...(data.prompt_modification ? { promptModification: data.prompt_modification } : {})
    };
  }
}
