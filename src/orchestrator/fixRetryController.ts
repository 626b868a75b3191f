import { config } from "../config";
import { DiagnosticAgentLike } from "../agents/diagnosticAgent";
import { GeneratorAgentLike } from "../agents/generatorAgent";
import { ArtifactStoreLike } from "../services/artifactStore";
import { SandboxClientLike } from "../services/localSandbox";
import {
  AgentRole,
  AttemptRecord,
  AttemptReport,
  Diagnosis,
  ExecutionResult,
  FailOutcome,
  GeneratedArtifact,
  GenerationRequest,
  Outcome,
  RunContext,
  TerminalReason
} from "../types";
import { errorMessage } from "../utils/text";
import { withTimeout } from "../utils/timeout";
import { classifyExecution, parseSandboxOutput } from "./resultClassifier";

export interface ControllerOptions {
  timeoutSeconds: number;
  /** Added on top of the sandbox timeout before the controller stops waiting. */
  graceMs: number;
}

export interface ControllerRunOptions {
  maxRetries: number;
  supervisorAttemptNumber: number;
  /** Passed to the sandbox process, typically the target API's credentials. */
  envVars?: Record<string, string>;
}

export interface FixRetryControllerLike {
  run(task: GenerationRequest, options: ControllerRunOptions, run: RunContext): Promise<AttemptReport>;
}

type ControllerState =
  | { kind: "generating"; request: GenerationRequest }
  | { kind: "executing"; artifact: GeneratedArtifact }
  | { kind: "classifying"; artifact: GeneratedArtifact; execution: ExecutionResult }
  | { kind: "diagnosing"; outcome: FailOutcome }
  | { kind: "done"; terminal: TerminalReason };

// Last generator prompt and response plus the previous diagnosis exchange.
const diagnosisHistoryEntries = 4;

const unavailableDiagnosis = (outcome: FailOutcome, error: unknown): Diagnosis => ({
  category: outcome.category,
  rootCause: `diagnosis unavailable: ${errorMessage(error)}`,
  canFix: false,
  fixStrategy: "give_up",
  fixDescription: "No automatic fix available."
});

const environmentFailure = (message: string): FailOutcome => ({
  kind: "fail",
  category: "environment",
  message,
  rawErrors: [message]
});

export const buildRetryRequest = (
  task: GenerationRequest,
  attemptNumber: number,
  outcome: FailOutcome,
  diagnosis: Diagnosis
): GenerationRequest =>
  Object.freeze({
    taskDescription: task.taskDescription,
    memoryHints: task.memoryHints,
    priorFailureContext: Object.freeze({ attemptNumber, outcome, diagnosis })
  });

/**
 * Inner generate, execute, classify loop. At most `maxRetries` cycles run; an unfixable
 * diagnosis ends the loop early. Every failure, including collaborator errors, comes back
 * inside the report.
 */
export class FixRetryController implements FixRetryControllerLike {
  private readonly options: ControllerOptions;

  constructor(
    private readonly generator: GeneratorAgentLike,
    private readonly sandbox: SandboxClientLike,
    private readonly diagnostic: DiagnosticAgentLike,
    private readonly artifacts: ArtifactStoreLike,
    options: Partial<ControllerOptions> = {}
  ) {
    this.options = {
      timeoutSeconds: options.timeoutSeconds ?? config.sandboxTimeoutSeconds,
      graceMs: options.graceMs ?? 5000
    };
  }

  async run(task: GenerationRequest, options: ControllerRunOptions, run: RunContext): Promise<AttemptReport> {
    const maxRetries = Math.max(1, Math.floor(options.maxRetries));
    const supervisorAttempt = options.supervisorAttemptNumber;
    const attempts: AttemptRecord[] = [];
    let attemptNumber = 1;
    let finalArtifact: GeneratedArtifact | undefined;
    let state: ControllerState = { kind: "generating", request: task };

    const emit = (role: AgentRole, type: string, message: string, data?: Record<string, unknown>) =>
      run.events.emit(role, type, message, { supervisorAttempt, attempt: attemptNumber, data });

    const record = (outcome: Outcome, artifactRef?: string): void => {
      attempts.push({ attemptNumber, outcome, ...(artifactRef ? { artifactRef } : {}) });
    };

    const afterFailure = (outcome: FailOutcome): ControllerState => {
      if (attemptNumber >= maxRetries) {
        emit("controller", "retries_exhausted", `Attempt ${attemptNumber} of ${maxRetries} failed; no retries left.`);
        return { kind: "done", terminal: "exhausted" };
      }
      if (run.signal?.aborted) {
        return { kind: "done", terminal: "cancelled" };
      }
      return { kind: "diagnosing", outcome };
    };

    emit("controller", "controller_started", `Fix-retry loop started (max ${maxRetries} attempt(s)).`, { maxRetries });

    while (state.kind !== "done") {
      switch (state.kind) {
        case "generating": {
          const request: GenerationRequest = state.request;
          if (attemptNumber > 1 && run.signal?.aborted) {
            state = { kind: "done", terminal: "cancelled" };
            break;
          }
          emit("generator", "generation_started", `Attempt ${attemptNumber}: generating driver.`);
          try {
            const generated = await this.generator.generate(request, run, attemptNumber);
            const artifact = this.artifacts.save(run.runId, generated.files, generated.rawModelOutput);
            finalArtifact = artifact;
            emit("generator", "artifact_generated", `Generated ${Object.keys(artifact.files).length} file(s).`, {
              artifactId: artifact.id,
              paths: Object.keys(artifact.files)
            });
            state = { kind: "executing", artifact };
          } catch (error: unknown) {
            const outcome = environmentFailure(`Generation failed: ${errorMessage(error)}`);
            record(outcome);
            emit("generator", "generation_failed", outcome.message);
            state = afterFailure(outcome);
          }
          break;
        }

        case "executing": {
          const artifact: GeneratedArtifact = state.artifact;
          const timeoutMs = this.options.timeoutSeconds * 1000 + this.options.graceMs;
          emit("sandbox", "execution_started", `Running driver tests (timeout ${this.options.timeoutSeconds}s).`);
          try {
            const raw = await withTimeout(
              this.sandbox.execute({
                files: artifact.files,
                envVars: options.envVars ?? {},
                timeoutSeconds: this.options.timeoutSeconds
              }),
              timeoutMs,
              "Sandbox execution"
            );
            const execution = parseSandboxOutput(raw);
            emit("sandbox", "execution_finished", `Sandbox finished in ${execution.durationSeconds.toFixed(1)}s.`, {
              exitError: execution.exitError,
              structuredCounts: execution.structuredCounts,
              stdoutTail: execution.stdout.slice(-1000)
            });
            state = { kind: "classifying", artifact, execution };
          } catch (error: unknown) {
            const outcome = environmentFailure(`Sandbox execution failed: ${errorMessage(error)}`);
            record(outcome, artifact.id);
            emit("sandbox", "execution_failed", outcome.message);
            state = afterFailure(outcome);
          }
          break;
        }

        case "classifying": {
          const artifact: GeneratedArtifact = state.artifact;
          const execution: ExecutionResult = state.execution;
          const outcome = classifyExecution(execution);
          record(outcome, artifact.id);
          if (outcome.kind === "pass") {
            emit("classifier", "attempt_passed", `Attempt ${attemptNumber} passed.`);
            state = { kind: "done", terminal: "passed" };
            break;
          }
          run.events.emit("classifier", "attempt_failed", `Attempt ${attemptNumber} failed (${outcome.category}): ${outcome.message}`, {
            supervisorAttempt,
            attempt: attemptNumber,
            category: outcome.category,
            data: { rawErrors: outcome.rawErrors.slice(0, 10) }
          });
          state = afterFailure(outcome);
          break;
        }

        case "diagnosing": {
          const outcome: FailOutcome = state.outcome;
          emit("diagnostic", "diagnosis_started", `Diagnosing attempt ${attemptNumber}.`);
          const diagnosis = await this.diagnose(outcome, attemptNumber, run);
          const current = attempts[attempts.length - 1];
          if (current) current.diagnosis = diagnosis;

          run.events.emit("diagnostic", "diagnosis_ready", `Root cause: ${diagnosis.rootCause}`, {
            supervisorAttempt,
            attempt: attemptNumber,
            category: diagnosis.category,
            data: { canFix: diagnosis.canFix, fixStrategy: diagnosis.fixStrategy, fixDescription: diagnosis.fixDescription }
          });

          if (!diagnosis.canFix || diagnosis.fixStrategy === "give_up") {
            emit("controller", "gave_up", `Diagnosis judged attempt ${attemptNumber} unfixable; stopping.`);
            state = { kind: "done", terminal: "gave_up" };
            break;
          }

          const next = buildRetryRequest(task, attemptNumber, outcome, diagnosis);
          attemptNumber += 1;
          emit("controller", "retry_scheduled", `Retrying with fix: ${diagnosis.fixDescription}`);
          state = { kind: "generating", request: next };
          break;
        }
      }
    }

    const terminal: TerminalReason = state.terminal;
    if (terminal === "cancelled") {
      emit("controller", "cancelled", "Run cancelled between attempts.");
    }
    emit("controller", "controller_finished", `Fix-retry loop finished (${terminal}) after ${attempts.length} attempt(s).`, {
      terminal
    });

    return {
      success: terminal === "passed",
      attempts,
      ...(finalArtifact ? { finalArtifact } : {}),
      supervisorAttemptNumber: supervisorAttempt,
      terminal
    };
  }

  private async diagnose(outcome: FailOutcome, attemptNumber: number, run: RunContext): Promise<Diagnosis> {
    try {
      return await this.diagnostic.diagnose(
        outcome,
        { generationHistory: run.transcript.recent(diagnosisHistoryEntries), attemptNumber },
        run
      );
    } catch (error: unknown) {
      return unavailableDiagnosis(outcome, error);
    }
  }
}
