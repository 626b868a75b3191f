import path from "node:path";
import { config } from "../config";
import { ArtifactStore } from "../services/artifactStore";
import { collectMemoryHints, recordLessons } from "../services/lessons";
import { PromptTranscript } from "../services/promptTranscript";
import { RunLogSnapshot } from "../services/runLogArchive";
import { RunStore } from "../services/runStore";
import { WorkspaceService } from "../services/workspace";
import { GenerationRequest, MemoryStoreLike, RunContext, RunInput, RunStatus, SupervisedReport } from "../types";
import { errorMessage } from "../utils/text";
import { SupervisorLike } from "./supervisor";

export interface RunArchiveLike {
  write(snapshot: RunLogSnapshot): Promise<unknown>;
}

export interface CoordinatorOptions {
  outputRoot: string;
  /** Where prompt transcripts are written; transcripts stay in memory when unset. */
  transcriptRoot?: string;
  memoryHintLimit: number;
}

export const slugify = (value: string): string => {
  const slug = value
    .toLowerCase()
    .replace(/[^a-z0-9]+/g, "_")
    .replace(/^_+|_+$/g, "")
    .slice(0, 40)
    .replace(/_+$/g, "");
  return slug || "driver";
};

export const summarizeReport = (report: SupervisedReport): string => {
  const head = `${report.attempts.length} attempt(s) in supervisor attempt ${report.supervisorAttemptNumber}`;
  if (report.success) {
    return `Driver passed its tests after ${head}.`;
  }

  const last = report.attempts[report.attempts.length - 1];
  const failure = last?.outcome.kind === "fail" ? ` Last failure (${last.outcome.category}): ${last.outcome.message}` : "";
  return `Driver generation ended (${report.terminal}) after ${head}.${failure}`;
};

const statusFor = (report: SupervisedReport): RunStatus => {
  if (report.success) return "success";
  return report.terminal === "cancelled" ? "cancelled" : "failed";
};

/**
 * Owns the lifecycle of driver runs: run state, memory hints, the supervised loop, writing the
 * passing driver, lessons and the archived snapshot.
 */
export class DriverRunCoordinator {
  private readonly aborts = new Map<string, AbortController>();
  private readonly completions = new Map<string, Promise<SupervisedReport | undefined>>();
  private readonly options: CoordinatorOptions;

  constructor(
    private readonly store: RunStore,
    private readonly artifacts: ArtifactStore,
    private readonly supervisor: SupervisorLike,
    private readonly memory?: MemoryStoreLike,
    private readonly archive?: RunArchiveLike,
    options: Partial<CoordinatorOptions> = {}
  ) {
    this.options = {
      outputRoot: options.outputRoot ?? config.outputRoot,
      transcriptRoot: options.transcriptRoot,
      memoryHintLimit: options.memoryHintLimit ?? config.memoryHintLimit
    };
  }

  async start(input: RunInput): Promise<string> {
    const run = this.store.create(input);
    const abort = new AbortController();
    this.aborts.set(run.id, abort);

    const completion = this.run(run.id, abort.signal, input.envVars)
      .catch(async (error: unknown) => {
        const message = errorMessage(error);
        this.store.pushEvent(run.id, "supervisor", "error", message);
        this.store.updateStatus(run.id, "failed", message);
        await this.archiveRun(run.id, "run_crashed", message);
        return undefined;
      })
      .finally(() => {
        this.aborts.delete(run.id);
        this.completions.delete(run.id);
      });
    this.completions.set(run.id, completion);
    return run.id;
  }

  /**
   * Resolves once the run has finished and been archived; `undefined` when it crashed. Only runs
   * in flight hold a completion, finished ones answer from the store.
   */
  async waitFor(runId: string): Promise<SupervisedReport | undefined> {
    const completion = this.completions.get(runId);
    if (completion) return completion;

    const run = this.store.get(runId);
    if (!run) {
      throw new Error(`Run not found: ${runId}`);
    }
    return run.report;
  }

  /** Runs still in flight. */
  activeRunCount(): number {
    return this.completions.size;
  }

  async execute(input: RunInput): Promise<SupervisedReport> {
    const runId = await this.start(input);
    const report = await this.waitFor(runId);
    if (!report) {
      throw new Error(this.store.get(runId)?.finalSummary ?? `Run ${runId} failed.`);
    }
    return report;
  }

  /** Takes effect between attempts; the attempt in flight finishes first. */
  cancel(runId: string): boolean {
    const abort = this.aborts.get(runId);
    if (!abort || abort.signal.aborted) return false;
    abort.abort();
    this.store.pushEvent(runId, "supervisor", "cancel_requested", "Cancellation requested; stopping after the current attempt.");
    return true;
  }

  /** `envVars` stays in this call; the stored run keeps only their names. */
  private async run(runId: string, signal: AbortSignal, envVars: Record<string, string> | undefined): Promise<SupervisedReport> {
    const state = this.store.get(runId);
    if (!state) {
      throw new Error(`Run not found: ${runId}`);
    }
    const input = state.input;

    const context: RunContext = {
      runId,
      events: this.store.sinkFor(runId),
      transcript: new PromptTranscript(runId, this.options.transcriptRoot),
      memory: this.memory,
      signal
    };

    this.store.updateStatus(runId, "running");
    context.events.emit("supervisor", "run_started", `Generating a driver for: ${input.target}`, {
      data: { maxRetries: input.maxRetries, maxSupervisorAttempts: input.maxSupervisorAttempts }
    });

    const memoryHints = await collectMemoryHints(this.memory, input.target, this.options.memoryHintLimit, context.events);
    const task: GenerationRequest = Object.freeze({
      taskDescription: input.target,
      memoryHints: Object.freeze([...memoryHints])
    });

    const report = await this.supervisor.runSupervised(
      task,
      { maxSupervisorAttempts: input.maxSupervisorAttempts, maxRetries: input.maxRetries, envVars },
      context
    );
    this.store.setReport(runId, report);

    if (report.success && report.finalArtifact) {
      const outputPath = path.join(this.options.outputRoot, slugify(input.driverName ?? input.target));
      const written = await new WorkspaceService(outputPath).writeFiles(report.finalArtifact.files);
      this.store.setOutputPath(runId, outputPath);
      context.events.emit("supervisor", "driver_written", `Wrote ${written.length} file(s) to ${outputPath}.`, {
        data: { outputPath, paths: written }
      });
    }

    await recordLessons(this.memory, input.target, report, context.events);

    const summary = summarizeReport(report);
    this.store.updateStatus(runId, statusFor(report), summary);
    context.events.emit("supervisor", "run_finished", summary, {
      data: { success: report.success, terminal: report.terminal }
    });

    await this.archiveRun(runId, "run_finished", summary);
    return report;
  }

  private async archiveRun(runId: string, triggerType: string, message: string): Promise<void> {
    if (!this.archive) return;
    const run = this.store.get(runId);
    if (!run) return;

    const snapshot: RunLogSnapshot = {
      version: 1,
      runId,
      archivedAt: new Date().toISOString(),
      trigger: { type: triggerType, message },
      run,
      events: this.store.getEvents(runId),
      artifacts: this.artifacts.getAll(runId).map((artifact) => ({
        id: artifact.id,
        createdAt: artifact.createdAt,
        paths: Object.keys(artifact.files)
      }))
    };

    try {
      await this.archive.write(snapshot);
    } catch (error: unknown) {
      this.store.pushEvent(runId, "supervisor", "archive_failed", `Could not archive run: ${errorMessage(error)}`);
    }
  }
}
