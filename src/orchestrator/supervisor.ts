import { AttemptReport, GenerationRequest, RunContext, SupervisedReport } from "../types";
import { FixRetryControllerLike } from "./fixRetryController";

export interface SupervisorOptions {
  maxSupervisorAttempts: number;
  maxRetries: number;
  envVars?: Record<string, string>;
}

export interface SupervisorLike {
  runSupervised(task: GenerationRequest, options: SupervisorOptions, run: RunContext): Promise<SupervisedReport>;
}

const countDiagnoses = (report: AttemptReport): { diagnostics: number; fixes: number } =>
  report.attempts.reduce(
    (totals, record) =>
      record.diagnosis
        ? { diagnostics: totals.diagnostics + 1, fixes: totals.fixes + (record.diagnosis.canFix ? 1 : 0) }
        : totals,
    { diagnostics: 0, fixes: 0 }
  );

/**
 * Outer retry budget. Each outer attempt restarts the controller from the original task with a
 * fresh history; diagnoses from earlier outer attempts are not carried forward.
 */
export class Supervisor implements SupervisorLike {
  constructor(private readonly controller: FixRetryControllerLike) {}

  async runSupervised(task: GenerationRequest, options: SupervisorOptions, run: RunContext): Promise<SupervisedReport> {
    const maxSupervisorAttempts = Math.max(1, Math.floor(options.maxSupervisorAttempts));
    let totalDiagnosticsRun = 0;
    let totalFixesApplied = 0;
    let supervisorAttemptsUsed = 0;
    let last: AttemptReport | undefined;

    for (let supervisorAttempt = 1; supervisorAttempt <= maxSupervisorAttempts; supervisorAttempt += 1) {
      if (last && run.signal?.aborted) {
        last = { ...last, success: false, terminal: "cancelled" };
        break;
      }

      run.events.emit("supervisor", "supervisor_attempt_started", `Supervisor attempt ${supervisorAttempt}/${maxSupervisorAttempts}.`, {
        supervisorAttempt,
        attempt: 0
      });

      const report = await this.controller.run(
        task,
        { maxRetries: options.maxRetries, supervisorAttemptNumber: supervisorAttempt, envVars: options.envVars },
        run
      );
      supervisorAttemptsUsed = supervisorAttempt;
      last = report;

      const counts = countDiagnoses(report);
      totalDiagnosticsRun += counts.diagnostics;
      totalFixesApplied += counts.fixes;

      run.events.emit(
        "supervisor",
        "supervisor_attempt_finished",
        `Supervisor attempt ${supervisorAttempt} ended (${report.terminal}) after ${report.attempts.length} attempt(s).`,
        { supervisorAttempt, attempt: report.attempts.length, data: { success: report.success, terminal: report.terminal } }
      );

      if (report.success || report.terminal === "cancelled") break;
    }

    if (!last) {
      throw new Error("Supervisor finished without running the controller.");
    }

    return {
      ...last,
      totalDiagnosticsRun,
      totalFixesApplied,
      supervisorAttemptsUsed
    };
  }
}
