import { randomUUID } from "node:crypto";
import { EventEmitter } from "node:events";
import { AgentRole, RunEvent, RunEventMeta, RunEventSink, RunInput, RunState, RunStatus, StoredRunInput, SupervisedReport } from "../types";

const toStoredInput = ({ envVars, ...rest }: RunInput): StoredRunInput => ({
  ...rest,
  envVarNames: Object.keys(envVars ?? {})
});

const terminalStatuses: RunStatus[] = ["success", "failed", "cancelled"];

export const isTerminalStatus = (status: RunStatus): boolean => terminalStatuses.includes(status);

export class RunStore {
  private readonly runs = new Map<string, RunState>();
  private readonly events = new Map<string, RunEvent[]>();
  private readonly emitter = new EventEmitter();

  constructor() {
    this.emitter.setMaxListeners(0);
  }

  create(input: RunInput): RunState {
    const run: RunState = {
      id: randomUUID(),
      status: "pending",
      input: toStoredInput(input),
      supervisorAttempt: 0,
      attempt: 0,
      startedAt: new Date().toISOString()
    };
    this.runs.set(run.id, run);
    this.events.set(run.id, []);
    return run;
  }

  get(runId: string): RunState | undefined {
    return this.runs.get(runId);
  }

  all(): RunState[] {
    return [...this.runs.values()].sort((a, b) => (a.startedAt > b.startedAt ? -1 : 1));
  }

  updateStatus(runId: string, status: RunStatus, finalSummary?: string): void {
    const current = this.runs.get(runId);
    if (!current) return;

    current.status = status;
    if (isTerminalStatus(status)) {
      current.endedAt = new Date().toISOString();
      current.finalSummary = finalSummary;
    }
  }

  setProgress(runId: string, supervisorAttempt: number, attempt: number): void {
    const current = this.runs.get(runId);
    if (!current) return;
    current.supervisorAttempt = supervisorAttempt;
    current.attempt = attempt;
  }

  setReport(runId: string, report: SupervisedReport): void {
    const current = this.runs.get(runId);
    if (!current) return;
    current.report = report;
  }

  setOutputPath(runId: string, outputPath: string): void {
    const current = this.runs.get(runId);
    if (!current) return;
    current.outputPath = outputPath;
  }

  pushEvent(runId: string, role: AgentRole, type: string, message: string, meta: RunEventMeta = {}): RunEvent {
    const event: RunEvent = {
      id: randomUUID(),
      runId,
      timestamp: new Date().toISOString(),
      role,
      type,
      message,
      supervisorAttempt: meta.supervisorAttempt,
      attempt: meta.attempt,
      category: meta.category,
      data: meta.data
    };
    const list = this.events.get(runId) ?? [];
    list.push(event);
    this.events.set(runId, list);
    if (typeof meta.supervisorAttempt === "number" && typeof meta.attempt === "number") {
      this.setProgress(runId, meta.supervisorAttempt, meta.attempt);
    }
    this.emitter.emit(`run:${runId}`, event);
    return event;
  }

  sinkFor(runId: string): RunEventSink {
    return {
      emit: (role, type, message, meta) => {
        this.pushEvent(runId, role, type, message, meta);
      }
    };
  }

  getEvents(runId: string): RunEvent[] {
    return [...(this.events.get(runId) ?? [])];
  }

  subscribe(runId: string, handler: (event: RunEvent) => void): () => void {
    const channel = `run:${runId}`;
    this.emitter.on(channel, handler);
    return () => this.emitter.off(channel, handler);
  }

  /** Replays the events recorded so far, then delivers new ones. */
  follow(runId: string, handler: (event: RunEvent) => void): () => void {
    for (const event of this.getEvents(runId)) {
      handler(event);
    }
    return this.subscribe(runId, handler);
  }
}
