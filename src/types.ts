export type AgentRole = "supervisor" | "controller" | "generator" | "sandbox" | "classifier" | "diagnostic" | "memory";

export type RunStatus = "pending" | "running" | "success" | "failed" | "cancelled";

export type FailureCategory = "logic" | "formatting" | "api_mismatch" | "environment" | "unknown";

export const failureCategories: readonly FailureCategory[] = ["logic", "formatting", "api_mismatch", "environment", "unknown"];

export type FixStrategy = "prompt_adjustment" | "regenerate" | "give_up";

export type TerminalReason = "passed" | "exhausted" | "gave_up" | "cancelled";

export interface PassOutcome {
  kind: "pass";
}

export interface FailOutcome {
  kind: "fail";
  category: FailureCategory;
  message: string;
  rawErrors: string[];
}

export type Outcome = PassOutcome | FailOutcome;

export interface Diagnosis {
  category: FailureCategory;
  rootCause: string;
  canFix: boolean;
  fixStrategy: FixStrategy;
  fixDescription: string;
  promptModification?: string;
}

export interface PriorFailureContext {
  attemptNumber: number;
  outcome: FailOutcome;
  diagnosis: Diagnosis;
}

export interface GenerationRequest {
  readonly taskDescription: string;
  readonly priorFailureContext?: Readonly<PriorFailureContext>;
  readonly memoryHints: readonly string[];
}

export interface GeneratedArtifact {
  readonly id: string;
  readonly files: Readonly<Record<string, string>>;
  readonly rawModelOutput: string;
  readonly createdAt: string;
}

export interface StructuredCounts {
  passed: number;
  failed: number;
}

export interface SandboxRunResult {
  stdout: string;
  exitError?: string;
  durationSeconds: number;
}

export interface ExecutionResult {
  stdout: string;
  exitError?: string;
  structuredCounts?: StructuredCounts;
  errors: string[];
  durationSeconds: number;
}

export interface AttemptRecord {
  attemptNumber: number;
  outcome: Outcome;
  diagnosis?: Diagnosis;
  artifactRef?: string;
}

export interface AttemptReport {
  readonly success: boolean;
  readonly attempts: readonly AttemptRecord[];
  readonly finalArtifact?: GeneratedArtifact;
  readonly supervisorAttemptNumber: number;
  readonly terminal: TerminalReason;
}

export interface SupervisedReport extends AttemptReport {
  readonly totalDiagnosticsRun: number;
  readonly totalFixesApplied: number;
  readonly supervisorAttemptsUsed: number;
}

export interface RunInput {
  target: string;
  driverName?: string;
  maxRetries: number;
  maxSupervisorAttempts: number;
  envVars?: Record<string, string>;
}

/** What a run keeps of its input: env var names only, never their values. */
export type StoredRunInput = Omit<RunInput, "envVars"> & { envVarNames: string[] };

export interface RunState {
  id: string;
  status: RunStatus;
  input: StoredRunInput;
  supervisorAttempt: number;
  attempt: number;
  outputPath?: string;
  report?: SupervisedReport;
  startedAt: string;
  endedAt?: string;
  finalSummary?: string;
}

export interface RunEvent {
  id: string;
  runId: string;
  timestamp: string;
  role: AgentRole;
  type: string;
  message: string;
  supervisorAttempt?: number;
  attempt?: number;
  category?: FailureCategory;
  data?: Record<string, unknown>;
}

export interface RunEventMeta {
  supervisorAttempt?: number;
  attempt?: number;
  category?: FailureCategory;
  data?: Record<string, unknown>;
}

export interface RunEventSink {
  emit(role: AgentRole, type: string, message: string, meta?: RunEventMeta): void;
}

export interface TranscriptEntry {
  sequence: number;
  agent: "generator" | "diagnostic";
  kind: "prompt" | "response";
  text: string;
  attempt?: number;
}

export interface TranscriptLike {
  record(entry: Omit<TranscriptEntry, "sequence">): Promise<void>;
  recent(limit: number): TranscriptEntry[];
}

export interface MemoryRecord {
  text: string;
  metadata: Record<string, string | number | boolean>;
}

export interface MemoryHit {
  text: string;
  score: number;
}

export interface MemoryStoreLike {
  add(record: MemoryRecord): Promise<void>;
  search(query: string, limit: number): Promise<MemoryHit[]>;
}

export interface RunContext {
  runId: string;
  events: RunEventSink;
  transcript: TranscriptLike;
  memory?: MemoryStoreLike;
  signal?: AbortSignal;
}
