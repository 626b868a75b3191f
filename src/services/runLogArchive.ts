import fs from "node:fs/promises";
import path from "node:path";
import { z } from "zod";
import { config } from "../config";
import { GeneratedArtifact, RunEvent, RunState } from "../types";

export interface RunLogSnapshot {
  version: 1;
  runId: string;
  archivedAt: string;
  trigger: {
    type: string;
    message: string;
  };
  run: RunState;
  events: RunEvent[];
  artifacts: Array<Pick<GeneratedArtifact, "id" | "createdAt"> & { paths: string[] }>;
}

const indexEntrySchema = z.object({
  runId: z.string(),
  archivedAt: z.string(),
  trigger: z.string(),
  status: z.enum(["pending", "running", "success", "failed", "cancelled"]),
  target: z.string(),
  terminal: z.enum(["passed", "exhausted", "gave_up", "cancelled"]).optional(),
  attemptCount: z.number().int().nonnegative(),
  outputPath: z.string().optional()
});

export type RunLogIndexEntry = z.infer<typeof indexEntrySchema>;

const maxIndexEntries = 500;

const safeSegment = (value: string): string => value.replace(/[^a-zA-Z0-9._-]/g, "_");

const isMissingFile = (error: unknown): boolean =>
  typeof error === "object" && error !== null && "code" in error && error.code === "ENOENT";

const readIfPresent = async (filePath: string): Promise<string | undefined> => {
  try {
    return await fs.readFile(filePath, "utf8");
  } catch (error: unknown) {
    if (isMissingFile(error)) return undefined;
    throw error;
  }
};

export const toIndexEntry = (snapshot: RunLogSnapshot): RunLogIndexEntry => ({
  runId: snapshot.runId,
  archivedAt: snapshot.archivedAt,
  trigger: snapshot.trigger.type,
  status: snapshot.run.status,
  target: snapshot.run.input.target,
  ...(snapshot.run.report ? { terminal: snapshot.run.report.terminal } : {}),
  attemptCount: snapshot.run.report?.attempts.length ?? 0,
  ...(snapshot.run.outputPath ? { outputPath: snapshot.run.outputPath } : {})
});

/**
 * Terminal run snapshots, one `latest.json` per run directory plus a newest-first `index.json`.
 * Shares `<runLogRoot>/<runId>/` with the prompt transcript.
 */
export class RunLogArchive {
  private readonly indexFilePath: string;
  private writeChain: Promise<void> = Promise.resolve();

  constructor(private readonly rootDir = config.runLogRoot) {
    this.indexFilePath = path.join(this.rootDir, "index.json");
  }

  /** Writes are serialised so concurrent runs cannot drop each other's index entries. */
  async write(snapshot: RunLogSnapshot): Promise<RunLogIndexEntry> {
    const next = this.writeChain.then(async () => {
      const runDir = path.join(this.rootDir, safeSegment(snapshot.runId));
      await fs.mkdir(runDir, { recursive: true });
      await fs.writeFile(path.join(runDir, "latest.json"), JSON.stringify(snapshot, null, 2), "utf8");

      const entry = toIndexEntry(snapshot);
      const others = (await this.readIndex()).filter((existing) => existing.runId !== snapshot.runId);
      const index = [entry, ...others].slice(0, maxIndexEntries);
      await fs.writeFile(this.indexFilePath, JSON.stringify(index, null, 2), "utf8");
      return entry;
    });
    this.writeChain = next.then(
      () => undefined,
      () => undefined
    );
    return next;
  }

  async list(limit = 20): Promise<RunLogIndexEntry[]> {
    const bounded = Number.isFinite(limit) ? Math.max(1, Math.min(Math.round(limit), 200)) : 20;
    return (await this.readIndex()).slice(0, bounded);
  }

  async readByRunId(runId: string): Promise<RunLogSnapshot | undefined> {
    const raw = await readIfPresent(path.join(this.rootDir, safeSegment(runId), "latest.json"));
    if (raw === undefined) return undefined;
    const parsed: unknown = JSON.parse(raw);
    if (typeof parsed !== "object" || parsed === null || !("version" in parsed) || parsed.version !== 1) {
      throw new Error(`Run log for ${runId} has an unsupported format.`);
    }
    // Written by this class; only the version is checked.
    return parsed as RunLogSnapshot;
  }

  private async readIndex(): Promise<RunLogIndexEntry[]> {
    const raw = await readIfPresent(this.indexFilePath);
    if (raw === undefined) return [];
    const parsed = z.array(z.unknown()).safeParse(JSON.parse(raw));
    if (!parsed.success) return [];
    return parsed.data.flatMap((item) => {
      const entry = indexEntrySchema.safeParse(item);
      return entry.success ? [entry.data] : [];
    });
  }
}
