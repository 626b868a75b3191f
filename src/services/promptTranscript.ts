import fs from "node:fs/promises";
import path from "node:path";
import { TranscriptEntry, TranscriptLike } from "../types";

const safeSegment = (value: string): string => value.replace(/[^a-zA-Z0-9._-]/g, "_");

/**
 * Prompts and raw model replies of one run. Kept in memory for the diagnostic tail; mirrored to
 * `<root>/<runId>/NNN-<agent>-<kind>.txt` when a root directory is given.
 */
export class PromptTranscript implements TranscriptLike {
  private readonly entries: TranscriptEntry[] = [];
  private readonly runDir?: string;

  constructor(runId: string, rootDir?: string) {
    this.runDir = rootDir ? path.join(rootDir, safeSegment(runId)) : undefined;
  }

  getRunDir(): string | undefined {
    return this.runDir;
  }

  async record(entry: Omit<TranscriptEntry, "sequence">): Promise<void> {
    const stored: TranscriptEntry = { ...entry, sequence: this.entries.length + 1 };
    this.entries.push(stored);

    if (!this.runDir) return;

    const fileName = `${String(stored.sequence).padStart(3, "0")}-${stored.agent}-${stored.kind}.txt`;
    const header = [
      "=".repeat(80),
      `Timestamp: ${new Date().toISOString()}`,
      ...(typeof stored.attempt === "number" ? [`Attempt: ${stored.attempt}`] : []),
      "=".repeat(80)
    ].join("\n");

    await fs.mkdir(this.runDir, { recursive: true });
    await fs.writeFile(path.join(this.runDir, fileName), `${header}\n${stored.text}\n`, "utf8");
  }

  recent(limit: number): TranscriptEntry[] {
    if (limit <= 0) return [];
    return this.entries.slice(-limit);
  }
}
