import fs from "node:fs/promises";
import path from "node:path";
import { z } from "zod";
import { config } from "../config";
import { MemoryHit, MemoryRecord, MemoryStoreLike } from "../types";

const storedRecordSchema = z.object({
  text: z.string(),
  metadata: z.record(z.union([z.string(), z.number(), z.boolean()])),
  createdAt: z.string()
});

type StoredRecord = z.infer<typeof storedRecordSchema>;

const tokenize = (text: string): Set<string> =>
  new Set(
    text
      .toLowerCase()
      .split(/[^a-z0-9_]+/)
      .filter((token) => token.length > 2)
  );

/**
 * Lessons from earlier runs in a JSON file. Search ranks by the share of query tokens a lesson
 * contains.
 */
export class LearningStore implements MemoryStoreLike {
  private writeChain: Promise<void> = Promise.resolve();

  constructor(private readonly filePath = config.memoryFile) {}

  async add(record: MemoryRecord): Promise<void> {
    const next = this.writeChain.then(async () => {
      const current = await this.readAll();
      current.push({ ...record, createdAt: new Date().toISOString() });
      await fs.mkdir(path.dirname(this.filePath), { recursive: true });
      await fs.writeFile(this.filePath, JSON.stringify(current, null, 2), "utf8");
    });
    this.writeChain = next.catch(() => undefined);
    return next;
  }

  async search(query: string, limit: number): Promise<MemoryHit[]> {
    const queryTokens = tokenize(query);
    if (queryTokens.size === 0 || limit <= 0) return [];

    const records = await this.readAll();
    return records
      .map((record, index) => {
        const recordTokens = tokenize(record.text);
        let matches = 0;
        for (const token of queryTokens) {
          if (recordTokens.has(token)) matches += 1;
        }
        return { text: record.text, score: matches / queryTokens.size, index };
      })
      .filter((hit) => hit.score > 0)
      .sort((a, b) => b.score - a.score || b.index - a.index)
      .slice(0, limit)
      .map(({ text, score }) => ({ text, score }));
  }

  private async readAll(): Promise<StoredRecord[]> {
    let raw: string;
    try {
      raw = await fs.readFile(this.filePath, "utf8");
    } catch (error: unknown) {
      if (typeof error === "object" && error !== null && "code" in error && error.code === "ENOENT") {
        return [];
      }
      throw error;
    }

    const parsed = z.array(storedRecordSchema).safeParse(JSON.parse(raw));
    if (!parsed.success) {
      throw new Error(`Memory file is not a list of lessons: ${this.filePath}`);
    }
    return parsed.data;
  }
}
