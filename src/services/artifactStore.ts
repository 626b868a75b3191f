import { randomUUID } from "node:crypto";
import { GeneratedArtifact } from "../types";

export interface ArtifactStoreLike {
  save(runId: string, files: Record<string, string>, rawModelOutput: string): GeneratedArtifact;
  get(runId: string, artifactId: string): GeneratedArtifact | undefined;
}

export class ArtifactStore implements ArtifactStoreLike {
  private readonly byRun = new Map<string, GeneratedArtifact[]>();

  save(runId: string, files: Record<string, string>, rawModelOutput: string): GeneratedArtifact {
    const artifact: GeneratedArtifact = Object.freeze({
      id: randomUUID(),
      files: Object.freeze({ ...files }),
      rawModelOutput,
      createdAt: new Date().toISOString()
    });
    const list = this.byRun.get(runId) ?? [];
    list.push(artifact);
    this.byRun.set(runId, list);
    return artifact;
  }

  get(runId: string, artifactId: string): GeneratedArtifact | undefined {
    return this.byRun.get(runId)?.find((artifact) => artifact.id === artifactId);
  }

  getAll(runId: string): GeneratedArtifact[] {
    return [...(this.byRun.get(runId) ?? [])];
  }
}
