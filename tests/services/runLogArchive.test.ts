import fs from "node:fs/promises";
import os from "node:os";
import path from "node:path";
import { afterEach, describe, expect, it } from "vitest";
import { RunLogArchive, RunLogSnapshot } from "../../src/services/runLogArchive";
import { RunStatus } from "../../src/types";

const tmpDirs: string[] = [];

const createSnapshot = (runId: string, triggerType: string, status: RunStatus): RunLogSnapshot => ({
  version: 1,
  runId,
  archivedAt: new Date().toISOString(),
  trigger: {
    type: triggerType,
    message: `${triggerType} happened`
  },
  run: {
    id: runId,
    status,
    input: { target: "Driver for the todo API", maxRetries: 3, maxSupervisorAttempts: 2, envVarNames: [] },
    supervisorAttempt: 1,
    attempt: 2,
    startedAt: new Date().toISOString()
  },
  events: [],
  artifacts: [{ id: "artifact-1", createdAt: new Date().toISOString(), paths: ["driver.py"] }]
});

describe("RunLogArchive", () => {
  afterEach(async () => {
    await Promise.all(tmpDirs.map((dir) => fs.rm(dir, { recursive: true, force: true })));
    tmpDirs.length = 0;
  });

  it("writes snapshots and reads them back by run id", async () => {
    const root = await fs.mkdtemp(path.join(os.tmpdir(), "driver-runlog-"));
    tmpDirs.push(root);

    const archive = new RunLogArchive(root);
    await archive.write(createSnapshot("run-1", "run_crashed", "failed"));
    await archive.write(createSnapshot("run-2", "run_finished", "success"));

    const index = await archive.list(10);
    expect(index.map((entry) => [entry.runId, entry.trigger, entry.status])).toEqual([
      ["run-2", "run_finished", "success"],
      ["run-1", "run_crashed", "failed"]
    ]);
    expect(index[0]).toEqual({
      runId: "run-2",
      archivedAt: expect.any(String),
      trigger: "run_finished",
      status: "success",
      target: "Driver for the todo API",
      attemptCount: 0
    });

    const byRun = await archive.readByRunId("run-1");
    expect(byRun?.trigger.type).toBe("run_crashed");
    expect(byRun?.artifacts[0].paths).toEqual(["driver.py"]);
  });

  it("keeps one index entry per run and records the report outcome", async () => {
    const root = await fs.mkdtemp(path.join(os.tmpdir(), "driver-runlog-"));
    tmpDirs.push(root);

    const archive = new RunLogArchive(root);
    await archive.write(createSnapshot("run-1", "run_crashed", "failed"));
    const finished = createSnapshot("run-1", "run_finished", "success");
    finished.run.outputPath = "/tmp/out/todo";
    finished.run.report = {
      success: true,
      attempts: [{ attemptNumber: 1, outcome: { kind: "pass" } }],
      supervisorAttemptNumber: 1,
      terminal: "passed",
      totalDiagnosticsRun: 0,
      totalFixesApplied: 0,
      supervisorAttemptsUsed: 1
    };
    await archive.write(finished);

    const index = await archive.list();
    expect(index).toHaveLength(1);
    expect(index[0]).toMatchObject({ trigger: "run_finished", terminal: "passed", attemptCount: 1, outputPath: "/tmp/out/todo" });
  });

  it("keeps every entry when runs are archived at the same time", async () => {
    const root = await fs.mkdtemp(path.join(os.tmpdir(), "driver-runlog-"));
    tmpDirs.push(root);
    const archive = new RunLogArchive(root);

    await Promise.all(
      ["run-a", "run-b", "run-c", "run-d"].map((runId) => archive.write(createSnapshot(runId, "run_finished", "success")))
    );

    const index = await archive.list();
    expect(index.map((entry) => entry.runId).sort()).toEqual(["run-a", "run-b", "run-c", "run-d"]);
  });

  it("skips malformed index entries", async () => {
    const root = await fs.mkdtemp(path.join(os.tmpdir(), "driver-runlog-"));
    tmpDirs.push(root);
    await fs.writeFile(path.join(root, "index.json"), JSON.stringify([{ runId: "x" }]), "utf8");

    await expect(new RunLogArchive(root).list()).resolves.toEqual([]);
  });

  it("returns undefined for unknown runs and an empty index", async () => {
    const root = await fs.mkdtemp(path.join(os.tmpdir(), "driver-runlog-"));
    tmpDirs.push(root);

    const archive = new RunLogArchive(root);
    await expect(archive.readByRunId("missing")).resolves.toBeUndefined();
    await expect(archive.list()).resolves.toEqual([]);
  });
});
