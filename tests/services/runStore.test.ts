import { describe, expect, it, vi } from "vitest";
import { isTerminalStatus, RunStore } from "../../src/services/runStore";
import { RunStatus } from "../../src/types";

const input = { target: "Driver for the weather API", maxRetries: 3, maxSupervisorAttempts: 2 };

describe("RunStore", () => {
  it("tracks progress from events that carry both attempt numbers", () => {
    const store = new RunStore();
    const run = store.create(input);

    store.pushEvent(run.id, "controller", "controller_started", "started", { supervisorAttempt: 2, attempt: 3 });
    store.pushEvent(run.id, "memory", "memory_hints_loaded", "no position");

    const updated = store.get(run.id);
    expect(updated?.supervisorAttempt).toBe(2);
    expect(updated?.attempt).toBe(3);
    expect(store.getEvents(run.id).map((event) => event.type)).toEqual(["controller_started", "memory_hints_loaded"]);
  });

  it("stamps endedAt and the summary only on terminal statuses", () => {
    const store = new RunStore();
    const run = store.create(input);

    store.updateStatus(run.id, "running", "ignored");
    expect(store.get(run.id)?.endedAt).toBeUndefined();
    expect(store.get(run.id)?.finalSummary).toBeUndefined();

    store.updateStatus(run.id, "cancelled", "Cancelled by user.");
    expect(store.get(run.id)?.endedAt).toEqual(expect.any(String));
    expect(store.get(run.id)?.finalSummary).toBe("Cancelled by user.");
  });

  it("delivers events to subscribers until they unsubscribe", () => {
    const store = new RunStore();
    const run = store.create(input);
    const handler = vi.fn();

    const unsubscribe = store.subscribe(run.id, handler);
    store.sinkFor(run.id).emit("classifier", "attempt_failed", "failed", { category: "logic" });
    unsubscribe();
    store.pushEvent(run.id, "classifier", "attempt_passed", "passed");

    expect(handler).toHaveBeenCalledTimes(1);
    expect(handler.mock.calls[0][0]).toMatchObject({ runId: run.id, role: "classifier", type: "attempt_failed", category: "logic" });
  });

  it("replays earlier events to a follower before live ones", () => {
    const store = new RunStore();
    const run = store.create(input);
    store.pushEvent(run.id, "supervisor", "run_started", "started");
    const handler = vi.fn();

    const unsubscribe = store.follow(run.id, handler);
    store.pushEvent(run.id, "supervisor", "run_finished", "finished");
    unsubscribe();

    expect(handler.mock.calls.map((call) => call[0].type)).toEqual(["run_started", "run_finished"]);
  });

  it("keeps env var names but not their values", () => {
    const store = new RunStore();

    const run = store.create({ ...input, envVars: { API_KEY: "test-secret", API_BASE: "http://api.test" } });

    expect(run.input).toEqual({ ...input, envVarNames: ["API_KEY", "API_BASE"] });
  });

  it("knows which statuses are terminal", () => {
    const statuses: RunStatus[] = ["pending", "running", "success", "failed", "cancelled"];
    expect(statuses.map(isTerminalStatus)).toEqual([false, false, true, true, true]);
  });
});
