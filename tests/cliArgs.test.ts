import { describe, expect, it } from "vitest";
import { parseCliArgs, parseEnvPairs } from "../src/cliArgs";
import { config } from "../src/config";

describe("parseCliArgs", () => {
  it("reads every flag", () => {
    expect(
      parseCliArgs([
        "--target",
        "Driver for the todo API",
        "--name",
        "todo",
        "--max-retries",
        "4",
        "--max-supervisor-attempts",
        "2",
        "--env",
        "API_KEY=test-secret"
      ])
    ).toEqual({
      target: "Driver for the todo API",
      driverName: "todo",
      maxRetries: 4,
      maxSupervisorAttempts: 2,
      envVars: { API_KEY: "test-secret" }
    });
  });

  it("falls back to configured budgets", () => {
    expect(parseCliArgs(["--target", "x"])).toEqual({
      target: "x",
      maxRetries: config.maxRetries,
      maxSupervisorAttempts: config.maxSupervisorAttempts
    });
  });

  it("runs a single outer attempt with --no-supervisor", () => {
    expect(parseCliArgs(["--target", "x", "--max-supervisor-attempts", "5", "--no-supervisor"]).maxSupervisorAttempts).toBe(1);
  });

  it("rejects missing targets and bad numbers", () => {
    expect(() => parseCliArgs(["--target", "--no-supervisor"])).toThrow("--target is required.");
    expect(() => parseCliArgs(["--target", "x", "--max-retries", "0"])).toThrow('--max-retries must be a positive integer, got "0".');
  });
});

describe("parseEnvPairs", () => {
  it("splits KEY=VALUE pairs and keeps '=' inside values", () => {
    expect(parseEnvPairs("A=1, B=x=y,")).toEqual({ A: "1", B: "x=y" });
  });

  it("rejects entries without a key", () => {
    expect(() => parseEnvPairs("=oops")).toThrow('--env entries must look like KEY=VALUE, got "=oops".');
  });
});
