import fs from "node:fs/promises";
import os from "node:os";
import path from "node:path";
import { afterEach, describe, expect, it, vi } from "vitest";
import { CommandResult, CommandRunner } from "../../src/services/commandRunner";
import { LocalSandbox, SandboxCommandRunnerLike } from "../../src/services/localSandbox";

const tmpDirs: string[] = [];

const createTmpRoot = async (): Promise<string> => {
  const root = await fs.mkdtemp(path.join(os.tmpdir(), "sandbox-root-"));
  tmpDirs.push(root);
  return root;
};

const fakeRunner = (result: Partial<CommandResult>) => {
  const seen: Array<{ cwd: string; files: string[]; driver: string }> = [];
  const run = vi.fn(async (_command: string, options: Parameters<SandboxCommandRunnerLike["run"]>[1]) => {
    seen.push({
      cwd: options.cwd,
      files: (await fs.readdir(options.cwd, { recursive: true })).map(String).sort(),
      driver: await fs.readFile(path.join(options.cwd, "driver.py"), "utf8")
    });
    return { exitCode: 0, stdout: "", stderr: "", timedOut: false, ...result };
  });
  const runner: SandboxCommandRunnerLike = { run };
  return { runner, run, seen };
};

const files = { "driver.py": "class Driver: ...", "tests/run_tests.py": "print('ALL TESTS PASSED')" };

describe("LocalSandbox", () => {
  afterEach(async () => {
    await Promise.all(tmpDirs.map((dir) => fs.rm(dir, { recursive: true, force: true })));
    tmpDirs.length = 0;
  });

  it("runs the bundle in a fresh directory and removes it afterwards", async () => {
    const { runner, run, seen } = fakeRunner({ stdout: "ALL TESTS PASSED\n" });
    const sandbox = new LocalSandbox(runner, "python3 tests/run_tests.py", await createTmpRoot());

    const result = await sandbox.execute({ files, envVars: { API_KEY: "test-secret" }, timeoutSeconds: 3 });

    expect(result.stdout).toBe("ALL TESTS PASSED\n");
    expect(result.exitError).toBeUndefined();
    expect(run).toHaveBeenCalledWith("python3 tests/run_tests.py", {
      cwd: seen[0].cwd,
      env: { API_KEY: "test-secret" },
      timeoutMs: 3000,
      inheritEnv: false
    });
    expect(seen[0].driver).toBe("class Driver: ...");
    expect(seen[0].files).toEqual(["driver.py", "tests", path.join("tests", "run_tests.py")]);
    await expect(fs.access(seen[0].cwd)).rejects.toThrow();
  });

  it("uses a new directory for every call", async () => {
    const { runner, seen } = fakeRunner({ stdout: "ok" });
    const sandbox = new LocalSandbox(runner, "python3 run_tests.py", await createTmpRoot());

    await sandbox.execute({ files, envVars: {}, timeoutSeconds: 1 });
    await sandbox.execute({ files, envVars: {}, timeoutSeconds: 1 });

    expect(seen[0].cwd).not.toBe(seen[1].cwd);
  });

  it("reports a timeout as an exit error", async () => {
    const { runner } = fakeRunner({ exitCode: 137, timedOut: true });
    const sandbox = new LocalSandbox(runner, "python3 run_tests.py", await createTmpRoot());

    const result = await sandbox.execute({ files, envVars: {}, timeoutSeconds: 3 });

    expect(result.exitError).toBe("Execution timed out after 3s");
  });

  it("uses the stderr tail when the process crashed before reporting", async () => {
    const stderr = Array.from({ length: 25 }, (_, index) => `e${index + 1}`).join("\n");
    const { runner } = fakeRunner({ exitCode: 1, stderr });
    const sandbox = new LocalSandbox(runner, "python3 run_tests.py", await createTmpRoot());

    const result = await sandbox.execute({ files, envVars: {}, timeoutSeconds: 3 });

    expect(result.exitError).toBe(Array.from({ length: 20 }, (_, index) => `e${index + 6}`).join("\n"));
  });

  it("falls back to the exit code when stderr is empty", async () => {
    const { runner } = fakeRunner({ exitCode: 2 });
    const sandbox = new LocalSandbox(runner, "python3 run_tests.py", await createTmpRoot());

    const result = await sandbox.execute({ files, envVars: {}, timeoutSeconds: 3 });

    expect(result.exitError).toBe("Process exited with code 2");
  });

  it("leaves failing test runs to the classifier", async () => {
    const { runner } = fakeRunner({ exitCode: 1, stdout: "Tests Passed: 1\nTests Failed: 2\n", stderr: "AssertionError" });
    const sandbox = new LocalSandbox(runner, "python3 run_tests.py", await createTmpRoot());

    const result = await sandbox.execute({ files, envVars: {}, timeoutSeconds: 3 });

    expect(result.exitError).toBeUndefined();
    expect(result.stdout).toContain("Tests Failed: 2");
  });

  it("hides host variables from the bundle", async () => {
    const previous = process.env.OPENAI_API_KEY;
    process.env.OPENAI_API_KEY = "test-host-secret";
    try {
      const sandbox = new LocalSandbox(new CommandRunner(), 'echo "key=$OPENAI_API_KEY token=$API_TOKEN"', await createTmpRoot());

      const result = await sandbox.execute({ files: { "a.txt": "x" }, envVars: { API_TOKEN: "test-token" }, timeoutSeconds: 5 });

      expect(result.stdout).toBe("key= token=test-token\n");
      expect(result.exitError).toBeUndefined();
    } finally {
      if (previous === undefined) {
        delete process.env.OPENAI_API_KEY;
      } else {
        process.env.OPENAI_API_KEY = previous;
      }
    }
  });
});
