import fs from "node:fs/promises";
import os from "node:os";
import path from "node:path";
import { config } from "../config";
import { SandboxRunResult } from "../types";
import { CommandResult, CommandRunner } from "./commandRunner";
import { tailLines } from "../utils/text";
import { WorkspaceService } from "./workspace";

export interface SandboxExecuteRequest {
  files: Readonly<Record<string, string>>;
  envVars: Record<string, string>;
  timeoutSeconds: number;
}

export interface SandboxClientLike {
  execute(request: SandboxExecuteRequest): Promise<SandboxRunResult>;
}

export interface SandboxCommandRunnerLike {
  run(command: string, options: { cwd: string; env: Record<string, string>; timeoutMs: number; inheritEnv: false }): Promise<CommandResult>;
}

const resultMarkers = ["JSON_RESULT_START", "Tests Passed:"];

/**
 * Runs each bundle in its own temporary directory, removed once the command exits. Nothing
 * survives between calls, and the bundle sees only the request's env vars on top of a minimal
 * host environment.
 */
export class LocalSandbox implements SandboxClientLike {
  constructor(
    private readonly commandRunner: SandboxCommandRunnerLike = new CommandRunner(),
    private readonly command = config.sandboxCommand,
    private readonly tmpRoot = os.tmpdir()
  ) {}

  async execute(request: SandboxExecuteRequest): Promise<SandboxRunResult> {
    const started = Date.now();
    const sessionDir = await fs.mkdtemp(path.join(this.tmpRoot, "driver-sandbox-"));

    try {
      await new WorkspaceService(sessionDir).writeFiles(request.files);
      const result = await this.commandRunner.run(this.command, {
        cwd: sessionDir,
        env: request.envVars,
        timeoutMs: request.timeoutSeconds * 1000,
        inheritEnv: false
      });
      const durationSeconds = (Date.now() - started) / 1000;

      if (result.timedOut) {
        return {
          stdout: result.stdout,
          exitError: `Execution timed out after ${request.timeoutSeconds}s`,
          durationSeconds
        };
      }

      const reportedResults = resultMarkers.some((marker) => result.stdout.includes(marker));
      if (result.exitCode !== 0 && !reportedResults) {
        const stderrTail = tailLines(result.stderr, 20);
        return {
          stdout: result.stdout,
          exitError: stderrTail || `Process exited with code ${result.exitCode}`,
          durationSeconds
        };
      }

      return { stdout: result.stdout, durationSeconds };
    } finally {
      await fs.rm(sessionDir, { recursive: true, force: true });
    }
  }
}
