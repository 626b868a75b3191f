import { spawn } from "node:child_process";
import { config } from "../config";

export interface CommandOptions {
  cwd?: string;
  env?: Record<string, string>;
  timeoutMs?: number;
  /** When false the child sees only `sandboxEnvKeys` from the host plus `env`. */
  inheritEnv?: boolean;
}

export interface CommandResult {
  exitCode: number;
  stdout: string;
  stderr: string;
  timedOut: boolean;
}

const sandboxEnvKeys = ["PATH", "HOME", "LANG", "TMPDIR"];

const baseEnv = (inherit: boolean): Record<string, string | undefined> => {
  if (inherit) return { ...process.env };
  const picked: Record<string, string> = {};
  for (const key of sandboxEnvKeys) {
    const value = process.env[key];
    if (value !== undefined) picked[key] = value;
  }
  return picked;
};

export class CommandRunner {
  constructor(private readonly maxOutputChars = config.maxCommandOutputChars) {}

  async run(command: string, options: CommandOptions = {}): Promise<CommandResult> {
    return new Promise((resolve, reject) => {
      const child = spawn(command, {
        cwd: options.cwd ?? config.workspaceRoot,
        shell: true,
        env: { ...baseEnv(options.inheritEnv ?? true), ...options.env }
      });

      let stdout = "";
      let stderr = "";
      let timedOut = false;
      const timer =
        typeof options.timeoutMs === "number"
          ? setTimeout(() => {
              timedOut = true;
              child.kill("SIGKILL");
            }, options.timeoutMs)
          : undefined;

      child.stdout.on("data", (chunk: Buffer) => {
        stdout += chunk.toString("utf8");
      });
      child.stderr.on("data", (chunk: Buffer) => {
        stderr += chunk.toString("utf8");
      });
      child.on("error", (err) => {
        if (timer) clearTimeout(timer);
        reject(err);
      });
      child.on("close", (code) => {
        if (timer) clearTimeout(timer);
        resolve({
          exitCode: code ?? 1,
          stdout: stdout.slice(-this.maxOutputChars),
          stderr: stderr.slice(-this.maxOutputChars),
          timedOut
        });
      });
    });
  }
}
