import dotenv from "dotenv";
import path from "node:path";

dotenv.config();

const defaultWorkspaceRoot = path.resolve(__dirname, "..");

const toInt = (value: string | undefined, fallback: number): number => {
  const parsed = Number.parseInt(value ?? "", 10);
  return Number.isFinite(parsed) ? parsed : fallback;
};

const workspaceRoot = path.resolve(process.env.WORKSPACE_ROOT ?? defaultWorkspaceRoot);
const stateRoot = path.join(workspaceRoot, ".driver-forge");

export const config = {
  port: toInt(process.env.PORT, 3000),
  openaiApiKey: process.env.OPENAI_API_KEY ?? "",
  openaiBaseUrl: process.env.OPENAI_BASE_URL ?? "http://localhost:8000/v1",
  model: process.env.OPENAI_MODEL ?? "gpt-4.1-mini",
  diagnosticModel: process.env.DIAGNOSTIC_MODEL || process.env.OPENAI_MODEL || "gpt-4.1-mini",
  workspaceRoot,
  outputRoot: path.resolve(workspaceRoot, process.env.OUTPUT_ROOT ?? "generated_drivers"),
  runLogRoot: path.resolve(workspaceRoot, process.env.RUN_LOG_ROOT ?? path.join(stateRoot, "run-logs")),
  memoryFile: path.resolve(workspaceRoot, process.env.MEMORY_FILE ?? path.join(stateRoot, "memory.json")),
  sandboxCommand: process.env.SANDBOX_COMMAND ?? "python3 run_tests.py",
  sandboxTimeoutSeconds: toInt(process.env.SANDBOX_TIMEOUT_SECONDS, 120),
  maxCommandOutputChars: toInt(process.env.MAX_COMMAND_OUTPUT_CHARS, 12000),
  maxRetries: toInt(process.env.MAX_RETRIES, 7),
  maxSupervisorAttempts: toInt(process.env.MAX_SUPERVISOR_ATTEMPTS, 3),
  generatorMaxTokens: toInt(process.env.GENERATOR_MAX_TOKENS, 8000),
  diagnosticMaxTokens: toInt(process.env.DIAGNOSTIC_MAX_TOKENS, 2000),
  logTailLines: toInt(process.env.LOG_TAIL_LINES, 50),
  memoryHintLimit: toInt(process.env.MEMORY_HINT_LIMIT, 5)
};

export const assertConfig = (): void => {
  if (!config.openaiApiKey) {
    throw new Error("OPENAI_API_KEY is required. Add it to .env or shell env.");
  }
};
