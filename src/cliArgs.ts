import { config } from "./config";
import { RunInput } from "./types";

export const usage = [
  'Usage: npm run cli -- --target "<API description>" [--name <slug>] [--max-retries 7]',
  '       [--max-supervisor-attempts 3] [--no-supervisor] [--env "API_KEY=...,API_BASE=..."]'
].join("\n");

export const getArgValue = (argv: readonly string[], name: string): string | undefined => {
  const marker = `--${name}`;
  const index = argv.findIndex((arg) => arg === marker);
  if (index === -1) return undefined;
  const value = argv[index + 1];
  return value === undefined || value.startsWith("--") ? undefined : value;
};

const parsePositiveInt = (raw: string | undefined, name: string, fallback: number): number => {
  if (raw === undefined) return fallback;
  const parsed = Number.parseInt(raw, 10);
  if (!Number.isFinite(parsed) || parsed < 1) {
    throw new Error(`--${name} must be a positive integer, got "${raw}".`);
  }
  return parsed;
};

export const parseEnvPairs = (raw: string | undefined): Record<string, string> => {
  if (!raw) return {};
  const pairs: Record<string, string> = {};
  for (const item of raw.split(",")) {
    const trimmed = item.trim();
    if (!trimmed) continue;
    const separator = trimmed.indexOf("=");
    if (separator <= 0) {
      throw new Error(`--env entries must look like KEY=VALUE, got "${trimmed}".`);
    }
    pairs[trimmed.slice(0, separator).trim()] = trimmed.slice(separator + 1);
  }
  return pairs;
};

/** Throws with a readable message on bad input; the caller prints it with the usage text. */
export const parseCliArgs = (argv: readonly string[]): RunInput => {
  const target = getArgValue(argv, "target")?.trim();
  if (!target) {
    throw new Error("--target is required.");
  }

  const noSupervisor = argv.includes("--no-supervisor");
  const driverName = getArgValue(argv, "name")?.trim();
  const envVars = parseEnvPairs(getArgValue(argv, "env"));

  return {
    target,
    ...(driverName ? { driverName } : {}),
    maxRetries: parsePositiveInt(getArgValue(argv, "max-retries"), "max-retries", config.maxRetries),
    maxSupervisorAttempts: noSupervisor
      ? 1
      : parsePositiveInt(getArgValue(argv, "max-supervisor-attempts"), "max-supervisor-attempts", config.maxSupervisorAttempts),
    ...(Object.keys(envVars).length > 0 ? { envVars } : {})
  };
};
