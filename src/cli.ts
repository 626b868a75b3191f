#!/usr/bin/env node
import { parseCliArgs, usage } from "./cliArgs";
import { assertConfig } from "./config";
import { createRuntime } from "./runtime";
import { RunEvent, RunInput } from "./types";
import { errorMessage } from "./utils/text";

const EXIT_INTERRUPTED = 130;

const printEvent = (event: RunEvent): void => {
  const position =
    typeof event.supervisorAttempt === "number"
      ? ` [S${event.supervisorAttempt}${typeof event.attempt === "number" && event.attempt > 0 ? `#${event.attempt}` : ""}]`
      : "";
  const category = event.category ? ` (${event.category})` : "";
  console.log(`[${event.timestamp}] [${event.role}]${position}${category} ${event.type}: ${event.message}`);
};

const main = async (): Promise<number> => {
  let input: RunInput;
  try {
    input = parseCliArgs(process.argv.slice(2));
  } catch (error: unknown) {
    console.error(errorMessage(error));
    console.error(usage);
    return 1;
  }

  assertConfig();
  const { store, llm, coordinator } = createRuntime();
  await llm.assertModelAvailable();

  const runId = await coordinator.start(input);
  console.log(`Run started: ${runId}`);
  const unsubscribe = store.follow(runId, printEvent);

  let interrupted = false;
  const onInterrupt = (): void => {
    if (interrupted) {
      process.exit(EXIT_INTERRUPTED);
    }
    interrupted = true;
    console.error("\nInterrupted: cancelling after the current attempt. Press Ctrl+C again to exit now.");
    coordinator.cancel(runId);
  };
  process.on("SIGINT", onInterrupt);

  const report = await coordinator.waitFor(runId);
  process.off("SIGINT", onInterrupt);
  unsubscribe();

  const run = store.get(runId);
  console.log(`\nFinal status: ${run?.status ?? "unknown"}`);
  if (run?.finalSummary) {
    console.log(run.finalSummary);
  }
  if (run?.outputPath) {
    console.log(`Driver written to: ${run.outputPath}`);
  }

  if (interrupted) return EXIT_INTERRUPTED;
  return report?.success ? 0 : 1;
};

main()
  .then((code) => process.exit(code))
  .catch((error: unknown) => {
    console.error(errorMessage(error));
    process.exit(1);
  });
