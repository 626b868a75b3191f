import { assertConfig, config } from "./config";
import { createRuntime } from "./runtime";
import { buildApp } from "./serverApp";

const { store, artifacts, llm, runLogArchive, coordinator } = createRuntime();

const app = buildApp({
  store,
  artifacts,
  coordinator,
  llm,
  runLogs: runLogArchive
});

const start = async (): Promise<void> => {
  assertConfig();
  await llm.assertModelAvailable();
  await app.listen({ port: config.port, host: "0.0.0.0" });
};

start().catch((error) => {
  app.log.error(error);
  process.exit(1);
});
