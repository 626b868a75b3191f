import { config } from "./config";
import { DiagnosticAgent } from "./agents/diagnosticAgent";
import { GeneratorAgent } from "./agents/generatorAgent";
import { OpenAiClient } from "./llm/openaiClient";
import { FixRetryController } from "./orchestrator/fixRetryController";
import { DriverRunCoordinator } from "./orchestrator/runCoordinator";
import { Supervisor } from "./orchestrator/supervisor";
import { ArtifactStore } from "./services/artifactStore";
import { LearningStore } from "./services/learningStore";
import { LocalSandbox } from "./services/localSandbox";
import { RunLogArchive } from "./services/runLogArchive";
import { RunStore } from "./services/runStore";

export interface Runtime {
  store: RunStore;
  artifacts: ArtifactStore;
  llm: OpenAiClient;
  runLogArchive: RunLogArchive;
  coordinator: DriverRunCoordinator;
}

/** Wires the production collaborators shared by the CLI and the HTTP server. */
export const createRuntime = (): Runtime => {
  const store = new RunStore();
  const artifacts = new ArtifactStore();
  const llm = new OpenAiClient();
  const diagnosticLlm = config.diagnosticModel === config.model ? llm : new OpenAiClient(config.diagnosticModel);
  const runLogArchive = new RunLogArchive();

  const controller = new FixRetryController(
    new GeneratorAgent(llm),
    new LocalSandbox(),
    new DiagnosticAgent(diagnosticLlm),
    artifacts,
    { timeoutSeconds: config.sandboxTimeoutSeconds }
  );

  const coordinator = new DriverRunCoordinator(
    store,
    artifacts,
    new Supervisor(controller),
    new LearningStore(),
    runLogArchive,
    { outputRoot: config.outputRoot, transcriptRoot: config.runLogRoot, memoryHintLimit: config.memoryHintLimit }
  );

  return { store, artifacts, llm, runLogArchive, coordinator };
};
