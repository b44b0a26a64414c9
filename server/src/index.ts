import dotenv from "dotenv";
import path from "node:path";
import { fileURLToPath } from "node:url";

const __dirname = path.dirname(fileURLToPath(import.meta.url));
const repoRoot = path.resolve(__dirname, "../../");

dotenv.config({ path: path.resolve(repoRoot, ".env") });

// Dynamic imports so `.env` is loaded before any modules read process.env at import-time.
const { RunManager } = await import("./run_manager.js");
const { RunExecutor } = await import("./executor.js");
const { createApp } = await import("./app.js");
const { loadEngineConfig } = await import("./pipeline/catalog.js");
const { SnapshotDataLayer } = await import("./pipeline/data_layer.js");
const { HashingEmbedder, OpenAiEmbedder } = await import("./pipeline/embeddings.js");
const { FakeInferenceBackend } = await import("./pipeline/fake_backends.js");
const { OpenAiAgentsBackend } = await import("./pipeline/inference.js");
const { CONFIGURED_MODELS } = await import("./pipeline/agents.js");
const { InMemoryIncidentCorpus, loadIncidentRecords } = await import("./pipeline/memory.js");
const { createDiagnosisPipeline } = await import("./pipeline/pipeline.js");

function portFromEnv(): number {
  const port = process.env.PORT ? Number(process.env.PORT) : 5050;
  return Number.isFinite(port) && port > 0 ? port : 5050;
}

function pipelineMode(): "fake" | "live" {
  return process.env.CDX_PIPELINE_MODE?.trim().toLowerCase() === "fake" ? "fake" : "live";
}

const mode = pipelineMode();
const apiKey = process.env.OPENAI_API_KEY?.trim() ?? "";
if (mode === "live" && apiKey.length === 0) {
  console.error("OPENAI_API_KEY is required in live mode (set CDX_PIPELINE_MODE=fake to run without it)");
  process.exit(1);
}
if (mode === "fake") {
  console.log("server pipeline mode: fake (CDX_PIPELINE_MODE=fake)");
}

const config = await loadEngineConfig();
const dataLayer = await SnapshotDataLayer.fromFile();
const embedder = mode === "fake" ? new HashingEmbedder() : new OpenAiEmbedder(apiKey);
const backend =
  mode === "fake" ? new FakeInferenceBackend() : new OpenAiAgentsBackend({ apiKey, models: CONFIGURED_MODELS });
const incidents = await loadIncidentRecords();
const corpus = await InMemoryIncidentCorpus.build(incidents, embedder);
console.log(
  `catalog ${config.catalog.version}, routing ${config.routing.version}, ${corpus.size()} incidents indexed`
);

const runs = new RunManager();
await runs.initFromDisk();

const pipeline = createDiagnosisPipeline({ config, dataLayer, backend, embedder, corpus });

const maxConcurrentRuns = process.env.MAX_CONCURRENT_RUNS ? Number(process.env.MAX_CONCURRENT_RUNS) : 1;
const executor = new RunExecutor(runs, pipeline, {
  concurrency: Number.isFinite(maxConcurrentRuns) && maxConcurrentRuns > 0 ? maxConcurrentRuns : 1
});
const app = createApp(runs, executor, { config, mode, dataLayer });

const port = portFromEnv();
app.listen(port, () => {
  console.log(`server listening on http://localhost:${port}`);
});
