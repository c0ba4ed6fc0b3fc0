import { createApp, finalizeApp } from "./app";
import { describeConfig, loadConfig } from "./config/appConfig";
import { loadCorpus } from "./corpus/messageCorpus";
import { createPipeline, warmPipeline } from "./pipeline/createPipeline";
import { registerRoutes } from "./routes";
import { logError } from "./utils/errorHandler";

async function main(): Promise<void> {
  const config = loadConfig(process.env);
  console.log(`[Server] Starting with ${describeConfig(config)}`);

  const corpus = await loadCorpus(config.corpus);
  const pipeline = createPipeline(config, corpus);
  await warmPipeline(pipeline, corpus);

  const app = createApp();
  const server = registerRoutes(app, {
    orchestrator: pipeline.orchestrator,
    corpus,
    apiKey: config.server.apiKey,
    rateLimit: config.server.rateLimit,
  });
  finalizeApp(app);

  server.listen(config.server.port, () => {
    console.log(`[Server] Listening on port ${config.server.port} (${corpus.size} messages)`);
  });
}

main().catch((error: unknown) => {
  logError("Server", error);
  process.exit(1);
});
