import { serve } from "@hono/node-server";
import { createApp } from "./lib/app";
import { describeError, isOrchestratorError } from "./lib/errors";
import { HealthMonitor } from "./lib/health-monitor";
import { configureLogger, logger } from "./lib/logger";
import { Orchestrator } from "./lib/orchestrator";
import { S3ClientObjectReader, openToolRegistry } from "./lib/registry";
import { DirectToolExecutor, IntentClassifier } from "./lib/routing";
import { loadSettings } from "./lib/shared/config";
import { createIntentModel } from "./lib/shared/model-router";
import { HttpToolClient, StubToolClient, createToolClient } from "./lib/tools";
import { PipelineDriver } from "./lib/workflows/tool-routing-workflow";

process.on("unhandledRejection", (reason) => {
  logger.fail("Process", `Unhandled Promise Rejection: ${describeError(reason)}`);
});

async function startServer() {
  const startTime = Date.now();

  // Step 1: configuration and registry. Either failing is fatal: the
  // server must not take traffic without a loaded registry.
  logger.info("📋 [Startup] Step 1: Loading configuration and tool registry...");
  const settings = loadSettings();
  configureLogger({ level: settings.logLevel, dir: settings.logDir });

  const registry = await openToolRegistry(settings.toolRegistryPath, {
    s3Reader: () => new S3ClientObjectReader({ region: settings.awsRegion }),
  });

  // Step 2: collaborators and pipeline
  logger.info("📋 [Startup] Step 2: Building pipeline...");
  const classifier = new IntentClassifier({
    model: createIntentModel(settings),
    timeoutMs: settings.classificationTimeoutMs,
    domain: settings.assistantDomain,
  });

  const toolClient = createToolClient(settings.toolBackend, {
    http: new HttpToolClient(),
    stub: StubToolClient.fromFile(settings.stubResponsesPath),
  });
  const executor = new DirectToolExecutor({
    client: toolClient,
    timeoutMs: settings.toolTimeoutMs,
  });

  const pipeline = new PipelineDriver({
    classifier,
    executor,
    confidenceThreshold: settings.confidenceThreshold,
  });

  const healthMonitor = new HealthMonitor();
  const orchestrator = new Orchestrator({ registry, pipeline, healthMonitor });
  const app = createApp({ orchestrator, registry, healthMonitor });

  // Step 3: HTTP server
  logger.info("📋 [Startup] Step 3: Starting HTTP server...");
  serve({
    fetch: app.fetch,
    port: settings.port,
  });

  const elapsedMs = Date.now() - startTime;
  logger.success("Startup", `HTTP server started on port ${settings.port} in ${elapsedMs}ms`);
  logger.info(
    `📊 [Startup] Confidence threshold ${settings.confidenceThreshold}, tool backend ${settings.toolBackend}`
  );
}

startServer().catch((error: unknown) => {
  const code = isOrchestratorError(error) ? ` [${error.code}]` : "";
  logger.fail("Startup", `Fatal error during initialization${code}: ${describeError(error)}`);
  process.exit(1);
});
