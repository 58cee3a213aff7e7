import { config as loadEnv } from "dotenv";
import path from "node:path";
import { fileURLToPath } from "node:url";
import cron from "node-cron";
import { type ServiceConfig, describeConfig, loadConfig, platformCredentials } from "./config.js";
import { RunCoordinator, exitCodeFor } from "./coordinator.js";
import { FileDiagnosticsSink } from "./diagnostics.js";
import { ConfigurationError, describeError } from "./errors.js";
import { type Logger, createLogger } from "./logger.js";
import { PlatformClient } from "./platformClient.js";
import { runPreflight } from "./preflight.js";
import { RunTracker } from "./runTracker.js";
import { buildServer } from "./server.js";
import { WeatherClient } from "./weatherClient.js";

const thisDir = path.dirname(fileURLToPath(import.meta.url));
const serviceRoot = path.resolve(thisDir, "..");
const envFiles = [".env", ".env.local"];
for (const file of envFiles) {
  loadEnv({ path: path.join(serviceRoot, file), override: true });
}

function preflight(config: ServiceConfig, logger: Logger) {
  return runPreflight(config, logger, {
    platform: (cfg) => new PlatformClient(cfg, platformCredentials(cfg), logger),
    weather: (cfg) => new WeatherClient(cfg, logger)
  });
}

function createCoordinator(config: ServiceConfig, logger: Logger) {
  return new RunCoordinator(config, logger, {
    sinks: [new FileDiagnosticsSink(config.DATA_DIR)]
  });
}

async function runOnce(config: ServiceConfig, logger: Logger) {
  const controller = new AbortController();
  const cancel = () => {
    logger.warn("Cancellation requested, waiting for in-flight batches");
    controller.abort();
  };
  process.once("SIGINT", cancel);
  process.once("SIGTERM", cancel);

  const result = await createCoordinator(config, logger).run(controller.signal);
  process.exitCode = exitCodeFor(result.status);
}

async function runSchedule(config: ServiceConfig, logger: Logger) {
  const report = await preflight(config, logger);
  if (!report.ok) {
    logger.error({ report }, "Preflight failed, not starting the schedule");
    process.exitCode = 1;
    return;
  }

  const controller = new AbortController();
  const coordinator = createCoordinator(config, logger);
  const tracker = new RunTracker((signal) => coordinator.run(signal));
  const fastify = await buildServer(config, tracker);

  const trigger = (source: string) => {
    if (tracker.running) {
      logger.warn({ source }, "Previous run still in progress, skipping trigger");
      return;
    }
    logger.info({ source }, "Starting relay run");
    tracker.trigger(controller.signal).catch((err) => {
      logger.error({ err }, "Relay run failed");
    });
  };

  const task = cron.schedule(config.CRON_SCHEDULE, () => trigger("schedule"));
  trigger("startup");

  const close = async () => {
    logger.info("Shutting down");
    task.stop();
    controller.abort();
    try {
      await tracker.idle();
      await fastify.close();
    }
    catch (err) {
      logger.error({ err }, "Shutdown did not complete cleanly");
    }
    process.exit(0);
  };

  process.on("SIGINT", () => void close());
  process.on("SIGTERM", () => void close());

  try {
    await fastify.listen({
      port: config.port,
      host: config.host
    });
    logger.info(`Relay status server listening on http://${config.host}:${config.port}`);
  }
  catch (err) {
    logger.error({ err }, "Failed to start status server");
    process.exit(1);
  }
}

async function bootstrap() {
  let config: ServiceConfig;
  try {
    config = loadConfig();
  }
  catch (err) {
    const fallback = createLogger({ LOG_LEVEL: "info" });
    if (err instanceof ConfigurationError) {
      fallback.error({ keys: err.keys }, err.message);
    }
    else {
      fallback.error({ reason: describeError(err) }, "Failed to load configuration");
    }
    process.exitCode = 2;
    return;
  }

  const logger = createLogger(config);
  logger.info(describeConfig(config), "Weather relay configuration");

  if (config.RUN_MODE === "check") {
    const report = await preflight(config, logger);
    logger.info({ report }, report.ok ? "Preflight passed" : "Preflight failed");
    process.exitCode = report.ok ? 0 : 1;
    return;
  }
  if (config.RUN_MODE === "schedule") {
    await runSchedule(config, logger);
    return;
  }
  await runOnce(config, logger);
}

bootstrap().catch((err) => {
  createLogger({ LOG_LEVEL: "error" }).fatal({ err }, "Weather relay crashed");
  process.exit(1);
});
