#!/usr/bin/env node
import { loadConfig } from "./config/config";
import { createLogger } from "./logging/logger";
import { toError } from "./core/errors";
import { JobScheduler } from "./core/scheduler";
import { JobStore } from "./store/job-store";
import { InMemoryJobStore } from "./store/in-memory-job-store";
import { MongoJobStore } from "./store/mongo/mongo-job-store";
import { connectMongo } from "./store/mongo/connect";
import { DockerCliRuntime } from "./runtime/docker-cli-runtime";
import { ContainerHealthProbe } from "./health/health-probe";
import { EventBus } from "./events/event-bus";
import { DeploymentServer } from "./api/server";

async function main(): Promise<void> {
  const config = loadConfig();
  const logger = createLogger("orchestrator", config.logLevel);

  let store: JobStore;
  let closeStore = async (): Promise<void> => undefined;

  if (config.store.backend === "mongo") {
    const { client, db } = await connectMongo({
      uri: config.store.uri,
      dbName: config.store.dbName,
      logger: logger.child("mongo"),
    });
    const mongoStore = new MongoJobStore(db, { logger: logger.child("store") });
    await mongoStore.ready();
    store = mongoStore;
    closeStore = () => client.close();
  } else {
    store = new InMemoryJobStore();
    logger.warn("Using in-memory job store, jobs are lost on restart");
  }

  const runtime = new DockerCliRuntime({
    binary: config.dockerBinary,
    logger: logger.child("docker"),
  });

  const scheduler = new JobScheduler({
    store,
    runtime,
    probe: new ContainerHealthProbe(runtime, { host: config.healthHost }),
    bus: new EventBus({ queueSize: config.eventQueueSize }),
    logger,
    ...config.scheduler,
  });

  scheduler.on("scheduler:error", (err) => {
    logger.error("Scheduler error", err);
  });

  await scheduler.start();

  const server = new DeploymentServer(scheduler, logger);
  await server.listen(config.http.port, config.http.host);

  let stopping = false;
  const shutdown = async (signal: string) => {
    if (stopping) return;
    stopping = true;
    logger.info("Shutting down", { signal });

    await scheduler.stop({
      graceful: true,
      timeoutMs: config.scheduler.timeouts.stopMs,
    });
    await server.close();
    await closeStore();
  };

  for (const signal of ["SIGINT", "SIGTERM"] as const) {
    process.once(signal, () => {
      shutdown(signal).then(
        () => process.exit(0),
        (err: unknown) => {
          logger.error("Shutdown failed", toError(err));
          process.exit(1);
        }
      );
    });
  }
}

main().catch((err: unknown) => {
  console.error(toError(err).message);
  process.exit(1);
});
