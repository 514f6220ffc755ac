import "dotenv/config";
import { loadConfig } from "./config";
import { createDefaultCollaborators } from "./collaborators";
import { createGrpcServer, startGrpcServer, stopGrpcServer } from "./grpc/server";
import { createEngine } from "./engine";

const TAG = "[engine]";

const config = loadConfig();
const engine = createEngine(config, createDefaultCollaborators(config));
const grpcServer = createGrpcServer(engine.tasks);

let shuttingDown = false;

async function main() {
  console.log(
    `${TAG} starting... (pool: ${config.poolSize}, maxQueue: ${config.maxQueueSize}, stage attempts: ${config.stageMaxAttempts})`,
  );

  await startGrpcServer(grpcServer, config.port);
  engine.reaper.start();

  console.log(`${TAG} ready`);
}

async function shutdown(signal: string) {
  if (shuttingDown) return;
  shuttingDown = true;
  console.log(`${TAG} ${signal} received, shutting down...`);

  await engine.shutdown(config.shutdownDeadlineMs);
  await stopGrpcServer(grpcServer);

  console.log(`${TAG} shutdown complete`);
  process.exit(0);
}

function onSignal(signal: string) {
  shutdown(signal).catch((err) => {
    console.error(`${TAG} shutdown failed:`, err);
    process.exit(1);
  });
}

process.on("SIGTERM", () => onSignal("SIGTERM"));
process.on("SIGINT", () => onSignal("SIGINT"));

main().catch((err) => {
  console.error(`${TAG} fatal:`, err);
  process.exit(1);
});
