import "dotenv/config";
import { loadConfig } from "./config";
import { loadAgentModules } from "./agent-loader";
import { createGrpcServer, startGrpcServer, stopGrpcServer } from "./grpc/server";
import {
  AgentExecutor,
  OrchestrationService,
  RedisEventPublisher,
  StatusTicker,
  createRedis,
} from "./services";

const TAG = "[agentdeck]";

// Central Configuration
const config = loadConfig();

// Wiring
const executor = new AgentExecutor();
const orchestrator = new OrchestrationService({
  historyLimit: config.historyLimit,
  autoStart: config.autoStart,
  launcher: executor,
});
const ticker = new StatusTicker(orchestrator, config.statusTickMs);
const redis = config.redisUrl ? createRedis(config.redisUrl) : null;
const publisher = redis ? new RedisEventPublisher(redis) : null;
const grpcServer = createGrpcServer(orchestrator);

let shuttingDown = false;

async function main() {
  console.log(`${TAG} starting engine...`);

  const categories = loadAgentModules(config.agentModules);
  console.log(`${TAG} agents registered: ${categories.length > 0 ? categories.join(", ") : "none"}`);

  if (redis && publisher) {
    await redis.ping();
    console.log(`${TAG} redis connected`);
    publisher.attach(orchestrator.events);
  }

  ticker.start();
  await startGrpcServer(grpcServer, config.port);

  console.log(`${TAG} engine ready (history limit: ${config.historyLimit}, auto start: ${config.autoStart})`);
}

// stop intake, cancel what is left, give agents a chance to observe it, then close transports
async function shutdown(signal: string) {
  if (shuttingDown) return;
  shuttingDown = true;
  console.log(`${TAG} ${signal} received, shutting down...`);

  ticker.stop();
  orchestrator.shutdown();
  await executor.drain(config.shutdownGraceMs);
  await orchestrator.events.flush();
  await stopGrpcServer(grpcServer);

  publisher?.stop();
  if (redis) await redis.quit();
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
process.on("SIGUSR2", () => onSignal("SIGUSR2"));

main().catch((err) => {
  console.error(`${TAG} fatal:`, err);
  process.exit(1);
});
