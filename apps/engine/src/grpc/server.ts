import * as grpc from "@grpc/grpc-js";
import * as protoLoader from "@grpc/proto-loader";
import { ReflectionService } from "@grpc/reflection";
import path from "path";
import { OrchestrationService } from "../services/orchestration.service";
import { HealthService } from "./health.service";
import { AgentServiceImpl } from "./agent.service";

const PROTO_DIR = path.join(__dirname, "../../../..", "packages/proto");
const HEALTH_PROTO_PATH = path.join(PROTO_DIR, "health.service.proto");
const AGENT_PROTO_PATH = path.join(PROTO_DIR, "agent.service.proto");

const protoOptions: protoLoader.Options = {
  keepCase: true,
  longs: String,
  enums: String,
  defaults: true,
  oneofs: true,
};

function serviceFrom(
  definition: protoLoader.PackageDefinition,
  name: string,
): protoLoader.ServiceDefinition {
  const service = definition[name];
  if (service && !("format" in service)) {
    return service;
  }
  throw new Error(`gRPC service ${name} not found in proto definition`);
}

export function createGrpcServer(service: OrchestrationService): grpc.Server {
  const healthPackageDef = protoLoader.loadSync(HEALTH_PROTO_PATH, protoOptions);
  const agentPackageDef = protoLoader.loadSync(AGENT_PROTO_PATH, protoOptions);

  const server = new grpc.Server({
    "grpc.max_receive_message_length": 4 * 1024 * 1024,
    "grpc.max_send_message_length": 4 * 1024 * 1024,
    "grpc.keepalive_time_ms": 30000,
    "grpc.keepalive_timeout_ms": 10000,
    "grpc.keepalive_permit_without_calls": 1,
  });

  const healthService = new HealthService(service);
  server.addService(serviceFrom(healthPackageDef, "grpc.health.v1.Health"), {
    check: healthService.check.bind(healthService),
    watch: healthService.watch.bind(healthService),
  });

  const agentService = new AgentServiceImpl(service);
  server.addService(serviceFrom(agentPackageDef, "agentdeck.AgentService"), {
    submitTask: agentService.submitTask.bind(agentService),
    startTask: agentService.startTask.bind(agentService),
    pauseTask: agentService.pauseTask.bind(agentService),
    resumeTask: agentService.resumeTask.bind(agentService),
    cancelTask: agentService.cancelTask.bind(agentService),
    getTask: agentService.getTask.bind(agentService),
    listTasks: agentService.listTasks.bind(agentService),
    clearHistory: agentService.clearHistory.bind(agentService),
    watchTasks: agentService.watchTasks.bind(agentService),
  });

  // reflection for grpcurl debugging
  const reflectionService = new ReflectionService({
    ...healthPackageDef,
    ...agentPackageDef,
  });
  reflectionService.addToServer(server);

  return server;
}

export function startGrpcServer(
  server: grpc.Server,
  port: number = 50051,
): Promise<number> {
  return new Promise((resolve, reject) => {
    server.bindAsync(
      `0.0.0.0:${port}`,
      grpc.ServerCredentials.createInsecure(),
      (err, boundPort) => {
        if (err) {
          reject(err);
        } else {
          console.log(`[agentdeck] grpc server listening on port ${boundPort}`);
          resolve(boundPort);
        }
      },
    );
  });
}

export function stopGrpcServer(server: grpc.Server): Promise<void> {
  return new Promise((resolve) => {
    server.tryShutdown((err) => {
      if (err) {
        console.error("[agentdeck] grpc graceful shutdown failed, forcing:", err);
        server.forceShutdown();
      }
      resolve();
    });
  });
}
