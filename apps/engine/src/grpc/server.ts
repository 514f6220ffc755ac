import * as grpc from "@grpc/grpc-js";
import * as protoLoader from "@grpc/proto-loader";
import { ReflectionService } from "@grpc/reflection";
import path from "path";
import { TaskService } from "../services/task.service";
import { HealthService } from "./health.service";
import { PipelineServiceImpl } from "./pipeline.service";

const HEALTH_PROTO_PATH = path.join(
  __dirname,
  "../../../..",
  "packages/proto/health.service.proto",
);
const PIPELINE_PROTO_PATH = path.join(
  __dirname,
  "../../../..",
  "packages/proto/pipeline.service.proto",
);

const protoOptions: protoLoader.Options = {
  keepCase: true,
  longs: String,
  enums: String,
  defaults: true,
  oneofs: true,
};

type ProtoNode =
  | grpc.GrpcObject
  | grpc.ServiceClientConstructor
  | grpc.ProtobufTypeDefinition;

function isNamespace(node: ProtoNode): node is grpc.GrpcObject {
  return typeof node === "object" && !("format" in node && "fileDescriptorProtos" in node);
}

// Walks a dotted name such as "grpc.health.v1.Health" down a loaded package.
export function lookupService(
  root: grpc.GrpcObject,
  name: string,
): grpc.ServiceDefinition {
  let node: ProtoNode | undefined = root;
  for (const segment of name.split(".")) {
    if (!node || !isNamespace(node)) {
      throw new Error(`proto lookup failed at "${segment}" in ${name}`);
    }
    node = node[segment];
  }
  if (!node || typeof node !== "function") {
    throw new Error(`${name} is not a service`);
  }
  return node.service;
}

export function createGrpcServer(tasks: TaskService): grpc.Server {
  const healthPackageDef = protoLoader.loadSync(HEALTH_PROTO_PATH, protoOptions);
  const pipelinePackageDef = protoLoader.loadSync(PIPELINE_PROTO_PATH, protoOptions);

  const healthProto = grpc.loadPackageDefinition(healthPackageDef);
  const pipelineProto = grpc.loadPackageDefinition(pipelinePackageDef);

  const server = new grpc.Server({
    "grpc.max_receive_message_length": 4 * 1024 * 1024,
    "grpc.max_send_message_length": 4 * 1024 * 1024,
    "grpc.keepalive_time_ms": 30000,
    "grpc.keepalive_timeout_ms": 10000,
    "grpc.keepalive_permit_without_calls": 1,
  });

  const healthService = new HealthService(() => !tasks.isShuttingDown);
  server.addService(lookupService(healthProto, "grpc.health.v1.Health"), {
    check: healthService.check.bind(healthService),
    watch: healthService.watch.bind(healthService),
  });

  const pipelineService = new PipelineServiceImpl(tasks);
  server.addService(lookupService(pipelineProto, "pagesmith.PipelineService"), {
    submitTask: pipelineService.submitTask.bind(pipelineService),
    getTaskStatus: pipelineService.getTaskStatus.bind(pipelineService),
    getTaskResult: pipelineService.getTaskResult.bind(pipelineService),
    cancelTask: pipelineService.cancelTask.bind(pipelineService),
  });

  // reflection for grpcurl debugging
  const reflectionService = new ReflectionService({
    ...healthPackageDef,
    ...pipelinePackageDef,
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
          console.log(`[grpc] server listening on port ${boundPort}`);
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
        console.error("[grpc] graceful shutdown failed, forcing:", err);
        server.forceShutdown();
      }
      resolve();
    });
  });
}
